/**
 * Qualitative votes: governance, moat, ESG and the tone of management
 * commentary and filings.
 */

import type { AnalysisModule } from '@/pipeline/types';
import { asText, available, unavailable } from '@/signals/envelope';
import type { Direction } from '@/synthesis/votes';
import { classifyTone, type Tone, type ToneLexicon } from './text_classifier';
import { labelVote, numericVote, voteFrom, voteName } from './vote_rules';

/** Scores are on a 0-10 scale */
function scaleVote(id: string, input: string, good: number, poor: number): AnalysisModule {
  return numericVote({
    id,
    signal: id,
    input,
    range: [0, 10],
    decide: (score) => {
      if (score >= good) return 'positive';
      if (score < poor) return 'negative';
      return 'neutral';
    },
  });
}

export const governance = scaleVote('governance', 'governance.score', 8, 5);
export const moat = scaleVote('moat', 'moat.score', 6, 3);
export const esg = scaleVote('esg', 'esg.score', 7, 4);

export const TONE_DIRECTION: Record<Tone, Direction> = {
  BULLISH: 'positive',
  MILDLY_POSITIVE: 'positive',
  NEUTRAL: 'neutral',
  CAUTIOUS: 'negative',
  BEARISH: 'negative',
};

/**
 * Classifies management commentary with the given lexicon. The lexicon is
 * read once by the caller, so a run does no file I/O.
 */
export function managementTone(lexicon: ToneLexicon): AnalysisModule {
  return {
    id: 'management_tone',
    requires: ['doc.management_commentary'],
    produces: ['qualitative.management_tone', voteName('management_tone')],
    vote: { signal: 'management_tone', envelope: voteName('management_tone') },
    run(ctx) {
      const text = asText(ctx.input('doc.management_commentary'));
      if (!text.available) {
        const detail = `doc.management_commentary: ${text.value.reason}`;
        return [
          unavailable('qualitative.management_tone', 'upstream_unavailable', ctx.meta(), detail),
          unavailable(voteName('management_tone'), 'upstream_unavailable', ctx.meta(), detail),
        ];
      }

      const result = classifyTone(text.value, lexicon);
      if (!result) {
        const detail = 'commentary carries no tone keywords';
        return [
          unavailable('qualitative.management_tone', 'missing', ctx.meta(), detail),
          unavailable(voteName('management_tone'), 'missing', ctx.meta(), detail),
        ];
      }

      ctx.logger.debug({ tone: result.tone, hits: result.hits }, 'Management tone classified');
      const confidence = Math.min(text.confidence, result.confidence);
      const tone = available('qualitative.management_tone', result.tone, ctx.meta(null, confidence));
      return [tone, voteFrom(ctx, 'management_tone', tone, (t) => TONE_DIRECTION[t])];
    },
  };
}

export const textIntelligence = labelVote({
  id: 'text_intelligence',
  signal: 'text_intelligence',
  input: 'text.overall_tone',
  mapping: {
    POSITIVE: 'positive',
    NEUTRAL: 'neutral',
    NEGATIVE: 'negative',
  },
});
