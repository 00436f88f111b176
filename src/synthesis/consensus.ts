/**
 * Consensus Synthesizer
 * Equal-weight vote over available signals. Knows nothing about the modules
 * behind the votes.
 */

import type { SynthesisConfig } from '@/core/config';
import type { TrustBand } from '@/validation/cross_source';
import { tallyVotes, type Vote, type VoteTally } from './votes';

export type Rating = 'BUY' | 'HOLD' | 'SELL';
export type FinalRating = Rating | 'SUSPENDED';
export type Confidence = 'HIGH' | 'MEDIUM' | 'LOW';

export interface Consensus {
  /** null when no vote is available */
  candidate_rating: Rating | null;
  positive_fraction: number | null;
  /** Available votes over votes that apply to this entity */
  coverage: number | null;
  confidence: Confidence;
  tally: VoteTally;
}

/**
 * Unavailable votes never enter the denominator; neutral votes do.
 */
export function positiveFraction(tally: VoteTally): number | null {
  if (tally.available === 0) return null;
  return tally.positive / tally.available;
}

/**
 * Thresholds are inclusive and compared without rounding.
 */
export function ratingFor(fraction: number, config: SynthesisConfig): Rating {
  if (fraction >= config.buy_threshold) return 'BUY';
  if (fraction >= config.hold_threshold) return 'HOLD';
  return 'SELL';
}

export function voteCoverage(tally: VoteTally): number | null {
  const applicable = tally.registered - tally.not_applicable;
  if (applicable <= 0) return null;
  return tally.available / applicable;
}

export function confidenceFor(
  coverage: number | null,
  trustBand: TrustBand,
  config: SynthesisConfig
): Confidence {
  if (coverage === null || coverage < config.low_confidence_coverage || trustBand === 'UNRELIABLE') {
    return 'LOW';
  }
  if (coverage >= config.high_confidence_coverage && trustBand === 'HIGH') {
    return 'HIGH';
  }
  return 'MEDIUM';
}

export function synthesize(
  votes: readonly Vote[],
  trustBand: TrustBand,
  config: SynthesisConfig
): Consensus {
  const tally = tallyVotes(votes);
  const fraction = positiveFraction(tally);
  const coverage = voteCoverage(tally);

  return Object.freeze({
    candidate_rating: fraction === null ? null : ratingFor(fraction, config),
    positive_fraction: fraction,
    coverage,
    confidence: fraction === null ? 'LOW' : confidenceFor(coverage, trustBand, config),
    tally: Object.freeze(tally),
  });
}
