/**
 * Market votes from the technical and forecasting collaborators.
 */

import { labelVote } from './vote_rules';

export const technical = labelVote({
  id: 'technical',
  signal: 'technical',
  input: 'technical.signal',
  mapping: {
    STRONG_BULLISH: 'positive',
    MILDLY_BULLISH: 'positive',
    NEUTRAL: 'neutral',
    MILDLY_BEARISH: 'negative',
    STRONG_BEARISH: 'negative',
  },
});

export const forecast = labelVote({
  id: 'forecast',
  signal: 'forecast',
  input: 'forecast.trend',
  mapping: {
    BULLISH: 'positive',
    MILDLY_BULLISH: 'positive',
    SIDEWAYS: 'neutral',
    MILDLY_BEARISH: 'negative',
    BEARISH: 'negative',
  },
});
