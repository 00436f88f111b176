/**
 * Votes
 * One vote per registered vote producer, read from its vote envelope after
 * the pipeline has run. The synthesizer sees only this stream.
 */

import { asShape, type AnyEnvelope, type Envelope } from '@/signals/envelope';
import type { UnavailableReason } from '@/signals/envelope';
import type { VoteProducer } from '@/pipeline/types';

export type Direction = 'positive' | 'neutral' | 'negative';

export const DIRECTIONS: readonly Direction[] = ['positive', 'neutral', 'negative'];

export function isDirection(value: unknown): value is Direction {
  return DIRECTIONS.some((d) => d === value);
}

export function asDirection(env: AnyEnvelope): Envelope<Direction> {
  return asShape(env, isDirection, 'direction');
}

/**
 * Value of a vote envelope: the direction plus the figure it was read from.
 */
export interface VoteValue {
  direction: Direction;
  /** Envelope the direction was derived from */
  basis: string | null;
  basis_value: number | string | null;
  rationale: string | null;
}

export function isVoteValue(value: unknown): value is VoteValue {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const record: Record<string, unknown> = { ...value };
  return (
    isDirection(record.direction) &&
    (record.basis === null || typeof record.basis === 'string') &&
    (record.basis_value === null || typeof record.basis_value === 'number' || typeof record.basis_value === 'string') &&
    (record.rationale === null || typeof record.rationale === 'string')
  );
}

/**
 * Reads a vote envelope. A bare direction is accepted and carries no basis.
 */
export function asVoteValue(env: AnyEnvelope): Envelope<VoteValue> {
  const bare = asDirection(env);
  if (bare.available) {
    return Object.freeze({
      ...bare,
      value: { direction: bare.value, basis: null, basis_value: null, rationale: null },
    });
  }
  if (!env.available) return env;
  return asShape(env, isVoteValue, 'direction or vote');
}

export interface Vote {
  signal_name: string;
  phase_id: string;
  module_id: string;
  direction: Direction | null;
  available: boolean;
  /** Envelope the direction was read from */
  basis: string | null;
  basis_value: number | string | null;
  rationale: string | null;
  /** Why the vote is unavailable */
  reason: UnavailableReason | null;
  detail: string | null;
}

export interface VoteTally {
  registered: number;
  available: number;
  unavailable: number;
  /** Unavailable because the phase was gated out for this entity */
  not_applicable: number;
  positive: number;
  neutral: number;
  negative: number;
}

export interface EnvelopeSource {
  get(name: string): AnyEnvelope;
}

/**
 * Reads every producer's vote envelope. Order follows the producers, which
 * follow phase declaration order.
 */
export function collectVotes(producers: readonly VoteProducer[], source: EnvelopeSource): Vote[] {
  return producers.map((producer) => {
    const env = asVoteValue(source.get(producer.envelope));
    const base = {
      signal_name: producer.signal,
      phase_id: producer.phaseId,
      module_id: producer.moduleId,
    };
    if (!env.available) {
      return Object.freeze({
        ...base,
        direction: null,
        available: false,
        basis: null,
        basis_value: null,
        rationale: null,
        reason: env.value.reason,
        detail: env.value.detail,
      });
    }
    return Object.freeze({
      ...base,
      direction: env.value.direction,
      available: true,
      basis: env.value.basis,
      basis_value: env.value.basis_value,
      rationale: env.value.rationale,
      reason: null,
      detail: null,
    });
  });
}

export function tallyVotes(votes: readonly Vote[]): VoteTally {
  const tally: VoteTally = {
    registered: votes.length,
    available: 0,
    unavailable: 0,
    not_applicable: 0,
    positive: 0,
    neutral: 0,
    negative: 0,
  };

  for (const vote of votes) {
    if (!vote.available || vote.direction === null) {
      tally.unavailable += 1;
      if (vote.reason === 'not_applicable') tally.not_applicable += 1;
      continue;
    }
    tally.available += 1;
    tally[vote.direction] += 1;
  }

  return tally;
}
