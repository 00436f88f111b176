/**
 * Vote rule builders
 * Most vote producers read one collaborator value and bucket it into a
 * direction. These builders turn such a rule into an AnalysisModule.
 */

import type { AnalysisModule, ModuleContext } from '@/pipeline/types';
import {
  asNumber,
  asText,
  available,
  mapEnvelope,
  unavailable,
  type Envelope,
} from '@/signals/envelope';
import { isDirection, type Direction, type VoteValue } from '@/synthesis/votes';

export function voteName(signal: string): string {
  return `vote.${signal}`;
}

function basisValue(value: unknown): number | string | null {
  if (typeof value === 'number') return Number(value.toFixed(2));
  return typeof value === 'string' ? value : null;
}

/**
 * Wraps a direction (or its absence) as the signal's vote envelope. The vote
 * names its basis envelope and the value it was read from.
 */
export function voteFrom<T>(
  ctx: ModuleContext,
  signal: string,
  basis: Envelope<T>,
  decide: (value: T) => Direction | null
): Envelope<VoteValue> {
  const name = voteName(signal);
  if (!basis.available) {
    return unavailable(name, 'upstream_unavailable', ctx.meta(), `${basis.name}: ${basis.value.reason}`);
  }
  const direction = decide(basis.value);
  if (direction === null) {
    return unavailable(name, 'invalid_value', ctx.meta(), `${basis.name} has no direction`);
  }
  const shown = basisValue(basis.value);
  const rationale =
    shown === null ? `${basis.name} (${direction})` : `${basis.name} = ${shown} (${direction})`;
  return available(
    name,
    { direction, basis: basis.name, basis_value: shown, rationale },
    ctx.meta(null, basis.confidence)
  );
}

export interface NumericVoteRule {
  id: string;
  signal: string;
  input: string;
  /** Inclusive bounds of values the rule accepts; others are invalid */
  range?: [number, number];
  decide: (value: number) => Direction;
}

export function numericVote(rule: NumericVoteRule): AnalysisModule {
  const name = voteName(rule.signal);
  return {
    id: rule.id,
    requires: [rule.input],
    produces: [name],
    vote: { signal: rule.signal, envelope: name },
    run(ctx) {
      const value = asNumber(ctx.input(rule.input));
      if (value.available && rule.range) {
        const [min, max] = rule.range;
        if (value.value < min || value.value > max) {
          return [
            unavailable(name, 'invalid_value', ctx.meta(), `${rule.input}=${value.value} outside [${min}, ${max}]`),
          ];
        }
      }
      return [voteFrom(ctx, rule.signal, value, rule.decide)];
    },
  };
}

/** Upper-cases and joins words with underscores: "Mildly bullish" -> "MILDLY_BULLISH" */
export function normalizeLabel(label: string): string {
  return label.trim().toUpperCase().replace(/[\s-]+/g, '_');
}

export interface LabelVoteRule {
  id: string;
  signal: string;
  input: string;
  /** Keys are normalized labels */
  mapping: Readonly<Record<string, Direction>>;
}

export function labelVote(rule: LabelVoteRule): AnalysisModule {
  const name = voteName(rule.signal);
  return {
    id: rule.id,
    requires: [rule.input],
    produces: [name],
    vote: { signal: rule.signal, envelope: name },
    run(ctx) {
      const label = asText(ctx.input(rule.input));
      return [voteFrom(ctx, rule.signal, label, (text) => lookupDirection(rule.mapping, text))];
    },
  };
}

export function lookupDirection(
  mapping: Readonly<Record<string, Direction>>,
  label: string
): Direction | null {
  const direction = mapping[normalizeLabel(label)];
  return isDirection(direction) ? direction : null;
}

/**
 * Labels a numeric envelope, e.g. a zone or risk level derived from a score.
 */
export function labelFrom(
  ctx: ModuleContext,
  name: string,
  basis: Envelope<number>,
  classify: (value: number) => string
): Envelope<string> {
  return mapEnvelope(basis, name, classify, ctx.meta());
}
