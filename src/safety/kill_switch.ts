/**
 * Kill Switch
 * Final, independent veto over the candidate rating. Any triggered check
 * forces SUSPENDED whatever the vote says.
 */

import type { SafetyConfig, ValidationConfig } from '@/core/config';
import { parseDate } from '@/core/time';
import { asTextList, type AnyEnvelope } from '@/signals/envelope';
import { asPriceSeries } from '@/signals/series';
import type { FinalRating, Rating } from '@/synthesis/consensus';
import { createChildLogger } from '@/utils/logger';
import { assessStaleness, detectPriceAnomaly, type CheckStatus } from './anomaly';

const logger = createChildLogger('kill_switch');

/** Check order; the first triggered check names the veto reason */
export const SAFETY_CHECKS = ['trust', 'critical_data', 'price_anomaly', 'staleness', 'no_votes'] as const;

export type SafetyCheckKind = (typeof SAFETY_CHECKS)[number];

export interface SafetyCheck {
  check: SafetyCheckKind;
  /** Envelope or data class the check looked at */
  subject: string | null;
  status: CheckStatus;
  detail: string;
}

export interface SafetyDecision {
  rating: FinalRating;
  veto_reason: string | null;
  vetoes: SafetyCheck[];
  checks: SafetyCheck[];
}

export interface SafetyInputs {
  candidate: Rating | null;
  trustScore: number;
  asOf: string;
  source: { get(name: string): AnyEnvelope };
}

function trustCheck(score: number, bands: ValidationConfig['bands']): SafetyCheck {
  const below = score < bands.moderate;
  return {
    check: 'trust',
    subject: null,
    status: below ? 'triggered' : 'clear',
    detail: below
      ? `trust score ${score} below ${bands.moderate}`
      : `trust score ${score} at or above ${bands.moderate}`,
  };
}

function criticalChecks(inputs: SafetyInputs, config: SafetyConfig): SafetyCheck[] {
  return config.critical_envelopes.map((name): SafetyCheck => {
    const env = inputs.source.get(name);
    if (env.available) {
      return { check: 'critical_data', subject: name, status: 'clear', detail: `${name} available` };
    }
    return {
      check: 'critical_data',
      subject: name,
      status: 'triggered',
      detail: `critical input ${name} unavailable (${env.value.reason})`,
    };
  });
}

function priceCheck(inputs: SafetyInputs, config: SafetyConfig): SafetyCheck {
  const series = asPriceSeries(inputs.source.get(config.price_anomaly.series));
  if (!series.available) {
    return {
      check: 'price_anomaly',
      subject: config.price_anomaly.series,
      status: 'indeterminate',
      detail: `no price history (${series.value.reason})`,
    };
  }
  const asOf = parseDate(inputs.asOf);
  if (!asOf) {
    return {
      check: 'price_anomaly',
      subject: config.price_anomaly.series,
      status: 'indeterminate',
      detail: `unparseable as-of date ${inputs.asOf}`,
    };
  }
  const result = detectPriceAnomaly(series.value, config.price_anomaly, asOf);
  return {
    check: 'price_anomaly',
    subject: config.price_anomaly.series,
    status: result.status,
    detail: result.detail,
  };
}

function stalenessChecks(inputs: SafetyInputs, config: SafetyConfig): SafetyCheck[] {
  const asOf = parseDate(inputs.asOf);
  return config.staleness.data_classes.map((dataClass): SafetyCheck => {
    const history = asTextList(inputs.source.get(dataClass.history));
    if (!history.available || !asOf) {
      return {
        check: 'staleness',
        subject: dataClass.name,
        status: 'indeterminate',
        detail: asOf ? `no refresh history for ${dataClass.name}` : `unparseable as-of date ${inputs.asOf}`,
      };
    }
    const result = assessStaleness(history.value, asOf, config.staleness.cadence_multiplier);
    return {
      check: 'staleness',
      subject: dataClass.name,
      status: result.status,
      detail: `${dataClass.name}: ${result.detail}`,
    };
  });
}

function voteCheck(candidate: Rating | null): SafetyCheck {
  return candidate === null
    ? { check: 'no_votes', subject: null, status: 'triggered', detail: 'no signal produced an available vote' }
    : { check: 'no_votes', subject: null, status: 'clear', detail: 'at least one available vote' };
}

/**
 * The veto is absolute: nothing about the candidate can lift it.
 */
export function applyVetoes(candidate: Rating | null, checks: readonly SafetyCheck[]): FinalRating {
  if (checks.some((c) => c.status === 'triggered') || candidate === null) {
    return 'SUSPENDED';
  }
  return candidate;
}

export function evaluateSafety(
  inputs: SafetyInputs,
  config: SafetyConfig,
  bands: ValidationConfig['bands']
): SafetyDecision {
  const checks: SafetyCheck[] = [
    trustCheck(inputs.trustScore, bands),
    ...criticalChecks(inputs, config),
    priceCheck(inputs, config),
    ...stalenessChecks(inputs, config),
    voteCheck(inputs.candidate),
  ].map((check) => Object.freeze(check));

  const vetoes = checks.filter((c) => c.status === 'triggered');
  const rating = applyVetoes(inputs.candidate, checks);

  if (vetoes.length > 0) {
    logger.warn(
      { candidate: inputs.candidate, vetoes: vetoes.map((v) => v.check) },
      'Kill switch triggered'
    );
  }

  return Object.freeze({
    rating,
    veto_reason: vetoes.length > 0 ? vetoes[0].detail : null,
    vetoes,
    checks,
  });
}
