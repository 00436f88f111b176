/**
 * Cross-Source Validator
 * Pairs each configured concept's ingestion value with the value read from the
 * primary filing, corrects reporting-unit and corporate-action differences,
 * and folds the outcome into a Trust Score.
 */

import type { ConceptPairConfig, ValidationConfig } from '@/core/config';
import {
  asBoolean,
  asNumber,
  asText,
  asTextList,
  unavailableReason,
  type AnyEnvelope,
} from '@/signals/envelope';
import { createChildLogger } from '@/utils/logger';
import {
  classifyObservations,
  isAtLeast,
  isModifiedOpinion,
  parseAuditOpinion,
  type AuditFlag,
  type AuditOpinion,
} from './auditor';

const logger = createChildLogger('cross_source');

export type MatchStatus = 'match' | 'mismatch' | 'unverifiable';
export type Adjustment = 'none' | 'unit_scale' | 'corporate_action';
export type TrustBand = 'HIGH' | 'MODERATE' | 'UNRELIABLE';

export interface TrustRecord {
  concept: string;
  source_a: string;
  source_b: string;
  source_a_value: number | null;
  source_b_value: number | null;
  /** Secondary value after unit or corporate-action correction */
  normalized_b_value: number | null;
  /** Relative difference of the compared pair, 0..1 */
  normalized_delta: number | null;
  match: MatchStatus;
  adjustment: Adjustment;
  factor: number | null;
  detail: string;
}

export interface AuditAssessment {
  opinion: AuditOpinion | null;
  going_concern: boolean | null;
  flags: AuditFlag[];
  opinion_penalty: number;
  flag_penalty: number;
}

export interface TrustAssessment {
  score: number;
  band: TrustBand;
  records: TrustRecord[];
  /** Concepts left out because a side was gated out for this entity */
  excluded: string[];
  audit: AuditAssessment;
  counts: { match: number; mismatch: number; unverifiable: number };
}

export interface EnvelopeSource {
  get(name: string): AnyEnvelope;
}

type ComparisonConfig = Pick<ValidationConfig, 'relative_tolerance' | 'absolute_threshold' | 'absolute_tolerance'>;

export function relativeDelta(a: number, b: number): number {
  const scale = Math.max(Math.abs(a), Math.abs(b));
  return scale === 0 ? 0 : Math.abs(a - b) / scale;
}

/**
 * Small magnitudes are compared by absolute difference, everything else by
 * relative difference. Both limits are inclusive.
 */
export function valuesAgree(a: number, b: number, config: ComparisonConfig): boolean {
  if (Math.max(Math.abs(a), Math.abs(b)) < config.absolute_threshold) {
    return Math.abs(a - b) <= config.absolute_tolerance;
  }
  return relativeDelta(a, b) <= config.relative_tolerance;
}

function corporateActionFactor(a: number, b: number, config: ValidationConfig): number | null {
  if (a <= 0 || b <= 0) return null;
  const ratio = b / a;
  let best: { factor: number; error: number } | null = null;
  for (const multiplier of config.corporate_action.multipliers) {
    for (const factor of [multiplier, 1 / multiplier]) {
      const error = Math.abs(ratio - factor) / factor;
      if (error < config.corporate_action.tolerance && (!best || error < best.error)) {
        best = { factor, error };
      }
    }
  }
  return best ? best.factor : null;
}

/**
 * Compares one concept. Returns null when the concept does not apply to the
 * entity.
 */
export function compareConcept(
  concept: ConceptPairConfig,
  primary: AnyEnvelope,
  secondary: AnyEnvelope,
  config: ValidationConfig
): TrustRecord | null {
  if (unavailableReason(primary) === 'not_applicable' || unavailableReason(secondary) === 'not_applicable') {
    return null;
  }

  const a = asNumber(primary);
  const b = asNumber(secondary);
  const base = {
    concept: concept.concept,
    source_a: primary.sourceId,
    source_b: secondary.sourceId,
    source_a_value: a.available ? a.value : null,
    source_b_value: b.available ? b.value : null,
  };

  if (!a.available || !b.available) {
    const missing = [a, b].filter((env) => !env.available).map((env) => env.name);
    return {
      ...base,
      normalized_b_value: null,
      normalized_delta: null,
      match: 'unverifiable',
      adjustment: 'none',
      factor: null,
      detail: `no value for ${missing.join(' and ')}`,
    };
  }

  const direct = relativeDelta(a.value, b.value);
  if (valuesAgree(a.value, b.value, config)) {
    return {
      ...base,
      normalized_b_value: b.value,
      normalized_delta: direct,
      match: 'match',
      adjustment: 'none',
      factor: null,
      detail: 'values agree',
    };
  }

  for (const factor of config.scale_factors) {
    const scaled = b.value * factor;
    if (valuesAgree(a.value, scaled, config)) {
      return {
        ...base,
        normalized_b_value: scaled,
        normalized_delta: relativeDelta(a.value, scaled),
        match: 'match',
        adjustment: 'unit_scale',
        factor,
        detail: `values agree after scaling the filing value by ${factor}`,
      };
    }
  }

  if (concept.per_share) {
    const factor = corporateActionFactor(a.value, b.value, config);
    if (factor !== null) {
      const adjusted = b.value / factor;
      return {
        ...base,
        normalized_b_value: adjusted,
        normalized_delta: relativeDelta(a.value, adjusted),
        match: 'match',
        adjustment: 'corporate_action',
        factor,
        detail: `filing value is ${factor}x the ingestion value, consistent with a share-count change`,
      };
    }
  }

  return {
    ...base,
    normalized_b_value: b.value,
    normalized_delta: direct,
    match: 'mismatch',
    adjustment: 'none',
    factor: null,
    detail: `values differ by ${(direct * 100).toFixed(2)}%`,
  };
}

export function assessAudit(source: EnvelopeSource, config: ValidationConfig): AuditAssessment {
  const opinionEnv = asText(source.get(config.audit_inputs.opinion));
  const goingConcernEnv = asBoolean(source.get(config.audit_inputs.going_concern));
  const observationsEnv = asTextList(source.get(config.audit_inputs.observations));

  const opinion = opinionEnv.available ? parseAuditOpinion(opinionEnv.value) : null;
  const goingConcern = goingConcernEnv.available ? goingConcernEnv.value : null;
  const flags = observationsEnv.available ? classifyObservations(observationsEnv.value) : [];

  const modified = (opinion !== null && isModifiedOpinion(opinion)) || goingConcern === true;
  const severe = flags.filter((flag) => isAtLeast(flag.severity, 'HIGH')).length;

  return {
    opinion,
    going_concern: goingConcern,
    flags,
    opinion_penalty: modified ? config.penalties.audit_opinion : 0,
    flag_penalty: Math.min(severe * config.penalties.auditor_flag, config.penalties.auditor_flag_cap),
  };
}

export function trustScore(
  counts: { mismatch: number; unverifiable: number },
  auditPenalty: number,
  penalties: ValidationConfig['penalties']
): number {
  const raw =
    100 -
    penalties.mismatch * counts.mismatch -
    penalties.unverifiable * counts.unverifiable -
    auditPenalty;
  return Math.min(100, Math.max(0, raw));
}

export function trustBand(score: number, bands: ValidationConfig['bands']): TrustBand {
  if (score >= bands.high) return 'HIGH';
  if (score >= bands.moderate) return 'MODERATE';
  return 'UNRELIABLE';
}

export function validateSources(source: EnvelopeSource, config: ValidationConfig): TrustAssessment {
  const records: TrustRecord[] = [];
  const excluded: string[] = [];

  for (const concept of config.concepts) {
    const record = compareConcept(concept, source.get(concept.primary), source.get(concept.secondary), config);
    if (record) {
      records.push(Object.freeze(record));
    } else {
      excluded.push(concept.concept);
    }
  }

  const counts = {
    match: records.filter((r) => r.match === 'match').length,
    mismatch: records.filter((r) => r.match === 'mismatch').length,
    unverifiable: records.filter((r) => r.match === 'unverifiable').length,
  };
  const audit = assessAudit(source, config);
  const score = trustScore(counts, audit.opinion_penalty + audit.flag_penalty, config.penalties);
  const band = trustBand(score, config.bands);

  logger.debug({ score, band, ...counts, excluded }, 'Cross-source validation complete');
  for (const record of records) {
    if (record.match === 'mismatch') {
      logger.info(
        { concept: record.concept, a: record.source_a_value, b: record.source_b_value },
        'Sources disagree'
      );
    }
  }

  return Object.freeze({ score, band, records, excluded, audit, counts });
}
