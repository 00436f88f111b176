/**
 * Run Report Builder
 * Constructs the verdict report from a finished analysis
 */

import type { EngineConfig } from '@/core/config';
import { InputBundleError } from '@/core/errors';
import { contentHash } from '@/core/seed';
import { getRunId, parseDate } from '@/core/time';
import type { PhaseResult } from '@/pipeline/types';
import type { AnyEnvelope } from '@/signals/envelope';
import type { Analysis } from './engine';
import { REPORT_VERSION, type ReportOutput, type ReportPhase, type RunReport } from './types';

function toOutput(env: AnyEnvelope): ReportOutput {
  if (env.available) {
    return {
      name: env.name,
      available: true,
      value: env.value,
      unit: env.unit,
      source_id: env.sourceId,
      confidence: env.confidence,
      reason: null,
      detail: null,
    };
  }
  return {
    name: env.name,
    available: false,
    value: null,
    unit: env.unit,
    source_id: env.sourceId,
    confidence: null,
    reason: env.value.reason,
    detail: env.value.detail,
  };
}

function toPhase(result: PhaseResult): ReportPhase {
  return {
    phase_id: result.phaseId,
    status: result.status,
    errors: [...result.errors],
    modules: result.modules.map((m) => ({ module_id: m.moduleId, status: m.status, error: m.error })),
    outputs: Object.keys(result.envelopes)
      .sort()
      .map((name) => toOutput(result.envelopes[name])),
  };
}

/**
 * Seeds in name order, so the fingerprint does not depend on bundle key order.
 */
export function inputFingerprint(seeds: readonly AnyEnvelope[]): string {
  return contentHash([...seeds].sort((a, b) => a.name.localeCompare(b.name)));
}

export function buildRunReport(
  analysis: Analysis,
  seeds: readonly AnyEnvelope[],
  config: EngineConfig
): RunReport {
  const { profile, run, trust, votes, safety, verdict } = analysis;
  const asOfDate = parseDate(verdict.as_of);
  if (!asOfDate) {
    throw new InputBundleError(`Invalid as-of date "${verdict.as_of}"`, { asOf: verdict.as_of });
  }

  const body: Omit<RunReport, 'run_id' | 'fingerprint'> = {
    report_version: REPORT_VERSION,
    symbol: profile.symbol,
    as_of: verdict.as_of,
    config_version: config.version,
    input_fingerprint: inputFingerprint(seeds),
    profile: {
      classification: profile.classification,
      classification_basis: profile.classificationBasis,
      sector: profile.sector,
      fiscal_years: [...profile.fiscalYears],
    },
    verdict,
    votes: [...votes],
    phases: run.phases.map(toPhase),
    trust: {
      score: trust.score,
      band: trust.band,
      records: trust.records,
      excluded: trust.excluded,
      audit_opinion: trust.audit.opinion,
      going_concern: trust.audit.going_concern,
      audit_flags: trust.audit.flags,
    },
    safety: { checks: safety.checks },
  };

  const fingerprint = contentHash(body);
  return {
    ...body,
    run_id: getRunId(profile.symbol, asOfDate, fingerprint),
    fingerprint,
  };
}
