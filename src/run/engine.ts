/**
 * Verdict engine
 * Entity profile -> phase pipeline -> cross-source trust -> consensus ->
 * kill switch. The caller supplies the seed envelopes and receives one frozen
 * verdict. Only the config and lexicon fallbacks touch the filesystem, and
 * both are read before the pipeline starts.
 */

import { getEngineConfig, type EngineConfig } from '@/core/config';
import { InputBundleError } from '@/core/errors';
import { parseDate } from '@/core/time';
import { createEntityProfile, type ClassificationHints, type EntityProfile } from '@/entity/capability_gate';
import {
  catalogInputs,
  defaultPhases,
  loadCatalogResources,
  type CatalogResources,
} from '@/pipeline/catalog';
import { createPipeline, type PipelineRun } from '@/pipeline/runner';
import type { PhaseDefinition } from '@/pipeline/types';
import { evaluateSafety, type SafetyDecision } from '@/safety/kill_switch';
import type { AnyEnvelope } from '@/signals/envelope';
import { synthesize, type Consensus } from '@/synthesis/consensus';
import { collectVotes, type Vote } from '@/synthesis/votes';
import { createChildLogger } from '@/utils/logger';
import { validateSources, type TrustAssessment } from '@/validation/cross_source';
import type { Verdict } from './types';

const logger = createChildLogger('engine');

export interface AnalyzeRequest {
  hints: ClassificationHints;
  asOf: string;
  seeds: readonly AnyEnvelope[];
}

export interface AnalyzeOptions {
  config?: EngineConfig;
  /** Replaces the default phase catalog */
  phases?: readonly PhaseDefinition[];
  /** Lexicons for the default catalog; read from config/lexicons/ when omitted */
  resources?: CatalogResources;
}

export interface Analysis {
  profile: EntityProfile;
  run: PipelineRun;
  trust: TrustAssessment;
  votes: readonly Vote[];
  consensus: Consensus;
  safety: SafetyDecision;
  verdict: Verdict;
}

export function buildVerdict(
  profile: EntityProfile,
  asOf: string,
  trust: TrustAssessment,
  consensus: Consensus,
  safety: SafetyDecision
): Verdict {
  const { tally } = consensus;
  return Object.freeze({
    symbol: profile.symbol,
    as_of: asOf,
    rating: safety.rating,
    candidate_rating: consensus.candidate_rating,
    positive_fraction: consensus.positive_fraction,
    trust_score: trust.score,
    trust_band: trust.band,
    confidence: consensus.confidence,
    votes: Object.freeze({
      registered: tally.registered,
      available: tally.available,
      unavailable: tally.unavailable,
      positive: tally.positive,
      neutral: tally.neutral,
      negative: tally.negative,
    }),
    veto_reason: safety.veto_reason,
    vetoes: safety.vetoes,
  });
}

export async function analyze(request: AnalyzeRequest, options: AnalyzeOptions = {}): Promise<Analysis> {
  if (!parseDate(request.asOf)) {
    throw new InputBundleError(`Invalid as-of date "${request.asOf}"`, { asOf: request.asOf });
  }
  const config = options.config ?? getEngineConfig();
  const phases = options.phases ?? defaultPhases(options.resources ?? loadCatalogResources());

  const pipeline = createPipeline({
    phases,
    inputs: catalogInputs(phases, config),
    maxConcurrency: config.pipeline.max_concurrency,
  });

  const profile = createEntityProfile(request.hints);
  logger.info(
    { symbol: profile.symbol, classification: profile.classification, basis: profile.classificationBasis },
    'Entity classified'
  );

  const run = await pipeline.run({ profile, seeds: request.seeds, asOf: request.asOf });
  const trust = validateSources(run.store, config.validation);
  const votes = collectVotes(run.votes, run.store);
  const consensus = synthesize(votes, trust.band, config.synthesis);
  const safety = evaluateSafety(
    {
      candidate: consensus.candidate_rating,
      trustScore: trust.score,
      asOf: request.asOf,
      source: run.store,
    },
    config.safety,
    config.validation.bands
  );
  const verdict = buildVerdict(profile, request.asOf, trust, consensus, safety);

  logger.info(
    {
      symbol: verdict.symbol,
      rating: verdict.rating,
      candidate: verdict.candidate_rating,
      positiveFraction: verdict.positive_fraction,
      trustScore: verdict.trust_score,
      confidence: verdict.confidence,
      votes: verdict.votes,
    },
    'Verdict reached'
  );

  return Object.freeze({ profile, run, trust, votes, consensus, safety, verdict });
}
