import type { Logger } from 'pino';
import type { EntityClassification, EntityProfile, GatedUnit } from '@/entity/capability_gate';
import type { AnyEnvelope, EnvelopeMeta } from '@/signals/envelope';

export type PhaseStatus = 'complete' | 'partial' | 'skipped' | 'failed';

export interface ModuleContext {
  readonly profile: EntityProfile;
  readonly asOf: string;
  readonly phaseId: string;
  readonly moduleId: string;
  readonly logger: Logger;
  /** Reads a declared input. Reading an undeclared name is a module fault. */
  input(name: string): AnyEnvelope;
  /** Provenance for envelopes this module produces */
  meta(unit?: string | null, confidence?: number): EnvelopeMeta;
}

export interface VoteDeclaration {
  /** Signal name shown in the verdict, e.g. "dcf" */
  readonly signal: string;
  /** Produced envelope whose value is a Direction */
  readonly envelope: string;
}

export interface AnalysisModule {
  readonly id: string;
  /** Inputs the module cannot work without */
  readonly requires: readonly string[];
  /** Inputs the module reads when present; their absence never fails the phase */
  readonly optional?: readonly string[];
  readonly produces: readonly string[];
  readonly vote?: VoteDeclaration;
  run(ctx: ModuleContext): readonly AnyEnvelope[] | Promise<readonly AnyEnvelope[]>;
}

export interface PhaseDefinition extends GatedUnit {
  readonly id: string;
  readonly description?: string;
  readonly excludeFor?: readonly EntityClassification[];
  readonly modules: readonly AnalysisModule[];
}

export type ModuleOutcomeStatus = 'ok' | 'unavailable' | 'fault' | 'not_run';

export interface ModuleOutcome {
  readonly moduleId: string;
  readonly status: ModuleOutcomeStatus;
  readonly error: string | null;
}

export interface PhaseResult {
  readonly phaseId: string;
  readonly status: PhaseStatus;
  readonly envelopes: Readonly<Record<string, AnyEnvelope>>;
  readonly errors: readonly string[];
  readonly modules: readonly ModuleOutcome[];
}

export interface VoteProducer extends VoteDeclaration {
  readonly phaseId: string;
  readonly moduleId: string;
}

export interface PipelineOptions {
  phases: readonly PhaseDefinition[];
  /** Envelope names supplied by ingestion, document extraction and configuration */
  inputs: readonly string[];
  maxConcurrency?: number;
}

export interface PipelineRunRequest {
  profile: EntityProfile;
  seeds: readonly AnyEnvelope[];
  asOf: string;
}
