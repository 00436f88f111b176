/**
 * Phase Pipeline
 * Runs phases in dependency order. Modules of all running phases share one
 * bounded pool; each module runs behind its own fault boundary and every
 * phase publishes its envelopes to the store in one batch.
 */

import {
  DataUnavailableError,
  EngineError,
  InputBundleError,
  ModuleFaultError,
  describeError,
} from '@/core/errors';
import { isPhaseApplicable, type EntityProfile } from '@/entity/capability_gate';
import { isEnvelopeList, unavailable, type AnyEnvelope, type UnavailableReason } from '@/signals/envelope';
import { EnvelopeStore } from '@/signals/store';
import { createLimiter, runWithConcurrency, type Limiter } from '@/utils/concurrency';
import { createChildLogger } from '@/utils/logger';
import { buildPhaseGraph, type PhaseGraph } from './graph';
import type {
  AnalysisModule,
  ModuleContext,
  ModuleOutcome,
  PhaseDefinition,
  PhaseResult,
  PhaseStatus,
  PipelineOptions,
  PipelineRunRequest,
  VoteProducer,
} from './types';

const logger = createChildLogger('pipeline');

export const DEFAULT_MAX_CONCURRENCY = 4;

export interface PipelineRun {
  profile: EntityProfile;
  asOf: string;
  /** Topological order */
  phases: PhaseResult[];
  store: EnvelopeStore;
  votes: readonly VoteProducer[];
}

interface ModuleRunResult {
  outcome: ModuleOutcome;
  envelopes: AnyEnvelope[];
  errors: string[];
}

export class PhasePipeline {
  private readonly graph: PhaseGraph;
  private readonly phases: Map<string, PhaseDefinition>;
  private readonly inputs: readonly string[];
  private readonly maxConcurrency: number;

  constructor(options: PipelineOptions) {
    this.graph = buildPhaseGraph(options.phases, options.inputs);
    this.phases = new Map(options.phases.map((phase) => [phase.id, phase]));
    this.inputs = Array.from(new Set(options.inputs)).sort();
    this.maxConcurrency = Math.max(1, Math.floor(options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY));
  }

  get order(): readonly string[] {
    return this.graph.order;
  }

  get votes(): readonly VoteProducer[] {
    return this.graph.votes;
  }

  async run(request: PipelineRunRequest): Promise<PipelineRun> {
    const { profile, asOf } = request;
    const store = new EnvelopeStore(asOf, this.seedEnvelopes(request));
    const limiter = createLimiter(this.maxConcurrency);
    const results = await this.schedule(profile, store, asOf, limiter);
    const phases = this.graph.order.flatMap((id) => {
      const result = results.get(id);
      return result ? [result] : [];
    });

    logger.info(
      {
        symbol: profile.symbol,
        classification: profile.classification,
        phases: phases.length,
        partial: phases.filter((p) => p.status === 'partial').map((p) => p.phaseId),
        failed: phases.filter((p) => p.status === 'failed').map((p) => p.phaseId),
        skipped: phases.filter((p) => p.status === 'skipped').map((p) => p.phaseId),
      },
      'Pipeline run complete'
    );

    return { profile, asOf, phases, store, votes: this.graph.votes };
  }

  /**
   * Caller envelopes plus an unavailable placeholder for every declared input
   * the caller did not supply.
   */
  private seedEnvelopes(request: PipelineRunRequest): AnyEnvelope[] {
    const seen = new Set<string>();
    const problems: string[] = [];
    for (const env of request.seeds) {
      if (seen.has(env.name)) {
        problems.push(`seed "${env.name}" supplied twice`);
      }
      if (this.graph.producers.has(env.name)) {
        problems.push(`seed "${env.name}" collides with a phase output`);
      }
      seen.add(env.name);
    }
    if (problems.length > 0) {
      throw new InputBundleError(`Invalid pipeline seeds: ${problems.join('; ')}`, { problems });
    }

    const placeholders = this.inputs
      .filter((name) => !seen.has(name))
      .map((name) =>
        unavailable(name, 'missing', { sourceId: 'pipeline', computedAt: request.asOf }, 'not supplied')
      );
    return [...request.seeds, ...placeholders];
  }

  /**
   * Ready-set scheduling: a phase is queued as soon as its last dependency has
   * published. The queue keeps topological order so launches are stable.
   * Modules of every running phase draw on the one limiter.
   */
  private schedule(
    profile: EntityProfile,
    store: EnvelopeStore,
    asOf: string,
    limiter: Limiter
  ): Promise<Map<string, PhaseResult>> {
    const order = this.graph.order;
    const position = new Map(order.map((id, index) => [id, index]));
    const waiting = new Map(
      order.map((id) => [id, this.graph.dependencies.get(id)?.size ?? 0])
    );
    const ready = order.filter((id) => waiting.get(id) === 0);
    const results = new Map<string, PhaseResult>();

    return new Promise((resolve, reject) => {
      let active = 0;
      let settled = false;

      const fail = (error: unknown) => {
        if (settled) return;
        settled = true;
        reject(error);
      };

      const release = (id: string) => {
        for (const dependent of this.graph.dependents.get(id) ?? []) {
          const remaining = (waiting.get(dependent) ?? 0) - 1;
          waiting.set(dependent, remaining);
          if (remaining === 0) {
            const at = position.get(dependent) ?? order.length;
            const insertAt = ready.findIndex((queued) => (position.get(queued) ?? 0) > at);
            ready.splice(insertAt === -1 ? ready.length : insertAt, 0, dependent);
          }
        }
      };

      const launch = () => {
        if (settled) return;
        if (results.size === order.length) {
          settled = true;
          resolve(results);
          return;
        }
        while (active < this.maxConcurrency && ready.length > 0) {
          const id = ready.shift();
          const phase = id === undefined ? undefined : this.phases.get(id);
          if (!phase) continue;
          active += 1;
          this.executePhase(phase, profile, store, asOf, limiter)
            .then((result) => {
              active -= 1;
              store.publish(Object.values(result.envelopes));
              results.set(phase.id, result);
              release(phase.id);
              launch();
            })
            .catch(fail);
        }
      };

      launch();
    });
  }

  private async executePhase(
    phase: PhaseDefinition,
    profile: EntityProfile,
    store: EnvelopeStore,
    asOf: string,
    limiter: Limiter
  ): Promise<PhaseResult> {
    if (!isPhaseApplicable(profile, phase)) {
      logger.debug({ phase: phase.id, classification: profile.classification }, 'Phase skipped');
      return freezeResult({
        phaseId: phase.id,
        status: 'skipped',
        envelopes: placeholderOutputs(
          phase,
          'not_applicable',
          asOf,
          `not applicable to ${profile.classification} entities`
        ),
        errors: [],
        modules: notRun(phase),
      });
    }

    const blocking = sharedRequirements(phase).filter((name) => !store.get(name).available);
    if (blocking.length > 0) {
      const detail = `required input unavailable: ${blocking.join(', ')}`;
      logger.info({ phase: phase.id, blocking }, 'Phase failed on unavailable input');
      return freezeResult({
        phaseId: phase.id,
        status: 'failed',
        envelopes: placeholderOutputs(phase, 'phase_failed', asOf, detail),
        errors: [`${phase.id}: ${detail}`],
        modules: notRun(phase),
      });
    }

    const settled = new Map<number, ModuleRunResult>();
    await runWithConcurrency(
      phase.modules,
      async (mod, index) => {
        settled.set(index, await this.invokeModule(phase, mod, profile, store, asOf));
      },
      limiter
    );
    const runs = phase.modules.flatMap((_, index) => {
      const run = settled.get(index);
      return run ? [run] : [];
    });

    const envelopes: Record<string, AnyEnvelope> = {};
    const errors: string[] = [];
    for (const run of runs) {
      for (const env of run.envelopes) envelopes[env.name] = env;
      errors.push(...run.errors);
    }

    const modules = runs.map((run) => run.outcome);
    return freezeResult({
      phaseId: phase.id,
      status: phaseStatus(modules),
      envelopes,
      errors,
      modules,
    });
  }

  private async invokeModule(
    phase: PhaseDefinition,
    mod: AnalysisModule,
    profile: EntityProfile,
    store: EnvelopeStore,
    asOf: string
  ): Promise<ModuleRunResult> {
    const sourceId = `${phase.id}/${mod.id}`;
    const declaredInputs = new Set([...mod.requires, ...(mod.optional ?? [])]);
    const declaredOutputs = new Set(mod.produces);
    const ctx: ModuleContext = {
      profile,
      asOf,
      phaseId: phase.id,
      moduleId: mod.id,
      logger: logger.child({ phase: phase.id, analysis: mod.id }),
      input: (name) => {
        if (!declaredInputs.has(name)) {
          throw new EngineError(
            `${sourceId} read undeclared input "${name}"`,
            'PIPELINE_MISCONFIGURATION',
            { context: { phaseId: phase.id, moduleId: mod.id, name } }
          );
        }
        return store.get(name);
      },
      meta: (unit, confidence) => ({ sourceId, computedAt: asOf, unit: unit ?? null, confidence }),
    };

    let produced: readonly AnyEnvelope[];
    try {
      const returned: unknown = await mod.run(ctx);
      if (!isEnvelopeList(returned)) {
        throw new EngineError(
          `${sourceId} returned ${describeReturn(returned)} instead of envelopes`,
          'MODULE_FAULT',
          { context: { phaseId: phase.id, moduleId: mod.id } }
        );
      }
      produced = returned;
    } catch (error) {
      if (error instanceof DataUnavailableError) {
        const detail = error.message;
        return {
          outcome: { moduleId: mod.id, status: 'unavailable', error: detail },
          envelopes: mod.produces.map((name) =>
            unavailable(name, 'upstream_unavailable', { sourceId, computedAt: asOf }, detail)
          ),
          errors: [],
        };
      }

      const fault = new ModuleFaultError(phase.id, mod.id, error);
      const detail = describeError(error);
      logger.warn({ phase: phase.id, analysis: mod.id, error: detail }, 'Module fault');
      return {
        outcome: { moduleId: mod.id, status: 'fault', error: fault.message },
        envelopes: mod.produces.map((name) =>
          unavailable(name, 'module_fault', { sourceId, computedAt: asOf }, detail)
        ),
        errors: [fault.message],
      };
    }

    const errors: string[] = [];
    const byName = new Map<string, AnyEnvelope>();
    for (const env of produced) {
      if (!declaredOutputs.has(env.name)) {
        errors.push(`${sourceId} produced undeclared envelope "${env.name}"`);
        continue;
      }
      if (byName.has(env.name)) {
        errors.push(`${sourceId} produced "${env.name}" more than once`);
        continue;
      }
      byName.set(env.name, env);
    }

    const envelopes = mod.produces.map(
      (name) =>
        byName.get(name) ??
        unavailable(name, 'not_produced', { sourceId, computedAt: asOf }, `${sourceId} returned no value`)
    );
    if (errors.length > 0) {
      logger.warn({ phase: phase.id, analysis: mod.id, errors }, 'Module output contract violated');
    }

    return {
      outcome: { moduleId: mod.id, status: 'ok', error: null },
      envelopes,
      errors,
    };
  }
}

export function createPipeline(options: PipelineOptions): PhasePipeline {
  return new PhasePipeline(options);
}

/**
 * Names every module of the phase requires. Empty for a phase without modules.
 */
function sharedRequirements(phase: PhaseDefinition): string[] {
  if (phase.modules.length === 0) return [];
  const [first, ...rest] = phase.modules;
  return first.requires.filter((name) => rest.every((mod) => mod.requires.includes(name)));
}

function describeReturn(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'a list holding a non-envelope';
  return `a ${typeof value}`;
}

function notRun(phase: PhaseDefinition): ModuleOutcome[] {
  return phase.modules.map((mod): ModuleOutcome => ({ moduleId: mod.id, status: 'not_run', error: null }));
}

function placeholderOutputs(
  phase: PhaseDefinition,
  reason: UnavailableReason,
  asOf: string,
  detail: string
): Record<string, AnyEnvelope> {
  const envelopes: Record<string, AnyEnvelope> = {};
  for (const mod of phase.modules) {
    for (const name of mod.produces) {
      envelopes[name] = unavailable(name, reason, { sourceId: `${phase.id}/${mod.id}`, computedAt: asOf }, detail);
    }
  }
  return envelopes;
}

function phaseStatus(modules: readonly ModuleOutcome[]): PhaseStatus {
  const faults = modules.filter((m) => m.status === 'fault').length;
  if (faults === 0) return 'complete';
  return faults === modules.length ? 'failed' : 'partial';
}

function freezeResult(result: PhaseResult): PhaseResult {
  return Object.freeze({
    ...result,
    envelopes: Object.freeze({ ...result.envelopes }),
    errors: Object.freeze([...result.errors]),
    modules: Object.freeze(result.modules.map((m) => Object.freeze({ ...m }))),
  });
}
