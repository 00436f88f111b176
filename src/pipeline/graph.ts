/**
 * Phase dependency graph.
 * Built once at pipeline construction; every wiring problem is collected and
 * reported together as a PipelineMisconfigurationError.
 */

import { PipelineMisconfigurationError } from '@/core/errors';
import type { PhaseDefinition, VoteProducer } from './types';

export interface Producer {
  phaseId: string;
  moduleId: string;
}

export interface PhaseGraph {
  /** Topological order; ties keep declaration order */
  order: string[];
  /** Phases grouped by depth; phases in one layer are independent */
  layers: string[][];
  dependencies: Map<string, Set<string>>;
  dependents: Map<string, Set<string>>;
  producers: Map<string, Producer>;
  votes: VoteProducer[];
}

export function buildPhaseGraph(
  phases: readonly PhaseDefinition[],
  inputs: readonly string[]
): PhaseGraph {
  const problems: string[] = [];
  const inputSet = new Set(inputs);
  const producers = new Map<string, Producer>();
  const phaseIds = new Set<string>();
  const moduleIds = new Set<string>();
  const signals = new Set<string>();
  const votes: VoteProducer[] = [];

  for (const phase of phases) {
    if (!phase.id.trim()) {
      problems.push('phase with empty id');
    }
    if (phaseIds.has(phase.id)) {
      problems.push(`duplicate phase id "${phase.id}"`);
    }
    phaseIds.add(phase.id);

    for (const mod of phase.modules) {
      const qualified = `${phase.id}/${mod.id}`;
      if (moduleIds.has(mod.id)) {
        problems.push(`duplicate module id "${mod.id}" in phase "${phase.id}"`);
      }
      moduleIds.add(mod.id);

      for (const name of mod.produces) {
        const existing = producers.get(name);
        if (existing) {
          problems.push(
            `envelope "${name}" produced by both ${existing.phaseId}/${existing.moduleId} and ${qualified}`
          );
          continue;
        }
        if (inputSet.has(name)) {
          problems.push(`envelope "${name}" produced by ${qualified} is also a pipeline input`);
          continue;
        }
        producers.set(name, { phaseId: phase.id, moduleId: mod.id });
      }

      if (mod.vote) {
        if (!mod.produces.includes(mod.vote.envelope)) {
          problems.push(`${qualified} votes through "${mod.vote.envelope}" which it does not produce`);
        }
        if (signals.has(mod.vote.signal)) {
          problems.push(`duplicate vote signal "${mod.vote.signal}"`);
        }
        signals.add(mod.vote.signal);
        votes.push({ ...mod.vote, phaseId: phase.id, moduleId: mod.id });
      }
    }
  }

  const dependencies = new Map<string, Set<string>>();
  const dependents = new Map<string, Set<string>>();
  for (const phase of phases) {
    dependencies.set(phase.id, new Set());
    dependents.set(phase.id, new Set());
  }

  for (const phase of phases) {
    const deps = dependencies.get(phase.id) ?? new Set<string>();
    for (const mod of phase.modules) {
      for (const name of [...mod.requires, ...(mod.optional ?? [])]) {
        if (inputSet.has(name)) continue;
        const producer = producers.get(name);
        if (!producer) {
          problems.push(`${phase.id}/${mod.id} requires unknown envelope "${name}"`);
          continue;
        }
        if (producer.phaseId === phase.id) {
          problems.push(
            `${phase.id}/${mod.id} requires "${name}" produced inside the same phase by ${producer.moduleId}`
          );
          continue;
        }
        deps.add(producer.phaseId);
        dependents.get(producer.phaseId)?.add(phase.id);
      }
    }
  }

  if (problems.length > 0) {
    throw new PipelineMisconfigurationError(problems);
  }

  const { order, layers, cyclic } = topologicalLayers(
    phases.map((p) => p.id),
    dependencies
  );
  if (cyclic.length > 0) {
    throw new PipelineMisconfigurationError([`dependency cycle between phases: ${cyclic.join(', ')}`]);
  }

  return { order, layers, dependencies, dependents, producers, votes };
}

/**
 * Kahn's algorithm by layers. Anything left over sits on a cycle.
 */
function topologicalLayers(
  ids: string[],
  dependencies: Map<string, Set<string>>
): { order: string[]; layers: string[][]; cyclic: string[] } {
  const placed = new Set<string>();
  const order: string[] = [];
  const layers: string[][] = [];

  let layer = ids.filter((id) => (dependencies.get(id)?.size ?? 0) === 0);
  while (layer.length > 0) {
    layers.push(layer);
    for (const id of layer) {
      placed.add(id);
      order.push(id);
    }
    const next: string[] = [];
    for (const id of ids) {
      if (placed.has(id)) continue;
      const deps = dependencies.get(id) ?? new Set<string>();
      if (Array.from(deps).every((dep) => placed.has(dep))) next.push(id);
    }
    layer = next;
  }

  const cyclic = ids.filter((id) => !placed.has(id));
  return { order, layers, cyclic };
}
