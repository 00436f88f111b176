/**
 * Append-only envelope store.
 * Each batch is published atomically; an envelope name is written once.
 */

import { EngineError } from '@/core/errors';
import { unavailable, type AnyEnvelope } from './envelope';

// Envelopes arrive shallow-frozen, so children are visited regardless.
function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export class EnvelopeStore {
  private readonly entries = new Map<string, AnyEnvelope>();

  constructor(
    private readonly computedAt: string,
    initial: Iterable<AnyEnvelope> = []
  ) {
    this.publish(Array.from(initial));
  }

  /**
   * Adds a batch. Fails without writing anything if a name repeats inside the
   * batch or is already present.
   */
  publish(batch: readonly AnyEnvelope[]): void {
    const seen = new Set<string>();
    const conflicts: string[] = [];
    for (const env of batch) {
      if (seen.has(env.name) || this.entries.has(env.name)) {
        conflicts.push(env.name);
      }
      seen.add(env.name);
    }
    if (conflicts.length > 0) {
      throw new EngineError(
        `Envelope already published: ${conflicts.join(', ')}`,
        'PIPELINE_MISCONFIGURATION',
        { context: { conflicts } }
      );
    }

    for (const env of batch) {
      this.entries.set(env.name, deepFreeze(env));
    }
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /**
   * Returns the published envelope, or an unavailable one when nothing was
   * published under the name.
   */
  get(name: string): AnyEnvelope {
    return (
      this.entries.get(name) ??
      unavailable(name, 'missing', { sourceId: 'store', computedAt: this.computedAt })
    );
  }

  names(): string[] {
    return Array.from(this.entries.keys()).sort();
  }

  get size(): number {
    return this.entries.size;
  }

  toRecord(): Record<string, AnyEnvelope> {
    const record: Record<string, AnyEnvelope> = {};
    for (const name of this.names()) {
      const env = this.entries.get(name);
      if (env) record[name] = env;
    }
    return record;
  }
}
