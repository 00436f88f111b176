/**
 * Deterministic hashing for run fingerprints
 */

import { createHash } from 'crypto';

export function deterministicHash(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

export function contentHash(content: unknown): string {
  const normalized = stableStringify(content);
  return deterministicHash(normalized);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function stableStringify(obj: unknown): string {
  if (obj === undefined) {
    return 'null';
  }
  if (obj === null || typeof obj !== 'object') {
    return JSON.stringify(obj);
  }

  if (Array.isArray(obj)) {
    return '[' + obj.map(stableStringify).join(',') + ']';
  }

  if (!isRecord(obj)) {
    return JSON.stringify(obj);
  }

  const keys = Object.keys(obj)
    .filter((key) => obj[key] !== undefined)
    .sort();
  const pairs = keys.map((key) => JSON.stringify(key) + ':' + stableStringify(obj[key]));
  return '{' + pairs.join(',') + '}';
}
