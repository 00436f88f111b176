/**
 * Signal Envelope
 * Value-or-unavailable container used at every module boundary.
 *
 * A producer either returns a concrete value with provenance or an
 * Unavailable marker. Nothing in the engine turns a missing value into zero
 * or into a hardcoded constant.
 */

export const UNAVAILABLE_REASONS = [
  'missing',
  'not_applicable',
  'module_fault',
  'upstream_unavailable',
  'type_mismatch',
  'invalid_value',
  'not_produced',
  'phase_failed',
] as const;

export type UnavailableReason = (typeof UNAVAILABLE_REASONS)[number];

export interface Unavailable {
  readonly kind: 'unavailable';
  readonly reason: UnavailableReason;
  readonly detail: string | null;
}

interface EnvelopeBase {
  readonly name: string;
  readonly unit: string | null;
  readonly sourceId: string;
  readonly computedAt: string;
}

export interface AvailableEnvelope<T> extends EnvelopeBase {
  readonly available: true;
  readonly value: T;
  /** 0..1, how much the producer trusts the value */
  readonly confidence: number;
}

export interface UnavailableEnvelope extends EnvelopeBase {
  readonly available: false;
  readonly value: Unavailable;
}

export type Envelope<T> = AvailableEnvelope<T> | UnavailableEnvelope;
export type AnyEnvelope = Envelope<unknown>;

export interface EnvelopeMeta {
  sourceId: string;
  computedAt: string;
  unit?: string | null;
  confidence?: number;
}

function clampConfidence(confidence: number | undefined): number {
  if (confidence === undefined || !Number.isFinite(confidence)) return 1;
  return Math.min(1, Math.max(0, confidence));
}

export function available<T>(name: string, value: T, meta: EnvelopeMeta): AvailableEnvelope<T> {
  return Object.freeze({
    name,
    available: true as const,
    value,
    unit: meta.unit ?? null,
    sourceId: meta.sourceId,
    computedAt: meta.computedAt,
    confidence: clampConfidence(meta.confidence),
  });
}

export function unavailable(
  name: string,
  reason: UnavailableReason,
  meta: EnvelopeMeta,
  detail: string | null = null
): UnavailableEnvelope {
  return Object.freeze({
    name,
    available: false as const,
    value: Object.freeze({ kind: 'unavailable' as const, reason, detail }),
    unit: meta.unit ?? null,
    sourceId: meta.sourceId,
    computedAt: meta.computedAt,
  });
}

/**
 * Numeric producer helper: NaN and Infinity are reported as invalid values.
 */
export function numeric(
  name: string,
  value: number | null | undefined,
  meta: EnvelopeMeta
): Envelope<number> {
  if (value === null || value === undefined) {
    return unavailable(name, 'missing', meta);
  }
  if (!Number.isFinite(value)) {
    return unavailable(name, 'invalid_value', meta, `non-finite value ${String(value)}`);
  }
  return available(name, value, meta);
}

export function isAvailable<T>(env: Envelope<T>): env is AvailableEnvelope<T> {
  return env.available;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isUnavailableMarker(value: unknown): boolean {
  return (
    isRecord(value) &&
    value.kind === 'unavailable' &&
    UNAVAILABLE_REASONS.some((reason) => reason === value.reason) &&
    (value.detail === null || typeof value.detail === 'string')
  );
}

/**
 * Structural check for values that cross a boundary the compiler cannot see,
 * such as a module's return value.
 */
export function isEnvelope(value: unknown): value is AnyEnvelope {
  if (!isRecord(value)) return false;
  if (typeof value.name !== 'string' || typeof value.sourceId !== 'string') return false;
  if (typeof value.computedAt !== 'string') return false;
  if (value.unit !== null && typeof value.unit !== 'string') return false;
  if (value.available === true) {
    return 'value' in value && typeof value.confidence === 'number';
  }
  return value.available === false && isUnavailableMarker(value.value);
}

export function isEnvelopeList(value: unknown): value is AnyEnvelope[] {
  return Array.isArray(value) && value.every(isEnvelope);
}

export function unavailableReason(env: AnyEnvelope): UnavailableReason | null {
  return env.available ? null : env.value.reason;
}

/**
 * Derives a new envelope from one input. Unavailable input propagates.
 */
export function mapEnvelope<A, B>(
  env: Envelope<A>,
  name: string,
  fn: (value: A) => B,
  meta: EnvelopeMeta
): Envelope<B> {
  if (!env.available) {
    return unavailable(name, 'upstream_unavailable', meta, `${env.name}: ${env.value.reason}`);
  }
  return available(name, fn(env.value), {
    ...meta,
    confidence: meta.confidence ?? env.confidence,
  });
}

/**
 * Numeric derivation over several operands. Any unavailable operand makes the
 * result unavailable; a non-finite result is an invalid value.
 */
export function combineNumbers(
  name: string,
  operands: readonly Envelope<number>[],
  fn: (values: number[]) => number,
  meta: EnvelopeMeta
): Envelope<number> {
  const missing = operands.filter((env) => !env.available).map((env) => env.name);
  if (missing.length > 0) {
    return unavailable(name, 'upstream_unavailable', meta, `missing operands: ${missing.join(', ')}`);
  }

  const values: number[] = [];
  let confidence = 1;
  for (const env of operands) {
    if (env.available) {
      values.push(env.value);
      confidence = Math.min(confidence, env.confidence);
    }
  }

  const result = fn(values);
  if (!Number.isFinite(result)) {
    return unavailable(name, 'invalid_value', meta, `non-finite result ${String(result)}`);
  }
  return available(name, result, { ...meta, confidence: meta.confidence ?? confidence });
}

// ---------------------------------------------------------------------------
// Typed readers: a value of the wrong shape becomes unavailable
// ---------------------------------------------------------------------------

function mismatch(env: AnyEnvelope, expected: string): UnavailableEnvelope {
  return unavailable(
    env.name,
    'type_mismatch',
    { sourceId: env.sourceId, computedAt: env.computedAt, unit: env.unit },
    `expected ${expected}`
  );
}

export function asNumber(env: AnyEnvelope): Envelope<number> {
  if (!env.available) return env;
  const value = env.value;
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Object.freeze({ ...env, value });
  }
  return mismatch(env, 'finite number');
}

export function asText(env: AnyEnvelope): Envelope<string> {
  if (!env.available) return env;
  const value = env.value;
  if (typeof value === 'string') {
    return Object.freeze({ ...env, value });
  }
  return mismatch(env, 'string');
}

export function asBoolean(env: AnyEnvelope): Envelope<boolean> {
  if (!env.available) return env;
  const value = env.value;
  if (typeof value === 'boolean') {
    return Object.freeze({ ...env, value });
  }
  return mismatch(env, 'boolean');
}

export function asTextList(env: AnyEnvelope): Envelope<string[]> {
  if (!env.available) return env;
  const value = env.value;
  if (Array.isArray(value)) {
    const items: string[] = [];
    for (const item of value) {
      if (typeof item !== 'string') return mismatch(env, 'string[]');
      items.push(item);
    }
    return Object.freeze({ ...env, value: items });
  }
  return mismatch(env, 'string[]');
}

/**
 * Reads a value through a caller-supplied type guard.
 */
export function asShape<T>(
  env: AnyEnvelope,
  guard: (value: unknown) => value is T,
  expected: string
): Envelope<T> {
  if (!env.available) return env;
  const value = env.value;
  if (guard(value)) {
    return Object.freeze({ ...env, value });
  }
  return mismatch(env, expected);
}
