/**
 * Keyword tone classifier
 * Pure text -> tone with a confidence. Lexicons live in config/lexicons/.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { ConfigError, describeError } from '@/core/errors';

export interface ToneLexicon {
  positive: string[];
  negative: string[];
}

export type Tone = 'BULLISH' | 'MILDLY_POSITIVE' | 'NEUTRAL' | 'CAUTIOUS' | 'BEARISH';

export interface ToneResult {
  tone: Tone;
  /** (positive - negative) / (positive + negative), in [-1, 1] */
  score: number;
  hits: { positive: number; negative: number };
  confidence: number;
}

/** Keyword hits at which the classification is fully trusted */
const FULL_CONFIDENCE_HITS = 10;

const lexiconCache = new Map<string, ToneLexicon>();

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isToneLexicon(value: unknown): value is ToneLexicon {
  if (value === null || typeof value !== 'object') return false;
  return (
    'positive' in value &&
    'negative' in value &&
    isStringList(value.positive) &&
    isStringList(value.negative)
  );
}

export function loadLexicon(name: string): ToneLexicon {
  const cached = lexiconCache.get(name);
  if (cached) return cached;

  const path = join(process.cwd(), 'config', 'lexicons', `${name}.json`);
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read lexicon ${name}: ${describeError(error)}`, { path });
  }
  if (!isToneLexicon(parsed)) {
    throw new ConfigError(`Lexicon ${name} must have string lists "positive" and "negative"`, { path });
  }

  const lexicon = {
    positive: parsed.positive.map((term) => term.toLowerCase()),
    negative: parsed.negative.map((term) => term.toLowerCase()),
  };
  lexiconCache.set(name, lexicon);
  return lexicon;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[a-z][a-z'-]*/g) ?? [];
}

function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count += 1;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

/**
 * Single words match whole tokens; phrases match the space-joined token
 * stream.
 */
export function countTerms(tokens: readonly string[], terms: readonly string[]): number {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  const joined = ` ${tokens.join(' ')} `;

  let total = 0;
  for (const term of terms) {
    total += term.includes(' ') ? countOccurrences(joined, ` ${term} `) : counts.get(term) ?? 0;
  }
  return total;
}

export function toneForScore(score: number): Tone {
  if (score > 0.2) return 'BULLISH';
  if (score > 0.05) return 'MILDLY_POSITIVE';
  if (score > -0.05) return 'NEUTRAL';
  if (score > -0.2) return 'CAUTIOUS';
  return 'BEARISH';
}

/**
 * Returns null when the text carries no tone keyword at all.
 */
export function classifyTone(text: string, lexicon: ToneLexicon): ToneResult | null {
  const tokens = tokenize(text);
  const positive = countTerms(tokens, lexicon.positive);
  const negative = countTerms(tokens, lexicon.negative);
  const hits = positive + negative;
  if (hits === 0) return null;

  const score = (positive - negative) / hits;
  return {
    tone: toneForScore(score),
    score,
    hits: { positive, negative },
    confidence: Math.min(1, hits / FULL_CONFIDENCE_HITS),
  };
}
