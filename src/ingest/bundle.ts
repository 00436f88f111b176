/**
 * Input bundle
 * One JSON document per analysis: entity hints, ingestion statements and
 * prices, values extracted from the primary filing, collaborator scores and
 * live market parameters. The bundle is turned into classification hints and
 * seed envelopes; a null anywhere becomes an unavailable envelope, never a
 * zero.
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { describeError, InputBundleError } from '@/core/errors';
import type { LiveMarketParams } from '@/core/env';
import { MARKET_PARAMETERS } from '@/analysis/cost_of_capital';
import { available, numeric, unavailable, type AnyEnvelope, type EnvelopeMeta } from '@/signals/envelope';
import type { PeriodValue, PricePoint } from '@/signals/series';
import type { AnalyzeRequest } from '@/run/engine';
import { createChildLogger } from '@/utils/logger';
import { validateInputBundle } from '@/validation/ajv_instance';

const logger = createChildLogger('input_bundle');

export type BundleValue = number | string | boolean | string[] | null;

export interface BundleSource {
  source_id: string;
  confidence?: number;
  /** Keys are envelope names, e.g. "doc.revenue" or "piotroski.f_score" */
  values?: Record<string, BundleValue>;
}

export interface BundleEntity {
  fiscal_years: string[];
  classification_hint?: string | null;
  sector?: string | null;
  industry?: string | null;
  balance_sheet_lines?: string[];
}

export interface BundleIngestion extends BundleSource {
  /** Line item -> fiscal year -> value; published as "fin.<line item>" */
  statements?: Record<string, Record<string, number | null>>;
  prices?: PricePoint[] | null;
  /** Data class -> refresh timestamps; published as "refresh.<data class>" */
  refresh_history?: Record<string, string[]>;
}

export interface BundleMarket {
  source_id: string;
  risk_free_rate?: number | null;
  terminal_growth_rate?: number | null;
  equity_risk_premium?: number | null;
  credit_spread?: number | null;
}

export interface InputBundle {
  bundle_version: '1';
  symbol: string;
  as_of: string;
  entity: BundleEntity;
  ingestion: BundleIngestion;
  documents?: BundleSource;
  analytics?: BundleSource;
  market?: BundleMarket;
}

export const PRICE_SERIES = 'price.history';

type MarketField = Exclude<keyof BundleMarket, 'source_id'>;

const MARKET_KEYS: ReadonlyArray<{ key: keyof LiveMarketParams; field: MarketField; name: string }> = [
  { key: 'riskFreeRate', field: 'risk_free_rate', name: MARKET_PARAMETERS.riskFreeRate },
  { key: 'terminalGrowthRate', field: 'terminal_growth_rate', name: MARKET_PARAMETERS.terminalGrowthRate },
  { key: 'equityRiskPremium', field: 'equity_risk_premium', name: MARKET_PARAMETERS.equityRiskPremium },
  { key: 'creditSpread', field: 'credit_spread', name: MARKET_PARAMETERS.creditSpread },
];

function sourceMeta(source: BundleSource, computedAt: string): EnvelopeMeta {
  return { sourceId: source.source_id, computedAt, confidence: source.confidence };
}

function valueEnvelope(name: string, value: BundleValue, meta: EnvelopeMeta): AnyEnvelope {
  if (value === null) return unavailable(name, 'missing', meta, 'null in bundle');
  if (typeof value === 'number') return numeric(name, value, meta);
  return available(name, value, meta);
}

function sourceEnvelopes(source: BundleSource | undefined, computedAt: string): AnyEnvelope[] {
  if (!source?.values) return [];
  const meta = sourceMeta(source, computedAt);
  return Object.entries(source.values).map(([name, value]) => valueEnvelope(name, value, meta));
}

/**
 * Null periods are dropped; a statement with no value at all is unavailable.
 */
function statementEnvelopes(ingestion: BundleIngestion, computedAt: string): AnyEnvelope[] {
  const meta = sourceMeta(ingestion, computedAt);
  return Object.entries(ingestion.statements ?? {}).map(([item, periods]) => {
    const name = `fin.${item}`;
    const series: PeriodValue[] = [];
    for (const [period, value] of Object.entries(periods)) {
      if (value !== null) series.push({ period, value });
    }
    series.sort((a, b) => a.period.localeCompare(b.period));
    return series.length > 0
      ? available(name, series, meta)
      : unavailable(name, 'missing', meta, 'no period reported');
  });
}

function priceEnvelope(ingestion: BundleIngestion, computedAt: string): AnyEnvelope[] {
  if (ingestion.prices === undefined) return [];
  const meta = sourceMeta(ingestion, computedAt);
  if (ingestion.prices === null || ingestion.prices.length === 0) {
    return [unavailable(PRICE_SERIES, 'missing', meta, 'no price history')];
  }
  const series = [...ingestion.prices].sort((a, b) => a.date.localeCompare(b.date));
  return [available(PRICE_SERIES, series, meta)];
}

function refreshEnvelopes(ingestion: BundleIngestion, computedAt: string): AnyEnvelope[] {
  const meta = sourceMeta(ingestion, computedAt);
  return Object.entries(ingestion.refresh_history ?? {}).map(([dataClass, stamps]) =>
    available(`refresh.${dataClass}`, [...stamps], meta)
  );
}

/**
 * A parameter set in the environment wins over the bundle. A parameter set in
 * neither is left out and the pipeline reports it missing.
 */
function marketEnvelopes(
  market: BundleMarket | undefined,
  live: LiveMarketParams,
  computedAt: string
): AnyEnvelope[] {
  const envelopes: AnyEnvelope[] = [];
  for (const { key, field, name } of MARKET_KEYS) {
    const override = live[key];
    if (override !== null) {
      envelopes.push(numeric(name, override, { sourceId: 'config', computedAt, unit: 'rate' }));
      continue;
    }
    if (market && market[field] !== undefined) {
      envelopes.push(numeric(name, market[field], { sourceId: market.source_id, computedAt, unit: 'rate' }));
    }
  }
  return envelopes;
}

export function toAnalyzeRequest(bundle: InputBundle, live: LiveMarketParams): AnalyzeRequest {
  const asOf = bundle.as_of;
  const seeds = [
    ...statementEnvelopes(bundle.ingestion, asOf),
    ...priceEnvelope(bundle.ingestion, asOf),
    ...refreshEnvelopes(bundle.ingestion, asOf),
    ...sourceEnvelopes(bundle.ingestion, asOf),
    ...sourceEnvelopes(bundle.documents, asOf),
    ...sourceEnvelopes(bundle.analytics, asOf),
    ...marketEnvelopes(bundle.market, live, asOf),
  ];

  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const env of seeds) {
    if (seen.has(env.name)) duplicates.add(env.name);
    seen.add(env.name);
  }
  if (duplicates.size > 0) {
    throw new InputBundleError(`Envelope supplied by more than one section: ${[...duplicates].join(', ')}`, {
      symbol: bundle.symbol,
    });
  }

  return {
    hints: {
      symbol: bundle.symbol,
      fiscalYears: bundle.entity.fiscal_years,
      classificationHint: bundle.entity.classification_hint ?? null,
      balanceSheetLines: bundle.entity.balance_sheet_lines ?? null,
      sector: bundle.entity.sector ?? null,
      industry: bundle.entity.industry ?? null,
    },
    asOf,
    seeds,
  };
}

export function parseInputBundle(raw: unknown, source: string): InputBundle {
  const result = validateInputBundle(raw);
  if (!result.valid || !result.data) {
    throw new InputBundleError(`Invalid input bundle ${source}: ${(result.errors ?? []).join('; ')}`, {
      source,
    });
  }
  return result.data;
}

export function readInputBundle(path: string): InputBundle {
  const fullPath = resolve(path);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(fullPath, 'utf-8'));
  } catch (error) {
    throw new InputBundleError(`Cannot read input bundle: ${describeError(error)}`, { path: fullPath });
  }
  const bundle = parseInputBundle(raw, fullPath);
  logger.info({ symbol: bundle.symbol, asOf: bundle.as_of, path: fullPath }, 'Input bundle loaded');
  return bundle;
}
