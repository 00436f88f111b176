import { loadEngineConfig, type EngineConfig } from '@/core/config';
import type { LiveMarketParams } from '@/core/env';
import { toAnalyzeRequest, type BundleSource, type BundleValue, type InputBundle } from '@/ingest/bundle';
import { analyze, type Analysis, type AnalyzeOptions } from '@/run/engine';

export const AS_OF = '2025-06-30';

export const NO_LIVE_PARAMS: LiveMarketParams = {
  riskFreeRate: null,
  terminalGrowthRate: null,
  equityRiskPremium: null,
  creditSpread: null,
};

/** 31 daily closes in May 2025 alternating 100 / 101; the last close is 100 */
export function quietPrices(): { date: string; close: number }[] {
  return Array.from({ length: 31 }, (_, i) => ({
    date: `2025-05-${String(i + 1).padStart(2, '0')}`,
    close: i % 2 === 0 ? 100 : 101,
  }));
}

/**
 * A healthy industrial: all seventeen votes available, twelve positive,
 * one cross-source mismatch (net profit) and one unverifiable concept
 * (operating cash flow), so the trust score is 100 - 12 - 6 = 82.
 */
export function baselineBundle(): InputBundle {
  return {
    bundle_version: '1',
    symbol: 'acme',
    as_of: AS_OF,
    entity: {
      fiscal_years: ['FY2023', 'FY2024', 'FY2025'],
      sector: 'Industrials',
      industry: 'Specialty Machinery',
      balance_sheet_lines: ['Trade receivables', 'Inventories'],
    },
    ingestion: {
      source_id: 'screener',
      statements: {
        revenue: { FY2023: 900, FY2024: 1000, FY2025: 1200 },
        net_profit: { FY2023: 90, FY2024: 100, FY2025: 125 },
        eps: { FY2023: 9, FY2024: 10, FY2025: 12.5 },
        operating_cash_flow: { FY2023: 110, FY2024: 130, FY2025: 150 },
        free_cash_flow: { FY2023: 70, FY2024: 85, FY2025: 100 },
        ebitda: { FY2023: 140, FY2024: 160, FY2025: 180 },
        cash_conversion_cycle: { FY2023: 60, FY2024: 55, FY2025: 50 },
      },
      prices: quietPrices(),
      refresh_history: {
        financials: ['2025-01-15', '2025-04-15', '2025-06-15'],
        prices: ['2025-06-26', '2025-06-27', '2025-06-28', '2025-06-29', '2025-06-30'],
      },
      values: {
        'company.beta': 1,
        'company.net_debt': 100,
        'company.shares_outstanding': 8,
        'company.pe_ratio': 15,
      },
    },
    documents: {
      source_id: 'annual_report_fy2025',
      values: {
        'doc.revenue': 1200,
        'doc.net_profit': 140,
        'doc.eps': 12.5,
        'doc.operating_cash_flow': null,
        'doc.audit_opinion': 'Unmodified',
        'doc.going_concern': false,
        'doc.auditor_observations': ['Key audit matter: revenue recognition on long-term contracts'],
        'doc.management_commentary': 'Demand was weak and input cost pressure persisted.',
      },
    },
    analytics: {
      source_id: 'analytics',
      values: {
        'altman.z_score': 3.5,
        'piotroski.f_score': 8,
        'beneish.m_score': -2.5,
        'trend.health_score': 8,
        'trend.direction': 'improving',
        'peer.median_pe': 20,
        'peer.pb_fair_value': 140,
        'sotp.fair_value': null,
        'history.pe_band_fair_value': 130,
        'history.pb_band_fair_value': null,
        'governance.score': 9,
        'moat.score': 7,
        'esg.score': 5,
        'text.overall_tone': 'neutral',
        'technical.signal': 'mildly bearish',
        'forecast.trend': 'sideways',
      },
    },
    market: {
      source_id: 'market_desk',
      risk_free_rate: 0.07,
      terminal_growth_rate: 0.04,
      equity_risk_premium: 0.05,
      credit_spread: 0.02,
    },
  };
}

export function withValues(
  source: BundleSource | undefined,
  values: Record<string, BundleValue>
): BundleSource {
  return {
    source_id: source?.source_id ?? 'test',
    confidence: source?.confidence,
    values: { ...(source?.values ?? {}), ...values },
  };
}

let config: EngineConfig | null = null;

export function testConfig(): EngineConfig {
  if (!config) {
    config = loadEngineConfig('config/engine.json');
  }
  return config;
}

export function runBundle(bundle: InputBundle, options: AnalyzeOptions = {}): Promise<Analysis> {
  return analyze(toAnalyzeRequest(bundle, NO_LIVE_PARAMS), { config: testConfig(), ...options });
}
