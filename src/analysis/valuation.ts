/**
 * Valuation modules: intrinsic (DCF), relative (peer multiples) and the
 * price-target reconciliation that averages whichever fair values exist.
 */

import type { AnalysisModule, ModuleContext } from '@/pipeline/types';
import {
  asNumber,
  available,
  combineNumbers,
  numeric,
  unavailable,
  type Envelope,
} from '@/signals/envelope';
import { parseDate } from '@/core/time';
import { asPriceSeries, pricesUpTo } from '@/signals/series';
import type { Direction } from '@/synthesis/votes';
import { latestPeriodValue } from './fundamentals';
import { voteFrom, voteName } from './vote_rules';

/**
 * Most recent close known on the run's as-of date.
 */
export function lastClose(ctx: ModuleContext, name: string, output: string): Envelope<number> {
  const prices = asPriceSeries(ctx.input(name));
  if (!prices.available) {
    return unavailable(output, 'upstream_unavailable', ctx.meta('currency'), `${name}: ${prices.value.reason}`);
  }
  const asOf = parseDate(ctx.asOf);
  const sorted = asOf ? pricesUpTo(prices.value, asOf) : [];
  if (sorted.length === 0) {
    return unavailable(output, 'missing', ctx.meta('currency'), `${name} has no close on or before ${ctx.asOf}`);
  }
  return numeric(output, sorted[sorted.length - 1].close, ctx.meta('currency', prices.confidence));
}

/**
 * Single-stage perpetuity on free cash flow, less net debt, per share.
 */
export function perpetuityValuePerShare(
  freeCashFlow: number,
  costOfEquity: number,
  growth: number,
  netDebt: number,
  shares: number
): number {
  const enterprise = (freeCashFlow * (1 + growth)) / (costOfEquity - growth);
  return (enterprise - netDebt) / shares;
}

export function upsidePct(fairValue: number, price: number): number {
  return (fairValue / price - 1) * 100;
}

export function dcfDirection(upside: number): Direction {
  if (upside > 20) return 'positive';
  if (upside > -15) return 'neutral';
  return 'negative';
}

export const dcf: AnalysisModule = {
  id: 'dcf',
  requires: [
    'fin.free_cash_flow',
    'company.net_debt',
    'company.shares_outstanding',
    'capital.cost_of_equity',
    'capital.terminal_growth',
  ],
  optional: ['price.history'],
  produces: ['valuation.dcf_fair_value', 'valuation.dcf_upside_pct', voteName('dcf')],
  vote: { signal: 'dcf', envelope: voteName('dcf') },
  run(ctx) {
    const fcf = latestPeriodValue(ctx, 'fin.free_cash_flow', 'valuation.dcf_fcf');
    const ke = asNumber(ctx.input('capital.cost_of_equity'));
    const g = asNumber(ctx.input('capital.terminal_growth'));
    const netDebt = asNumber(ctx.input('company.net_debt'));
    const shares = asNumber(ctx.input('company.shares_outstanding'));

    let fairValue: Envelope<number>;
    if (ke.available && g.available && ke.value <= g.value) {
      fairValue = unavailable(
        'valuation.dcf_fair_value',
        'invalid_value',
        ctx.meta('currency/share'),
        `cost of equity ${ke.value} not above terminal growth ${g.value}`
      );
    } else if (shares.available && shares.value <= 0) {
      fairValue = unavailable(
        'valuation.dcf_fair_value',
        'invalid_value',
        ctx.meta('currency/share'),
        'shares outstanding must be positive'
      );
    } else {
      fairValue = combineNumbers(
        'valuation.dcf_fair_value',
        [fcf, ke, g, netDebt, shares],
        ([cash, cost, growth, debt, count]) => perpetuityValuePerShare(cash, cost, growth, debt, count),
        ctx.meta('currency/share')
      );
    }

    const price = lastClose(ctx, 'price.history', 'valuation.last_close');
    const upside = combineNumbers(
      'valuation.dcf_upside_pct',
      [fairValue, price],
      ([fair, close]) => upsidePct(fair, close),
      ctx.meta('%')
    );

    return [fairValue, upside, voteFrom(ctx, 'dcf', upside, dcfDirection)];
  },
};

export function peerPremiumDirection(premiumPct: number): Direction {
  if (premiumPct < -15) return 'positive';
  if (premiumPct > 30) return 'negative';
  return 'neutral';
}

export const peerValuation: AnalysisModule = {
  id: 'peer_valuation',
  requires: ['company.pe_ratio', 'peer.median_pe'],
  produces: ['peer.pe_premium_pct', voteName('peer_valuation')],
  vote: { signal: 'peer_valuation', envelope: voteName('peer_valuation') },
  run(ctx) {
    const pe = asNumber(ctx.input('company.pe_ratio'));
    const median = asNumber(ctx.input('peer.median_pe'));

    let premium: Envelope<number>;
    if ((pe.available && pe.value <= 0) || (median.available && median.value <= 0)) {
      premium = unavailable('peer.pe_premium_pct', 'invalid_value', ctx.meta('%'), 'P/E must be positive');
    } else {
      premium = combineNumbers(
        'peer.pe_premium_pct',
        [pe, median],
        ([own, peers]) => (own / peers - 1) * 100,
        ctx.meta('%')
      );
    }

    return [premium, voteFrom(ctx, 'peer_valuation', premium, peerPremiumDirection)];
  },
};

export const peerFairValue: AnalysisModule = {
  id: 'peer_fair_value',
  requires: ['peer.median_pe', 'fundamentals.eps_latest'],
  produces: ['valuation.peer_pe_fair_value'],
  run(ctx) {
    const median = asNumber(ctx.input('peer.median_pe'));
    const eps = asNumber(ctx.input('fundamentals.eps_latest'));
    if (eps.available && eps.value <= 0) {
      return [
        unavailable(
          'valuation.peer_pe_fair_value',
          'invalid_value',
          ctx.meta('currency/share'),
          'earnings per share must be positive'
        ),
      ];
    }
    return [
      combineNumbers(
        'valuation.peer_pe_fair_value',
        [median, eps],
        ([multiple, earnings]) => multiple * earnings,
        ctx.meta('currency/share')
      ),
    ];
  },
};

export const PRICE_TARGET_METHODS: Readonly<Record<string, string>> = {
  dcf: 'valuation.dcf_fair_value',
  peer_pe: 'valuation.peer_pe_fair_value',
  peer_pb: 'peer.pb_fair_value',
  sotp: 'sotp.fair_value',
  historical_pe: 'history.pe_band_fair_value',
  historical_pb: 'history.pb_band_fair_value',
};

/**
 * Mean of the available, positive fair values. Confidence is the share of
 * methods that contributed.
 */
export const priceTarget: AnalysisModule = {
  id: 'price_target',
  requires: [],
  optional: [...Object.values(PRICE_TARGET_METHODS), 'price.history'],
  produces: ['valuation.price_target', 'valuation.price_target_methods', 'valuation.price_target_upside_pct'],
  run(ctx) {
    const methods = Object.entries(PRICE_TARGET_METHODS);
    const used: { method: string; value: number }[] = [];
    for (const [method, name] of methods) {
      const env = asNumber(ctx.input(name));
      if (env.available && env.value > 0) {
        used.push({ method, value: env.value });
      }
    }

    if (used.length === 0) {
      const detail = 'no valuation method produced a fair value';
      return [
        unavailable('valuation.price_target', 'upstream_unavailable', ctx.meta('currency/share'), detail),
        unavailable('valuation.price_target_methods', 'upstream_unavailable', ctx.meta(), detail),
        unavailable('valuation.price_target_upside_pct', 'upstream_unavailable', ctx.meta('%'), detail),
      ];
    }

    const mean = used.reduce((sum, m) => sum + m.value, 0) / used.length;
    const target = available('valuation.price_target', mean, ctx.meta('currency/share', used.length / methods.length));
    const price = lastClose(ctx, 'price.history', 'valuation.last_close');

    return [
      target,
      available(
        'valuation.price_target_methods',
        used.map((m) => m.method),
        ctx.meta()
      ),
      combineNumbers(
        'valuation.price_target_upside_pct',
        [target, price],
        ([fair, close]) => upsidePct(fair, close),
        ctx.meta('%')
      ),
    ];
  },
};
