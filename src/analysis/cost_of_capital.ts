/**
 * Cost of capital from the live market parameters.
 * A missing parameter leaves the dependent rate unavailable; nothing here
 * falls back to a textbook constant.
 */

import type { AnalysisModule } from '@/pipeline/types';
import { asNumber, combineNumbers, unavailable } from '@/signals/envelope';

export const MARKET_PARAMETERS = {
  riskFreeRate: 'market.risk_free_rate',
  terminalGrowthRate: 'market.terminal_growth_rate',
  equityRiskPremium: 'market.equity_risk_premium',
  creditSpread: 'market.credit_spread',
} as const;

export const costOfEquity: AnalysisModule = {
  id: 'cost_of_equity',
  requires: [MARKET_PARAMETERS.riskFreeRate, MARKET_PARAMETERS.equityRiskPremium, 'company.beta'],
  produces: ['capital.cost_of_equity'],
  run(ctx) {
    const operands = [
      asNumber(ctx.input(MARKET_PARAMETERS.riskFreeRate)),
      asNumber(ctx.input('company.beta')),
      asNumber(ctx.input(MARKET_PARAMETERS.equityRiskPremium)),
    ];
    return [
      combineNumbers('capital.cost_of_equity', operands, ([rf, beta, erp]) => rf + beta * erp, ctx.meta('rate')),
    ];
  },
};

export const costOfDebt: AnalysisModule = {
  id: 'cost_of_debt',
  requires: [MARKET_PARAMETERS.riskFreeRate, MARKET_PARAMETERS.creditSpread],
  produces: ['capital.cost_of_debt'],
  run(ctx) {
    const operands = [
      asNumber(ctx.input(MARKET_PARAMETERS.riskFreeRate)),
      asNumber(ctx.input(MARKET_PARAMETERS.creditSpread)),
    ];
    return [combineNumbers('capital.cost_of_debt', operands, ([rf, spread]) => rf + spread, ctx.meta('rate'))];
  },
};

/**
 * Terminal growth at or above the risk-free rate makes a perpetuity diverge.
 */
export const terminalGrowth: AnalysisModule = {
  id: 'terminal_growth',
  requires: [MARKET_PARAMETERS.riskFreeRate, MARKET_PARAMETERS.terminalGrowthRate],
  produces: ['capital.terminal_growth'],
  run(ctx) {
    const rf = asNumber(ctx.input(MARKET_PARAMETERS.riskFreeRate));
    const growth = asNumber(ctx.input(MARKET_PARAMETERS.terminalGrowthRate));
    if (rf.available && growth.available && growth.value >= rf.value) {
      return [
        unavailable(
          'capital.terminal_growth',
          'invalid_value',
          ctx.meta('rate'),
          `terminal growth ${growth.value} not below risk-free rate ${rf.value}`
        ),
      ];
    }
    return [combineNumbers('capital.terminal_growth', [growth, rf], ([g]) => g, ctx.meta('rate'))];
  },
};
