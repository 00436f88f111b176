/**
 * Default phase catalog
 * Wires the collaborator envelopes into seventeen votes. Adding a signal means
 * adding a module here; the synthesizer does not change.
 */

import type { EngineConfig } from '@/core/config';
import { costOfDebt, costOfEquity, terminalGrowth } from '@/analysis/cost_of_capital';
import { altmanZ, workingCapital } from '@/analysis/distress';
import { latestFinancials, profitGrowth, revenueGrowth } from '@/analysis/fundamentals';
import { forecast, technical } from '@/analysis/market';
import { esg, governance, managementTone, moat, textIntelligence } from '@/analysis/qualitative';
import { beneish, cashConversion, piotroski, trendHealth } from '@/analysis/quality';
import { loadLexicon, type ToneLexicon } from '@/analysis/text_classifier';
import { dcf, peerFairValue, peerValuation, priceTarget } from '@/analysis/valuation';
import type { PhaseDefinition } from './types';

/** Reference data the default modules are built with */
export interface CatalogResources {
  toneLexicon: ToneLexicon;
}

export function loadCatalogResources(): CatalogResources {
  return { toneLexicon: loadLexicon('management_tone') };
}

export function defaultPhases(resources: CatalogResources): PhaseDefinition[] {
  return [
    {
      id: 'fundamentals',
      description: 'Latest-period statement values and growth',
      modules: [latestFinancials, revenueGrowth, profitGrowth],
    },
    {
      id: 'cost_of_capital',
      description: 'Discount and growth rates from live market parameters',
      modules: [costOfEquity, costOfDebt, terminalGrowth],
    },
    {
      id: 'intrinsic_valuation',
      description: 'Discounted cash flow fair value',
      excludeFor: ['bank', 'nbfc'],
      modules: [dcf],
    },
    {
      id: 'distress',
      description: 'Bankruptcy risk and working-capital cycle',
      excludeFor: ['bank', 'nbfc'],
      modules: [altmanZ, workingCapital],
    },
    {
      id: 'quality',
      description: 'Financial strength and earnings quality',
      modules: [piotroski, beneish, cashConversion, trendHealth],
    },
    {
      id: 'relative_valuation',
      description: 'Valuation against peers',
      modules: [peerValuation, peerFairValue],
    },
    {
      id: 'price_target',
      description: 'Reconciled fair value across methods',
      modules: [priceTarget],
    },
    {
      id: 'qualitative',
      description: 'Governance, moat, ESG and tone',
      modules: [governance, moat, esg, managementTone(resources.toneLexicon), textIntelligence],
    },
    {
      id: 'market',
      description: 'Technical and forecast signals',
      modules: [technical, forecast],
    },
  ];
}

/**
 * Every name the phases, the validator and the kill switch read that no phase
 * produces. These come from ingestion, document extraction or configuration.
 */
export function catalogInputs(phases: readonly PhaseDefinition[], config: EngineConfig): string[] {
  const produced = new Set(phases.flatMap((phase) => phase.modules.flatMap((mod) => mod.produces)));
  const read = [
    ...phases.flatMap((phase) =>
      phase.modules.flatMap((mod) => [...mod.requires, ...(mod.optional ?? [])])
    ),
    ...config.validation.concepts.flatMap((concept) => [concept.primary, concept.secondary]),
    config.validation.audit_inputs.opinion,
    config.validation.audit_inputs.going_concern,
    config.validation.audit_inputs.observations,
    ...config.safety.critical_envelopes,
    config.safety.price_anomaly.series,
    ...config.safety.staleness.data_classes.map((dataClass) => dataClass.history),
  ];
  return Array.from(new Set(read.filter((name) => !produced.has(name)))).sort();
}
