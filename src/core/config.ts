/**
 * Engine configuration loaded from config/engine.json
 * Every threshold the validator, synthesizer and kill switch apply lives here.
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { validateEngineConfig } from '@/validation/ajv_instance';
import { ConfigError, describeError } from './errors';
import { getEnvConfig } from './env';

export interface ConceptPairConfig {
  concept: string;
  /** Envelope from ingestion or a phase derived from it */
  primary: string;
  /** Same concept as read from the primary filing */
  secondary: string;
  per_share: boolean;
}

export interface ValidationConfig {
  relative_tolerance: number;
  /** Values smaller than this in magnitude are compared by absolute difference */
  absolute_threshold: number;
  absolute_tolerance: number;
  scale_factors: number[];
  corporate_action: {
    multipliers: number[];
    tolerance: number;
  };
  concepts: ConceptPairConfig[];
  audit_inputs: {
    opinion: string;
    going_concern: string;
    observations: string;
  };
  penalties: {
    mismatch: number;
    unverifiable: number;
    audit_opinion: number;
    auditor_flag: number;
    auditor_flag_cap: number;
  };
  bands: {
    high: number;
    moderate: number;
  };
}

export interface SynthesisConfig {
  buy_threshold: number;
  hold_threshold: number;
  high_confidence_coverage: number;
  low_confidence_coverage: number;
}

export interface PriceAnomalyConfig {
  series: string;
  multiplier: number;
  /** Returns used to estimate volatility before each tested return */
  window: number;
  /** Most recent returns that are tested */
  lookback: number;
  volatility_floor: number;
}

export interface StalenessConfig {
  cadence_multiplier: number;
  data_classes: { name: string; history: string }[];
}

export interface SafetyConfig {
  critical_envelopes: string[];
  price_anomaly: PriceAnomalyConfig;
  staleness: StalenessConfig;
}

export interface EngineConfig {
  version: string;
  pipeline: { max_concurrency: number };
  validation: ValidationConfig;
  synthesis: SynthesisConfig;
  safety: SafetyConfig;
  report: { runs_dir: string };
}

let cachedConfig: EngineConfig | null = null;

function resolveConfigPath(explicitPath?: string): string {
  const projectRoot = process.cwd();
  const configured = explicitPath ?? getEnvConfig().engineConfigPath;
  if (!configured) {
    return join(projectRoot, 'config', 'engine.json');
  }
  return isAbsolute(configured) ? configured : join(projectRoot, configured);
}

/**
 * Relations between fields that the schema cannot express.
 */
function checkConsistency(config: EngineConfig): string[] {
  const problems: string[] = [];
  if (config.synthesis.hold_threshold > config.synthesis.buy_threshold) {
    problems.push('synthesis.hold_threshold must not exceed synthesis.buy_threshold');
  }
  if (config.synthesis.low_confidence_coverage > config.synthesis.high_confidence_coverage) {
    problems.push('synthesis.low_confidence_coverage must not exceed synthesis.high_confidence_coverage');
  }
  if (config.validation.bands.moderate > config.validation.bands.high) {
    problems.push('validation.bands.moderate must not exceed validation.bands.high');
  }
  const concepts = config.validation.concepts.map((c) => c.concept);
  const duplicates = concepts.filter((c, i) => concepts.indexOf(c) !== i);
  if (duplicates.length > 0) {
    problems.push(`duplicate validation concepts: ${Array.from(new Set(duplicates)).join(', ')}`);
  }
  return problems;
}

export function parseEngineConfig(raw: unknown, source: string): EngineConfig {
  const result = validateEngineConfig(raw);
  if (!result.valid || !result.data) {
    throw new ConfigError(`Invalid engine config ${source}`, { errors: result.errors });
  }
  const problems = checkConsistency(result.data);
  if (problems.length > 0) {
    throw new ConfigError(`Inconsistent engine config ${source}`, { errors: problems });
  }
  return result.data;
}

export function loadEngineConfig(explicitPath?: string): EngineConfig {
  const configPath = resolveConfigPath(explicitPath);
  if (!existsSync(configPath)) {
    throw new ConfigError(`Engine config not found: ${configPath}`, { configPath });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Engine config is not valid JSON: ${describeError(error)}`, { configPath });
  }

  return parseEngineConfig(raw, configPath);
}

export function getEngineConfig(): EngineConfig {
  if (!cachedConfig) {
    cachedConfig = loadEngineConfig();
  }
  return cachedConfig;
}

export function resetEngineConfig(): void {
  cachedConfig = null;
}
