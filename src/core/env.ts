/**
 * Environment variable handling with validation
 * Live market parameters are read here and never defaulted
 */

export interface LiveMarketParams {
  riskFreeRate: number | null;
  terminalGrowthRate: number | null;
  equityRiskPremium: number | null;
  creditSpread: number | null;
}

export interface EnvConfig {
  engineConfigPath: string | null;
  runsDir: string | null;
  liveParams: LiveMarketParams;
}

function getEnvVar(name: string): string | undefined {
  return process.env[name];
}

/**
 * Parses a numeric env var. A missing or malformed value yields null so the
 * pipeline sees the parameter as unavailable.
 */
export function parseOptionalNumber(raw: string | undefined): number | null {
  if (raw === undefined || raw.trim().length === 0) return null;
  const n = Number(raw);
  return Number.isFinite(n) ? n : null;
}

export function loadEnvConfig(): EnvConfig {
  return {
    engineConfigPath: getEnvVar('ENGINE_CONFIG') || null,
    runsDir: getEnvVar('RUNS_DIR') || null,
    liveParams: {
      riskFreeRate: parseOptionalNumber(getEnvVar('RISK_FREE_RATE')),
      terminalGrowthRate: parseOptionalNumber(getEnvVar('TERMINAL_GROWTH_RATE')),
      equityRiskPremium: parseOptionalNumber(getEnvVar('EQUITY_RISK_PREMIUM')),
      creditSpread: parseOptionalNumber(getEnvVar('CREDIT_SPREAD')),
    },
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
