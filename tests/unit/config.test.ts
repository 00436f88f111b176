import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { getEngineConfig, loadEngineConfig, parseEngineConfig, resetEngineConfig } from '@/core/config';
import { loadEnvConfig, parseOptionalNumber, resetEnvConfig } from '@/core/env';
import { ConfigError } from '@/core/errors';

const ENV_KEYS = ['ENGINE_CONFIG', 'RISK_FREE_RATE', 'CREDIT_SPREAD'];

let tempDir: string;
const originalEnv: Record<string, string | undefined> = {};

function baseConfig(): Record<string, unknown> {
  const parsed: unknown = JSON.parse(readFileSync(join(process.cwd(), 'config', 'engine.json'), 'utf-8'));
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error('config/engine.json is not an object');
  }
  return { ...parsed };
}

function configError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('engine config', () => {
  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'engine-config-test-'));
    ENV_KEYS.forEach((key) => {
      originalEnv[key] = process.env[key];
      delete process.env[key];
    });
    resetEnvConfig();
    resetEngineConfig();
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
    ENV_KEYS.forEach((key) => {
      if (originalEnv[key] === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = originalEnv[key];
      }
    });
    resetEnvConfig();
    resetEngineConfig();
  });

  it('loads the checked-in config', () => {
    const config = loadEngineConfig();
    expect(config.version).toBe('1.0.0');
    expect(config.synthesis.buy_threshold).toBe(0.65);
    expect(config.validation.concepts.map((c) => c.concept)).toEqual([
      'revenue',
      'net_profit',
      'eps',
      'operating_cash_flow',
    ]);
  });

  it('follows ENGINE_CONFIG and caches until reset', () => {
    const custom = { ...baseConfig(), version: '9.9.9' };
    const path = join(tempDir, 'engine.json');
    writeFileSync(path, JSON.stringify(custom));
    process.env.ENGINE_CONFIG = path;

    expect(getEngineConfig().version).toBe('9.9.9');
    writeFileSync(path, JSON.stringify({ ...custom, version: '9.9.10' }));
    expect(getEngineConfig().version).toBe('9.9.9');
    resetEngineConfig();
    expect(getEngineConfig().version).toBe('9.9.10');
  });

  it('rejects a missing file', () => {
    const error = configError(() => loadEngineConfig(join(tempDir, 'absent.json')));
    expect(error.message).toBe(`Engine config not found: ${join(tempDir, 'absent.json')}`);
  });

  it('rejects malformed JSON', () => {
    const path = join(tempDir, 'broken.json');
    writeFileSync(path, '{ "version": ');
    expect(configError(() => loadEngineConfig(path)).message).toMatch(/^Engine config is not valid JSON: /);
  });

  it('rejects a config that breaks the schema', () => {
    const raw = { ...baseConfig(), synthesis: { buy_threshold: 1.5 } };
    expect(configError(() => parseEngineConfig(raw, 'inline')).message).toBe('Invalid engine config inline');
  });

  it('rejects a hold threshold above the buy threshold', () => {
    const raw = {
      ...baseConfig(),
      synthesis: {
        buy_threshold: 0.4,
        hold_threshold: 0.6,
        high_confidence_coverage: 0.8,
        low_confidence_coverage: 0.5,
      },
    };
    const error = configError(() => parseEngineConfig(raw, 'inline'));
    expect(error.message).toBe('Inconsistent engine config inline');
    expect(error.context).toEqual({
      errors: ['synthesis.hold_threshold must not exceed synthesis.buy_threshold'],
    });
  });
});

describe('environment', () => {
  afterEach(() => {
    delete process.env.RISK_FREE_RATE;
    delete process.env.CREDIT_SPREAD;
    resetEnvConfig();
  });

  it('reads live market parameters without defaulting them', () => {
    process.env.RISK_FREE_RATE = '0.065';
    process.env.CREDIT_SPREAD = 'n/a';
    const env = loadEnvConfig();
    expect(env.liveParams).toEqual({
      riskFreeRate: 0.065,
      terminalGrowthRate: null,
      equityRiskPremium: null,
      creditSpread: null,
    });
  });

  it('exposes only the settings the engine reads', () => {
    expect(Object.keys(loadEnvConfig())).toEqual(['engineConfigPath', 'runsDir', 'liveParams']);
  });

  it('parses optional numbers', () => {
    expect(parseOptionalNumber(undefined)).toBeNull();
    expect(parseOptionalNumber('  ')).toBeNull();
    expect(parseOptionalNumber('1e-2')).toBe(0.01);
    expect(parseOptionalNumber('Infinity')).toBeNull();
  });
});
