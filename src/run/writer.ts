/**
 * Run Writer
 * Saves validated run reports to disk
 */

import { existsSync, mkdirSync, readdirSync, readFileSync, writeFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import type { EngineConfig } from '@/core/config';
import { getEnvConfig } from '@/core/env';
import { describeError, ReportValidationError } from '@/core/errors';
import { createChildLogger } from '@/utils/logger';
import { validateRunReport } from '@/validation/ajv_instance';
import type { RunReport } from './types';

const logger = createChildLogger('run_writer');

export interface WriteResult {
  runId: string;
  filePath: string;
  fingerprint: string;
}

/**
 * RUNS_DIR wins over the configured directory. Relative paths resolve against
 * the working directory.
 */
export function resolveRunsDir(config: EngineConfig, explicitDir?: string): string {
  const configured = explicitDir ?? getEnvConfig().runsDir ?? config.report.runs_dir;
  return isAbsolute(configured) ? configured : join(process.cwd(), configured);
}

export function writeRunReport(report: RunReport, runsDir: string): WriteResult {
  const result = validateRunReport(report);
  if (!result.valid) {
    logger.error({ runId: report.run_id, errors: result.errors }, 'Run report validation failed');
    throw new ReportValidationError(result.errors ?? [], { runId: report.run_id });
  }

  if (!existsSync(runsDir)) {
    mkdirSync(runsDir, { recursive: true });
  }

  const filePath = join(runsDir, `${report.run_id}.json`);
  writeFileSync(filePath, JSON.stringify(report, null, 2), 'utf-8');

  logger.info({ runId: report.run_id, filePath, rating: report.verdict.rating }, 'Run report written');

  return { runId: report.run_id, filePath, fingerprint: report.fingerprint };
}

export function readRunReport(filePath: string): RunReport {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ReportValidationError([`cannot read ${filePath}: ${describeError(error)}`], { filePath });
  }
  const result = validateRunReport(raw);
  if (!result.valid || !result.data) {
    throw new ReportValidationError(result.errors ?? [], { filePath });
  }
  return result.data;
}

/**
 * Report files, newest as-of date first. Run ids start with the as-of date.
 */
export function listRunReports(runsDir: string, symbol?: string): string[] {
  if (!existsSync(runsDir)) {
    return [];
  }
  const suffix = symbol ? `__${symbol.toUpperCase()}__` : '__';
  return readdirSync(runsDir)
    .filter((file) => file.endsWith('.json') && file.includes(suffix))
    .sort((a, b) => b.localeCompare(a))
    .map((file) => join(runsDir, file));
}
