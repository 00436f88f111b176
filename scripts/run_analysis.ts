/**
 * Analysis Run Script
 * Reads one input bundle, reaches a verdict and writes the run report.
 *
 * Usage: npx tsx scripts/run_analysis.ts --bundle=data/samples/sample_bundle.json [--out=data/runs] [--dry-run]
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

// Load .env.local first, then fall back to .env
dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
import { getEngineConfig } from '../src/core/config';
import { getEnvConfig } from '../src/core/env';
import { describeError } from '../src/core/errors';
import { readInputBundle, toAnalyzeRequest } from '../src/ingest/bundle';
import { buildRunReport } from '../src/run/builder';
import { analyze } from '../src/run/engine';
import { resolveRunsDir, writeRunReport } from '../src/run/writer';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('run_analysis');

interface AnalysisCliArgs {
  bundlePath: string | null;
  outDir: string | undefined;
  dryRun: boolean;
}

function readFlag(name: string): string | undefined {
  const equalsArg = process.argv.find((arg) => arg.startsWith(`${name}=`));
  if (equalsArg) return equalsArg.slice(name.length + 1);
  const index = process.argv.indexOf(name);
  return index >= 0 ? process.argv[index + 1] : undefined;
}

function parseCliArgs(): AnalysisCliArgs {
  return {
    bundlePath: readFlag('--bundle') ?? null,
    outDir: readFlag('--out'),
    dryRun: process.argv.includes('--dry-run'),
  };
}

async function main(): Promise<void> {
  const args = parseCliArgs();
  if (!args.bundlePath) {
    logger.error('Missing --bundle=<path to input bundle JSON>');
    process.exitCode = 1;
    return;
  }

  const config = getEngineConfig();
  const bundle = readInputBundle(args.bundlePath);
  const request = toAnalyzeRequest(bundle, getEnvConfig().liveParams);

  const analysis = await analyze(request, { config });
  const report = buildRunReport(analysis, request.seeds, config);
  const { verdict } = report;

  logger.info(
    {
      symbol: verdict.symbol,
      rating: verdict.rating,
      candidate: verdict.candidate_rating,
      trust: `${verdict.trust_score} (${verdict.trust_band})`,
      votes: `${verdict.votes.positive}+/${verdict.votes.neutral}=/${verdict.votes.negative}- of ${verdict.votes.available} available`,
      vetoReason: verdict.veto_reason,
    },
    'Analysis finished'
  );

  if (args.dryRun) {
    logger.info({ runId: report.run_id }, 'Dry run: report not written');
    return;
  }

  const written = writeRunReport(report, resolveRunsDir(config, args.outDir));
  logger.info({ runId: written.runId, filePath: written.filePath }, 'Done');
}

main().catch((error: unknown) => {
  logger.error({ error: describeError(error) }, 'Analysis run failed');
  process.exitCode = 1;
});
