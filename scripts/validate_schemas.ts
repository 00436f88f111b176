/**
 * Schema Validation Script
 * Compiles every JSON schema and checks the engine config and sample bundles
 * against them.
 *
 * Usage: npx tsx scripts/validate_schemas.ts
 */

import { readdirSync, readFileSync } from 'fs';
import { join } from 'path';
import {
  getEngineConfigValidator,
  getInputBundleValidator,
  getRunReportValidator,
  validateEngineConfig,
  validateInputBundle,
} from '../src/validation/ajv_instance';
import { describeError } from '../src/core/errors';

const samplesDir = join(process.cwd(), 'data', 'samples');

let hasErrors = false;

function check(label: string, fn: () => string[] | null): void {
  try {
    const errors = fn();
    if (errors && errors.length > 0) {
      hasErrors = true;
      console.log(`✗ ${label}`);
      errors.forEach((e) => console.log(`  ${e}`));
    } else {
      console.log(`✓ ${label}`);
    }
  } catch (error) {
    hasErrors = true;
    console.log(`✗ ${label}`);
    console.log(`  Error: ${describeError(error)}`);
  }
}

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(path, 'utf-8'));
}

console.log('Validating schemas...\n');

const compilers = {
  'engine_config.v1': getEngineConfigValidator,
  'input_bundle.v1': getInputBundleValidator,
  'verdict_report.v1': getRunReportValidator,
};
for (const [name, compile] of Object.entries(compilers)) {
  check(name, () => {
    compile();
    return null;
  });
}

check('config/engine.json', () => validateEngineConfig(readJson(join(process.cwd(), 'config', 'engine.json'))).errors);

for (const file of readdirSync(samplesDir).filter((f) => f.endsWith('.json'))) {
  check(`data/samples/${file}`, () => validateInputBundle(readJson(join(samplesDir, file))).errors);
}

if (hasErrors) {
  console.log('\nSchema validation FAILED');
  process.exit(1);
} else {
  console.log('\nAll schemas and samples validated successfully');
}
