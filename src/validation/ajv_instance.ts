/**
 * Ajv validation instance with schema validators
 * Configuration, input bundles and run reports are all checked against the
 * JSON schemas under schemas/
 */

import Ajv2020, { type ErrorObject, type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { loadSchema } from './schema_loader';
import type { EngineConfig } from '@/core/config';
import type { InputBundle } from '@/ingest/bundle';
import type { RunReport } from '@/run/types';

// Create Ajv instance with Draft 2020-12 support
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// Add format validators (date, date-time, ...)
addFormats(ajv);

// Lazy-loaded validators
let engineConfigValidator: ValidateFunction<EngineConfig> | null = null;
let inputBundleValidator: ValidateFunction<InputBundle> | null = null;
let runReportValidator: ValidateFunction<RunReport> | null = null;

export function getEngineConfigValidator(): ValidateFunction<EngineConfig> {
  if (!engineConfigValidator) {
    engineConfigValidator = ajv.compile<EngineConfig>(loadSchema('engine_config.v1'));
  }
  return engineConfigValidator;
}

export function getInputBundleValidator(): ValidateFunction<InputBundle> {
  if (!inputBundleValidator) {
    inputBundleValidator = ajv.compile<InputBundle>(loadSchema('input_bundle.v1'));
  }
  return inputBundleValidator;
}

export function getRunReportValidator(): ValidateFunction<RunReport> {
  if (!runReportValidator) {
    runReportValidator = ajv.compile<RunReport>(loadSchema('verdict_report.v1'));
  }
  return runReportValidator;
}

export interface ValidationResult<T> {
  valid: boolean;
  data: T | null;
  errors: string[] | null;
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return errors?.map((e) => `${e.instancePath || 'root'}: ${e.message}`) ?? [
    'Unknown validation error',
  ];
}

function runValidator<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }
  return { valid: false, data: null, errors: formatErrors(validate.errors) };
}

export function validateEngineConfig(data: unknown): ValidationResult<EngineConfig> {
  return runValidator(getEngineConfigValidator(), data);
}

export function validateInputBundle(data: unknown): ValidationResult<InputBundle> {
  return runValidator(getInputBundleValidator(), data);
}

export function validateRunReport(data: unknown): ValidationResult<RunReport> {
  return runValidator(getRunReportValidator(), data);
}
