/**
 * Error taxonomy
 *
 * Only PipelineMisconfigurationError aborts a run. DataUnavailableError and
 * ModuleFaultError are caught at the module boundary and turned into
 * unavailable envelopes. Validation conflicts and safety vetoes are records,
 * not exceptions.
 */

export type EngineErrorCode =
  | 'DATA_UNAVAILABLE'
  | 'MODULE_FAULT'
  | 'PIPELINE_MISCONFIGURATION'
  | 'CONFIG_ERROR'
  | 'INPUT_ERROR'
  | 'REPORT_INVALID';

export class EngineError extends Error {
  public readonly code: EngineErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: EngineErrorCode,
    options?: { cause?: unknown; context?: Record<string, unknown> }
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = options?.context;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Thrown by a module that cannot compute because an input it needs is missing.
 * The runner records it like a fault but it is expected, not a bug.
 */
export class DataUnavailableError extends EngineError {
  public readonly missing: string[];

  constructor(missing: string[], detail?: string) {
    super(detail ?? `Required data unavailable: ${missing.join(', ')}`, 'DATA_UNAVAILABLE', {
      context: { missing },
    });
    this.name = 'DataUnavailableError';
    this.missing = missing;
  }
}

export class ModuleFaultError extends EngineError {
  public readonly moduleId: string;
  public readonly phaseId: string;

  constructor(phaseId: string, moduleId: string, cause: unknown) {
    super(`Module ${phaseId}/${moduleId} failed: ${describeError(cause)}`, 'MODULE_FAULT', {
      cause,
      context: { phaseId, moduleId },
    });
    this.name = 'ModuleFaultError';
    this.moduleId = moduleId;
    this.phaseId = phaseId;
  }
}

export class PipelineMisconfigurationError extends EngineError {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Pipeline misconfigured: ${problems.join('; ')}`, 'PIPELINE_MISCONFIGURATION', {
      context: { problems },
    });
    this.name = 'PipelineMisconfigurationError';
    this.problems = problems;
  }
}

export class ConfigError extends EngineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', { context });
    this.name = 'ConfigError';
  }
}

export class InputBundleError extends EngineError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INPUT_ERROR', { context });
    this.name = 'InputBundleError';
  }
}

export class ReportValidationError extends EngineError {
  public readonly errors: string[];

  constructor(errors: string[], context?: Record<string, unknown>) {
    super(`Run report failed validation: ${errors.join('; ')}`, 'REPORT_INVALID', { context });
    this.name = 'ReportValidationError';
    this.errors = errors;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
