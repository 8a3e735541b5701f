/**
 * Custom Error classes for perfspec
 */

export interface ErrorOptions {
  code: string;
  cause?: unknown;
}

/**
 * Base error class for all perfspec errors
 */
export class PerfError extends Error {
  public readonly code: string;
  public override readonly cause?: unknown;

  constructor(message: string, options: ErrorOptions) {
    super(message);
    this.name = this.constructor.name;
    this.code = options.code;
    this.cause = options.cause;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      stack: this.stack,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * Source text of a function cannot be retrieved (native or bound functions)
 */
export class SourceUnavailableError extends PerfError {
  public readonly functionName: string;

  constructor(functionName: string, options?: Partial<ErrorOptions>) {
    super(`Source text is not available for function "${functionName || '<anonymous>'}"`, {
      code: options?.code ?? 'SOURCE_UNAVAILABLE',
      cause: options?.cause,
    });
    this.functionName = functionName;
  }
}

/**
 * Perf metadata attached to a function has the wrong shape
 */
export class InvalidPerfMetadataError extends PerfError {
  public readonly field: string;

  constructor(field: string, message: string, options?: Partial<ErrorOptions>) {
    super(`Invalid "${field}" metadata: ${message}`, {
      code: options?.code ?? 'INVALID_METADATA',
      cause: options?.cause,
    });
    this.field = field;
  }
}

/**
 * Results of an experiment were requested before it ran
 */
export class ExperimentNotExecutedError extends PerfError {
  constructor(experimentName: string) {
    super(`Experiment "${experimentName}" has not been executed`, {
      code: 'NOT_EXECUTED',
    });
  }
}

/**
 * One or more runners failed to dispose at session end
 */
export class RunnerDisposeError extends PerfError {
  public readonly errors: unknown[];

  constructor(errors: unknown[]) {
    super(`${errors.length} runner(s) failed to dispose`, {
      code: 'RUNNER_DISPOSE_FAILED',
      cause: errors[0],
    });
    this.errors = errors;
  }
}

/**
 * Configuration/initialization error
 */
export class ConfigurationError extends PerfError {
  constructor(message: string, options?: Partial<ErrorOptions>) {
    super(message, {
      code: options?.code ?? 'CONFIGURATION_ERROR',
      cause: options?.cause,
    });
  }
}
