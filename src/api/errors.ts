/**
 * Load test error utilities.
 *
 * Fatal, setup-time failures are raised as LoadTestError. Per-request
 * failures never use this type: they are recorded on RequestOutcome.
 */

/**
 * Error codes surfaced by the sweep and the CLI.
 */
export type LoadTestErrorCode =
  | 'ConfigError'
  | 'ValidationError'
  | 'PreflightError'
  | 'ReportError'
  | 'InternalError';

export interface LoadTestErrorShape {
  code: LoadTestErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export class LoadTestError extends Error implements LoadTestErrorShape {
  public readonly code: LoadTestErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: LoadTestErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LoadTestError';
    this.code = code;
    this.details = details;
  }

  /**
   * Serialize error into plain shape (for JSON output/logging).
   */
  public toObject(): LoadTestErrorShape {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Map unknown errors into LoadTestError instances.
 *
 * @param error - Anything thrown
 * @param fallbackCode - Code to use when we cannot infer a specific one
 */
export function toLoadTestError(
  error: unknown,
  fallbackCode: LoadTestErrorCode = 'InternalError'
): LoadTestError {
  if (error instanceof LoadTestError) {
    return error;
  }

  if (error instanceof Error) {
    return new LoadTestError(fallbackCode, error.message, { name: error.name });
  }

  return new LoadTestError(fallbackCode, `Unknown error: ${String(error)}`);
}

/**
 * Human-readable message for any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause;
    if (cause instanceof Error && cause.message && cause.message !== error.message) {
      return `${error.message} (${cause.message})`;
    }
    return error.message;
  }
  return String(error);
}
