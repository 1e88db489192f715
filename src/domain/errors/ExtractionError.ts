/** Machine-readable codes carried by {@link ExtractionError}. */
export type ExtractionErrorCode =
  | 'LINE_TOO_LONG'
  | 'INPUT_INVALID'
  | 'CONFIG_INVALID'
  | 'ABORTED'
  | 'GENERATION_FAILED'
  | 'AUTHENTICATION_FAILED'
  | 'INVALID_RESPONSE';

/** Base error for every failure raised by an extraction run. */
export class ExtractionError extends Error {
  constructor(
    public readonly code: ExtractionErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ExtractionError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Failure of a generation call.
 *
 * `retryable` is `false` for failures a retry cannot fix (e.g. rejected credentials).
 */
export class GenerationError extends ExtractionError {
  constructor(
    code: 'GENERATION_FAILED' | 'AUTHENTICATION_FAILED' | 'INVALID_RESPONSE',
    message: string,
    public readonly retryable: boolean,
    details?: Record<string, unknown>,
  ) {
    super(code, message, details);
    this.name = 'GenerationError';
  }
}

/** Whether a thrown value may succeed when the call is attempted again. */
export function isRetryable(error: unknown): boolean {
  if (error instanceof GenerationError) return error.retryable;
  return !(error instanceof ExtractionError);
}
