/** Reported when a single line cannot fit in any batch. */
export interface LineTooLongError {
  readonly code: 'LINE_TOO_LONG';
  /** One-based number of the offending line. */
  readonly lineNumber: number;
  /** Observed length of the line, terminator included. */
  readonly length: number;
  readonly maxLength: number;
  readonly message: string;
}

/**
 * Outcome of splitting a text into batches.
 *
 * Exactly one of `batches` and `error` is present: an over-long line aborts the
 * split and no partial result is returned.
 */
export type SplitResult =
  | { readonly ok: true; readonly batches: readonly string[] }
  | { readonly ok: false; readonly error: LineTooLongError };

/** Create a successful split result. */
export function splitSucceeded(batches: readonly string[]): SplitResult {
  return { ok: true, batches };
}

/** Create a failed split result for the given line. */
export function lineTooLong(lineNumber: number, length: number, maxLength: number): SplitResult {
  return {
    ok: false,
    error: {
      code: 'LINE_TOO_LONG',
      lineNumber,
      length,
      maxLength,
      message: `The line ${String(lineNumber)} is too long (got ${String(length)}, max. is ${String(maxLength)}).`,
    },
  };
}
