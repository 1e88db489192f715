/** Metadata about the data source (optional, for logging). */
export interface SourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
}

/**
 * Port for reading the input text from any origin (inline argument, file, stream).
 *
 * `read()` yields chunks in order; chunk boundaries carry no meaning and may
 * fall in the middle of a line.
 */
export interface DataSource {
  /** Yield the content as string chunks. */
  read(): AsyncIterable<string>;
  /** Return metadata about the source (file name, size). */
  metadata(): SourceMetadata;
}
