import type { Category } from './Category.js';

/** A parsed record that was skipped because it did not have the expected number of fields. */
export interface MalformedRecord {
  /** Zero-based index of the record within its response. */
  readonly recordIndex: number;
  readonly fields: readonly string[];
  readonly expectedFieldCount: number;
  /** Zero-based index of the batch that produced the response, when known. */
  readonly batchIndex?: number;
  /** Category the response was generated for, when known. */
  readonly category?: Category;
}
