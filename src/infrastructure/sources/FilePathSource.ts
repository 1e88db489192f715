import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { basename } from 'node:path';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { ExtractionError } from '../../domain/errors/ExtractionError.js';

export interface FilePathSourceOptions {
  /** Encoding for reading the file. Default: 'utf-8'. */
  readonly encoding?: BufferEncoding;
  /** Chunk size in bytes for streaming reads. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
}

/** Data source that streams a local text file. Node.js only. */
export class FilePathSource implements DataSource {
  private readonly filePath: string;
  private readonly encoding: BufferEncoding;
  private readonly highWaterMark: number;
  private fileSize: number | undefined;

  constructor(filePath: string, options?: FilePathSourceOptions) {
    this.filePath = filePath;
    this.encoding = options?.encoding ?? 'utf-8';
    this.highWaterMark = options?.highWaterMark ?? 65536;
  }

  /**
   * Check that the path names a regular file.
   *
   * @throws ExtractionError with code `INPUT_INVALID` otherwise.
   */
  async ensureReadable(): Promise<void> {
    const stats = await stat(this.filePath).catch((error: unknown) => {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new ExtractionError('INPUT_INVALID', `${this.filePath} does not exist`, { path: this.filePath });
      }
      throw error;
    });

    if (!stats.isFile()) {
      throw new ExtractionError('INPUT_INVALID', `${this.filePath} is not a file`, { path: this.filePath });
    }
    this.fileSize = stats.size;
  }

  async *read(): AsyncIterable<string> {
    await this.ensureReadable();

    const stream = createReadStream(this.filePath, {
      encoding: this.encoding,
      highWaterMark: this.highWaterMark,
    });

    for await (const chunk of stream) {
      yield String(chunk);
    }
  }

  metadata(): SourceMetadata {
    return {
      fileName: basename(this.filePath),
      fileSize: this.fileSize,
    };
  }
}
