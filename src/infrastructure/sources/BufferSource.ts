import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';

/** Data source over text already in memory, e.g. passed on the command line. */
export class BufferSource implements DataSource {
  private readonly content: string;
  private readonly meta: SourceMetadata;

  constructor(content: string | Buffer, metadata?: Pick<SourceMetadata, 'fileName'>) {
    this.content = typeof content === 'string' ? content : content.toString('utf-8');
    this.meta = {
      fileName: metadata?.fileName ?? 'inline-text',
      fileSize: Buffer.byteLength(this.content, 'utf-8'),
    };
  }

  async *read(): AsyncIterable<string> {
    await Promise.resolve();
    yield this.content;
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}
