import type { DataSource } from '../../domain/ports/DataSource.js';

/** Drain a data source into a single string. */
export async function readAll(source: DataSource): Promise<string> {
  const chunks: string[] = [];
  for await (const chunk of source.read()) {
    chunks.push(chunk);
  }
  return chunks.join('');
}
