import type { Document } from '@langchain/core/documents';

/**
 * Metadata written on every chunk by DocumentChunkerService
 */
export interface ChunkMetadata {
  source: string;
  chunkIndex: number;
}

export function chunkSource(chunk: Document): string {
  const source: unknown = chunk.metadata.source;
  return typeof source === 'string' ? source : 'unknown';
}

export function chunkIndexOf(chunk: Document, fallback: number): number {
  const index: unknown = chunk.metadata.chunkIndex;
  return typeof index === 'number' ? index : fallback;
}
