/**
 * In-process Retrieval Index
 * Vectors live in the session's memory and disappear with it.
 */

import { Logger } from '@nestjs/common';
import type { Document } from '@langchain/core/documents';
import type { EmbeddingsInterface } from '@langchain/core/embeddings';
import { cosineSimilarity } from '@langchain/core/utils/math';
import { IndexAlreadyBuiltError } from '../errors/chat-errors';
import {
  selectByMarginalRelevance,
  type MmrSearchOptions,
  type RetrievalIndex,
  type RetrievedPassage,
  type ScoredCandidate,
} from './retrieval-index';
import { chunkSource, chunkIndexOf } from './chunk-metadata';

interface StoredVector {
  content: string;
  source: string;
  chunkIndex: number;
  embedding: number[];
}

export class MemoryRetrievalIndex implements RetrievalIndex {
  readonly backend = 'memory';
  private readonly logger = new Logger(MemoryRetrievalIndex.name);
  private readonly vectors: StoredVector[] = [];
  private sealed = false;

  constructor(
    private readonly embeddings: EmbeddingsInterface,
    private readonly options: MmrSearchOptions,
  ) {}

  async addDocuments(
    chunks: Document[],
    signal?: AbortSignal,
  ): Promise<number> {
    if (this.sealed) {
      throw new IndexAlreadyBuiltError();
    }
    if (chunks.length === 0) {
      return 0;
    }

    const embeddings = await this.embeddings.embedDocuments(
      chunks.map((chunk) => chunk.pageContent),
    );
    signal?.throwIfAborted();

    chunks.forEach((chunk, i) => {
      this.vectors.push({
        content: chunk.pageContent,
        source: chunkSource(chunk),
        chunkIndex: chunkIndexOf(chunk, i),
        embedding: embeddings[i],
      });
    });

    this.logger.log(
      `[MemoryIndex] status=added chunks=${chunks.length} total=${this.vectors.length}`,
    );
    return chunks.length;
  }

  seal(): void {
    this.sealed = true;
  }

  async search(
    query: string,
    signal?: AbortSignal,
  ): Promise<RetrievedPassage[]> {
    if (this.vectors.length === 0) {
      return [];
    }

    const queryEmbedding = await this.embeddings.embedQuery(query);
    signal?.throwIfAborted();
    const [scores] = cosineSimilarity(
      [queryEmbedding],
      this.vectors.map((vector) => vector.embedding),
    );

    const candidates: ScoredCandidate[] = this.vectors.map((vector, i) => ({
      ...vector,
      score: scores[i],
    }));

    return selectByMarginalRelevance(queryEmbedding, candidates, this.options);
  }

  size(): number {
    return this.vectors.length;
  }

  dispose(): Promise<void> {
    this.vectors.length = 0;
    return Promise.resolve();
  }
}
