/**
 * Qdrant Retrieval Index
 * One collection per session, created on the first batch of chunks and
 * deleted when the session closes. Search asks Qdrant for the candidate pool
 * with vectors attached and runs the same MMR selection as the memory index.
 */

import { Logger } from '@nestjs/common';
import type { QdrantClient } from '@qdrant/js-client-rest';
import type { Document } from '@langchain/core/documents';
import type { EmbeddingsInterface } from '@langchain/core/embeddings';
import { v4 as uuidv4 } from 'uuid';
import { IndexAlreadyBuiltError } from '../errors/chat-errors';
import {
  selectByMarginalRelevance,
  type MmrSearchOptions,
  type RetrievalIndex,
  type RetrievedPassage,
  type ScoredCandidate,
} from './retrieval-index';
import { chunkIndexOf, chunkSource } from './chunk-metadata';

/**
 * Subset of QdrantClient used by the index
 */
export type QdrantIndexClient = Pick<
  QdrantClient,
  'createCollection' | 'upsert' | 'search' | 'deleteCollection'
>;

type SearchPoint = Awaited<ReturnType<QdrantIndexClient['search']>>[number];

function isDenseVector(value: unknown): value is number[] {
  return (
    Array.isArray(value) &&
    value.every((component) => typeof component === 'number')
  );
}

export class QdrantRetrievalIndex implements RetrievalIndex {
  readonly backend = 'qdrant';
  private readonly logger = new Logger(QdrantRetrievalIndex.name);
  private collectionCreated = false;
  private pointCount = 0;
  private sealed = false;

  constructor(
    private readonly client: QdrantIndexClient,
    readonly collectionName: string,
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

    const vectors = await this.embeddings.embedDocuments(
      chunks.map((chunk) => chunk.pageContent),
    );
    signal?.throwIfAborted();

    if (!this.collectionCreated) {
      await this.client.createCollection(this.collectionName, {
        vectors: { size: vectors[0].length, distance: 'Cosine' },
      });
      this.collectionCreated = true;
      this.logger.log(
        `[QdrantIndex] collection=${this.collectionName} status=created dim=${vectors[0].length}`,
      );
    }
    signal?.throwIfAborted();

    await this.client.upsert(this.collectionName, {
      wait: true,
      points: chunks.map((chunk, i) => ({
        id: uuidv4(),
        vector: vectors[i],
        payload: {
          content: chunk.pageContent,
          source: chunkSource(chunk),
          chunkIndex: chunkIndexOf(chunk, this.pointCount + i),
        },
      })),
    });

    this.pointCount += chunks.length;
    this.logger.log(
      `[QdrantIndex] collection=${this.collectionName} status=upserted chunks=${chunks.length} total=${this.pointCount}`,
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
    if (this.pointCount === 0) {
      return [];
    }

    const queryEmbedding = await this.embeddings.embedQuery(query);
    signal?.throwIfAborted();
    const points = await this.client.search(this.collectionName, {
      vector: queryEmbedding,
      limit: this.options.fetchK,
      with_payload: true,
      with_vector: true,
      ...(this.options.minScore !== null && {
        score_threshold: this.options.minScore,
      }),
    });

    const candidates = points.flatMap((point) => this.toCandidate(point));

    return selectByMarginalRelevance(queryEmbedding, candidates, this.options);
  }

  size(): number {
    return this.pointCount;
  }

  async dispose(): Promise<void> {
    if (!this.collectionCreated) {
      return;
    }
    await this.client.deleteCollection(this.collectionName);
    this.collectionCreated = false;
    this.pointCount = 0;
    this.logger.log(
      `[QdrantIndex] collection=${this.collectionName} status=deleted`,
    );
  }

  private toCandidate(point: SearchPoint): ScoredCandidate[] {
    const content = point.payload?.content;
    const source = point.payload?.source;
    const chunkIndex = point.payload?.chunkIndex;

    if (typeof content !== 'string' || !isDenseVector(point.vector)) {
      this.logger.warn(
        `[QdrantIndex] collection=${this.collectionName} point=${String(point.id)} status=skipped reason=missing_content_or_vector`,
      );
      return [];
    }

    return [
      {
        content,
        source: typeof source === 'string' ? source : 'unknown',
        chunkIndex: typeof chunkIndex === 'number' ? chunkIndex : -1,
        score: point.score,
        embedding: point.vector,
      },
    ];
  }
}
