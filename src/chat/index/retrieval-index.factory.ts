/**
 * Retrieval Index Factory
 * Builds the read-only index for a new session: chunk every loaded document,
 * embed the chunks into the configured backend, then seal.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Document } from '@langchain/core/documents';
import { EmbeddingProviderFactory } from '../providers/embedding-provider.factory';
import { DocumentChunkerService } from '../services/document-chunker.service';
import {
  BackendFailureError,
  BackendTimeoutError,
  ChatError,
} from '../errors/chat-errors';
import { errorMessage, withTimeout } from '../utils/async.utils';
import type { MmrSearchOptions, RetrievalIndex } from './retrieval-index';
import { MemoryRetrievalIndex } from './memory-retrieval-index';
import {
  QdrantRetrievalIndex,
  type QdrantIndexClient,
} from './qdrant-retrieval-index';

/**
 * Injection token for the Qdrant client; null unless VECTOR_STORE=qdrant
 */
export const QDRANT_CLIENT = Symbol('QDRANT_CLIENT');

export type VectorStoreBackend = RetrievalIndex['backend'];

export interface IndexedDocument {
  source: string;
  chunks: number;
}

export interface BuiltIndex {
  index: RetrievalIndex;
  documents: IndexedDocument[];
  /** `provider/model` of the embeddings behind the index */
  embedding: string;
}

@Injectable()
export class RetrievalIndexFactory {
  private readonly logger = new Logger(RetrievalIndexFactory.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly embeddingFactory: EmbeddingProviderFactory,
    private readonly chunker: DocumentChunkerService,
    @Inject(QDRANT_CLIENT)
    private readonly qdrantClient: QdrantIndexClient | null,
  ) {}

  /**
   * Each document's chunks are embedded and stored under `EMBEDDING_TIMEOUT_MS`.
   * @param sessionId - Used to name the Qdrant collection
   * @param documents - Loaded documents; an empty list gives an empty index
   * @throws BackendFailureError when the backend is misconfigured or embedding
   * or storage fails
   * @throws BackendTimeoutError when a document takes longer than the timeout
   */
  async build(sessionId: string, documents: Document[]): Promise<BuiltIndex> {
    const startTime = Date.now();
    const backend = this.getBackend();
    const timeoutMs = parseInt(
      this.configService.get<string>('EMBEDDING_TIMEOUT_MS', '60000'),
      10,
    );

    let created: Omit<BuiltIndex, 'documents'>;
    try {
      created = this.createIndex(sessionId, backend);
    } catch (error) {
      throw this.buildFailure(sessionId, backend, error);
    }

    const { index, embedding } = created;
    const indexed: IndexedDocument[] = [];

    try {
      for (const document of documents) {
        const chunks = await this.chunker.split(document);
        const stored = await withTimeout(
          (signal) => index.addDocuments(chunks, signal),
          timeoutMs,
          () => new BackendTimeoutError('embedding', timeoutMs),
        );
        indexed.push({
          source:
            typeof document.metadata.source === 'string'
              ? document.metadata.source
              : 'unknown',
          chunks: stored,
        });
      }
    } catch (error) {
      await index.dispose();
      throw this.buildFailure(sessionId, backend, error);
    }

    index.seal();

    this.logger.log(
      `[IndexBuild] session=${sessionId} backend=${backend} embedding=${embedding} status=success documents=${indexed.length} chunks=${index.size()} duration=${Date.now() - startTime}ms`,
    );

    return { index, documents: indexed, embedding };
  }

  private createIndex(
    sessionId: string,
    backend: VectorStoreBackend,
  ): Omit<BuiltIndex, 'documents'> {
    const { embeddings, provider, model } =
      this.embeddingFactory.createEmbeddingModel();
    const embedding = `${provider}/${model}`;
    const options = this.getSearchOptions();

    if (backend === 'qdrant') {
      if (!this.qdrantClient) {
        throw new BackendFailureError(
          'embedding',
          'Qdrant client is not configured for VECTOR_STORE=qdrant',
        );
      }
      const prefix = this.configService.get<string>(
        'QDRANT_COLLECTION_PREFIX',
        'chat_session_',
      );
      return {
        index: new QdrantRetrievalIndex(
          this.qdrantClient,
          `${prefix}${sessionId}`,
          embeddings,
          options,
        ),
        embedding,
      };
    }

    return { index: new MemoryRetrievalIndex(embeddings, options), embedding };
  }

  private buildFailure(
    sessionId: string,
    backend: VectorStoreBackend,
    error: unknown,
  ): ChatError {
    this.logger.error(
      `[IndexBuild] session=${sessionId} backend=${backend} status=failed error=${errorMessage(error)}`,
    );
    if (error instanceof ChatError) {
      return error;
    }
    return new BackendFailureError(
      'embedding',
      errorMessage(error),
      error instanceof Error ? error : undefined,
    );
  }

  private getBackend(): VectorStoreBackend {
    const backend = this.configService.get<string>('VECTOR_STORE', 'memory');

    if (backend !== 'memory' && backend !== 'qdrant') {
      this.logger.warn(
        `Invalid vector store: ${backend}, defaulting to memory`,
      );
      return 'memory';
    }

    return backend;
  }

  private getSearchOptions(): MmrSearchOptions {
    const minScore = this.configService.get<string>('RETRIEVAL_MIN_SCORE');

    return {
      k: parseInt(this.configService.get<string>('RETRIEVAL_TOP_K', '5'), 10),
      fetchK: parseInt(
        this.configService.get<string>('RETRIEVAL_FETCH_K', '20'),
        10,
      ),
      lambda: parseFloat(
        this.configService.get<string>('RETRIEVAL_MMR_LAMBDA', '0.5'),
      ),
      minScore: minScore ? parseFloat(minScore) : null,
    };
  }
}
