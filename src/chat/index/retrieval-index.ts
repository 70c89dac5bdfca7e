/**
 * Retrieval Index contract
 * Per-session store of embedded document chunks, searched with maximal
 * marginal relevance (MMR) over a larger similarity candidate pool.
 */

import { maximalMarginalRelevance } from '@langchain/core/utils/math';
import type { Document } from '@langchain/core/documents';

/**
 * A passage returned to the pipeline. Only `content` is interpreted;
 * `source` is carried for provenance.
 */
export interface RetrievedPassage {
  content: string;
  source: string;
  chunkIndex: number;
  score: number;
}

export interface MmrSearchOptions {
  /** Passages returned per search */
  k: number;
  /** Similarity candidates considered before MMR selection */
  fetchK: number;
  /** 0 = pure diversity, 1 = pure relevance */
  lambda: number;
  /** Cosine similarity floor; null disables the floor */
  minScore: number | null;
}

/**
 * `signal` cancels the operation: once it is aborted no further backend call
 * is started and the operation rejects with the abort reason.
 */
export interface RetrievalIndex {
  readonly backend: 'memory' | 'qdrant';

  /**
   * Embed and store chunks. Only valid while the index is being built.
   * @returns Number of chunks stored
   * @throws IndexAlreadyBuiltError after seal()
   */
  addDocuments(chunks: Document[], signal?: AbortSignal): Promise<number>;

  /** Freeze the index; it is read-only for the rest of the session */
  seal(): void;

  search(query: string, signal?: AbortSignal): Promise<RetrievedPassage[]>;

  size(): number;

  dispose(): Promise<void>;
}

/**
 * Similarity candidate with its stored vector
 */
export interface ScoredCandidate {
  content: string;
  source: string;
  chunkIndex: number;
  score: number;
  embedding: number[];
}

export const DEFAULT_MMR_OPTIONS: MmrSearchOptions = {
  k: 5,
  fetchK: 20,
  lambda: 0.5,
  minScore: null,
};

/**
 * Drop candidates below the floor (and non-finite scores), keep the best
 * `fetchK`, then pick `k` of them by MMR. Output is in MMR selection order.
 */
export function selectByMarginalRelevance(
  queryEmbedding: number[],
  candidates: ScoredCandidate[],
  options: MmrSearchOptions,
): RetrievedPassage[] {
  const { minScore } = options;
  const pool = candidates
    .filter(
      (candidate) =>
        Number.isFinite(candidate.score) &&
        (minScore === null || candidate.score >= minScore),
    )
    .sort((a, b) => b.score - a.score)
    .slice(0, options.fetchK);

  if (pool.length === 0 || options.k <= 0) {
    return [];
  }

  const selected = maximalMarginalRelevance(
    queryEmbedding,
    pool.map((candidate) => candidate.embedding),
    options.lambda,
    options.k,
  );

  return selected.map((index) => {
    const { content, source, chunkIndex, score } = pool[index];
    return { content, source, chunkIndex, score };
  });
}
