/**
 * Chat Turn State
 * Transient record for one user turn, created at turn start and dropped at
 * turn end. Nothing here outlives the turn; only ConversationMemory does.
 */

import type { RetrievedPassage } from '../../index/retrieval-index';

export type ChatStage =
  | 'start'
  | 'rewrite'
  | 'retrieve'
  | 'condense'
  | 'answer';

/**
 * What the turn knows about the documents. Retrieve writes `passages`,
 * condense replaces it with exactly one `condensed` string.
 */
export type RetrievalPayload =
  | { kind: 'passages'; passages: RetrievedPassage[] }
  | { kind: 'condensed'; context: string };

export interface TurnMetrics {
  startTime: number;
  endTime?: number;
  totalDuration?: number;
  rewriteDuration?: number;
  retrievalDuration?: number;
  condenseDuration?: number;
  answerDuration?: number;
  passageCount?: number;
  rewriteFallbackUsed?: boolean;
}

export interface ChatTurnState {
  /** Raw user input; never changed */
  originalQuery: string;
  /** Working query; the rewrite stage replaces it and later stages read it */
  query: string;
  retrieved: RetrievalPayload | null;
  /** Distinct passage sources in retrieval order */
  sources: string[];
  response: string | null;
  currentStage: ChatStage;
  metrics: TurnMetrics;
}

export type TurnResult =
  | {
      status: 'answered';
      answer: string;
      rewrittenQuery: string;
      sources: string[];
      metrics: TurnMetrics;
    }
  | {
      status: 'no_relevant_documents';
      message: string;
      rewrittenQuery: string;
      metrics: TurnMetrics;
    };

export function createInitialState(query: string): ChatTurnState {
  return {
    originalQuery: query,
    query,
    retrieved: null,
    sources: [],
    response: null,
    currentStage: 'start',
    metrics: {
      startTime: Date.now(),
    },
  };
}

export function passagesOf(state: ChatTurnState): RetrievedPassage[] {
  const retrieved = state.retrieved;
  if (retrieved?.kind !== 'passages') {
    throw new Error(
      `Expected retrieved passages at stage ${state.currentStage}, found ${retrieved?.kind ?? 'nothing'}`,
    );
  }
  return retrieved.passages;
}

export function condensedContextOf(state: ChatTurnState): string {
  const retrieved = state.retrieved;
  if (retrieved?.kind !== 'condensed') {
    throw new Error(
      `Expected condensed context at stage ${state.currentStage}, found ${retrieved?.kind ?? 'nothing'}`,
    );
  }
  return retrieved.context;
}
