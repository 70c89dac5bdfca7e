/**
 * Session and Turn Response DTOs
 */

import type { LLMProvider } from '../providers/types';
import type { ConversationTurn } from '../memory/conversation-memory';
import type { IndexedDocument } from '../index/retrieval-index.factory';
import type { TurnResult } from '../workflow/state/chat-state';

export interface SessionResponseDto {
  sessionId: string;
  provider: LLMProvider;
  model: string;
  /** `provider/model` of the embeddings behind the session's index */
  embedding: string;
  documents: IndexedDocument[];
  chunks: number;
  createdAt: string;
}

/**
 * `no_relevant_documents` is a normal outcome, distinguished by `status`
 * rather than by message text
 */
export type TurnResponseDto = TurnResult;

export interface HistoryResponseDto {
  sessionId: string;
  turns: ConversationTurn[];
}
