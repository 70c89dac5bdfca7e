/**
 * Chat Session
 * Everything one conversation owns: its memory, its read-only index and its
 * pipeline. Nothing here is shared with another session.
 */

import { Logger } from '@nestjs/common';
import type { ModelSelection } from '../providers/types';
import type {
  ConversationMemory,
  ConversationTurn,
} from '../memory/conversation-memory';
import type { RetrievalIndex } from '../index/retrieval-index';
import type { IndexedDocument } from '../index/retrieval-index.factory';
import type { ChatPipeline } from '../workflow/chat-pipeline';
import type { TurnResult } from '../workflow/state/chat-state';
import {
  SessionNotFoundError,
  TurnInProgressError,
} from '../errors/chat-errors';

export interface ChatSessionInit {
  id: string;
  selection: ModelSelection;
  memory: ConversationMemory;
  index: RetrievalIndex;
  pipeline: ChatPipeline;
  documents: IndexedDocument[];
  embedding: string;
}

export class ChatSession {
  private readonly logger = new Logger(ChatSession.name);
  readonly id: string;
  readonly selection: ModelSelection;
  readonly documents: readonly IndexedDocument[];
  readonly embedding: string;
  readonly createdAt = new Date();
  private readonly memory: ConversationMemory;
  private readonly index: RetrievalIndex;
  private readonly pipeline: ChatPipeline;
  private turnInFlight = false;
  private closed = false;
  private lastActivity = Date.now();

  constructor(init: ChatSessionInit) {
    this.id = init.id;
    this.selection = init.selection;
    this.documents = init.documents;
    this.embedding = init.embedding;
    this.memory = init.memory;
    this.index = init.index;
    this.pipeline = init.pipeline;
  }

  get busy(): boolean {
    return this.turnInFlight;
  }

  get lastActivityAt(): number {
    return this.lastActivity;
  }

  get indexedChunks(): number {
    return this.index.size();
  }

  /**
   * Run one turn. Turns are single-flight: a submit while another turn is
   * outstanding is rejected, never queued.
   * @throws TurnInProgressError while a previous turn is running
   * @throws SessionNotFoundError once the session is closed
   */
  async submit(query: string): Promise<TurnResult> {
    if (this.closed) {
      throw new SessionNotFoundError(this.id);
    }
    if (this.turnInFlight) {
      throw new TurnInProgressError(this.id);
    }

    this.turnInFlight = true;
    this.lastActivity = Date.now();

    try {
      return await this.pipeline.run(query);
    } finally {
      this.turnInFlight = false;
      this.lastActivity = Date.now();
    }
  }

  history(): readonly ConversationTurn[] {
    return this.memory.history();
  }

  /**
   * Whole-session memory reset; the index is kept.
   * @throws TurnInProgressError while a turn is running
   */
  resetHistory(): void {
    if (this.turnInFlight) {
      throw new TurnInProgressError(this.id);
    }
    this.memory.clear();
    this.lastActivity = Date.now();
    this.logger.log(`Session ${this.id} history reset`);
  }

  /**
   * Clear memory and dispose the index. Idempotent.
   * @param force - Close even while a turn is running (shutdown only)
   * @throws TurnInProgressError while a turn is running, unless forced
   */
  async close(force = false): Promise<void> {
    if (this.closed) {
      return;
    }
    if (this.turnInFlight && !force) {
      throw new TurnInProgressError(this.id);
    }
    this.closed = true;
    this.memory.clear();
    await this.index.dispose();
    this.logger.log(`Session ${this.id} closed`);
  }
}
