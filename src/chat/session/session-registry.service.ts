/**
 * Session Registry Service
 * Creates sessions from uploaded documents and tracks the live ones by id.
 */

import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import type { Document } from '@langchain/core/documents';
import { ChatSession } from './chat-session';
import { ConversationMemory } from '../memory/conversation-memory';
import { LLMProviderFactory } from '../providers/llm-provider.factory';
import { TextCompletionFactory } from '../services/text-completion.service';
import {
  DocumentLoaderService,
  type UploadedDocument,
} from '../services/document-loader.service';
import { RetrievalIndexFactory } from '../index/retrieval-index.factory';
import { ChatPipelineFactory } from '../workflow/chat-pipeline';
import { SessionNotFoundError } from '../errors/chat-errors';
import { errorMessage } from '../utils/async.utils';

@Injectable()
export class SessionRegistryService implements OnModuleDestroy {
  private readonly logger = new Logger(SessionRegistryService.name);
  private readonly sessions = new Map<string, ChatSession>();

  constructor(
    private readonly llmFactory: LLMProviderFactory,
    private readonly completionFactory: TextCompletionFactory,
    private readonly documentLoader: DocumentLoaderService,
    private readonly indexFactory: RetrievalIndexFactory,
    private readonly pipelineFactory: ChatPipelineFactory,
  ) {}

  /**
   * Load and index the uploaded files, then wire a fresh memory and pipeline.
   * @throws UnsupportedModelError, UnsupportedDocumentError, BackendFailureError
   */
  async createSession(
    files: UploadedDocument[],
    provider?: string,
    model?: string,
  ): Promise<ChatSession> {
    const selection = this.llmFactory.resolveSelection(provider, model);
    const completion = this.completionFactory.create(selection);

    const documents: Document[] = [];
    for (const file of files) {
      const document = await this.documentLoader.load(file);
      if (document) {
        documents.push(document);
      }
    }

    const id = uuidv4();
    const {
      index,
      documents: indexed,
      embedding,
    } = await this.indexFactory.build(id, documents);
    const memory = new ConversationMemory();

    const session = new ChatSession({
      id,
      selection,
      memory,
      index,
      pipeline: this.pipelineFactory.create({ completion, index, memory }),
      documents: indexed,
      embedding,
    });
    this.sessions.set(id, session);

    this.logger.log(
      `Session ${id} created: ${selection.provider}/${selection.model}, embeddings ${embedding}, ${indexed.length} documents, ${index.size()} chunks`,
    );

    return session;
  }

  /**
   * @throws SessionNotFoundError
   */
  get(sessionId: string): ChatSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  /**
   * @throws SessionNotFoundError
   * @throws TurnInProgressError while the session is running a turn
   */
  async close(sessionId: string): Promise<void> {
    const session = this.get(sessionId);
    await session.close();
    this.sessions.delete(sessionId);
  }

  /**
   * Close sessions idle for longer than `maxIdleMs`. Busy sessions are kept.
   * @returns Number of sessions closed
   */
  async closeIdle(maxIdleMs: number, now = Date.now()): Promise<number> {
    const idle = [...this.sessions.values()].filter(
      (session) => !session.busy && now - session.lastActivityAt > maxIdleMs,
    );

    for (const session of idle) {
      this.sessions.delete(session.id);
      await session.close();
    }

    return idle.length;
  }

  count(): number {
    return this.sessions.size;
  }

  async onModuleDestroy(): Promise<void> {
    const sessions = [...this.sessions.values()];
    this.sessions.clear();

    const results = await Promise.allSettled(
      sessions.map((session) => session.close(true)),
    );
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        this.logger.error(
          `Failed to close session ${sessions[i].id} on shutdown: ${errorMessage(result.reason)}`,
        );
      }
    });
  }
}
