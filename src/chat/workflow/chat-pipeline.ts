/**
 * Chat Pipeline
 * The fixed four-stage turn: rewrite → retrieve → condense → answer.
 *
 * Stages run strictly in order over one ChatTurnState. The only branch is
 * after retrieve: zero passages end the turn with `no_relevant_documents`
 * and the later stages never run.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  createInitialState,
  type ChatStage,
  type ChatTurnState,
  type TurnResult,
} from './state/chat-state';
import { createRewriteQueryNode } from './nodes/rewrite-query.node';
import { createRetrieveNode } from './nodes/retrieve.node';
import { createCondenseNode } from './nodes/condense.node';
import { createAnswerNode } from './nodes/answer.node';
import { NO_RELEVANT_DOCUMENTS_MESSAGE } from './prompts';
import type { TextCompletion } from '../services/text-completion.service';
import type { RetrievalIndex } from '../index/retrieval-index';
import type { ConversationMemory } from '../memory/conversation-memory';
import { BackendFailureError, ChatError } from '../errors/chat-errors';
import { errorMessage } from '../utils/async.utils';

type StageNode = (state: ChatTurnState) => Promise<Partial<ChatTurnState>>;

export interface PipelineStage {
  name: Exclude<ChatStage, 'start'>;
  run: StageNode;
  /** Terminal branch: checked after `run`, ends the turn when true */
  endsTurnWhen?: (state: ChatTurnState) => boolean;
}

export interface ChatPipelineDeps {
  completion: TextCompletion;
  index: RetrievalIndex;
  memory: ConversationMemory;
}

export interface ChatPipelineOptions {
  fallbackToOriginal: boolean;
  retrievalTimeoutMs: number;
}

function retrievedNothing(state: ChatTurnState): boolean {
  const retrieved = state.retrieved;
  return retrieved?.kind === 'passages' && retrieved.passages.length === 0;
}

export class ChatPipeline {
  private readonly logger = new Logger(ChatPipeline.name);
  private readonly stages: readonly PipelineStage[];

  constructor(deps: ChatPipelineDeps, options: ChatPipelineOptions) {
    this.stages = [
      {
        name: 'rewrite',
        run: createRewriteQueryNode(deps.completion, deps.memory, {
          fallbackToOriginal: options.fallbackToOriginal,
        }),
      },
      {
        name: 'retrieve',
        run: createRetrieveNode(deps.index, options.retrievalTimeoutMs),
        endsTurnWhen: retrievedNothing,
      },
      { name: 'condense', run: createCondenseNode(deps.completion) },
      { name: 'answer', run: createAnswerNode(deps.completion, deps.memory) },
    ];
  }

  get stageNames(): string[] {
    return this.stages.map((stage) => stage.name);
  }

  /**
   * Run one turn to completion or failure.
   * @throws ChatError from the failing stage; nothing after it runs
   */
  async run(query: string): Promise<TurnResult> {
    let state = createInitialState(query);

    this.logger.log(`Starting turn for query: "${query}"`);

    for (const stage of this.stages) {
      try {
        state = { ...state, ...(await stage.run(state)) };
      } catch (error) {
        this.logger.error(
          `Turn failed at stage=${stage.name}`,
          error instanceof Error ? error.stack : String(error),
        );
        if (error instanceof ChatError) {
          throw error;
        }
        throw new BackendFailureError(
          stage.name === 'retrieve' ? 'search' : 'completion',
          errorMessage(error),
          error instanceof Error ? error : undefined,
        );
      }

      if (stage.endsTurnWhen?.(state)) {
        const metrics = this.finish(state);
        this.logger.log(
          `Turn ended after stage=${stage.name}: no relevant documents (${metrics.totalDuration}ms)`,
        );
        return {
          status: 'no_relevant_documents',
          message: NO_RELEVANT_DOCUMENTS_MESSAGE,
          rewrittenQuery: state.query,
          metrics,
        };
      }
    }

    if (state.response === null) {
      throw new BackendFailureError(
        'completion',
        `Turn finished at stage ${state.currentStage} without an answer`,
      );
    }

    const metrics = this.finish(state);
    this.logger.log(
      `Turn completed: ${state.sources.length} sources, ${metrics.totalDuration}ms`,
    );

    return {
      status: 'answered',
      answer: state.response,
      rewrittenQuery: state.query,
      sources: state.sources,
      metrics,
    };
  }

  private finish(state: ChatTurnState): ChatTurnState['metrics'] {
    const endTime = Date.now();
    return {
      ...state.metrics,
      endTime,
      totalDuration: endTime - state.metrics.startTime,
    };
  }
}

@Injectable()
export class ChatPipelineFactory {
  constructor(private readonly configService: ConfigService) {}

  create(deps: ChatPipelineDeps): ChatPipeline {
    return new ChatPipeline(deps, {
      fallbackToOriginal:
        this.configService.get<string>(
          'REWRITE_FALLBACK_TO_ORIGINAL',
          'false',
        ) === 'true',
      retrievalTimeoutMs: parseInt(
        this.configService.get<string>('RETRIEVAL_TIMEOUT_MS', '15000'),
        10,
      ),
    });
  }
}
