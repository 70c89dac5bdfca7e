/**
 * Text Completion Service
 * `complete(prompt) -> string` over a LangChain chat model, one call per
 * pipeline stage, with a timeout on every attempt and optional bounded retry.
 * A timed-out attempt is aborted before the next one starts.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { StringOutputParser } from '@langchain/core/output_parsers';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { LLMProviderFactory } from '../providers/llm-provider.factory';
import type { ModelSelection } from '../providers/types';
import {
  BackendFailureError,
  BackendTimeoutError,
  ChatError,
  EmptyCompletionError,
} from '../errors/chat-errors';
import { errorMessage, sleep, withTimeout } from '../utils/async.utils';

/**
 * Text completion capability consumed by the pipeline stages
 */
export interface TextCompletion {
  readonly selection: ModelSelection;

  /**
   * @param label - Stage name used in logs and errors
   */
  complete(prompt: string, label?: string): Promise<string>;
}

export interface CompletionPolicy {
  timeoutMs: number;
  maxAttempts: number;
  backoffMs: number;
}

export class ChatModelCompletion implements TextCompletion {
  private readonly logger = new Logger(ChatModelCompletion.name);

  constructor(
    private readonly chat: BaseChatModel,
    readonly selection: ModelSelection,
    private readonly policy: CompletionPolicy,
  ) {}

  async complete(prompt: string, label = 'completion'): Promise<string> {
    const chain = this.chat.pipe(new StringOutputParser());
    const maxAttempts = Math.max(1, this.policy.maxAttempts);
    let lastError: ChatError = new EmptyCompletionError(label);

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const startTime = Date.now();

      try {
        const output = await withTimeout(
          (signal) => chain.invoke(prompt, { signal }),
          this.policy.timeoutMs,
          () => new BackendTimeoutError('completion', this.policy.timeoutMs),
        );
        const text = output.trim();

        if (text.length === 0) {
          throw new EmptyCompletionError(label);
        }

        this.logger.log(
          `[TextCompletion] label=${label} provider=${this.selection.provider} model=${this.selection.model} attempt=${attempt}/${maxAttempts} status=success duration=${Date.now() - startTime}ms chars=${text.length}`,
        );
        return text;
      } catch (error) {
        lastError =
          error instanceof ChatError
            ? error
            : new BackendFailureError(
                'completion',
                errorMessage(error),
                error instanceof Error ? error : undefined,
              );

        if (attempt < maxAttempts) {
          const backoffMs = this.policy.backoffMs * Math.pow(2, attempt - 1);
          this.logger.warn(
            `[TextCompletion] label=${label} provider=${this.selection.provider} model=${this.selection.model} attempt=${attempt}/${maxAttempts} status=retry backoff=${backoffMs}ms error=${lastError.message}`,
          );
          await sleep(backoffMs);
        } else {
          this.logger.error(
            `[TextCompletion] label=${label} provider=${this.selection.provider} model=${this.selection.model} attempt=${attempt}/${maxAttempts} status=failed error=${lastError.message}`,
          );
        }
      }
    }

    throw lastError;
  }
}

@Injectable()
export class TextCompletionFactory {
  constructor(
    private readonly configService: ConfigService,
    private readonly llmFactory: LLMProviderFactory,
  ) {}

  create(selection: ModelSelection): TextCompletion {
    return new ChatModelCompletion(
      this.llmFactory.createChatModel(selection),
      selection,
      {
        timeoutMs: parseInt(
          this.configService.get<string>('LLM_TIMEOUT_MS', '30000'),
          10,
        ),
        maxAttempts: parseInt(
          this.configService.get<string>('LLM_MAX_ATTEMPTS', '1'),
          10,
        ),
        backoffMs: parseInt(
          this.configService.get<string>('LLM_RETRY_BACKOFF_MS', '1000'),
          10,
        ),
      },
    );
  }
}
