/**
 * Rewrite Query Node
 * Turns the user's question into a standalone search query: domain terms kept
 * verbatim, pronouns resolved against the previous turns.
 */

import { Logger } from '@nestjs/common';
import type { ChatTurnState } from '../state/chat-state';
import type { TextCompletion } from '../../services/text-completion.service';
import type { ConversationMemory } from '../../memory/conversation-memory';
import { EmptyCompletionError } from '../../errors/chat-errors';
import { errorMessage } from '../../utils/async.utils';
import { REWRITE_PROMPT, historyOrPlaceholder } from '../prompts';

const logger = new Logger('RewriteQueryNode');

const LEADING_LABEL = /^(rewritten|standalone|search)?\s*query\s*:\s*/i;
const CLOSING_QUOTES = new Map([
  ['"', '"'],
  ["'", "'"],
  ['“', '”'],
  ['‘', '’'],
]);

/**
 * Strip one pair of quotes around the whole query. Left alone when the inner
 * text quotes something itself: `"CRISPR" vs "TALEN"` stays as it is.
 */
function stripWrappingQuotes(text: string): string {
  const open = text.charAt(0);
  const close = CLOSING_QUOTES.get(open);

  if (!close || text.length < 2 || !text.endsWith(close)) {
    return text;
  }

  const inner = text.slice(1, -1);
  if (inner.includes(open) || inner.includes(close)) {
    return text;
  }
  return inner.trim();
}

/**
 * Keep the first line with text after its label, then strip wrapping quotes.
 * A label on a line of its own is skipped. Never touches the words of the
 * query itself.
 */
export function cleanRewrittenQuery(raw: string): string {
  const firstLine =
    raw
      .split('\n')
      .map((line) => line.trim().replace(LEADING_LABEL, '').trim())
      .find((line) => line.length > 0) ?? '';

  return stripWrappingQuotes(firstLine);
}

export interface RewriteNodeOptions {
  /** Use the original query when the rewrite call fails */
  fallbackToOriginal: boolean;
}

export function createRewriteQueryNode(
  completion: TextCompletion,
  memory: ConversationMemory,
  options: RewriteNodeOptions,
) {
  return async (state: ChatTurnState): Promise<Partial<ChatTurnState>> => {
    const startTime = Date.now();
    const history = historyOrPlaceholder(memory.render());

    logger.log(
      `[RewriteQuery] stage=rewrite status=starting history_turns=${memory.length}`,
    );

    try {
      const prompt = await REWRITE_PROMPT.format({
        history,
        question: state.query,
      });
      const rewritten = cleanRewrittenQuery(
        await completion.complete(prompt, 'rewrite'),
      );

      if (rewritten.length === 0) {
        throw new EmptyCompletionError('rewrite');
      }

      const rewriteDuration = Date.now() - startTime;
      logger.log(
        `[RewriteQuery] stage=rewrite status=success duration=${rewriteDuration}ms changed=${rewritten !== state.query}`,
      );

      return {
        query: rewritten,
        currentStage: 'rewrite',
        metrics: { ...state.metrics, rewriteDuration },
      };
    } catch (error) {
      if (!options.fallbackToOriginal) {
        throw error;
      }

      logger.warn(
        `[RewriteQuery] stage=rewrite status=fallback_original error=${errorMessage(error)}`,
      );

      return {
        query: state.originalQuery,
        currentStage: 'rewrite',
        metrics: {
          ...state.metrics,
          rewriteDuration: Date.now() - startTime,
          rewriteFallbackUsed: true,
        },
      };
    }
  };
}
