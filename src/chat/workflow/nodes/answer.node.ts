/**
 * Answer Node
 * Final response from the condensed context and conversation history.
 * The completed turn is recorded in memory only after the answer exists,
 * so a failed turn leaves memory untouched.
 */

import { Logger } from '@nestjs/common';
import { condensedContextOf, type ChatTurnState } from '../state/chat-state';
import type { TextCompletion } from '../../services/text-completion.service';
import type { ConversationMemory } from '../../memory/conversation-memory';
import {
  ANSWER_PROMPT,
  GREETING_RESPONSE,
  historyOrPlaceholder,
} from '../prompts';

const logger = new Logger('AnswerNode');

export function createAnswerNode(
  completion: TextCompletion,
  memory: ConversationMemory,
) {
  return async (state: ChatTurnState): Promise<Partial<ChatTurnState>> => {
    const startTime = Date.now();

    const prompt = await ANSWER_PROMPT.format({
      greeting: GREETING_RESPONSE,
      history: historyOrPlaceholder(memory.render()),
      context: condensedContextOf(state),
      question: state.query,
    });
    const answer = await completion.complete(prompt, 'answer');

    memory.append(state.originalQuery, answer);

    const answerDuration = Date.now() - startTime;
    logger.log(
      `[Answer] stage=answer status=success chars=${answer.length} memory_turns=${memory.length} duration=${answerDuration}ms`,
    );

    return {
      response: answer,
      currentStage: 'answer',
      metrics: { ...state.metrics, answerDuration },
    };
  };
}
