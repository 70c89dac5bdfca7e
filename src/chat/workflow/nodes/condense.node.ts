/**
 * Condense Node
 * Reduces the retrieved passages to one block of relevant, de-duplicated
 * facts. The passages list is replaced, not kept alongside.
 */

import { Logger } from '@nestjs/common';
import { passagesOf, type ChatTurnState } from '../state/chat-state';
import type { TextCompletion } from '../../services/text-completion.service';
import { CONDENSE_PROMPT, NO_RELEVANT_FACTS, formatPassages } from '../prompts';

const logger = new Logger('CondenseNode');

export function createCondenseNode(completion: TextCompletion) {
  return async (state: ChatTurnState): Promise<Partial<ChatTurnState>> => {
    const startTime = Date.now();
    const passages = passagesOf(state);

    const prompt = await CONDENSE_PROMPT.format({
      query: state.query,
      passages: formatPassages(passages),
    });
    const context = await completion.complete(prompt, 'condense');

    const condenseDuration = Date.now() - startTime;
    logger.log(
      `[Condense] stage=condense status=success passages=${passages.length} chars=${context.length} no_relevant_facts=${context === NO_RELEVANT_FACTS} duration=${condenseDuration}ms`,
    );

    return {
      retrieved: { kind: 'condensed', context },
      currentStage: 'condense',
      metrics: { ...state.metrics, condenseDuration },
    };
  };
}
