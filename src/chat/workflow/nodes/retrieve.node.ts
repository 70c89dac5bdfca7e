/**
 * Retrieve Node
 * One MMR search against the session's index with the rewritten query.
 * An empty result is not an error: the pipeline ends the turn early.
 */

import { Logger } from '@nestjs/common';
import type { ChatTurnState } from '../state/chat-state';
import type {
  RetrievalIndex,
  RetrievedPassage,
} from '../../index/retrieval-index';
import {
  BackendFailureError,
  BackendTimeoutError,
  ChatError,
} from '../../errors/chat-errors';
import { errorMessage, withTimeout } from '../../utils/async.utils';

const logger = new Logger('RetrieveNode');

export function createRetrieveNode(index: RetrievalIndex, timeoutMs: number) {
  return async (state: ChatTurnState): Promise<Partial<ChatTurnState>> => {
    const startTime = Date.now();

    let passages: RetrievedPassage[];
    try {
      passages = await withTimeout(
        (signal) => index.search(state.query, signal),
        timeoutMs,
        () => new BackendTimeoutError('search', timeoutMs),
      );
    } catch (error) {
      logger.error(
        `[Retrieve] stage=retrieve backend=${index.backend} status=failed duration=${Date.now() - startTime}ms error=${errorMessage(error)}`,
      );
      if (error instanceof ChatError) {
        throw error;
      }
      throw new BackendFailureError(
        'search',
        errorMessage(error),
        error instanceof Error ? error : undefined,
      );
    }

    const retrievalDuration = Date.now() - startTime;
    const sources = [...new Set(passages.map((passage) => passage.source))];

    logger.log(
      `[Retrieve] stage=retrieve backend=${index.backend} status=${passages.length > 0 ? 'success' : 'empty'} passages=${passages.length} duration=${retrievalDuration}ms`,
    );

    return {
      retrieved: { kind: 'passages', passages },
      sources,
      currentStage: 'retrieve',
      metrics: {
        ...state.metrics,
        retrievalDuration,
        passageCount: passages.length,
      },
    };
  };
}
