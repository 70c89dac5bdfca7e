/**
 * Chat Errors
 * Error taxonomy for sessions and the per-turn pipeline.
 * An empty retrieval is not an error: it ends the turn with the
 * `no_relevant_documents` result.
 */

/**
 * Backend operations that can fail inside a turn
 */
export type BackendOperation = 'completion' | 'search' | 'embedding';

/**
 * Base class for all chat errors
 */
export abstract class ChatError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Backend errors - fatal for the current turn
 */
export class BackendFailureError extends ChatError {
  constructor(
    public readonly operation: BackendOperation,
    message: string,
    public readonly originalError?: Error,
  ) {
    super(
      `Backend ${operation} failed: ${message}`,
      'CHAT_BACKEND_FAILURE',
      false,
    );
  }
}

export class BackendTimeoutError extends ChatError {
  constructor(
    public readonly operation: BackendOperation,
    public readonly timeoutMs: number,
  ) {
    super(
      `Backend ${operation} timed out after ${timeoutMs}ms`,
      'CHAT_BACKEND_TIMEOUT',
      true,
    );
  }
}

export class EmptyCompletionError extends ChatError {
  constructor(label: string) {
    super(
      `Completion for ${label} returned no text`,
      'CHAT_EMPTY_COMPLETION',
      false,
    );
  }
}

/**
 * Session errors
 */
export class TurnInProgressError extends ChatError {
  constructor(sessionId: string) {
    super(
      `Session ${sessionId} is still processing the previous turn`,
      'CHAT_TURN_IN_PROGRESS',
      true,
    );
  }
}

export class SessionNotFoundError extends ChatError {
  constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`, 'CHAT_SESSION_NOT_FOUND', false);
  }
}

export class IndexAlreadyBuiltError extends ChatError {
  constructor() {
    super(
      'Retrieval index is read-only once built; start a new session to index other documents',
      'CHAT_INDEX_ALREADY_BUILT',
      false,
    );
  }
}

/**
 * Input errors
 */
export class UnsupportedDocumentError extends ChatError {
  constructor(filename: string, mimeType: string) {
    super(
      `Unsupported document type: ${filename} (${mimeType || 'unknown'})`,
      'CHAT_UNSUPPORTED_DOCUMENT',
      false,
    );
  }
}

export class UnsupportedModelError extends ChatError {
  constructor(provider: string, model: string) {
    super(
      `Unsupported chat model: ${provider}/${model}`,
      'CHAT_UNSUPPORTED_MODEL',
      false,
    );
  }
}
