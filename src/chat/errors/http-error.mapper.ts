import {
  BadGatewayException,
  BadRequestException,
  ConflictException,
  GatewayTimeoutException,
  HttpException,
  InternalServerErrorException,
  NotFoundException,
} from '@nestjs/common';
import {
  BackendFailureError,
  BackendTimeoutError,
  ChatError,
  EmptyCompletionError,
  IndexAlreadyBuiltError,
  SessionNotFoundError,
  TurnInProgressError,
  UnsupportedDocumentError,
  UnsupportedModelError,
} from './chat-errors';

/**
 * Map a chat error to its HTTP response. Unknown errors become 500.
 */
export function toHttpException(error: unknown): HttpException {
  if (error instanceof HttpException) {
    return error;
  }

  if (!(error instanceof ChatError)) {
    return new InternalServerErrorException('Unexpected error');
  }

  const body = {
    message: error.message,
    code: error.code,
    retryable: error.retryable,
  };

  if (error instanceof SessionNotFoundError) {
    return new NotFoundException(body);
  }
  if (
    error instanceof TurnInProgressError ||
    error instanceof IndexAlreadyBuiltError
  ) {
    return new ConflictException(body);
  }
  if (
    error instanceof UnsupportedDocumentError ||
    error instanceof UnsupportedModelError
  ) {
    return new BadRequestException(body);
  }
  if (error instanceof BackendTimeoutError) {
    return new GatewayTimeoutException(body);
  }
  if (
    error instanceof BackendFailureError ||
    error instanceof EmptyCompletionError
  ) {
    return new BadGatewayException(body);
  }

  return new InternalServerErrorException(body);
}
