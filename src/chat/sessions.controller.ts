/**
 * Sessions HTTP Controller
 *
 * POST   /sessions                      upload documents, start a session
 * POST   /sessions/:sessionId/query     run one turn
 * GET    /sessions/:sessionId/history   completed turns
 * DELETE /sessions/:sessionId/history   reset memory, keep the index
 * DELETE /sessions/:sessionId           close the session (409 during a turn)
 */

import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  Post,
  UploadedFiles,
  UseInterceptors,
  ValidationPipe,
} from '@nestjs/common';
import { FilesInterceptor } from '@nestjs/platform-express';
import { SessionRegistryService } from './session/session-registry.service';
import type { UploadedDocument } from './services/document-loader.service';
import { CreateSessionDto } from './dto/create-session.dto';
import { QueryRequestDto } from './dto/query-request.dto';
import type {
  HistoryResponseDto,
  SessionResponseDto,
  TurnResponseDto,
} from './dto/session-response.dto';
import { toHttpException } from './errors/http-error.mapper';

export const MAX_UPLOAD_FILES = 10;
export const MAX_UPLOAD_FILE_BYTES = 20 * 1024 * 1024;

@Controller('sessions')
export class SessionsController {
  private readonly logger = new Logger(SessionsController.name);

  constructor(private readonly registry: SessionRegistryService) {}

  /**
   * POST /sessions (multipart/form-data)
   *
   * Fields: `files` (text, markdown or PDF; repeatable), optional `provider`
   * and `model` from the supported menu.
   */
  @Post()
  @UseInterceptors(
    FilesInterceptor('files', MAX_UPLOAD_FILES, {
      limits: { fileSize: MAX_UPLOAD_FILE_BYTES },
    }),
  )
  async createSession(
    @UploadedFiles() files: UploadedDocument[] | undefined,
    @Body(ValidationPipe) body: CreateSessionDto,
  ): Promise<SessionResponseDto> {
    const uploads = files ?? [];
    this.logger.log(
      `Create session request: ${uploads.length} file(s), provider=${body.provider ?? 'default'} model=${body.model ?? 'default'}`,
    );

    try {
      const session = await this.registry.createSession(
        uploads,
        body.provider,
        body.model,
      );

      return {
        sessionId: session.id,
        provider: session.selection.provider,
        model: session.selection.model,
        embedding: session.embedding,
        documents: [...session.documents],
        chunks: session.indexedChunks,
        createdAt: session.createdAt.toISOString(),
      };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  /**
   * POST /sessions/:sessionId/query
   *
   * Request: { "query": "What is the capital of Freedonia?" }
   * Response: `answered` with answer and sources, or `no_relevant_documents`
   * with a rephrase request. 409 while the previous turn is still running.
   */
  @Post(':sessionId/query')
  @HttpCode(HttpStatus.OK)
  async query(
    @Param('sessionId') sessionId: string,
    @Body(ValidationPipe) body: QueryRequestDto,
  ): Promise<TurnResponseDto> {
    try {
      const result = await this.registry.get(sessionId).submit(body.query);

      this.logger.log(
        `Turn completed for session ${sessionId}: status=${result.status} ${result.metrics.totalDuration ?? 0}ms`,
      );

      return result;
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Get(':sessionId/history')
  getHistory(@Param('sessionId') sessionId: string): HistoryResponseDto {
    try {
      return {
        sessionId,
        turns: [...this.registry.get(sessionId).history()],
      };
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Delete(':sessionId/history')
  @HttpCode(HttpStatus.NO_CONTENT)
  resetHistory(@Param('sessionId') sessionId: string): void {
    try {
      this.registry.get(sessionId).resetHistory();
    } catch (error) {
      throw toHttpException(error);
    }
  }

  @Delete(':sessionId')
  @HttpCode(HttpStatus.NO_CONTENT)
  async closeSession(@Param('sessionId') sessionId: string): Promise<void> {
    try {
      await this.registry.close(sessionId);
    } catch (error) {
      throw toHttpException(error);
    }
  }
}
