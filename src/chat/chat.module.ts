import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { QdrantClient } from '@qdrant/js-client-rest';
import { SessionsController } from './sessions.controller';
import { LLMProviderFactory } from './providers/llm-provider.factory';
import { EmbeddingProviderFactory } from './providers/embedding-provider.factory';
import { TextCompletionFactory } from './services/text-completion.service';
import { DocumentLoaderService } from './services/document-loader.service';
import { DocumentChunkerService } from './services/document-chunker.service';
import {
  QDRANT_CLIENT,
  RetrievalIndexFactory,
} from './index/retrieval-index.factory';
import { ChatPipelineFactory } from './workflow/chat-pipeline';
import { SessionRegistryService } from './session/session-registry.service';
import { SessionCleanupService } from './session/session-cleanup.service';

@Module({
  imports: [ScheduleModule.forRoot()],
  controllers: [SessionsController],
  providers: [
    {
      provide: QDRANT_CLIENT,
      useFactory: (configService: ConfigService) => {
        if (configService.get<string>('VECTOR_STORE', 'memory') !== 'qdrant') {
          return null;
        }
        const url = configService.get<string>(
          'QDRANT_URL',
          'http://localhost:6333',
        );
        const apiKey = configService.get<string>('QDRANT_API_KEY');
        return new QdrantClient({
          url,
          ...(apiKey && { apiKey }),
        });
      },
      inject: [ConfigService],
    },
    LLMProviderFactory,
    EmbeddingProviderFactory,
    TextCompletionFactory,
    DocumentLoaderService,
    DocumentChunkerService,
    RetrievalIndexFactory,
    ChatPipelineFactory,
    SessionRegistryService,
    SessionCleanupService,
  ],
  exports: [SessionRegistryService],
})
export class ChatModule {}
