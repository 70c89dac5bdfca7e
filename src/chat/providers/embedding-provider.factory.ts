/**
 * Embedding Provider Factory
 * One embedding model, fixed by configuration, embeds every session's
 * chunks and queries. Chat models are chosen per session; embeddings are not.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OllamaEmbeddings } from '@langchain/ollama';
import { OpenAIEmbeddings } from '@langchain/openai';
import { GoogleGenerativeAIEmbeddings } from '@langchain/google-genai';
import type { Embeddings } from '@langchain/core/embeddings';
import { BackendFailureError } from '../errors/chat-errors';
import type { EmbeddingProvider } from './types';

/**
 * Embeddings plus the identity reported with each session
 */
export interface SessionEmbeddings {
  embeddings: Embeddings;
  provider: EmbeddingProvider;
  model: string;
}

const EMBEDDING_DEFAULTS: Record<
  EmbeddingProvider,
  { modelEnv: string; model: string }
> = {
  ollama: { modelEnv: 'OLLAMA_EMBEDDING_MODEL', model: 'bge-m3:567m' },
  openai: { modelEnv: 'OPENAI_EMBEDDING_MODEL', model: 'text-embedding-3-small' },
  google: { modelEnv: 'GOOGLE_EMBEDDING_MODEL', model: 'text-embedding-004' },
};

function isEmbeddingProvider(value: string): value is EmbeddingProvider {
  return Object.prototype.hasOwnProperty.call(EMBEDDING_DEFAULTS, value);
}

@Injectable()
export class EmbeddingProviderFactory {
  private readonly logger = new Logger(EmbeddingProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * @throws BackendFailureError when the provider's API key is missing
   */
  createEmbeddingModel(): SessionEmbeddings {
    const provider = this.getProvider();
    const defaults = EMBEDDING_DEFAULTS[provider];
    const model = this.configService.get<string>(
      defaults.modelEnv,
      defaults.model,
    );

    this.logger.log(`[Embeddings] provider=${provider} model=${model}`);

    return {
      embeddings: this.createEmbeddings(provider, model),
      provider,
      model,
    };
  }

  private getProvider(): EmbeddingProvider {
    const provider = this.configService.get<string>(
      'EMBEDDING_PROVIDER',
      'ollama',
    );

    if (!isEmbeddingProvider(provider)) {
      this.logger.warn(
        `Invalid embedding provider: ${provider}, defaulting to ollama`,
      );
      return 'ollama';
    }

    return provider;
  }

  private createEmbeddings(
    provider: EmbeddingProvider,
    model: string,
  ): Embeddings {
    switch (provider) {
      case 'ollama':
        return new OllamaEmbeddings({
          model,
          baseUrl: this.configService.get<string>(
            'OLLAMA_BASE_URL',
            'http://localhost:11434',
          ),
        });

      case 'openai':
        return new OpenAIEmbeddings({
          model,
          apiKey: this.requireApiKey(provider, 'OPENAI_API_KEY'),
        });

      case 'google':
        return new GoogleGenerativeAIEmbeddings({
          model,
          apiKey: this.requireApiKey(provider, 'GOOGLE_API_KEY'),
        });
    }
  }

  private requireApiKey(provider: EmbeddingProvider, envVar: string): string {
    const apiKey = this.configService.get<string>(envVar);
    if (!apiKey) {
      throw new BackendFailureError(
        'embedding',
        `${envVar} is required for ${provider} embeddings`,
      );
    }
    return apiKey;
  }
}
