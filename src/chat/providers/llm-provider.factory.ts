/**
 * LLM Provider Factory
 * Creates chat models from multiple providers (OpenAI, Google, Anthropic, Ollama)
 * restricted to the fixed model menu in SUPPORTED_CHAT_MODELS.
 */

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChatOpenAI } from '@langchain/openai';
import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import { ChatAnthropic } from '@langchain/anthropic';
import { ChatOllama } from '@langchain/ollama';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import {
  BackendFailureError,
  UnsupportedModelError,
} from '../errors/chat-errors';
import {
  SUPPORTED_CHAT_MODELS,
  isLLMProvider,
  type ChatModelOptions,
  type LLMProvider,
  type ModelSelection,
} from './types';

@Injectable()
export class LLMProviderFactory {
  private readonly logger = new Logger(LLMProviderFactory.name);

  constructor(private readonly configService: ConfigService) {}

  /**
   * Resolve the provider/model pair for a session.
   * Explicit choices must come from the menu; otherwise the configured
   * provider and its `<PROVIDER>_CHAT_MODEL` are used.
   * @throws UnsupportedModelError for choices outside the menu
   */
  resolveSelection(provider?: string, model?: string): ModelSelection {
    const providerValue =
      provider || this.configService.get<string>('LLM_PROVIDER', 'ollama');

    if (!isLLMProvider(providerValue)) {
      throw new UnsupportedModelError(providerValue, model ?? 'default');
    }

    const selectedModel =
      model ||
      this.configService.get<string>(
        `${providerValue.toUpperCase()}_CHAT_MODEL`,
      ) ||
      SUPPORTED_CHAT_MODELS[providerValue][0];

    if (!SUPPORTED_CHAT_MODELS[providerValue].includes(selectedModel)) {
      throw new UnsupportedModelError(providerValue, selectedModel);
    }

    return { provider: providerValue, model: selectedModel };
  }

  /**
   * Create chat model for a resolved selection
   * @param selection - Provider and model from resolveSelection
   * @param options - Optional overrides (temperature, maxTokens)
   */
  createChatModel(
    selection: ModelSelection,
    options?: ChatModelOptions,
  ): BaseChatModel {
    const resolved: ChatModelOptions = {
      model: options?.model ?? selection.model,
      temperature:
        options?.temperature ??
        parseFloat(this.configService.get<string>('LLM_TEMPERATURE', '0')),
      maxTokens:
        options?.maxTokens ??
        parseInt(this.configService.get<string>('LLM_MAX_TOKENS', '512'), 10),
    };

    this.logger.log(
      `Creating chat model: ${selection.provider}/${resolved.model} temp=${resolved.temperature} maxTokens=${resolved.maxTokens}`,
    );

    switch (selection.provider) {
      case 'openai':
        return this.createOpenAIModel(resolved);

      case 'google':
        return this.createGoogleModel(resolved);

      case 'anthropic':
        return this.createAnthropicModel(resolved) as unknown as BaseChatModel;

      case 'ollama':
        return this.createOllamaModel(resolved);
    }
  }

  /**
   * Retries are owned by TextCompletion, so every client gets maxRetries 0.
   */
  private createOpenAIModel(options: ChatModelOptions): ChatOpenAI {
    const apiKey = this.requireApiKey('openai', 'OPENAI_API_KEY');

    return new ChatOpenAI({
      model: options.model,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      maxRetries: 0,
      apiKey,
      configuration: {
        baseURL: this.configService.get<string>(
          'OPENAI_BASE_URL',
          'https://api.openai.com/v1',
        ),
      },
    });
  }

  private createGoogleModel(options: ChatModelOptions): ChatGoogleGenerativeAI {
    const apiKey = this.requireApiKey('google', 'GOOGLE_API_KEY');

    return new ChatGoogleGenerativeAI({
      model: options.model ?? SUPPORTED_CHAT_MODELS.google[0],
      temperature: options.temperature,
      maxOutputTokens: options.maxTokens,
      maxRetries: 0,
      apiKey,
    });
  }

  private createAnthropicModel(options: ChatModelOptions): ChatAnthropic {
    const apiKey = this.requireApiKey('anthropic', 'ANTHROPIC_API_KEY');

    return new ChatAnthropic({
      model: options.model,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      maxRetries: 0,
      apiKey,
    });
  }

  private createOllamaModel(options: ChatModelOptions): ChatOllama {
    return new ChatOllama({
      model: options.model,
      temperature: options.temperature,
      numPredict: options.maxTokens,
      maxRetries: 0,
      baseUrl: this.configService.get<string>(
        'OLLAMA_BASE_URL',
        'http://localhost:11434',
      ),
    });
  }

  private requireApiKey(provider: LLMProvider, envVar: string): string {
    const apiKey = this.configService.get<string>(envVar);
    if (!apiKey) {
      throw new BackendFailureError(
        'completion',
        `${envVar} is required for ${provider} provider`,
      );
    }
    return apiKey;
  }
}
