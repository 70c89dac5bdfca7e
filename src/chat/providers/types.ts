/**
 * Provider Types and Configurations
 */

/**
 * Embedding Provider Type
 */
export type EmbeddingProvider = 'ollama' | 'openai' | 'google';

/**
 * LLM Provider Type
 */
export type LLMProvider = 'openai' | 'google' | 'anthropic' | 'ollama';

export const LLM_PROVIDERS: readonly LLMProvider[] = [
  'openai',
  'google',
  'anthropic',
  'ollama',
];

/**
 * Chat models a session may select, per provider.
 * The first entry is the provider default.
 */
export const SUPPORTED_CHAT_MODELS: Record<LLMProvider, readonly string[]> = {
  openai: ['gpt-4o-mini', 'gpt-4o'],
  anthropic: ['claude-3-5-haiku-20241022', 'claude-sonnet-4-5-20250929'],
  google: ['gemini-2.5-flash-lite', 'gemini-2.5-flash'],
  ollama: ['gemma3:1b', 'llama3.1:8b'],
};

/**
 * Resolved provider/model pair for one session
 */
export interface ModelSelection {
  provider: LLMProvider;
  model: string;
}

/**
 * Chat Model Options
 */
export interface ChatModelOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export function isLLMProvider(value: string): value is LLMProvider {
  return LLM_PROVIDERS.some((provider) => provider === value);
}
