export type { LLMProvider, LLMResponse, LLMRequestOptions, LLMProviderConfig } from './types.js';
export { GroqProvider, createGroqClient } from './groq.js';
export type { GroqClient } from './groq.js';
export { OllamaProvider } from './ollama.js';
export type { FetchFn, OllamaProviderOptions } from './ollama.js';

import { GroqProvider, createGroqClient } from './groq.js';
import { OllamaProvider } from './ollama.js';
import type { AppConfig } from '../config.js';
import type { LLMProvider, LLMProviderConfig } from './types.js';

export function createLLMProvider(config: LLMProviderConfig): LLMProvider {
  switch (config.provider) {
    case 'groq':
      return new GroqProvider(createGroqClient(config.apiKey, config.timeoutMs), config.model);
    case 'ollama':
      return new OllamaProvider({ baseUrl: config.baseUrl, model: config.model, timeoutMs: config.timeoutMs });
  }
}

/** @throws {Error} If the groq provider is selected without an API key */
export function providerConfigFrom(config: AppConfig['llm']): LLMProviderConfig {
  if (config.provider === 'groq') {
    if (!config.groqApiKey) {
      throw new Error('GROQ_API_KEY environment variable is not set');
    }
    return { provider: 'groq', apiKey: config.groqApiKey, model: config.model, timeoutMs: config.timeoutMs };
  }
  return { provider: 'ollama', baseUrl: config.ollamaBaseUrl, model: config.model, timeoutMs: config.timeoutMs };
}

export function llmFromConfig(config: AppConfig['llm']): LLMProvider {
  return createLLMProvider(providerConfigFrom(config));
}
