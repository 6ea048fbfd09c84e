import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';

export interface LLMUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LLMResponse {
  /** Raw reply text; callers treat it as untrusted. */
  content: string;
  /** Model that actually answered, as reported by the backend. */
  model: string;
  usage: LLMUsage;
  latencyMs: number;
}

export interface LLMRequestOptions {
  temperature?: number;
  maxTokens?: number;
  /** `json` asks the backend to constrain the reply to a JSON object. */
  responseFormat?: 'json' | 'text';
}

/**
 * A chat backend for the receipt fallback. Failures come back as `AppError`
 * values with `LLM_*` codes; implementations never throw.
 */
export interface LLMProvider {
  readonly name: string;
  chat(systemPrompt: string, userMessage: string, options?: LLMRequestOptions): Promise<Result<LLMResponse, AppError>>;
}

interface ProviderSettings {
  model?: string;
  timeoutMs?: number;
}

export type LLMProviderConfig =
  | ({ provider: 'groq'; apiKey: string } & ProviderSettings)
  | ({ provider: 'ollama'; baseUrl: string } & ProviderSettings);
