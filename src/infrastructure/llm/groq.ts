import Groq, { APIConnectionError, APIConnectionTimeoutError } from 'groq-sdk';
import { ok, err } from '../../domain/result.js';
import { createAppError, ErrorCode } from '../../domain/errors.js';
import { logger } from '../logger.js';
import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { LLMProvider, LLMResponse, LLMRequestOptions, LLMUsage } from './types.js';

// Replies are a few receipt fields
const DEFAULT_MODEL = 'llama-3.1-8b-instant';
const DEFAULT_MAX_TOKENS = 512;
const DEFAULT_TIMEOUT_MS = 60_000;

const log = logger.child({ module: 'llm-groq' });

type ChatMessage = { role: 'system' | 'user' | 'assistant'; content: string };

interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  max_tokens?: number;
  response_format?: { type: 'json_object' | 'text' };
}

interface ChatCompletion {
  choices: Array<{ message?: { content?: string | null } }>;
  model: string;
  usage?: { prompt_tokens?: number; completion_tokens?: number; total_tokens?: number };
}

/** The slice of the groq-sdk client this provider calls. */
export interface GroqClient {
  chat: {
    completions: {
      create(params: ChatRequest): Promise<ChatCompletion>;
    };
  };
}

function usageOf(completion: ChatCompletion): LLMUsage {
  const promptTokens = completion.usage?.prompt_tokens ?? 0;
  const completionTokens = completion.usage?.completion_tokens ?? 0;
  return {
    promptTokens,
    completionTokens,
    totalTokens: completion.usage?.total_tokens ?? promptTokens + completionTokens,
  };
}

export class GroqProvider implements LLMProvider {
  readonly name = 'groq';
  private readonly client: GroqClient;
  private readonly model: string;

  constructor(client: GroqClient, model?: string) {
    this.client = client;
    this.model = model ?? DEFAULT_MODEL;
  }

  async chat(
    systemPrompt: string,
    userMessage: string,
    options?: LLMRequestOptions,
  ): Promise<Result<LLMResponse, AppError>> {
    const request = this.buildRequest(systemPrompt, userMessage, options);
    const ctx = { provider: this.name, model: this.model, responseFormat: options?.responseFormat ?? 'text' };
    const startTime = Date.now();

    log.debug(ctx, 'Requesting receipt completion');

    let completion: ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(request);
    } catch (cause) {
      return this.mapError(cause, Date.now() - startTime);
    }

    const latencyMs = Date.now() - startTime;
    const content = completion.choices[0]?.message?.content;
    if (!content) {
      log.warn({ ...ctx, latencyMs, errorCode: ErrorCode.LLM_MALFORMED_RESPONSE, retryable: false }, 'Completion had no content');
      return err(createAppError(ErrorCode.LLM_MALFORMED_RESPONSE, 'Groq returned empty response content', false));
    }

    const usage = usageOf(completion);
    log.info({ ...ctx, answeredBy: completion.model, latencyMs, totalTokens: usage.totalTokens }, 'Receipt completion received');
    return ok({ content, model: completion.model, usage, latencyMs });
  }

  private buildRequest(systemPrompt: string, userMessage: string, options?: LLMRequestOptions): ChatRequest {
    const request: ChatRequest = {
      model: this.model,
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content: userMessage },
      ],
      temperature: options?.temperature ?? 0,
      max_tokens: options?.maxTokens ?? DEFAULT_MAX_TOKENS,
    };
    if (options?.responseFormat === 'json') {
      request.response_format = { type: 'json_object' };
    }
    return request;
  }

  private mapError(cause: unknown, latencyMs: number): Result<never, AppError> {
    const details = cause instanceof Error ? cause.message : String(cause);
    const status = statusOf(cause);
    const failure = classifyFailure(cause, status);

    log[failure.level](
      { provider: this.name, model: this.model, latencyMs, status, details, errorCode: failure.code, retryable: failure.retryable },
      failure.message,
    );
    return err(createAppError(failure.code, failure.message, failure.retryable, details));
  }
}

interface GroqFailure {
  code: ErrorCode;
  message: string;
  retryable: boolean;
  level: 'warn' | 'error';
}

function statusOf(cause: unknown): number | undefined {
  if (cause !== null && typeof cause === 'object' && 'status' in cause && typeof cause.status === 'number') {
    return cause.status;
  }
  return undefined;
}

function classifyFailure(cause: unknown, status: number | undefined): GroqFailure {
  // Timeout is a subclass of the connection error, so it goes first
  if (cause instanceof APIConnectionTimeoutError) {
    return { code: ErrorCode.LLM_TIMEOUT, message: 'Groq API request timed out', retryable: true, level: 'error' };
  }
  if (cause instanceof APIConnectionError) {
    return { code: ErrorCode.LLM_UNREACHABLE, message: 'Groq API is unreachable', retryable: true, level: 'error' };
  }

  switch (status) {
    case 401:
    case 403:
      return { code: ErrorCode.LLM_AUTH_ERROR, message: 'Groq API authentication failed', retryable: false, level: 'error' };
    case 429:
      return { code: ErrorCode.LLM_RATE_LIMITED, message: 'Groq API rate limited', retryable: true, level: 'warn' };
    case undefined:
      return { code: ErrorCode.LLM_API_ERROR, message: 'Groq API call failed', retryable: true, level: 'error' };
    default:
      return {
        code: ErrorCode.LLM_API_ERROR,
        message: `Groq API returned ${status}`,
        retryable: status >= 500,
        level: 'error',
      };
  }
}

export function createGroqClient(apiKey: string, timeoutMs: number = DEFAULT_TIMEOUT_MS): GroqClient {
  return new Groq({ apiKey, timeout: timeoutMs, maxRetries: 1 });
}
