import { z } from 'zod';
import { ok, err } from '../../domain/result.js';
import { createAppError, ErrorCode } from '../../domain/errors.js';
import { logger } from '../logger.js';
import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { LLMProvider, LLMResponse, LLMRequestOptions } from './types.js';

const DEFAULT_MODEL = 'llama3.2:3b';
const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_MAX_TOKENS = 1024;
const CHAT_ENDPOINT = '/api/chat';

const log = logger.child({ module: 'llm-ollama' });

const chatResponseSchema = z.object({
  model: z.string(),
  message: z.object({ content: z.string() }),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface OllamaProviderOptions {
  baseUrl: string;
  model?: string;
  timeoutMs?: number;
}

export class OllamaProvider implements LLMProvider {
  readonly name = 'ollama';
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(options: OllamaProviderOptions, fetchFn: FetchFn = fetch) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.model = options.model ?? DEFAULT_MODEL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchFn = fetchFn;
  }

  async chat(
    systemPrompt: string,
    userMessage: string,
    options?: LLMRequestOptions,
  ): Promise<Result<LLMResponse, AppError>> {
    const startTime = Date.now();
    const ctx = { model: this.model, baseUrl: this.baseUrl };
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    log.debug(ctx, 'Calling Ollama chat');

    let response: Response;
    try {
      response = await this.fetchFn(`${this.baseUrl}${CHAT_ENDPOINT}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.model,
          messages: [
            { role: 'system', content: systemPrompt },
            { role: 'user', content: userMessage },
          ],
          stream: false,
          ...(options?.responseFormat === 'json' && { format: 'json' }),
          options: {
            temperature: options?.temperature ?? 0.1,
            num_predict: options?.maxTokens ?? DEFAULT_MAX_TOKENS,
          },
        }),
        signal: controller.signal,
      });
    } catch (cause) {
      clearTimeout(timeoutId);
      const latencyMs = Date.now() - startTime;
      const details = cause instanceof Error ? cause.message : String(cause);

      if (controller.signal.aborted) {
        log.error({ ...ctx, latencyMs, errorCode: ErrorCode.LLM_TIMEOUT, retryable: true }, 'Ollama request timed out');
        return err(createAppError(ErrorCode.LLM_TIMEOUT, `Ollama did not answer within ${this.timeoutMs}ms`, true, details));
      }

      log.error({ ...ctx, latencyMs, errorCode: ErrorCode.LLM_UNREACHABLE, retryable: true, details }, 'Ollama unreachable');
      return err(createAppError(ErrorCode.LLM_UNREACHABLE, 'Ollama service is unreachable', true, details));
    }

    try {
      if (!response.ok) {
        const body = await response.text();
        const retryable = response.status >= 500;
        log.error(
          { ...ctx, status: response.status, errorCode: ErrorCode.LLM_API_ERROR, retryable },
          'Ollama returned an error status',
        );
        return err(createAppError(ErrorCode.LLM_API_ERROR, `Ollama API returned ${response.status}`, retryable, body));
      }

      const payload: unknown = await response.json();
      const parsed = chatResponseSchema.safeParse(payload);
      const latencyMs = Date.now() - startTime;

      if (!parsed.success) {
        log.error({ ...ctx, latencyMs, errorCode: ErrorCode.LLM_API_ERROR, retryable: false }, 'Ollama returned an unexpected payload');
        return err(
          createAppError(ErrorCode.LLM_API_ERROR, 'Ollama returned an unexpected payload', false, parsed.error.message),
        );
      }

      if (parsed.data.message.content.length === 0) {
        log.warn({ ...ctx, latencyMs, errorCode: ErrorCode.LLM_MALFORMED_RESPONSE, retryable: false }, 'Ollama returned empty response');
        return err(createAppError(ErrorCode.LLM_MALFORMED_RESPONSE, 'Ollama returned empty response content', false));
      }

      const promptTokens = parsed.data.prompt_eval_count ?? 0;
      const completionTokens = parsed.data.eval_count ?? 0;

      log.info({ ...ctx, latencyMs, promptTokens, completionTokens }, 'Ollama chat succeeded');

      return ok({
        content: parsed.data.message.content,
        model: parsed.data.model,
        usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
        latencyMs,
      });
    } catch (cause) {
      const details = cause instanceof Error ? cause.message : String(cause);
      if (controller.signal.aborted) {
        log.error({ ...ctx, errorCode: ErrorCode.LLM_TIMEOUT, retryable: true }, 'Ollama response timed out');
        return err(createAppError(ErrorCode.LLM_TIMEOUT, `Ollama did not answer within ${this.timeoutMs}ms`, true, details));
      }
      log.error({ ...ctx, errorCode: ErrorCode.LLM_API_ERROR, retryable: true, details }, 'Failed to read Ollama response');
      return err(createAppError(ErrorCode.LLM_API_ERROR, 'Failed to read Ollama response', true, details));
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
