import { randomUUID } from 'node:crypto';
import { ErrorCode } from '../../domain/errors.js';
import { missingFieldsOf } from '../../domain/fields.js';
import { logger } from '../../infrastructure/logger.js';
import { buildExtractionPrompt } from './prompt.js';
import { coerceReply, findJsonObject } from './reply-parser.js';
import type { AppError } from '../../domain/errors.js';
import type { FieldExtractionStep, FieldName, StepFailure } from '../../domain/types.js';
import type { LLMResponse } from '../../infrastructure/llm/types.js';
import type { ModelExtraction, ModelFallbackDeps } from './types.js';

export type { ModelExtraction, ModelFallbackDeps } from './types.js';
export { findJsonObject, coerceReply } from './reply-parser.js';
export { buildExtractionPrompt } from './prompt.js';

const log = logger.child({ module: 'model-fallback' });

const MAX_ATTEMPTS = 2;

function serviceUnavailable(error: AppError): StepFailure {
  return { kind: 'service_unavailable', code: error.code, message: error.message };
}

function parseFailure(message: string): StepFailure {
  return { kind: 'parse_failure', code: ErrorCode.LLM_MALFORMED_RESPONSE, message };
}

/**
 * Asks the language model for `targetFields`. Never throws: an unreachable
 * service or an unusable reply comes back as a `failure` with no fields.
 */
export async function extractWithModel(
  deps: ModelFallbackDeps,
  text: string,
  targetFields: readonly FieldName[],
  documentId?: string,
): Promise<ModelExtraction> {
  const ctx = { documentId, step: 'model-fallback', provider: deps.llm.name, targetFields };
  const prompt = buildExtractionPrompt(text, targetFields);
  let lastReply: LLMResponse | null = null;

  for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
    const startTime = new Date();
    const chatResult = await deps.llm.chat(prompt.system, prompt.user, { responseFormat: 'json' });

    if (!chatResult.ok) {
      if (chatResult.error.code !== ErrorCode.LLM_MALFORMED_RESPONSE) {
        log.warn(
          { ...ctx, attempt, errorCode: chatResult.error.code, retryable: chatResult.error.retryable },
          'Model service unavailable, continuing without fallback fields',
        );
        return { fields: {}, missingFields: [...targetFields], attempts: attempt, failure: serviceUnavailable(chatResult.error) };
      }
      log.warn({ ...ctx, attempt, errorCode: chatResult.error.code }, 'Model returned an empty reply');
      continue;
    }

    lastReply = chatResult.value;
    deps.tracer?.traceGeneration({
      traceId: randomUUID(),
      name: 'receipt-fallback-extraction',
      model: lastReply.model,
      input: `${prompt.system}\n\n${prompt.user}`,
      output: lastReply.content,
      startTime,
      endTime: new Date(),
      metadata: { documentId, attempt, targetFields },
    });

    const raw = findJsonObject(lastReply.content);
    if (raw) {
      const fields = coerceReply(raw, targetFields);
      const missingFields = missingFieldsOf(fields, targetFields);
      log.info(
        { ...ctx, attempt, model: lastReply.model, latencyMs: lastReply.latencyMs, extracted: Object.keys(fields).length, missingFields },
        'Model fallback extraction completed',
      );
      return { fields, missingFields, model: lastReply.model, attempts: attempt };
    }

    log.warn({ ...ctx, attempt, errorCode: ErrorCode.LLM_MALFORMED_RESPONSE }, 'Model reply contained no JSON object');
  }

  log.error(
    { ...ctx, attempts: MAX_ATTEMPTS, errorCode: ErrorCode.LLM_MALFORMED_RESPONSE, retryable: false },
    'Model reply unusable on every attempt',
  );
  return {
    fields: {},
    missingFields: [...targetFields],
    model: lastReply?.model,
    attempts: MAX_ATTEMPTS,
    failure: parseFailure(`No JSON object in model reply after ${MAX_ATTEMPTS} attempts`),
  };
}

/** Runs the fallback stage and wraps its outcome as a persisted step. */
export async function runFallbackStep(
  deps: ModelFallbackDeps,
  text: string,
  targetFields: readonly FieldName[],
  stepNumber: number,
  documentId?: string,
): Promise<FieldExtractionStep> {
  const startedAt = new Date();
  const extraction = await extractWithModel(deps, text, targetFields, documentId);

  const step: FieldExtractionStep = {
    stepName: 'model-fallback',
    stepNumber,
    startedAt: startedAt.toISOString(),
    durationMs: Date.now() - startedAt.getTime(),
    status: extraction.failure ? 'failed' : 'succeeded',
    method: `llm:${deps.llm.name}`,
    requestedFields: [...targetFields],
    extractedFields: extraction.fields,
    missingFields: extraction.missingFields,
  };
  if (extraction.model) step.model = extraction.model;
  if (extraction.failure) step.failure = extraction.failure;

  return step;
}

/** The stage as recorded when no model provider is configured. */
export function unavailableFallbackStep(targetFields: readonly FieldName[], stepNumber: number): FieldExtractionStep {
  return {
    stepName: 'model-fallback',
    stepNumber,
    startedAt: new Date().toISOString(),
    durationMs: 0,
    status: 'failed',
    method: 'llm:none',
    requestedFields: [...targetFields],
    extractedFields: {},
    missingFields: [...targetFields],
    failure: {
      kind: 'service_unavailable',
      code: ErrorCode.LLM_UNREACHABLE,
      message: 'No language model provider is configured',
    },
  };
}
