import { logger } from '../../infrastructure/logger.js';
import type { RecognitionStep } from '../../domain/types.js';
import type { RecognitionOutcome, TextRecognizer } from './types.js';

export type { RecognizedText, TextRecognizer, RecognitionOutcome } from './types.js';

const log = logger.child({ module: 'recognition' });

export async function recognizeDocument(
  recognizer: TextRecognizer,
  path: string,
  stepNumber: number,
  documentId?: string,
): Promise<RecognitionOutcome> {
  const startedAt = new Date();
  const ctx = { documentId, step: 'recognition', method: recognizer.method };

  log.info(ctx, 'Starting text recognition');

  const result = await recognizer.recognize(path);
  const durationMs = Date.now() - startedAt.getTime();

  if (!result.ok) {
    const step: RecognitionStep = {
      stepName: 'recognition',
      stepNumber,
      startedAt: startedAt.toISOString(),
      durationMs,
      status: 'failed',
      method: recognizer.method,
      output: { textLength: 0, pageCount: 0 },
      failure: { kind: 'recognition_failure', code: result.error.code, message: result.error.message },
    };
    log.error({ ...ctx, durationMs, errorCode: result.error.code, retryable: result.error.retryable }, 'Text recognition failed');
    return { ok: false, step, error: result.error };
  }

  const { text, pageCount, method } = result.value;
  const step: RecognitionStep = {
    stepName: 'recognition',
    stepNumber,
    startedAt: startedAt.toISOString(),
    durationMs,
    status: 'succeeded',
    method,
    output: { textLength: text.length, pageCount },
  };

  log.info({ ...ctx, durationMs, textLength: text.length, pageCount }, 'Text recognition completed');
  return { ok: true, step, text };
}
