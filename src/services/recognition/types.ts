import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { RecognitionStep } from '../../domain/types.js';

export interface RecognizedText {
  text: string;
  pageCount: number;
  method: string;
}

/** External text-recognition engine, consumed as a black box. */
export interface TextRecognizer {
  readonly method: string;
  recognize(path: string): Promise<Result<RecognizedText, AppError>>;
}

export type RecognitionOutcome =
  | { ok: true; step: RecognitionStep; text: string }
  | { ok: false; step: RecognitionStep; error: AppError };
