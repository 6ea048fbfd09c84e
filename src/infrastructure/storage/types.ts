import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { GroundTruthRecord, OverrideRecord, ProcessingRecord } from '../../domain/types.js';

/** Pipeline output, one record per document. `null` means never processed. */
export interface RecordRepository {
  load(documentId: string): Promise<Result<ProcessingRecord | null, AppError>>;
  loadText(documentId: string): Promise<Result<string | null, AppError>>;
  save(record: ProcessingRecord, text: string | null): Promise<Result<void, AppError>>;
  list(): Promise<Result<string[], AppError>>;
}

/** Human-maintained ground truth and override files. Never written by the pipeline. */
export interface VerificationRepository {
  loadGroundTruth(documentId: string): Promise<Result<GroundTruthRecord | null, AppError>>;
  loadOverride(documentId: string): Promise<Result<OverrideRecord | null, AppError>>;
  list(): Promise<Result<string[], AppError>>;
}
