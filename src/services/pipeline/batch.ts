import { randomUUID } from 'node:crypto';
import { readdir, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';
import { ok, err } from '../../domain/result.js';
import { createAppError, ErrorCode } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';
import { documentIdFor, processDocument } from './document.js';
import { summarize } from './report.js';
import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { BatchReport, DocumentReport, DocumentResult, PipelineDeps, ProcessingMode } from './types.js';

const log = logger.child({ module: 'batch' });

const DOCUMENT_EXTENSIONS = new Set(['.pdf']);

export interface BatchOptions {
  concurrency?: number;
}

/** A single file, or every PDF directly inside a directory, sorted by name. */
export async function collectInputs(target: string): Promise<Result<string[], AppError>> {
  try {
    const info = await stat(target);
    if (!info.isDirectory()) return ok([target]);

    const entries = await readdir(target, { withFileTypes: true });
    const files = entries
      .filter((entry) => entry.isFile() && DOCUMENT_EXTENSIONS.has(extname(entry.name).toLowerCase()))
      .map((entry) => join(target, entry.name))
      .sort();
    return ok(files);
  } catch (cause) {
    const details = cause instanceof Error ? cause.message : String(cause);
    log.error({ target, errorCode: ErrorCode.FILE_NOT_FOUND, retryable: false, details }, 'Input path not readable');
    return err(createAppError(ErrorCode.FILE_NOT_FOUND, `Input path not found: ${target}`, false, details));
  }
}

async function processOne(path: string, mode: ProcessingMode, deps: PipelineDeps, runId: string): Promise<DocumentReport> {
  const documentId = documentIdFor(path);
  let result: Result<DocumentResult, AppError>;
  try {
    result = await processDocument(path, mode, deps, runId);
  } catch (cause) {
    const details = cause instanceof Error ? cause.message : String(cause);
    log.error({ runId, documentId, errorCode: ErrorCode.INTERNAL_ERROR, retryable: false, details }, 'Document crashed');
    const error = createAppError(ErrorCode.INTERNAL_ERROR, `Processing ${documentId} crashed`, false, details);
    return { documentId, status: 'fatal', validation: null, error };
  }

  if (!result.ok) {
    return { documentId, status: 'fatal', validation: null, error: result.error };
  }

  const outcome = result.value;
  if (outcome.fatal) {
    return { documentId, status: 'fatal', validation: null, error: outcome.fatal };
  }
  return { documentId, status: outcome.validation.severity, validation: outcome.validation, basis: outcome.final.basis };
}

/**
 * Processes documents independently with at most `concurrency` in flight.
 * Reports keep input order; one document failing never stops the others.
 */
export async function processBatch(
  paths: readonly string[],
  mode: ProcessingMode,
  deps: PipelineDeps,
  options: BatchOptions = {},
): Promise<BatchReport> {
  const runId = randomUUID();
  const concurrency = Math.max(1, Math.min(options.concurrency ?? 1, paths.length || 1));
  const reports: DocumentReport[] = new Array(paths.length);
  let next = 0;

  log.info({ runId, mode, documents: paths.length, concurrency }, 'Starting batch');

  const worker = async (): Promise<void> => {
    while (next < paths.length) {
      const index = next++;
      const path = paths[index];
      if (path === undefined) return;
      reports[index] = await processOne(path, mode, deps, runId);
    }
  };

  await Promise.all(Array.from({ length: concurrency }, () => worker()));

  const report = summarize(reports);
  log.info(
    { runId, total: report.total, passed: report.passed, warnings: report.warnings, failed: report.failed, fatal: report.fatal },
    'Batch completed',
  );
  return report;
}
