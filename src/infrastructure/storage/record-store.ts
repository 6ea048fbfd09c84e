import { join } from 'node:path';
import { ok, err } from '../../domain/result.js';
import { createAppError, ErrorCode } from '../../domain/errors.js';
import { processingRecordSchema } from '../../domain/schemas.js';
import { logger } from '../logger.js';
import { checkDocumentId, listDocumentDirs, readJsonIfExists, readTextIfExists, writeFileAtomic } from './files.js';
import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { ProcessingRecord } from '../../domain/types.js';
import type { RecordRepository } from './types.js';

const DATA_FILE = 'data.json';
const TEXT_FILE = 'ocr.txt';

const log = logger.child({ module: 'record-store' });

/** `<root>/<documentId>/data.json` plus the recognized text in `ocr.txt`. */
export class FileRecordRepository implements RecordRepository {
  constructor(private readonly root: string) {}

  async load(documentId: string): Promise<Result<ProcessingRecord | null, AppError>> {
    const id = checkDocumentId(documentId);
    if (!id.ok) return id;

    const path = join(this.root, id.value, DATA_FILE);
    const raw = await readJsonIfExists(path);
    if (!raw.ok) {
      log.error({ documentId, path, errorCode: raw.error.code, retryable: raw.error.retryable }, 'Failed to read processing record');
      return raw;
    }
    if (raw.value === null) return ok(null);

    const parsed = processingRecordSchema.safeParse(raw.value);
    if (!parsed.success) {
      log.error({ documentId, path, errorCode: ErrorCode.RECORD_INVALID, retryable: false }, 'Processing record does not match schema');
      return err(createAppError(ErrorCode.RECORD_INVALID, `Processing record for ${documentId} is invalid`, false, parsed.error.message));
    }
    return ok(parsed.data);
  }

  async loadText(documentId: string): Promise<Result<string | null, AppError>> {
    const id = checkDocumentId(documentId);
    if (!id.ok) return id;
    return readTextIfExists(join(this.root, id.value, TEXT_FILE));
  }

  async save(record: ProcessingRecord, text: string | null): Promise<Result<void, AppError>> {
    const id = checkDocumentId(record.documentId);
    if (!id.ok) return id;

    const dir = join(this.root, id.value);
    if (text !== null) {
      const textResult = await writeFileAtomic(join(dir, TEXT_FILE), text);
      if (!textResult.ok) {
        log.error({ documentId: record.documentId, errorCode: textResult.error.code, retryable: true }, 'Failed to write recognized text');
        return textResult;
      }
    }

    const dataResult = await writeFileAtomic(join(dir, DATA_FILE), `${JSON.stringify(record, null, 2)}\n`);
    if (!dataResult.ok) {
      log.error({ documentId: record.documentId, errorCode: dataResult.error.code, retryable: true }, 'Failed to write processing record');
      return dataResult;
    }

    log.debug({ documentId: record.documentId, steps: record.steps.length }, 'Processing record saved');
    return ok(undefined);
  }

  list(): Promise<Result<string[], AppError>> {
    return listDocumentDirs(this.root, DATA_FILE);
  }
}
