import { join } from 'node:path';
import { ok, err } from '../../domain/result.js';
import { createAppError, ErrorCode } from '../../domain/errors.js';
import { compactFields } from '../../domain/fields.js';
import { overrideFileSchema, verifiedFileSchema } from '../../domain/schemas.js';
import { logger } from '../logger.js';
import { checkDocumentId, listDocumentDirs, readJsonIfExists } from './files.js';
import type { z } from 'zod';
import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type {
  ExpectationRules,
  ExpectationStage,
  GroundTruthRecord,
  OverrideRecord,
} from '../../domain/types.js';
import type { ExpectationRulesFile } from '../../domain/schemas.js';
import type { VerificationRepository } from './types.js';

const VERIFIED_FILE = 'verified.json';
const OVERRIDE_FILE = 'override.json';

const log = logger.child({ module: 'verification-store' });

function toRules(file: ExpectationRulesFile): ExpectationRules {
  const rules: ExpectationRules = {
    requiredFields: file.required_fields,
    warnIfMissing: file.warning_if_missing,
    optionalFields: file.optional_fields,
  };
  if (file.ranges) rules.ranges = file.ranges;
  return rules;
}

/**
 * Reads `<root>/<documentId>/verified.json` and `override.json`. These files
 * are maintained by people; this repository never writes them.
 */
export class FileVerificationRepository implements VerificationRepository {
  constructor(private readonly root: string) {}

  async loadGroundTruth(documentId: string): Promise<Result<GroundTruthRecord | null, AppError>> {
    const file = await this.readFile(documentId, VERIFIED_FILE, verifiedFileSchema);
    if (!file.ok) return file;
    if (file.value === null) return ok(null);

    const expectations: Partial<Record<ExpectationStage, ExpectationRules>> = {};
    const expected = file.value.expected_extraction;
    if (expected?.pattern) expectations.pattern = toRules(expected.pattern);
    if (expected?.model_fallback) expectations.model_fallback = toRules(expected.model_fallback);
    if (expected?.final_data) expectations.final_data = toRules(expected.final_data);

    return ok({ documentId, fields: compactFields(file.value.ground_truth), expectations });
  }

  async loadOverride(documentId: string): Promise<Result<OverrideRecord | null, AppError>> {
    const file = await this.readFile(documentId, OVERRIDE_FILE, overrideFileSchema);
    if (!file.ok) return file;
    if (file.value === null) return ok(null);

    // nulls stay: an override can clear a field
    return ok({ documentId, fields: { ...file.value.ground_truth }, reason: file.value.reason ?? null });
  }

  list(): Promise<Result<string[], AppError>> {
    return listDocumentDirs(this.root, VERIFIED_FILE);
  }

  private async readFile<T>(
    documentId: string,
    name: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<Result<T | null, AppError>> {
    const id = checkDocumentId(documentId);
    if (!id.ok) return id;

    const path = join(this.root, id.value, name);
    const raw = await readJsonIfExists(path);
    if (!raw.ok) {
      log.error({ documentId, path, errorCode: raw.error.code, retryable: raw.error.retryable }, 'Failed to read verification file');
      return raw;
    }
    if (raw.value === null) return ok(null);

    const parsed = schema.safeParse(raw.value);
    if (!parsed.success) {
      log.error({ documentId, path, errorCode: ErrorCode.RECORD_INVALID, retryable: false }, 'Verification file does not match schema');
      return err(createAppError(ErrorCode.RECORD_INVALID, `${name} for ${documentId} is invalid`, false, parsed.error.message));
    }
    return ok(parsed.data);
  }
}
