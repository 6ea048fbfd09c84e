import { FIELD_NAMES } from '../../domain/types.js';
import { compactFields, copyField } from '../../domain/fields.js';
import { ok } from '../../domain/result.js';
import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type {
  ExtractedFields,
  FieldName,
  FieldValue,
  FinalRecord,
  GroundTruthRecord,
  OverriddenField,
  OverrideRecord,
  ReconciledRecord,
} from '../../domain/types.js';
import type { VerificationRepository } from '../../infrastructure/storage/types.js';

export interface Verification {
  groundTruth: GroundTruthRecord | null;
  override: OverrideRecord | null;
}

function sameValue(a: FieldValue | null, b: FieldValue | null): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, index) => item === b[index]);
  }
  return a === b;
}

/**
 * Folds the three sources into the trusted record: ground truth replaces the
 * reconciled fields entirely, then override values win field by field; a
 * `null` override removes the field.
 * Inputs are never mutated.
 */
export function resolveFinalRecord(
  reconciled: ReconciledRecord | null,
  groundTruth: GroundTruthRecord | null,
  override: OverrideRecord | null,
  documentId: string,
): FinalRecord {
  const base: ExtractedFields = groundTruth
    ? compactFields(groundTruth.fields)
    : reconciled
      ? compactFields(reconciled.fields)
      : {};

  const fields: ExtractedFields = { ...base };
  const overriddenFields: Partial<Record<FieldName, OverriddenField>> = {};

  if (override) {
    for (const field of FIELD_NAMES) {
      const value = override.fields[field];
      if (value === undefined) continue;

      const original = base[field] ?? null;
      if (!sameValue(original, value)) {
        overriddenFields[field] = { original, override: value };
      }
      if (value === null) {
        delete fields[field];
      } else {
        copyField(fields, override.fields, field);
      }
    }
  }

  return {
    documentId,
    fields,
    basis: groundTruth ? 'ground_truth' : 'reconciled',
    overrideInfo: {
      hasOverrides: Object.keys(overriddenFields).length > 0,
      overriddenFields,
      reason: override?.reason ?? null,
    },
  };
}

export async function loadVerification(
  repo: VerificationRepository,
  documentId: string,
): Promise<Result<Verification, AppError>> {
  const groundTruth = await repo.loadGroundTruth(documentId);
  if (!groundTruth.ok) return groundTruth;

  const override = await repo.loadOverride(documentId);
  if (!override.ok) return override;

  return ok({ groundTruth: groundTruth.value, override: override.value });
}
