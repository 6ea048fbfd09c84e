import { FIELD_NAMES } from '../../domain/types.js';
import { emptyFields } from '../../domain/fields.js';
import { logger } from '../../infrastructure/logger.js';
import type {
  CompleteFields,
  ExtractedFields,
  FieldExtractionStep,
  FieldName,
  FieldProvenance,
  FieldRepair,
  FieldStepName,
  ReceiptFields,
  ReconciledRecord,
} from '../../domain/types.js';

const log = logger.child({ module: 'reconciliation' });

export const ODOMETER_REPAIR_RULE = 'odometer-leading-digit';

export interface OdometerBounds {
  minKm: number;
  maxKm: number;
}

export const DEFAULT_ODOMETER_BOUNDS: OdometerBounds = { minKm: 0, maxKm: 1_000_000 };

export interface ReconcileOptions {
  odometer?: Partial<OdometerBounds>;
  documentId?: string;
}

/**
 * OCR tends to read a stray mark in front of the odometer as an extra leading
 * digit. A reading at or above `maxKm` with exactly one digit more than the
 * largest plausible reading loses its first digit, provided what remains is a
 * plausible reading itself. Returns null when no repair applies.
 */
export function repairOdometer(value: number, bounds: OdometerBounds = DEFAULT_ODOMETER_BOUNDS): number | null {
  if (!Number.isSafeInteger(value) || value < bounds.maxKm) return null;

  const digits = String(value);
  const plausibleDigits = String(Math.max(bounds.maxKm - 1, 0)).length;
  if (digits.length !== plausibleDigits + 1) return null;

  const remainder = digits.slice(1);
  if (remainder.startsWith('0')) return null;

  const repaired = Number(remainder);
  return repaired >= bounds.minKm && repaired < bounds.maxKm ? repaired : null;
}

function mergeField<K extends FieldName>(
  fields: CompleteFields,
  provenance: FieldProvenance,
  field: K,
  sources: ReadonlyArray<{ stepName: FieldStepName; values: ExtractedFields }>,
): void {
  for (const source of sources) {
    const value: ReceiptFields[K] | undefined = source.values[field];
    if (value !== undefined) {
      fields[field] = value;
      provenance[field] = source.stepName;
      return;
    }
  }
}

/**
 * Pattern values win wherever present; the fallback only fills gaps. Every
 * schema field is present on the result, `null` when neither stage found it.
 */
export function reconcile(
  patternStep: FieldExtractionStep | null,
  fallbackStep: FieldExtractionStep | null,
  options: ReconcileOptions = {},
): ReconciledRecord {
  const bounds: OdometerBounds = { ...DEFAULT_ODOMETER_BOUNDS, ...options.odometer };
  const sources: Array<{ stepName: FieldStepName; values: ExtractedFields }> = [];
  if (patternStep) sources.push({ stepName: 'pattern', values: patternStep.extractedFields });
  if (fallbackStep) sources.push({ stepName: 'model-fallback', values: fallbackStep.extractedFields });

  const fields = emptyFields();
  const provenance: FieldProvenance = {};
  for (const field of FIELD_NAMES) {
    mergeField(fields, provenance, field, sources);
  }

  const repairs: FieldRepair[] = [];
  if (fields.odometer_km !== null) {
    const repaired = repairOdometer(fields.odometer_km, bounds);
    if (repaired !== null) {
      repairs.push({ field: 'odometer_km', original: fields.odometer_km, repaired, rule: ODOMETER_REPAIR_RULE });
      log.info({ documentId: options.documentId, original: fields.odometer_km, repaired }, 'Repaired odometer reading');
      fields.odometer_km = repaired;
    }
  }

  return { fields, provenance, repairs };
}
