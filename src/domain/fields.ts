import { FIELD_NAMES } from './types.js';
import type { CompleteFields, ExtractedFields, FieldName, ReceiptFields } from './types.js';

type LooseFields = { [K in FieldName]?: ReceiptFields[K] | null };

export function emptyFields(): CompleteFields {
  return {
    date: null,
    company: null,
    amount: null,
    vat_amount: null,
    invoice_number: null,
    odometer_km: null,
    vehicle_reg: null,
    work_description: null,
  };
}

export function hasField(fields: LooseFields, field: FieldName): boolean {
  const value = fields[field];
  return value !== null && value !== undefined;
}

export function copyField<K extends FieldName>(
  target: ExtractedFields,
  source: LooseFields,
  field: K,
): void {
  const value: ReceiptFields[K] | null | undefined = source[field];
  if (value !== null && value !== undefined) {
    target[field] = value;
  }
}

/** Drops null/undefined entries so that presence means "has a value". */
export function compactFields(source: LooseFields): ExtractedFields {
  const result: ExtractedFields = {};
  for (const field of FIELD_NAMES) {
    copyField(result, source, field);
  }
  return result;
}

export function missingFieldsOf(fields: LooseFields, among: readonly FieldName[] = FIELD_NAMES): FieldName[] {
  return among.filter((field) => !hasField(fields, field));
}
