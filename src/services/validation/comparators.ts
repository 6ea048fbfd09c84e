import { FIELD_NAMES } from '../../domain/types.js';
import { parseDateString } from '../pattern-extraction/parsers.js';
import type { ExtractedFields, FieldName, FieldValue, ValueMismatch } from '../../domain/types.js';

const MONEY_FIELDS: ReadonlySet<FieldName> = new Set(['amount', 'vat_amount']);

function normalizeText(value: string): string {
  return value.replace(/\s+/g, ' ').trim().toLowerCase();
}

function sameTextSet(expected: readonly string[], actual: readonly string[]): boolean {
  const left = new Set(expected.map(normalizeText));
  const right = new Set(actual.map(normalizeText));
  return left.size === right.size && [...left].every((item) => right.has(item));
}

/** Type-aware equality: calendar dates, money within tolerance, text case-insensitively, lists as sets. */
export function valuesMatch(field: FieldName, expected: FieldValue, actual: FieldValue, amountTolerance: number): boolean {
  if (Array.isArray(expected) || Array.isArray(actual)) {
    return Array.isArray(expected) && Array.isArray(actual) && sameTextSet(expected, actual);
  }

  if (typeof expected === 'number' && typeof actual === 'number') {
    if (MONEY_FIELDS.has(field)) {
      // epsilon so that 0.01 apart still counts as within a 0.01 tolerance
      return Math.abs(expected - actual) <= amountTolerance + 1e-9;
    }
    return expected === actual;
  }

  const expectedText = String(expected);
  const actualText = String(actual);

  if (field === 'date') {
    const expectedDate = parseDateString(expectedText);
    const actualDate = parseDateString(actualText);
    if (expectedDate !== null && actualDate !== null) return expectedDate === actualDate;
  }

  return normalizeText(expectedText) === normalizeText(actualText);
}

function describe(value: FieldValue): string {
  return Array.isArray(value) ? `[${value.join(', ')}]` : String(value);
}

export function compareFields(
  expected: ExtractedFields,
  actual: ExtractedFields,
  amountTolerance: number,
): ValueMismatch[] {
  const mismatches: ValueMismatch[] = [];

  for (const field of FIELD_NAMES) {
    const expectedValue = expected[field];
    const actualValue = actual[field];
    if (expectedValue === undefined || actualValue === undefined) continue;

    if (!valuesMatch(field, expectedValue, actualValue, amountTolerance)) {
      mismatches.push({
        field,
        expected: expectedValue,
        actual: actualValue,
        message: `${field}: expected ${describe(expectedValue)}, got ${describe(actualValue)}`,
      });
    }
  }

  return mismatches;
}
