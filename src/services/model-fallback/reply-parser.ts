import { parseDateString, parseDistance, parseLocaleAmount } from '../pattern-extraction/parsers.js';
import type { ExtractedFields, FieldName, ReceiptFields } from '../../domain/types.js';

const PLATE = /^[A-ZÅÄÖ]{2,3}-\d{1,3}$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Index of the `}` closing the object opened at `start`, or -1. */
function closingBrace(content: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < content.length; i++) {
    const char = content[i];

    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }

    if (char === '"') inString = true;
    else if (char === '{') depth++;
    else if (char === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }

  return -1;
}

function tryParseObject(candidate: string): Record<string, unknown> | null {
  try {
    const parsed: unknown = JSON.parse(candidate);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Finds the first balanced `{...}` block in a model reply that parses as a
 * JSON object. Prose and code fences around it are ignored.
 */
export function findJsonObject(content: string): Record<string, unknown> | null {
  let start = content.indexOf('{');

  while (start !== -1) {
    const end = closingBrace(content, start);
    if (end !== -1) {
      const parsed = tryParseObject(content.slice(start, end + 1));
      if (parsed) return parsed;
    }
    start = content.indexOf('{', start + 1);
  }

  return null;
}

function stripUnit(value: string, unit: RegExp): string {
  return value.replace(unit, '').trim();
}

function toAmount(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? Math.round(value * 100) / 100 : null;
  if (typeof value === 'string') return parseLocaleAmount(stripUnit(value, /(?:EUR|€)/gi));
  return null;
}

function toText(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.replace(/\s+/g, ' ').trim();
  return trimmed.length > 0 ? trimmed : null;
}

const COERCERS: { [K in FieldName]: (value: unknown) => ReceiptFields[K] | null } = {
  date: (value) => (typeof value === 'string' ? parseDateString(value) : null),
  company: toText,
  amount: toAmount,
  vat_amount: toAmount,
  invoice_number: (value) => {
    if (typeof value === 'number') return Number.isSafeInteger(value) && value >= 0 ? String(value) : null;
    if (typeof value !== 'string') return null;
    const digits = value.replace(/\s/g, '');
    return /^\d+$/.test(digits) ? digits : null;
  },
  odometer_km: (value) => {
    if (typeof value === 'number') return Number.isSafeInteger(value) && value > 0 ? value : null;
    if (typeof value === 'string') return parseDistance(stripUnit(value, /km/gi));
    return null;
  },
  vehicle_reg: (value) => {
    const text = toText(value);
    if (text === null) return null;
    const plate = text.toUpperCase().replace(/\s/g, '');
    return PLATE.test(plate) ? plate : null;
  },
  work_description: (value) => {
    const items: unknown[] = typeof value === 'string' ? [value] : Array.isArray(value) ? value : [];
    const terms: string[] = [];
    for (const item of items) {
      const text = toText(item);
      if (text !== null && !terms.includes(text)) terms.push(text);
    }
    return terms.length > 0 ? terms : null;
  },
};

function coerceField<K extends FieldName>(target: ExtractedFields, field: K, value: unknown): void {
  const coerced: ReceiptFields[K] | null = COERCERS[field](value);
  if (coerced !== null) {
    target[field] = coerced;
  }
}

/** Keeps only requested fields whose values coerce to the field's type. */
export function coerceReply(raw: Record<string, unknown>, targetFields: readonly FieldName[]): ExtractedFields {
  const fields: ExtractedFields = {};
  for (const field of targetFields) {
    coerceField(fields, field, raw[field]);
  }
  return fields;
}
