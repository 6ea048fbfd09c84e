/**
 * Parses a Finnish-style money string: `850,00`, `1 234,56`, `1234.56`.
 * Returns null when the input is not a finite number.
 */
export function parseLocaleAmount(raw: string): number | null {
  const normalized = raw.replace(/\s/g, '').replace(',', '.');
  if (!/^-?\d+(?:\.\d+)?$/.test(normalized)) return null;
  const value = Number(normalized);
  if (!Number.isFinite(value)) return null;
  return Math.round(value * 100) / 100;
}

/** Two-digit years below 50 are 20xx, the rest 19xx. */
export function expandYear(year: number): number {
  if (year >= 100) return year;
  return year < 50 ? 2000 + year : 1900 + year;
}

/** Builds `YYYY-MM-DD`, or null for an impossible calendar date. */
export function toIsoDate(day: number, month: number, year: number): string | null {
  const fullYear = expandYear(year);
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;

  const date = new Date(Date.UTC(fullYear, month - 1, day));
  if (
    date.getUTCFullYear() !== fullYear ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return `${String(fullYear).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/** Accepts `D.M.YYYY`, `D.M.YY` and `YYYY-MM-DD`. */
export function parseDateString(raw: string): string | null {
  const trimmed = raw.trim();

  const iso = /^(\d{4})-(\d{1,2})-(\d{1,2})$/.exec(trimmed);
  if (iso) return toIsoDate(Number(iso[3]), Number(iso[2]), Number(iso[1]));

  const finnish = /^(\d{1,2})\.(\d{1,2})\.(\d{4}|\d{2})$/.exec(trimmed);
  if (finnish) return toIsoDate(Number(finnish[1]), Number(finnish[2]), Number(finnish[3]));

  return null;
}

export function parseDistance(raw: string): number | null {
  const digits = raw.replace(/\s/g, '');
  if (!/^\d+$/.test(digits)) return null;
  const value = Number(digits);
  return Number.isSafeInteger(value) && value > 0 ? value : null;
}
