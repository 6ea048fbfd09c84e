import type { ZodError } from 'zod';

export function paramString(val: string | string[]): string {
  return Array.isArray(val) ? val[0] ?? '' : val;
}

export function issueSummary(error: ZodError): string {
  return error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
}
