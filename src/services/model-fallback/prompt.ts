import type { FieldName } from '../../domain/types.js';

const MAX_TEXT_CHARS = 8000;

const FIELD_DESCRIPTIONS: Record<FieldName, string> = {
  date: 'invoice date as "YYYY-MM-DD"',
  company: 'name of the company that issued the receipt',
  amount: 'total amount including VAT in euros, as a number (e.g. 850.00)',
  vat_amount: 'VAT amount in euros, as a number',
  invoice_number: 'invoice number as a string of digits',
  odometer_km: 'odometer reading in kilometres, as an integer',
  vehicle_reg: 'Finnish vehicle registration plate, e.g. "ABC-123"',
  work_description: 'list of the service work items performed, as strings',
};

export interface ExtractionPrompt {
  system: string;
  user: string;
}

export function buildExtractionPrompt(text: string, targetFields: readonly FieldName[]): ExtractionPrompt {
  const fieldLines = targetFields.map((field) => `- "${field}": ${FIELD_DESCRIPTIONS[field]}`).join('\n');
  const shape = `{ ${targetFields.map((field) => `"${field}": ...`).join(', ')} }`;

  const system = [
    'You extract structured data from Finnish car service receipts.',
    'The receipt text comes from OCR and may contain recognition errors.',
    'Extract only these fields:',
    fieldLines,
    '',
    `Respond with a single JSON object of the form ${shape}.`,
    'Use null for any field you cannot find. Do not guess and do not add other keys.',
  ].join('\n');

  const user = text.length > MAX_TEXT_CHARS ? text.slice(0, MAX_TEXT_CHARS) : text;

  return { system, user };
}
