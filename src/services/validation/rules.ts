import type { ExpectationRules, FieldName, RangeRules } from '../../domain/types.js';

export const DEFAULT_REQUIRED_FIELDS: readonly FieldName[] = ['date', 'amount', 'company'];

const DEFAULT_WARN_FIELDS: readonly FieldName[] = ['odometer_km', 'invoice_number'];
const DEFAULT_OPTIONAL_FIELDS: readonly FieldName[] = ['vat_amount', 'vehicle_reg', 'work_description'];

/** For `date` the bounds apply to the calendar year. */
export const DEFAULT_RANGES: RangeRules = {
  amount: { min: 0, max: 100_000 },
  vat_amount: { min: 0, max: 100_000 },
  odometer_km: { min: 0, max: 999_999 },
  date: { min: 2000, max: 2035 },
};

/**
 * Default severities. Fields made required through configuration are taken
 * out of the warn and optional lists.
 */
export function defaultRules(requiredFields: readonly FieldName[] = DEFAULT_REQUIRED_FIELDS): ExpectationRules {
  const required = new Set(requiredFields);
  return {
    requiredFields: [...required],
    warnIfMissing: DEFAULT_WARN_FIELDS.filter((field) => !required.has(field)),
    optionalFields: DEFAULT_OPTIONAL_FIELDS.filter((field) => !required.has(field)),
    ranges: DEFAULT_RANGES,
  };
}
