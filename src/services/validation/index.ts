import { FIELD_NAMES } from '../../domain/types.js';
import { hasField } from '../../domain/fields.js';
import { logger } from '../../infrastructure/logger.js';
import { compareFields } from './comparators.js';
import { DEFAULT_AMOUNT_TOLERANCE } from './types.js';
import type {
  ExpectationRules,
  ExtractedFields,
  FieldName,
  RangeRules,
  RangeViolation,
  ValidationOutcome,
  ValidationSeverity,
} from '../../domain/types.js';
import type { ValidationOptions } from './types.js';

export type { ValidationOptions } from './types.js';
export { DEFAULT_AMOUNT_TOLERANCE } from './types.js';
export { DEFAULT_RANGES, DEFAULT_REQUIRED_FIELDS, defaultRules } from './rules.js';
export { compareFields, valuesMatch } from './comparators.js';

const log = logger.child({ module: 'validation' });

function rangeValue(field: FieldName, fields: ExtractedFields): number | null {
  if (field === 'date') {
    return fields.date ? Number(fields.date.slice(0, 4)) : null;
  }
  const value = fields[field];
  return typeof value === 'number' ? value : null;
}

function checkRanges(fields: ExtractedFields, ranges: RangeRules): RangeViolation[] {
  const violations: RangeViolation[] = [];

  for (const field of FIELD_NAMES) {
    const rule = ranges[field];
    if (!rule) continue;

    const value = rangeValue(field, fields);
    if (value === null) continue;

    if ((rule.min !== undefined && value < rule.min) || (rule.max !== undefined && value > rule.max)) {
      const shown = field === 'date' ? fields.date ?? value : value;
      violations.push({
        field,
        value: shown,
        message: `Field '${field}' value ${shown} is outside allowed range [${rule.min ?? '-∞'}, ${rule.max ?? '∞'}]`,
      });
    }
  }

  return violations;
}

/**
 * Judges a record against expectation rules. Missing required fields and
 * (in self-test mode) value mismatches fail the record; missing warn fields
 * and range violations only downgrade it to a warning.
 */
export function validateRecord(
  fields: ExtractedFields,
  rules: ExpectationRules,
  options: ValidationOptions = {},
): ValidationOutcome {
  const required = new Set(rules.requiredFields);
  const warn = new Set(rules.warnIfMissing.filter((field) => !required.has(field)));

  const missingRequired = rules.requiredFields.filter((field) => !hasField(fields, field));
  const missingWarning = [...warn].filter((field) => !hasField(fields, field));
  const missingOptional = rules.optionalFields.filter(
    (field) => !required.has(field) && !warn.has(field) && !hasField(fields, field),
  );

  const rangeViolations = rules.ranges ? checkRanges(fields, rules.ranges) : [];
  const mismatches = options.groundTruth
    ? compareFields(options.groundTruth, fields, options.amountTolerance ?? DEFAULT_AMOUNT_TOLERANCE)
    : [];

  let severity: ValidationSeverity = 'pass';
  if (missingRequired.length > 0 || mismatches.length > 0) {
    severity = 'fail';
  } else if (missingWarning.length > 0 || rangeViolations.length > 0) {
    severity = 'warning';
  }

  const outcome: ValidationOutcome = {
    passed: severity !== 'fail',
    severity,
    missingRequired,
    missingWarning,
    missingOptional,
    mismatches,
    rangeViolations,
  };

  log.debug(
    {
      documentId: options.documentId,
      step: 'validating',
      severity,
      missingRequired,
      missingWarning,
      mismatchCount: mismatches.length,
      rangeViolationCount: rangeViolations.length,
    },
    'Validation completed',
  );

  return outcome;
}
