import { FIELD_NAMES } from '../../domain/types.js';
import { missingFieldsOf } from '../../domain/fields.js';
import { logger } from '../../infrastructure/logger.js';
import { getDefaultTables } from './tables.js';
import {
  AMOUNT_RULES,
  DATE_RULES,
  INVOICE_RULES,
  ODOMETER_RULES,
  VAT_RULES,
  VEHICLE_REG_RULES,
  firstMatch,
} from './rules.js';
import type {
  ExtractedFields,
  FieldExtractionStep,
  FieldName,
  ReceiptFields,
} from '../../domain/types.js';
import type { ExtractionTables } from './tables.js';
import type { RuleMatch } from './rules.js';

export { loadExtractionTables, getDefaultTables } from './tables.js';
export type { ExtractionTables, IssuerEntry, ServiceTermEntry } from './tables.js';
export { parseLocaleAmount, parseDateString, toIsoDate } from './parsers.js';

const log = logger.child({ module: 'pattern-extraction' });

export const PATTERN_METHOD = 'pattern_matching';

export interface PatternExtractionOptions {
  tables?: ExtractionTables;
}

export interface PatternExtraction {
  fields: ExtractedFields;
  missingFields: FieldName[];
  /** Name of the rule that produced each field. */
  matchedRules: Partial<Record<FieldName, string>>;
}

function assign<K extends FieldName>(
  extraction: PatternExtraction,
  field: K,
  match: RuleMatch<ReceiptFields[K]> | null,
): void {
  if (!match) return;
  extraction.fields[field] = match.value;
  extraction.matchedRules[field] = match.rule;
}

function matchIssuer(text: string, tables: ExtractionTables): RuleMatch<string> | null {
  for (const issuer of tables.issuers) {
    if (issuer.patterns.some((pattern) => pattern.test(text))) {
      return { value: issuer.name, rule: 'issuer-table' };
    }
  }
  return null;
}

function matchServiceTerms(text: string, tables: ExtractionTables): RuleMatch<string[]> | null {
  const terms: string[] = [];
  for (const entry of tables.serviceTerms) {
    if (terms.length >= tables.maxWorkTerms) break;
    if (entry.pattern.test(text) && !terms.includes(entry.term)) {
      terms.push(entry.term);
    }
  }
  return terms.length > 0 ? { value: terms, rule: 'service-terms' } : null;
}

/**
 * Deterministic extraction by per-field ordered rules. The same text always
 * yields the same fields; no value is ever repaired here.
 */
export function extractWithPatterns(text: string, options: PatternExtractionOptions = {}): PatternExtraction {
  const tables = options.tables ?? getDefaultTables();
  const extraction: PatternExtraction = { fields: {}, missingFields: [], matchedRules: {} };

  assign(extraction, 'date', firstMatch(text, DATE_RULES));
  assign(extraction, 'company', matchIssuer(text, tables));
  assign(extraction, 'amount', firstMatch(text, AMOUNT_RULES));
  assign(extraction, 'vat_amount', firstMatch(text, VAT_RULES));
  assign(extraction, 'invoice_number', firstMatch(text, INVOICE_RULES));
  assign(extraction, 'odometer_km', firstMatch(text, ODOMETER_RULES));
  assign(extraction, 'vehicle_reg', firstMatch(text, VEHICLE_REG_RULES));
  assign(extraction, 'work_description', matchServiceTerms(text, tables));

  extraction.missingFields = missingFieldsOf(extraction.fields);
  return extraction;
}

/** Runs the pattern stage and wraps its output as a persisted step. */
export function runPatternStep(
  text: string,
  stepNumber: number,
  options: PatternExtractionOptions = {},
  documentId?: string,
): FieldExtractionStep {
  const startedAt = new Date();
  const extraction = extractWithPatterns(text, options);
  const durationMs = Date.now() - startedAt.getTime();

  log.info(
    {
      documentId,
      step: 'pattern',
      durationMs,
      extracted: Object.keys(extraction.fields).length,
      missing: extraction.missingFields,
    },
    'Pattern extraction completed',
  );
  log.debug({ documentId, matchedRules: extraction.matchedRules }, 'Pattern rules matched');

  return {
    stepName: 'pattern',
    stepNumber,
    startedAt: startedAt.toISOString(),
    durationMs,
    status: 'succeeded',
    method: PATTERN_METHOD,
    requestedFields: [...FIELD_NAMES],
    extractedFields: extraction.fields,
    missingFields: extraction.missingFields,
  };
}
