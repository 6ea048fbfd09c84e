import type { ErrorCode } from './errors.js';

export const FIELD_NAMES = [
  'date',
  'company',
  'amount',
  'vat_amount',
  'invoice_number',
  'odometer_km',
  'vehicle_reg',
  'work_description',
] as const;

export type FieldName = (typeof FIELD_NAMES)[number];

export interface ReceiptFields {
  /** ISO calendar date, YYYY-MM-DD */
  date: string;
  company: string;
  /** Total including VAT, EUR */
  amount: number;
  vat_amount: number;
  invoice_number: string;
  odometer_km: number;
  vehicle_reg: string;
  work_description: string[];
}

export type FieldValue = ReceiptFields[FieldName];

export type ExtractedFields = Partial<ReceiptFields>;

/** Every schema field present; `null` marks an explicitly absent value. */
export type CompleteFields = { [K in FieldName]: ReceiptFields[K] | null };

export const STEP_NAMES = ['recognition', 'pattern', 'model-fallback'] as const;

export type StepName = (typeof STEP_NAMES)[number];

export type FieldStepName = Exclude<StepName, 'recognition'>;

export const PIPELINE_MODES = [
  'full',
  'recognition-only',
  'pattern-only',
  'fallback-only',
  'validate',
] as const;

export type PipelineMode = (typeof PIPELINE_MODES)[number];

export type StepFailureKind = 'recognition_failure' | 'service_unavailable' | 'parse_failure';

export interface StepFailure {
  kind: StepFailureKind;
  code: ErrorCode;
  message: string;
}

interface StepBase {
  stepNumber: number;
  startedAt: string;
  durationMs: number;
  status: 'succeeded' | 'failed';
  failure?: StepFailure;
}

export interface RecognitionStep extends StepBase {
  stepName: 'recognition';
  method: string;
  output: {
    textLength: number;
    pageCount: number;
  };
}

export interface FieldExtractionStep extends StepBase {
  stepName: FieldStepName;
  method: string;
  /** Fields this stage was asked for; the model stage may be given a subset. */
  requestedFields: FieldName[];
  extractedFields: ExtractedFields;
  missingFields: FieldName[];
  model?: string;
}

export type ExtractionStep = RecognitionStep | FieldExtractionStep;

export type FieldProvenance = Partial<Record<FieldName, FieldStepName>>;

export interface FieldRepair {
  field: FieldName;
  original: number;
  repaired: number;
  rule: string;
}

export interface ReconciledRecord {
  fields: CompleteFields;
  provenance: FieldProvenance;
  repairs: FieldRepair[];
}

export interface ExpectationRules {
  requiredFields: FieldName[];
  warnIfMissing: FieldName[];
  optionalFields: FieldName[];
  ranges?: RangeRules;
}

export interface RangeRule {
  min?: number;
  max?: number;
}

export type RangeRules = Partial<Record<FieldName, RangeRule>>;

export type ExpectationStage = 'pattern' | 'model_fallback' | 'final_data';

export interface GroundTruthRecord {
  documentId: string;
  fields: ExtractedFields;
  expectations: Partial<Record<ExpectationStage, ExpectationRules>>;
}

/** Override values as written; `null` clears the field. */
export type OverrideFields = { [K in FieldName]?: ReceiptFields[K] | null };

export interface OverrideRecord {
  documentId: string;
  fields: OverrideFields;
  reason: string | null;
}

export interface OverriddenField {
  original: FieldValue | null;
  override: FieldValue | null;
}

export interface OverrideInfo {
  hasOverrides: boolean;
  overriddenFields: Partial<Record<FieldName, OverriddenField>>;
  reason: string | null;
}

export interface FinalRecord {
  documentId: string;
  fields: ExtractedFields;
  basis: 'ground_truth' | 'reconciled';
  overrideInfo: OverrideInfo;
}

export interface ValueMismatch {
  field: FieldName;
  expected: FieldValue;
  actual: FieldValue;
  message: string;
}

export interface RangeViolation {
  field: FieldName;
  value: number | string;
  message: string;
}

export type ValidationSeverity = 'pass' | 'warning' | 'fail';

export interface ValidationOutcome {
  passed: boolean;
  severity: ValidationSeverity;
  missingRequired: FieldName[];
  missingWarning: FieldName[];
  missingOptional: FieldName[];
  mismatches: ValueMismatch[];
  rangeViolations: RangeViolation[];
}

export interface ProcessingMetadata {
  sourceFile: string;
  /** `sha256:<hex>`, null when the source could not be read */
  fileHash: string | null;
  processedAt: string;
  pipelineVersion: string;
  mode: PipelineMode;
  error?: string;
}

export interface ProcessingRecord {
  documentId: string;
  metadata: ProcessingMetadata;
  /** Append-only across processing passes. */
  steps: ExtractionStep[];
  reconciled: ReconciledRecord;
  /** Durations of the latest pass, keyed by step name. */
  durations: Partial<Record<StepName, number>>;
  totalDurationMs: number;
}
