import { z } from 'zod';
import { ErrorCode } from './errors.js';
import { FIELD_NAMES, PIPELINE_MODES, STEP_NAMES } from './types.js';

export const fieldNameSchema = z.enum(FIELD_NAMES);

export const pipelineModeSchema = z.enum(PIPELINE_MODES);

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');

const invoiceNumber = z
  .union([z.string().min(1), z.number().int().nonnegative()])
  .transform((value) => String(value));

/** Values as written by people: `null` is allowed and means "no value". */
export const receiptFieldsSchema = z.object({
  date: isoDate.nullish(),
  company: z.string().min(1).nullish(),
  amount: z.number().nullish(),
  vat_amount: z.number().nullish(),
  invoice_number: invoiceNumber.nullish(),
  odometer_km: z.number().int().nonnegative().nullish(),
  vehicle_reg: z.string().min(1).nullish(),
  work_description: z.array(z.string()).nullish(),
});

/** Values as written by the pipeline itself. */
const extractedFieldsSchema = z.object({
  date: isoDate.optional(),
  company: z.string().optional(),
  amount: z.number().optional(),
  vat_amount: z.number().optional(),
  invoice_number: z.string().optional(),
  odometer_km: z.number().optional(),
  vehicle_reg: z.string().optional(),
  work_description: z.array(z.string()).optional(),
});

const completeFieldsSchema = z.object({
  date: isoDate.nullable(),
  company: z.string().nullable(),
  amount: z.number().nullable(),
  vat_amount: z.number().nullable(),
  invoice_number: z.string().nullable(),
  odometer_km: z.number().nullable(),
  vehicle_reg: z.string().nullable(),
  work_description: z.array(z.string()).nullable(),
});

const rangeRuleSchema = z.object({
  min: z.number().optional(),
  max: z.number().optional(),
});

export const expectationRulesFileSchema = z.object({
  required_fields: z.array(fieldNameSchema).default([]),
  warning_if_missing: z.array(fieldNameSchema).default([]),
  optional_fields: z.array(fieldNameSchema).default([]),
  ranges: z.record(fieldNameSchema, rangeRuleSchema).optional(),
});

/** verified/<documentId>/verified.json */
export const verifiedFileSchema = z.object({
  ground_truth: receiptFieldsSchema,
  expected_extraction: z
    .object({
      pattern: expectationRulesFileSchema.optional(),
      model_fallback: expectationRulesFileSchema.optional(),
      final_data: expectationRulesFileSchema.optional(),
    })
    .optional(),
});

/** verified/<documentId>/override.json */
export const overrideFileSchema = z.object({
  ground_truth: receiptFieldsSchema,
  reason: z.string().nullish(),
});

const stepFailureSchema = z.object({
  kind: z.enum(['recognition_failure', 'service_unavailable', 'parse_failure']),
  code: z.nativeEnum(ErrorCode),
  message: z.string(),
});

const stepBaseSchema = z.object({
  stepNumber: z.number().int().positive(),
  startedAt: z.string(),
  durationMs: z.number().nonnegative(),
  status: z.enum(['succeeded', 'failed']),
  failure: stepFailureSchema.optional(),
});

const recognitionStepSchema = stepBaseSchema.extend({
  stepName: z.literal('recognition'),
  method: z.string(),
  output: z.object({
    textLength: z.number().int().nonnegative(),
    pageCount: z.number().int().nonnegative(),
  }),
});

const fieldExtractionStepSchema = stepBaseSchema.extend({
  stepName: z.enum(['pattern', 'model-fallback']),
  method: z.string(),
  requestedFields: z.array(fieldNameSchema),
  extractedFields: extractedFieldsSchema,
  missingFields: z.array(fieldNameSchema),
  model: z.string().optional(),
});

/** extracted/<documentId>/data.json */
export const processingRecordSchema = z.object({
  documentId: z.string().min(1),
  metadata: z.object({
    sourceFile: z.string(),
    fileHash: z.string().nullable(),
    processedAt: z.string(),
    pipelineVersion: z.string(),
    mode: pipelineModeSchema,
    error: z.string().optional(),
  }),
  steps: z.array(z.union([recognitionStepSchema, fieldExtractionStepSchema])),
  reconciled: z.object({
    fields: completeFieldsSchema,
    provenance: z.record(fieldNameSchema, z.enum(['pattern', 'model-fallback'])),
    repairs: z.array(
      z.object({
        field: fieldNameSchema,
        original: z.number(),
        repaired: z.number(),
        rule: z.string(),
      }),
    ),
  }),
  durations: z.record(z.enum(STEP_NAMES), z.number()),
  totalDurationMs: z.number().nonnegative(),
});

export const processDocumentInput = z.object({
  path: z.string().min(1, 'Document path is required'),
  mode: pipelineModeSchema.exclude(['validate']).default('full'),
});

export const validationQueryInput = z.object({
  selfTest: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
});

export type VerifiedFile = z.infer<typeof verifiedFileSchema>;
export type OverrideFile = z.infer<typeof overrideFileSchema>;
export type ExpectationRulesFile = z.infer<typeof expectationRulesFileSchema>;
export type ProcessDocumentInput = z.infer<typeof processDocumentInput>;
