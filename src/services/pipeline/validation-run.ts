import { ok, err } from '../../domain/result.js';
import { createAppError, ErrorCode } from '../../domain/errors.js';
import { compactFields } from '../../domain/fields.js';
import { logger } from '../../infrastructure/logger.js';
import { loadVerification, resolveFinalRecord } from '../verification/index.js';
import { defaultRules, validateRecord } from '../validation/index.js';
import { summarize } from './report.js';
import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type {
  ExtractionStep,
  FieldExtractionStep,
  FieldStepName,
  FinalRecord,
  GroundTruthRecord,
  ProcessingRecord,
  ValidationSeverity,
} from '../../domain/types.js';
import type { BatchReport, DocumentReport, ExtractionStage, PipelineDeps, StageOutcomes } from './types.js';

const log = logger.child({ module: 'validation-run' });

export type ValidationDeps = Pick<PipelineDeps, 'records' | 'verification' | 'settings'>;

export interface ValidationRunOptions {
  /** Validate one document instead of every known one. */
  documentId?: string;
  /** Compare the pipeline's own output against ground truth instead of validating the final record. */
  selfTest?: boolean;
}

/** The trusted record for a document: ground truth or pipeline output, with overrides applied. */
export async function getFinalRecord(deps: ValidationDeps, documentId: string): Promise<Result<FinalRecord, AppError>> {
  const record = await deps.records.load(documentId);
  if (!record.ok) return record;

  const verification = await loadVerification(deps.verification, documentId);
  if (!verification.ok) return verification;

  const { groundTruth, override } = verification.value;
  if (!record.value && !groundTruth) {
    return err(createAppError(ErrorCode.RECORD_NOT_FOUND, `No record for document '${documentId}'`, false));
  }

  return ok(resolveFinalRecord(record.value?.reconciled ?? null, groundTruth, override, documentId));
}

const STAGE_STEPS: Record<ExtractionStage, FieldStepName> = {
  pattern: 'pattern',
  model_fallback: 'model-fallback',
};

const SEVERITY_RANK: Record<ValidationSeverity, number> = { pass: 0, warning: 1, fail: 2 };

function latestStep(steps: readonly ExtractionStep[], name: FieldStepName): FieldExtractionStep | null {
  for (let i = steps.length - 1; i >= 0; i--) {
    const step = steps[i];
    if (step && step.stepName !== 'recognition' && step.stepName === name) return step;
  }
  return null;
}

/** Checks what each stage extracted on its own against that stage's expectations. */
function validateStages(
  record: ProcessingRecord,
  groundTruth: GroundTruthRecord,
  amountTolerance: number,
): StageOutcomes {
  const outcomes: StageOutcomes = {};
  for (const stage of ['pattern', 'model_fallback'] as const) {
    const rules = groundTruth.expectations[stage];
    if (!rules) continue;

    // a stage that never ran has nothing to judge
    const step = latestStep(record.steps, STAGE_STEPS[stage]);
    if (!step) continue;

    outcomes[stage] = validateRecord(step.extractedFields, rules, {
      documentId: record.documentId,
      groundTruth: groundTruth.fields,
      amountTolerance,
    });
  }
  return outcomes;
}

function worstSeverity(severities: ValidationSeverity[]): ValidationSeverity {
  return severities.reduce<ValidationSeverity>(
    (worst, severity) => (SEVERITY_RANK[severity] > SEVERITY_RANK[worst] ? severity : worst),
    'pass',
  );
}

async function validateDocument(
  deps: ValidationDeps,
  documentId: string,
  selfTest: boolean,
): Promise<Result<DocumentReport, AppError>> {
  const record = await deps.records.load(documentId);
  if (!record.ok) return record;

  const verification = await loadVerification(deps.verification, documentId);
  if (!verification.ok) return verification;

  const { groundTruth, override } = verification.value;
  if (!record.value && !groundTruth) {
    return err(createAppError(ErrorCode.RECORD_NOT_FOUND, `No record for document '${documentId}'`, false));
  }

  const rules = groundTruth?.expectations.final_data ?? defaultRules(deps.settings.requiredFields);

  if (selfTest) {
    if (!record.value) {
      const error = createAppError(ErrorCode.RECORD_NOT_FOUND, `Document '${documentId}' has not been processed`, false);
      return ok({ documentId, status: 'fatal', validation: null, error });
    }
    const validation = validateRecord(compactFields(record.value.reconciled.fields), rules, {
      documentId,
      groundTruth: groundTruth?.fields,
      amountTolerance: deps.settings.amountTolerance,
    });
    if (!groundTruth) {
      return ok({ documentId, status: validation.severity, validation, basis: 'reconciled' });
    }

    const stages = validateStages(record.value, groundTruth, deps.settings.amountTolerance);
    const severities = [validation.severity];
    for (const outcome of Object.values(stages)) {
      if (outcome) severities.push(outcome.severity);
    }
    const status = worstSeverity(severities);
    return ok({ documentId, status, validation, basis: 'reconciled', stages });
  }

  const final = resolveFinalRecord(record.value?.reconciled ?? null, groundTruth, override, documentId);
  const validation = validateRecord(final.fields, rules, { documentId });
  return ok({ documentId, status: validation.severity, validation, basis: final.basis });
}

async function knownDocuments(deps: ValidationDeps): Promise<Result<string[], AppError>> {
  const processed = await deps.records.list();
  if (!processed.ok) return processed;

  const verified = await deps.verification.list();
  if (!verified.ok) return verified;

  return ok([...new Set([...processed.value, ...verified.value])].sort());
}

/**
 * Validates one document or all of them. Unknown single documents are an
 * error; in a full run, per-document read errors are reported as fatal.
 */
export async function runValidation(
  deps: ValidationDeps,
  options: ValidationRunOptions = {},
): Promise<Result<BatchReport, AppError>> {
  const selfTest = options.selfTest ?? false;

  if (options.documentId !== undefined) {
    const report = await validateDocument(deps, options.documentId, selfTest);
    if (!report.ok) return report;
    return ok(summarize([report.value]));
  }

  const ids = await knownDocuments(deps);
  if (!ids.ok) return ids;

  const reports: DocumentReport[] = [];
  for (const documentId of ids.value) {
    const report = await validateDocument(deps, documentId, selfTest);
    reports.push(report.ok ? report.value : { documentId, status: 'fatal', validation: null, error: report.error });
  }

  const summary = summarize(reports);
  log.info(
    { selfTest, total: summary.total, passed: summary.passed, warnings: summary.warnings, failed: summary.failed, fatal: summary.fatal },
    'Validation run completed',
  );
  return ok(summary);
}
