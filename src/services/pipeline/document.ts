import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { ok } from '../../domain/result.js';
import { ErrorCode } from '../../domain/errors.js';
import { FIELD_NAMES } from '../../domain/types.js';
import { emptyFields, hasField } from '../../domain/fields.js';
import { createDocumentLogger } from '../../infrastructure/logger.js';
import { recognizeDocument } from '../recognition/index.js';
import { runPatternStep } from '../pattern-extraction/index.js';
import { runFallbackStep, unavailableFallbackStep } from '../model-fallback/index.js';
import { reconcile } from '../reconciliation/index.js';
import { loadVerification, resolveFinalRecord } from '../verification/index.js';
import { defaultRules, validateRecord } from '../validation/index.js';
import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type {
  ExtractionStep,
  FieldExtractionStep,
  FieldName,
  ProcessingRecord,
  ReconciledRecord,
  StepName,
} from '../../domain/types.js';
import type { DocumentResult, PipelineDeps, ProcessingMode } from './types.js';

export const PIPELINE_VERSION = '1.0.0';

type Logger = ReturnType<typeof createDocumentLogger>;

export function documentIdFor(path: string): string {
  return basename(path);
}

async function hashFile(path: string): Promise<string | null> {
  try {
    const content = await readFile(path);
    return `sha256:${createHash('sha256').update(content).digest('hex')}`;
  } catch {
    return null;
  }
}

function nextStepNumber(steps: readonly ExtractionStep[]): number {
  return steps.reduce((max, step) => Math.max(max, step.stepNumber), 0) + 1;
}

function isPatternStep(step: ExtractionStep): step is FieldExtractionStep {
  return step.stepName === 'pattern' && step.status === 'succeeded';
}

function latestPatternStep(steps: readonly ExtractionStep[]): FieldExtractionStep | null {
  for (let i = steps.length - 1; i >= 0; i--) {
    const step = steps[i];
    if (step && isPatternStep(step)) return step;
  }
  return null;
}

function emptyReconciled(): ReconciledRecord {
  return { fields: emptyFields(), provenance: {}, repairs: [] };
}

function fallbackTargets(
  mode: ProcessingMode,
  patternStep: FieldExtractionStep | null,
  requiredFields: readonly FieldName[],
  log: Logger,
): FieldName[] {
  if (mode === 'fallback-only') return [...FIELD_NAMES];
  if (mode !== 'full' || !patternStep) return [];

  const missingRequired = requiredFields.filter((field) => !hasField(patternStep.extractedFields, field));
  if (missingRequired.length === 0) {
    log.debug('All required fields found by patterns, skipping model fallback');
    return [];
  }

  log.info({ missingRequired }, 'Required fields missing after pattern extraction');
  return patternStep.missingFields;
}

async function finalize(
  deps: PipelineDeps,
  record: ProcessingRecord,
): Promise<Result<DocumentResult, AppError>> {
  const verification = await loadVerification(deps.verification, record.documentId);
  if (!verification.ok) return verification;

  const { groundTruth, override } = verification.value;
  const final = resolveFinalRecord(record.reconciled, groundTruth, override, record.documentId);
  const rules = groundTruth?.expectations.final_data ?? defaultRules(deps.settings.requiredFields);
  const validation = validateRecord(final.fields, rules, { documentId: record.documentId });

  return ok({ documentId: record.documentId, record, final, validation, fatal: null });
}

/**
 * Runs one document through the stages `mode` selects and persists the
 * result. Steps from earlier passes are kept and numbering continues after
 * them. A recognition failure is persisted and reported through `fatal`
 * with no later stage run; only storage problems come back as errors.
 */
export async function processDocument(
  path: string,
  mode: ProcessingMode,
  deps: PipelineDeps,
  runId?: string,
): Promise<Result<DocumentResult, AppError>> {
  const documentId = documentIdFor(path);
  const log = createDocumentLogger(documentId, mode, runId);
  const startTime = Date.now();

  log.info({ path }, 'Processing document');

  const previousResult = await deps.records.load(documentId);
  if (!previousResult.ok) return previousResult;
  const previous = previousResult.value;

  const steps: ExtractionStep[] = previous ? [...previous.steps] : [];
  const durations: Partial<Record<StepName, number>> = {};
  let stepNumber = nextStepNumber(steps);
  const fileHash = await hashFile(path);

  const buildRecord = (reconciled: ReconciledRecord, error?: string): ProcessingRecord => ({
    documentId,
    metadata: {
      sourceFile: path,
      fileHash,
      processedAt: new Date().toISOString(),
      pipelineVersion: PIPELINE_VERSION,
      mode,
      ...(error !== undefined && { error }),
    },
    steps,
    reconciled,
    durations,
    totalDurationMs: Date.now() - startTime,
  });

  let text: string | null = null;
  let recognizedNow = false;
  if (mode === 'pattern-only' || mode === 'fallback-only') {
    const stored = await deps.records.loadText(documentId);
    if (!stored.ok) return stored;
    text = stored.value;
  }

  if (text === null) {
    const outcome = await recognizeDocument(deps.recognizer, path, stepNumber++, documentId);
    steps.push(outcome.step);
    durations.recognition = outcome.step.durationMs;

    if (!outcome.ok) {
      const record = buildRecord(previous?.reconciled ?? emptyReconciled(), outcome.error.message);
      const saved = await deps.records.save(record, null);
      if (!saved.ok) return saved;
      log.error(
        { errorCode: outcome.error.code, retryable: outcome.error.retryable },
        'Document failed at recognition',
      );
      return ok({ documentId, record, final: null, validation: null, fatal: outcome.error });
    }

    text = outcome.text;
    recognizedNow = true;
  }

  let reconciled: ReconciledRecord;
  if (mode === 'recognition-only') {
    reconciled = previous?.reconciled ?? emptyReconciled();
  } else {
    let patternStep: FieldExtractionStep | null = null;
    if (mode === 'fallback-only') {
      patternStep = latestPatternStep(steps);
    } else {
      patternStep = runPatternStep(text, stepNumber++, { tables: deps.tables }, documentId);
      steps.push(patternStep);
      durations.pattern = patternStep.durationMs;
    }

    let fallbackStep: FieldExtractionStep | null = null;
    const targets = fallbackTargets(mode, patternStep, deps.settings.requiredFields, log);
    if (targets.length > 0) {
      if (deps.llm) {
        fallbackStep = await runFallbackStep(
          { llm: deps.llm, tracer: deps.tracer },
          text,
          targets,
          stepNumber++,
          documentId,
        );
      } else {
        log.warn(
          { targets, errorCode: ErrorCode.LLM_UNREACHABLE, retryable: true },
          'Model fallback needed but no provider is configured',
        );
        fallbackStep = unavailableFallbackStep(targets, stepNumber++);
      }
      steps.push(fallbackStep);
      durations['model-fallback'] = fallbackStep.durationMs;
    }

    reconciled = reconcile(patternStep, fallbackStep, { odometer: deps.settings.odometer, documentId });
  }

  const record = buildRecord(reconciled);
  const saved = await deps.records.save(record, recognizedNow ? text : null);
  if (!saved.ok) return saved;

  log.info(
    {
      totalDurationMs: record.totalDurationMs,
      steps: steps.length,
      provenance: reconciled.provenance,
      repairs: reconciled.repairs.length,
    },
    'Document processed',
  );

  return finalize(deps, record);
}
