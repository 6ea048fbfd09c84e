import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { err } from '../../src/domain/result.js';
import { createAppError, ErrorCode } from '../../src/domain/errors.js';
import { FIELD_NAMES } from '../../src/domain/types.js';
import {
  collectInputs,
  documentIdFor,
  formatReport,
  getFinalRecord,
  processBatch,
  processDocument,
  runValidation,
  summarize,
} from '../../src/services/pipeline/index.js';
import {
  FULL_RECEIPT,
  PARTIAL_RECEIPT,
  FakeRecognizer,
  InMemoryRecordRepository,
  InMemoryVerificationRepository,
  createMockLlm,
  llmReply,
} from '../helpers.js';
import type { LLMProvider } from '../../src/infrastructure/llm/types.js';
import type { PipelineDeps } from '../../src/services/pipeline/index.js';
import type { GroundTruthRecord } from '../../src/domain/types.js';

interface TestDeps extends PipelineDeps {
  recognizer: FakeRecognizer;
  records: InMemoryRecordRepository;
  verification: InMemoryVerificationRepository;
}

function createDeps(texts: Record<string, string>, llm: LLMProvider | null = null): TestDeps {
  return {
    recognizer: new FakeRecognizer(new Map(Object.entries(texts))),
    records: new InMemoryRecordRepository(),
    verification: new InMemoryVerificationRepository(),
    llm,
    settings: {
      requiredFields: ['date', 'amount', 'company'],
      amountTolerance: 0.01,
      odometer: { minKm: 0, maxKm: 1_000_000 },
    },
  };
}

function groundTruthFor(documentId: string, fields: GroundTruthRecord['fields']): GroundTruthRecord {
  return { documentId, fields, expectations: {} };
}

describe('processDocument', () => {
  it('uses pattern values and skips the fallback when required fields are found', async () => {
    const llm = createMockLlm();
    const deps = createDeps({ 'receipt-01.pdf': FULL_RECEIPT }, llm);

    const result = await processDocument('receipts/receipt-01.pdf', 'full', deps);

    expect(result.ok).toBe(true);
    if (!result.ok || result.value.fatal) return;
    const { record, validation, final, fatal } = result.value;
    expect(fatal).toBeNull();
    expect(llm.chat).not.toHaveBeenCalled();
    expect(record.steps.map((step) => [step.stepNumber, step.stepName])).toEqual([
      [1, 'recognition'],
      [2, 'pattern'],
    ]);
    expect(record.reconciled.fields.amount).toBe(850);
    expect(record.reconciled.fields.date).toBe('2023-05-04');
    expect(record.reconciled.provenance.amount).toBe('pattern');
    expect(record.metadata.mode).toBe('full');
    expect(record.metadata.fileHash).toBeNull();
    expect(final.basis).toBe('reconciled');
    expect(validation.severity).toBe('pass');
    expect(deps.records.texts.get('receipt-01.pdf')).toBe(FULL_RECEIPT);
  });

  it('asks the model only for the fields patterns missed', async () => {
    const llm = createMockLlm();
    llm.chat.mockResolvedValue(llmReply('{"amount": 240.00}'));
    const deps = createDeps({ 'receipt-02.pdf': PARTIAL_RECEIPT }, llm);

    const result = await processDocument('receipts/receipt-02.pdf', 'full', deps);

    expect(result.ok).toBe(true);
    if (!result.ok || result.value.fatal) return;
    const { record, validation } = result.value;
    const fallback = record.steps[2];
    expect(fallback?.stepName).toBe('model-fallback');
    expect(fallback?.stepNumber).toBe(3);
    if (fallback?.stepName === 'model-fallback') {
      expect(fallback.requestedFields).toEqual(['amount', 'vat_amount', 'invoice_number', 'odometer_km', 'vehicle_reg']);
      expect(fallback.extractedFields).toEqual({ amount: 240 });
    }
    expect(record.reconciled.fields.amount).toBe(240);
    expect(record.reconciled.provenance).toMatchObject({
      date: 'pattern',
      company: 'pattern',
      amount: 'model-fallback',
    });
    expect(validation.severity).toBe('warning');
    expect(validation.missingWarning).toEqual(['odometer_km', 'invoice_number']);
  });

  it('continues without fallback fields when the model service is unreachable', async () => {
    const llm = createMockLlm();
    llm.chat.mockResolvedValue(err(createAppError(ErrorCode.LLM_UNREACHABLE, 'Ollama service is unreachable', true)));
    const deps = createDeps({ 'receipt-02.pdf': PARTIAL_RECEIPT }, llm);

    const result = await processDocument('receipts/receipt-02.pdf', 'full', deps);

    expect(result.ok).toBe(true);
    if (!result.ok || result.value.fatal) return;
    const { record, validation, fatal } = result.value;
    expect(fatal).toBeNull();
    const fallback = record.steps[2];
    expect(fallback?.status).toBe('failed');
    expect(fallback?.failure?.kind).toBe('service_unavailable');
    if (fallback?.stepName === 'model-fallback') {
      expect(fallback.extractedFields).toEqual({});
    }
    expect(record.reconciled.fields.amount).toBeNull();
    expect(validation.severity).toBe('fail');
    expect(validation.missingRequired).toEqual(['amount']);
  });

  it('records an unavailable fallback when no model is configured', async () => {
    const deps = createDeps({ 'receipt-02.pdf': PARTIAL_RECEIPT });

    const result = await processDocument('receipts/receipt-02.pdf', 'full', deps);

    expect(result.ok).toBe(true);
    if (!result.ok || result.value.fatal) return;
    const { record, validation } = result.value;
    expect(record.steps.map((step) => [step.stepName, step.status])).toEqual([
      ['recognition', 'succeeded'],
      ['pattern', 'succeeded'],
      ['model-fallback', 'failed'],
    ]);
    const fallback = record.steps[2];
    expect(fallback?.failure).toEqual({
      kind: 'service_unavailable',
      code: 'LLM_UNREACHABLE',
      message: 'No language model provider is configured',
    });
    if (fallback?.stepName === 'model-fallback') {
      expect(fallback.requestedFields).toEqual(['amount', 'vat_amount', 'invoice_number', 'odometer_km', 'vehicle_reg']);
      expect(fallback.extractedFields).toEqual({});
    }
    expect(record.reconciled.provenance.amount).toBeUndefined();
    expect(validation.missingRequired).toEqual(['amount']);
  });

  it('repairs an odometer reading with a spurious leading digit', async () => {
    const deps = createDeps({ 'receipt-03.pdf': `${FULL_RECEIPT}\nMittarilukema: 2387551`.replace('Mittarilukema: 352 832\n', '') });

    const result = await processDocument('receipts/receipt-03.pdf', 'full', deps);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const { record } = result.value;
    const pattern = record.steps[1];
    if (pattern?.stepName === 'pattern') {
      expect(pattern.extractedFields.odometer_km).toBe(2387551);
    }
    expect(record.reconciled.fields.odometer_km).toBe(387551);
    expect(record.reconciled.repairs).toEqual([
      { field: 'odometer_km', original: 2387551, repaired: 387551, rule: 'odometer-leading-digit' },
    ]);
  });

  it('applies a human override to the final record', async () => {
    const deps = createDeps({ 'receipt-04.pdf': FULL_RECEIPT.replace('352 832', '2352832') });
    deps.settings.odometer = { minKm: 0, maxKm: 10_000_000 };
    deps.verification.overrides.set('receipt-04.pdf', {
      documentId: 'receipt-04.pdf',
      fields: { odometer_km: 352832 },
      reason: 'odometer misread',
    });

    const result = await processDocument('receipts/receipt-04.pdf', 'full', deps);

    expect(result.ok).toBe(true);
    if (!result.ok || result.value.fatal) return;
    const { record, final } = result.value;
    expect(record.reconciled.fields.odometer_km).toBe(2352832);
    expect(final.fields.odometer_km).toBe(352832);
    expect(final.overrideInfo).toEqual({
      hasOverrides: true,
      overriddenFields: { odometer_km: { original: 2352832, override: 352832 } },
      reason: 'odometer misread',
    });
  });

  it('persists a recognition failure and reports it as fatal', async () => {
    const llm = createMockLlm();
    const deps = createDeps({}, llm);

    const result = await processDocument('receipts/unreadable.pdf', 'full', deps);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.fatal?.code).toBe('RECOGNITION_FAILED');
    expect(result.value.validation).toBeNull();
    expect(result.value.final).toBeNull();
    expect(llm.chat).not.toHaveBeenCalled();

    const saved = deps.records.records.get('unreadable.pdf');
    expect(saved?.metadata.error).toBe('Cannot recognize unreadable.pdf');
    expect(saved?.steps).toHaveLength(1);
    expect(saved?.steps[0]?.status).toBe('failed');
    expect(saved?.steps[0]?.failure?.kind).toBe('recognition_failure');
  });

  it('does not consult verification files after a recognition failure', async () => {
    const deps = createDeps({});
    deps.verification.groundTruth.set('unreadable.pdf', groundTruthFor('unreadable.pdf', { amount: 120 }));
    const loadGroundTruth = vi
      .spyOn(deps.verification, 'loadGroundTruth')
      .mockResolvedValue(err(createAppError(ErrorCode.RECORD_INVALID, 'verified.json for unreadable.pdf is invalid', false)));

    const result = await processDocument('receipts/unreadable.pdf', 'full', deps);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.fatal?.code).toBe('RECOGNITION_FAILED');
    expect(result.value.validation).toBeNull();
    expect(loadGroundTruth).not.toHaveBeenCalled();
  });

  it('appends steps across passes', async () => {
    const deps = createDeps({ 'receipt-01.pdf': FULL_RECEIPT });

    await processDocument('receipts/receipt-01.pdf', 'full', deps);
    const second = await processDocument('receipts/receipt-01.pdf', 'full', deps);

    expect(second.ok).toBe(true);
    if (!second.ok) return;
    expect(second.value.record.steps.map((step) => [step.stepNumber, step.stepName])).toEqual([
      [1, 'recognition'],
      [2, 'pattern'],
      [3, 'recognition'],
      [4, 'pattern'],
    ]);
  });

  it('reuses stored text in pattern-only mode', async () => {
    const deps = createDeps({ 'receipt-01.pdf': FULL_RECEIPT });
    await processDocument('receipts/receipt-01.pdf', 'full', deps);

    const result = await processDocument('receipts/receipt-01.pdf', 'pattern-only', deps);

    expect(deps.recognizer.recognize).toHaveBeenCalledTimes(1);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.record.steps.map((step) => step.stepName)).toEqual(['recognition', 'pattern', 'pattern']);
    expect(result.value.record.metadata.mode).toBe('pattern-only');
  });

  it('keeps the reconciled record in recognition-only mode', async () => {
    const deps = createDeps({ 'receipt-01.pdf': FULL_RECEIPT });
    await processDocument('receipts/receipt-01.pdf', 'full', deps);

    const result = await processDocument('receipts/receipt-01.pdf', 'recognition-only', deps);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.record.steps.map((step) => step.stepName)).toEqual(['recognition', 'pattern', 'recognition']);
    expect(result.value.record.reconciled.fields.amount).toBe(850);
  });

  it('runs the model over every field in fallback-only mode', async () => {
    const deps = createDeps({ 'receipt-02.pdf': PARTIAL_RECEIPT });
    await processDocument('receipts/receipt-02.pdf', 'full', deps);

    const llm = createMockLlm();
    llm.chat.mockResolvedValue(llmReply('{"amount": 240.00, "company": "Other Oy"}'));
    deps.llm = llm;
    const result = await processDocument('receipts/receipt-02.pdf', 'fallback-only', deps);

    expect(deps.recognizer.recognize).toHaveBeenCalledTimes(1);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const { record } = result.value;
    expect(record.steps.map((step) => step.stepName)).toEqual(['recognition', 'pattern', 'model-fallback', 'model-fallback']);
    const fallback = record.steps[3];
    if (fallback?.stepName === 'model-fallback') {
      expect(fallback.requestedFields).toEqual([...FIELD_NAMES]);
    }
    expect(record.reconciled.fields.company).toBe('Järvenpään Automajor Oy');
    expect(record.reconciled.fields.amount).toBe(240);
    expect(record.reconciled.provenance.amount).toBe('model-fallback');
  });
});

describe('processBatch', () => {
  it('reports every document in input order', async () => {
    const deps = createDeps({ 'receipt-01.pdf': FULL_RECEIPT, 'receipt-02.pdf': PARTIAL_RECEIPT });

    const report = await processBatch(
      ['receipts/receipt-01.pdf', 'receipts/missing.pdf', 'receipts/receipt-02.pdf'],
      'full',
      deps,
      { concurrency: 2 },
    );

    expect(report.total).toBe(3);
    expect(report.passed).toBe(1);
    expect(report.failed).toBe(1);
    expect(report.fatal).toBe(1);
    expect(report.documents.map((doc) => [doc.documentId, doc.status])).toEqual([
      ['receipt-01.pdf', 'pass'],
      ['missing.pdf', 'fatal'],
      ['receipt-02.pdf', 'fail'],
    ]);
  });

  it('isolates a document that throws', async () => {
    const deps = createDeps({ 'receipt-01.pdf': FULL_RECEIPT, 'receipt-02.pdf': FULL_RECEIPT });
    deps.recognizer.recognize.mockRejectedValueOnce(new Error('engine crashed'));

    const report = await processBatch(['receipts/receipt-01.pdf', 'receipts/receipt-02.pdf'], 'full', deps);

    expect(report.documents[0]?.status).toBe('fatal');
    expect(report.documents[0]?.error?.code).toBe('INTERNAL_ERROR');
    expect(report.documents[0]?.error?.message).toBe('Processing receipt-01.pdf crashed');
    expect(report.documents[1]?.status).toBe('pass');
  });
});

describe('collectInputs', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'inputs-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('lists PDFs in a directory by name', async () => {
    await writeFile(join(dir, 'b.pdf'), '');
    await writeFile(join(dir, 'a.PDF'), '');
    await writeFile(join(dir, 'notes.txt'), '');
    await mkdir(join(dir, 'nested.pdf'));

    expect(await collectInputs(dir)).toEqual({ ok: true, value: [join(dir, 'a.PDF'), join(dir, 'b.pdf')] });
  });

  it('accepts a single file', async () => {
    const file = join(dir, 'receipt.pdf');
    await writeFile(file, '');

    expect(await collectInputs(file)).toEqual({ ok: true, value: [file] });
  });

  it('fails on a missing path', async () => {
    const result = await collectInputs(join(dir, 'missing'));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('FILE_NOT_FOUND');
    }
  });
});

describe('runValidation', () => {
  async function processedDeps(): Promise<TestDeps> {
    const deps = createDeps({ 'receipt-01.pdf': FULL_RECEIPT });
    await processDocument('receipts/receipt-01.pdf', 'full', deps);
    return deps;
  }

  it('rejects an unknown document', async () => {
    const deps = createDeps({});

    const result = await runValidation(deps, { documentId: 'nope.pdf' });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('RECORD_NOT_FOUND');
    }
  });

  it('validates final records of every known document', async () => {
    const deps = await processedDeps();
    deps.verification.groundTruth.set(
      'verified-only.pdf',
      groundTruthFor('verified-only.pdf', { date: '2024-01-12', company: 'Euromaster', amount: 120 }),
    );

    const result = await runValidation(deps);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.documents.map((doc) => [doc.documentId, doc.status, doc.basis])).toEqual([
      ['receipt-01.pdf', 'pass', 'reconciled'],
      ['verified-only.pdf', 'warning', 'ground_truth'],
    ]);
    expect(result.value.passed).toBe(1);
    expect(result.value.warnings).toBe(1);
  });

  it('validates only the document a path names', async () => {
    const deps = await processedDeps();
    deps.verification.groundTruth.set('other.pdf', groundTruthFor('other.pdf', { amount: 120 }));

    const result = await runValidation(deps, { documentId: documentIdFor('receipts/receipt-01.pdf') });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.documents.map((doc) => doc.documentId)).toEqual(['receipt-01.pdf']);
  });

  it('compares pipeline output with ground truth in self-test mode', async () => {
    const deps = await processedDeps();
    deps.verification.groundTruth.set(
      'receipt-01.pdf',
      groundTruthFor('receipt-01.pdf', { date: '2023-05-04', company: 'Veho Autotalot Oy', amount: 805 }),
    );

    const result = await runValidation(deps, { documentId: 'receipt-01.pdf', selfTest: true });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const [doc] = result.value.documents;
    expect(doc?.status).toBe('fail');
    expect(doc?.basis).toBe('reconciled');
    expect(doc?.validation?.mismatches.map((mismatch) => mismatch.message)).toEqual(['amount: expected 805, got 850']);
  });

  it('checks each extraction stage against its own expectations', async () => {
    const llm = createMockLlm();
    llm.chat.mockResolvedValue(llmReply('{"amount": 240.00}'));
    const deps = createDeps({ 'receipt-02.pdf': PARTIAL_RECEIPT }, llm);
    await processDocument('receipts/receipt-02.pdf', 'full', deps);
    deps.verification.groundTruth.set('receipt-02.pdf', {
      documentId: 'receipt-02.pdf',
      fields: { date: '2024-01-12', company: 'Järvenpään Automajor Oy', amount: 240 },
      expectations: {
        pattern: { requiredFields: ['date', 'company', 'amount'], warnIfMissing: [], optionalFields: [] },
        model_fallback: { requiredFields: ['amount'], warnIfMissing: [], optionalFields: [] },
      },
    });

    const result = await runValidation(deps, { documentId: 'receipt-02.pdf', selfTest: true });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const [doc] = result.value.documents;
    expect(doc?.validation?.severity).toBe('warning');
    expect(doc?.stages?.pattern?.missingRequired).toEqual(['amount']);
    expect(doc?.stages?.model_fallback?.severity).toBe('pass');
    expect(doc?.status).toBe('fail');
    expect(formatReport(result.value)[0]).toBe(
      'FAIL     receipt-02.pdf  (missing odometer_km; missing invoice_number; pattern: missing required amount)',
    );
  });

  it('skips stage expectations for a stage that never ran', async () => {
    const deps = await processedDeps();
    deps.verification.groundTruth.set('receipt-01.pdf', {
      documentId: 'receipt-01.pdf',
      fields: { date: '2023-05-04', amount: 850 },
      expectations: {
        pattern: { requiredFields: ['date', 'amount'], warnIfMissing: [], optionalFields: [] },
        model_fallback: { requiredFields: ['amount'], warnIfMissing: [], optionalFields: [] },
      },
    });

    const result = await runValidation(deps, { documentId: 'receipt-01.pdf', selfTest: true });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const [doc] = result.value.documents;
    expect(Object.keys(doc?.stages ?? {})).toEqual(['pattern']);
    expect(doc?.status).toBe('pass');
  });

  it('reports unprocessed documents as fatal in self-test mode', async () => {
    const deps = createDeps({});
    deps.verification.groundTruth.set('verified-only.pdf', groundTruthFor('verified-only.pdf', { amount: 120 }));

    const result = await runValidation(deps, { selfTest: true });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.fatal).toBe(1);
    expect(result.value.documents[0]?.error?.code).toBe('RECORD_NOT_FOUND');
  });
});

describe('getFinalRecord', () => {
  it('applies overrides to the stored record', async () => {
    const deps = createDeps({ 'receipt-01.pdf': FULL_RECEIPT });
    await processDocument('receipts/receipt-01.pdf', 'full', deps);
    deps.verification.overrides.set('receipt-01.pdf', {
      documentId: 'receipt-01.pdf',
      fields: { amount: 805 },
      reason: null,
    });

    const result = await getFinalRecord(deps, 'receipt-01.pdf');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.fields.amount).toBe(805);
    expect(result.value.overrideInfo.overriddenFields).toEqual({ amount: { original: 850, override: 805 } });
  });

  it('returns RECORD_NOT_FOUND for an unknown document', async () => {
    const result = await getFinalRecord(createDeps({}), 'nope.pdf');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('RECORD_NOT_FOUND');
    }
  });
});

describe('formatReport', () => {
  it('prints one line per document and a total', () => {
    const report = summarize([
      {
        documentId: 'a.pdf',
        status: 'pass',
        validation: null,
      },
      {
        documentId: 'b.pdf',
        status: 'fail',
        validation: {
          passed: false,
          severity: 'fail',
          missingRequired: ['amount'],
          missingWarning: ['odometer_km'],
          missingOptional: [],
          mismatches: [],
          rangeViolations: [],
        },
      },
      {
        documentId: 'c.pdf',
        status: 'fatal',
        validation: null,
        error: createAppError(ErrorCode.RECOGNITION_FAILED, 'Failed to parse PDF document', false),
      },
    ]);

    expect(formatReport(report)).toEqual([
      'PASS     a.pdf',
      'FAIL     b.pdf  (missing required amount; missing odometer_km)',
      'FATAL    c.pdf  (RECOGNITION_FAILED: Failed to parse PDF document)',
      'Total 3: 1 passed, 0 warnings, 1 failed, 1 fatal',
    ]);
  });
});
