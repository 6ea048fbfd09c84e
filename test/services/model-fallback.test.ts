import { beforeEach, describe, it, expect, vi } from 'vitest';
import { err } from '../../src/domain/result.js';
import { createAppError, ErrorCode } from '../../src/domain/errors.js';
import {
  buildExtractionPrompt,
  coerceReply,
  extractWithModel,
  findJsonObject,
  runFallbackStep,
} from '../../src/services/model-fallback/index.js';
import { createMockLlm, llmReply } from '../helpers.js';
import type { GenerationTracer } from '../../src/infrastructure/langfuse.js';

describe('findJsonObject', () => {
  it('finds an object inside prose and code fences', () => {
    const content = 'Here you go:\n```json\n{"amount": 240.00, "note": "a {brace} in text"}\n```';

    expect(findJsonObject(content)).toEqual({ amount: 240, note: 'a {brace} in text' });
  });

  it('skips a block that is not valid JSON', () => {
    expect(findJsonObject('{not json} then {"amount": 12.5}')).toEqual({ amount: 12.5 });
  });

  it('returns null without an object', () => {
    expect(findJsonObject('no data found')).toBeNull();
    expect(findJsonObject('[1, 2, 3]')).toBeNull();
    expect(findJsonObject('{"amount": 1')).toBeNull();
  });
});

describe('coerceReply', () => {
  it('normalizes values to field types', () => {
    const raw = {
      date: '4.5.2023',
      company: '  Veho   Autotalot Oy ',
      amount: '850,00 €',
      vat_amount: 164.524,
      invoice_number: 20230415,
      odometer_km: '352 832 km',
      vehicle_reg: 'abc 123',
      work_description: 'Öljynvaihto',
    };

    expect(coerceReply(raw, ['date', 'company', 'amount', 'vat_amount', 'invoice_number', 'odometer_km', 'work_description'])).toEqual({
      date: '2023-05-04',
      company: 'Veho Autotalot Oy',
      amount: 850,
      vat_amount: 164.52,
      invoice_number: '20230415',
      odometer_km: 352832,
      work_description: ['Öljynvaihto'],
    });
  });

  it('drops values that do not fit the field', () => {
    const raw = {
      date: 'yesterday',
      amount: null,
      odometer_km: -5,
      vehicle_reg: 'ABC123',
      work_description: ['Huolto', 'Huolto', 42],
    };

    expect(coerceReply(raw, ['date', 'amount', 'odometer_km', 'vehicle_reg', 'work_description'])).toEqual({
      work_description: ['Huolto'],
    });
  });

  it('ignores keys that were not requested', () => {
    expect(coerceReply({ amount: 240, company: 'Euromaster' }, ['amount'])).toEqual({ amount: 240 });
  });
});

describe('buildExtractionPrompt', () => {
  it('names only the requested fields', () => {
    const prompt = buildExtractionPrompt('receipt text', ['amount', 'date']);

    expect(prompt.system).toContain('- "amount": ');
    expect(prompt.system).toContain('{ "amount": ..., "date": ... }');
    expect(prompt.system).not.toContain('"company"');
    expect(prompt.user).toBe('receipt text');
  });

  it('truncates long text', () => {
    expect(buildExtractionPrompt('x'.repeat(9000), ['amount']).user).toHaveLength(8000);
  });
});

describe('extractWithModel', () => {
  let llm: ReturnType<typeof createMockLlm>;

  beforeEach(() => {
    llm = createMockLlm();
  });

  it('returns the requested fields from a reply', async () => {
    llm.chat.mockResolvedValue(llmReply('{"amount": 240.00, "date": "2023-05-04"}'));

    const result = await extractWithModel({ llm }, 'text', ['amount', 'date', 'odometer_km']);

    expect(result).toEqual({
      fields: { amount: 240, date: '2023-05-04' },
      missingFields: ['odometer_km'],
      model: 'test-model',
      attempts: 1,
    });
    expect(llm.chat).toHaveBeenCalledWith(expect.any(String), 'text', { responseFormat: 'json' });
  });

  it('retries once when the reply has no JSON', async () => {
    llm.chat
      .mockResolvedValueOnce(llmReply('I could not read the receipt.'))
      .mockResolvedValueOnce(llmReply('{"amount": "240,00 €"}'));

    const result = await extractWithModel({ llm }, 'text', ['amount']);

    expect(llm.chat).toHaveBeenCalledTimes(2);
    expect(result.fields).toEqual({ amount: 240 });
    expect(result.attempts).toBe(2);
    expect(result.failure).toBeUndefined();
  });

  it('retries after an empty reply', async () => {
    llm.chat
      .mockResolvedValueOnce(err(createAppError(ErrorCode.LLM_MALFORMED_RESPONSE, 'empty', false)))
      .mockResolvedValueOnce(llmReply('{"amount": 10}'));

    const result = await extractWithModel({ llm }, 'text', ['amount']);

    expect(result.fields).toEqual({ amount: 10 });
    expect(result.attempts).toBe(2);
  });

  it('reports a parse failure when no attempt yields JSON', async () => {
    llm.chat.mockResolvedValue(llmReply('nothing here'));

    const result = await extractWithModel({ llm }, 'text', ['amount', 'date']);

    expect(llm.chat).toHaveBeenCalledTimes(2);
    expect(result).toEqual({
      fields: {},
      missingFields: ['amount', 'date'],
      model: 'test-model',
      attempts: 2,
      failure: {
        kind: 'parse_failure',
        code: 'LLM_MALFORMED_RESPONSE',
        message: 'No JSON object in model reply after 2 attempts',
      },
    });
  });

  it('gives up at once when the service is unreachable', async () => {
    llm.chat.mockResolvedValue(err(createAppError(ErrorCode.LLM_UNREACHABLE, 'Ollama service is unreachable', true)));

    const result = await extractWithModel({ llm }, 'text', ['amount']);

    expect(llm.chat).toHaveBeenCalledTimes(1);
    expect(result.fields).toEqual({});
    expect(result.missingFields).toEqual(['amount']);
    expect(result.failure).toEqual({
      kind: 'service_unavailable',
      code: 'LLM_UNREACHABLE',
      message: 'Ollama service is unreachable',
    });
  });

  it('traces each reply', async () => {
    llm.chat.mockResolvedValue(llmReply('{"amount": 240}'));
    const tracer: GenerationTracer = { traceGeneration: vi.fn(), flush: vi.fn() };

    await extractWithModel({ llm, tracer }, 'text', ['amount'], 'receipt-01.pdf');

    expect(tracer.traceGeneration).toHaveBeenCalledWith(
      expect.objectContaining({
        name: 'receipt-fallback-extraction',
        model: 'test-model',
        output: '{"amount": 240}',
        metadata: { documentId: 'receipt-01.pdf', attempt: 1, targetFields: ['amount'] },
      }),
    );
  });
});

describe('runFallbackStep', () => {
  it('records a succeeded step with the model name', async () => {
    const llm = createMockLlm();
    llm.chat.mockResolvedValue(llmReply('{"amount": 240.00}'));

    const step = await runFallbackStep({ llm }, 'text', ['amount', 'vat_amount'], 3);

    expect(step).toMatchObject({
      stepName: 'model-fallback',
      stepNumber: 3,
      status: 'succeeded',
      method: 'llm:mock',
      model: 'test-model',
      requestedFields: ['amount', 'vat_amount'],
      extractedFields: { amount: 240 },
      missingFields: ['vat_amount'],
    });
    expect(step.failure).toBeUndefined();
  });

  it('records a failed step when the service is down', async () => {
    const llm = createMockLlm();
    llm.chat.mockResolvedValue(err(createAppError(ErrorCode.LLM_TIMEOUT, 'timed out', true)));

    const step = await runFallbackStep({ llm }, 'text', ['amount'], 2);

    expect(step.status).toBe('failed');
    expect(step.extractedFields).toEqual({});
    expect(step.failure?.kind).toBe('service_unavailable');
    expect(step.model).toBeUndefined();
  });
});
