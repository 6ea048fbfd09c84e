import { vi, type Mock } from 'vitest';
import { ok, err } from '../src/domain/result.js';
import { createAppError, ErrorCode } from '../src/domain/errors.js';
import { emptyFields } from '../src/domain/fields.js';
import type { Result } from '../src/domain/result.js';
import type { AppError } from '../src/domain/errors.js';
import type { GroundTruthRecord, OverrideRecord, ProcessingRecord } from '../src/domain/types.js';
import type { LLMProvider, LLMResponse } from '../src/infrastructure/llm/types.js';
import type { RecordRepository, VerificationRepository } from '../src/infrastructure/storage/types.js';
import type { RecognizedText, TextRecognizer } from '../src/services/recognition/types.js';

export function makeRecord(documentId: string, overrides: Partial<ProcessingRecord> = {}): ProcessingRecord {
  return {
    documentId,
    metadata: {
      sourceFile: `receipts/${documentId}`,
      fileHash: 'sha256:abc123',
      processedAt: '2024-03-01T10:00:00.000Z',
      pipelineVersion: '1.0.0',
      mode: 'full',
    },
    steps: [],
    reconciled: { fields: emptyFields(), provenance: {}, repairs: [] },
    durations: {},
    totalDurationMs: 12,
    ...overrides,
  };
}

export class InMemoryRecordRepository implements RecordRepository {
  readonly records = new Map<string, ProcessingRecord>();
  readonly texts = new Map<string, string>();

  async load(documentId: string): Promise<Result<ProcessingRecord | null, AppError>> {
    return ok(this.records.get(documentId) ?? null);
  }

  async loadText(documentId: string): Promise<Result<string | null, AppError>> {
    return ok(this.texts.get(documentId) ?? null);
  }

  async save(record: ProcessingRecord, text: string | null): Promise<Result<void, AppError>> {
    this.records.set(record.documentId, structuredClone(record));
    if (text !== null) this.texts.set(record.documentId, text);
    return ok(undefined);
  }

  async list(): Promise<Result<string[], AppError>> {
    return ok([...this.records.keys()].sort());
  }
}

export class InMemoryVerificationRepository implements VerificationRepository {
  readonly groundTruth = new Map<string, GroundTruthRecord>();
  readonly overrides = new Map<string, OverrideRecord>();

  async loadGroundTruth(documentId: string): Promise<Result<GroundTruthRecord | null, AppError>> {
    return ok(this.groundTruth.get(documentId) ?? null);
  }

  async loadOverride(documentId: string): Promise<Result<OverrideRecord | null, AppError>> {
    return ok(this.overrides.get(documentId) ?? null);
  }

  async list(): Promise<Result<string[], AppError>> {
    return ok([...this.groundTruth.keys()].sort());
  }
}

/** Serves canned text per file name; unknown files fail recognition. */
export class FakeRecognizer implements TextRecognizer {
  readonly method = 'fake-ocr';
  readonly recognize = vi.fn(async (path: string): Promise<Result<RecognizedText, AppError>> => {
    const name = path.split('/').pop() ?? path;
    const text = this.texts.get(name);
    if (text === undefined) {
      return err(createAppError(ErrorCode.RECOGNITION_FAILED, `Cannot recognize ${name}`, false));
    }
    return ok({ text, pageCount: 1, method: this.method });
  });

  constructor(private readonly texts: Map<string, string> = new Map()) {}
}

export function llmReply(content: string): Result<LLMResponse, AppError> {
  return ok({
    content,
    model: 'test-model',
    usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
    latencyMs: 3,
  });
}

export function createMockLlm(): LLMProvider & { chat: Mock<LLMProvider['chat']> } {
  return { name: 'mock', chat: vi.fn<LLMProvider['chat']>() };
}

export const FULL_RECEIPT = [
  'Veho Autotalot Oy',
  'Laskunumero: 20230415',
  'Päivämäärä: 04.05.2023',
  'Rekisterinumero: abc-123',
  'Mittarilukema: 352 832',
  'Öljynvaihto 1 kpl 89,00',
  'Öljynsuodatin 1 kpl 24,50',
  'Työveloitus 1 h 95,00',
  'ALV 24 % 164,52',
  'Yhteensä: 850,00 EUR',
].join('\n');

/** Company, date and work only; no total. */
export const PARTIAL_RECEIPT = 'Järvenpään Automajor Oy\nPvm 12.01.2024\nHuolto';
