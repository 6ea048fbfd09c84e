import type { AppError } from '../../domain/errors.js';
import type {
  ExpectationStage,
  FieldName,
  FinalRecord,
  PipelineMode,
  ProcessingRecord,
  ValidationOutcome,
  ValidationSeverity,
} from '../../domain/types.js';
import type { GenerationTracer } from '../../infrastructure/langfuse.js';
import type { LLMProvider } from '../../infrastructure/llm/types.js';
import type { RecordRepository, VerificationRepository } from '../../infrastructure/storage/types.js';
import type { ExtractionTables } from '../pattern-extraction/tables.js';
import type { TextRecognizer } from '../recognition/types.js';
import type { OdometerBounds } from '../reconciliation/index.js';

export type ProcessingMode = Exclude<PipelineMode, 'validate'>;

export interface PipelineSettings {
  requiredFields: FieldName[];
  amountTolerance: number;
  odometer: OdometerBounds;
}

export interface PipelineDeps {
  recognizer: TextRecognizer;
  records: RecordRepository;
  verification: VerificationRepository;
  /** Null disables the model fallback stage. */
  llm: LLMProvider | null;
  tracer?: GenerationTracer | null;
  tables?: ExtractionTables;
  settings: PipelineSettings;
}

interface ProcessedDocument {
  documentId: string;
  record: ProcessingRecord;
  final: FinalRecord;
  validation: ValidationOutcome;
  fatal: null;
}

/** Recognition failed: the failed step is persisted and no later stage ran. */
interface FailedDocument {
  documentId: string;
  record: ProcessingRecord;
  final: null;
  validation: null;
  fatal: AppError;
}

export type DocumentResult = ProcessedDocument | FailedDocument;

export type DocumentStatus = ValidationSeverity | 'fatal';

export type ExtractionStage = Exclude<ExpectationStage, 'final_data'>;

/** Self-test outcomes of individual extraction steps, keyed by stage. */
export type StageOutcomes = Partial<Record<ExtractionStage, ValidationOutcome>>;

export interface DocumentReport {
  documentId: string;
  status: DocumentStatus;
  validation: ValidationOutcome | null;
  basis?: FinalRecord['basis'];
  stages?: StageOutcomes;
  error?: AppError;
}

export interface BatchReport {
  total: number;
  passed: number;
  warnings: number;
  failed: number;
  fatal: number;
  documents: DocumentReport[];
}
