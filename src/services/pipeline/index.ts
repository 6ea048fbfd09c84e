export { processDocument, documentIdFor, PIPELINE_VERSION } from './document.js';
export { processBatch, collectInputs } from './batch.js';
export type { BatchOptions } from './batch.js';
export { runValidation, getFinalRecord } from './validation-run.js';
export type { ValidationDeps, ValidationRunOptions } from './validation-run.js';
export { summarize, formatReport } from './report.js';
export type {
  BatchReport,
  DocumentReport,
  DocumentResult,
  DocumentStatus,
  ExtractionStage,
  PipelineDeps,
  PipelineSettings,
  ProcessingMode,
  StageOutcomes,
} from './types.js';
export { createPipelineDeps } from './deps.js';
