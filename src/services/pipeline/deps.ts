import { resolve } from 'node:path';
import { createTracer } from '../../infrastructure/langfuse.js';
import { llmFromConfig } from '../../infrastructure/llm/index.js';
import { PdfTextRecognizer } from '../../infrastructure/pdf-text.js';
import { FileRecordRepository, FileVerificationRepository } from '../../infrastructure/storage/index.js';
import { getDefaultTables } from '../pattern-extraction/tables.js';
import type { AppConfig } from '../../infrastructure/config.js';
import type { PipelineDeps } from './types.js';

/** Wires the production collaborators from configuration. */
export function createPipelineDeps(config: AppConfig): PipelineDeps {
  return {
    recognizer: new PdfTextRecognizer(),
    records: new FileRecordRepository(resolve(config.paths.extractedDir)),
    verification: new FileVerificationRepository(resolve(config.paths.verifiedDir)),
    llm: llmFromConfig(config.llm),
    tracer: createTracer(config.langfuse),
    tables: getDefaultTables(),
    settings: {
      requiredFields: config.pipeline.requiredFields,
      amountTolerance: config.pipeline.amountTolerance,
      odometer: config.pipeline.odometer,
    },
  };
}
