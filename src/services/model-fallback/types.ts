import type { GenerationTracer } from '../../infrastructure/langfuse.js';
import type { LLMProvider } from '../../infrastructure/llm/types.js';
import type { ExtractedFields, FieldName, StepFailure } from '../../domain/types.js';

export interface ModelFallbackDeps {
  llm: LLMProvider;
  tracer?: GenerationTracer | null;
}

export interface ModelExtraction {
  fields: ExtractedFields;
  /** Requested fields the model did not supply. */
  missingFields: FieldName[];
  model?: string;
  attempts: number;
  failure?: StepFailure;
}
