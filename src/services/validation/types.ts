import type { ExtractedFields } from '../../domain/types.js';

export interface ValidationOptions {
  /** Accuracy self-test: compare every field present in both records. */
  groundTruth?: ExtractedFields;
  /** Absolute tolerance for money fields, EUR. */
  amountTolerance?: number;
  documentId?: string;
}

export const DEFAULT_AMOUNT_TOLERANCE = 0.01;
