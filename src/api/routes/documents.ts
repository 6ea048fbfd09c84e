import { Router, type Request, type Response } from 'express';
import { isAbsolute, relative, resolve } from 'node:path';
import { processDocumentInput } from '../../domain/schemas.js';
import { createAppError, ErrorCode } from '../../domain/errors.js';
import { successResponse, errorResponse, sendAppError } from '../middleware/error-handler.js';
import { getFinalRecord, processDocument } from '../../services/pipeline/index.js';
import { issueSummary, paramString } from './params.js';
import type { ApiDeps } from '../app.js';

/** Resolves a request path inside the receipts directory, or null if it points outside. */
function receiptPath(receiptsDir: string, requested: string): string | null {
  const root = resolve(receiptsDir);
  const target = resolve(root, requested);
  const rel = relative(root, target);
  if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) return null;
  return target;
}

export function createDocumentsRouter(deps: ApiDeps): Router {
  const router = Router();

  router.get('/documents', async (_req: Request, res: Response) => {
    const ids = await deps.records.list();
    if (!ids.ok) return sendAppError(res, ids.error);
    res.json(successResponse({ documents: ids.value }));
  });

  router.post('/documents/process', async (req: Request, res: Response) => {
    const parsed = processDocumentInput.safeParse(req.body);
    if (!parsed.success) {
      res.status(422).json(errorResponse(ErrorCode.VALIDATION_ERROR, 'Invalid request body', issueSummary(parsed.error)));
      return;
    }

    const path = receiptPath(deps.receiptsDir, parsed.data.path);
    if (!path) {
      return sendAppError(
        res,
        createAppError(ErrorCode.VALIDATION_ERROR, 'Document path must point inside the receipts directory', false),
      );
    }

    const result = await processDocument(path, parsed.data.mode, deps);
    if (!result.ok) return sendAppError(res, result.error);

    const outcome = result.value;
    if (outcome.fatal) return sendAppError(res, outcome.fatal);

    const { documentId, record, final, validation } = outcome;
    res.json(successResponse({
      documentId,
      status: validation.severity,
      reconciled: record.reconciled,
      final,
      validation,
      totalDurationMs: record.totalDurationMs,
    }));
  });

  router.get('/documents/:id', async (req: Request, res: Response) => {
    const documentId = paramString(req.params.id);

    const result = await deps.records.load(documentId);
    if (!result.ok) return sendAppError(res, result.error);
    if (!result.value) {
      return sendAppError(res, createAppError(ErrorCode.RECORD_NOT_FOUND, `Document '${documentId}' has not been processed`, false));
    }

    res.json(successResponse(result.value));
  });

  router.get('/documents/:id/final', async (req: Request, res: Response) => {
    const result = await getFinalRecord(deps, paramString(req.params.id));
    if (!result.ok) return sendAppError(res, result.error);
    res.json(successResponse(result.value));
  });

  return router;
}
