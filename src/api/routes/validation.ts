import { Router, type Request, type Response } from 'express';
import { validationQueryInput } from '../../domain/schemas.js';
import { ErrorCode } from '../../domain/errors.js';
import { successResponse, errorResponse, sendAppError } from '../middleware/error-handler.js';
import { runValidation } from '../../services/pipeline/index.js';
import { issueSummary, paramString } from './params.js';
import type { ApiDeps } from '../app.js';

export function createValidationRouter(deps: ApiDeps): Router {
  const router = Router();

  const handle = async (req: Request, res: Response, documentId?: string): Promise<void> => {
    const query = validationQueryInput.safeParse(req.query);
    if (!query.success) {
      res.status(422).json(errorResponse(ErrorCode.VALIDATION_ERROR, 'Invalid query parameters', issueSummary(query.error)));
      return;
    }

    const result = await runValidation(deps, { documentId, selfTest: query.data.selfTest });
    if (!result.ok) return sendAppError(res, result.error);
    res.json(successResponse(result.value));
  };

  router.get('/validation', (req: Request, res: Response) => handle(req, res));
  router.get('/validation/:id', (req: Request, res: Response) => handle(req, res, paramString(req.params.id)));

  return router;
}
