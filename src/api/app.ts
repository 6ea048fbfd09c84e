import express from 'express';
import { setupOpenAPI } from './openapi/index.js';
import { createDocumentsRouter } from './routes/documents.js';
import { createValidationRouter } from './routes/validation.js';
import { requestLogger } from './middleware/request-logger.js';
import { errorHandler } from './middleware/error-handler.js';
import type { PipelineDeps } from '../services/pipeline/index.js';

export interface ApiDeps extends PipelineDeps {
  /** Root that `POST /documents/process` paths are resolved against. */
  receiptsDir: string;
}

export function createApp(deps: ApiDeps): express.Express {
  const app = express();

  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger);

  setupOpenAPI(app);

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(createDocumentsRouter(deps));
  app.use(createValidationRouter(deps));

  app.use(errorHandler);

  return app;
}
