import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yaml';
import { z } from 'zod';
import type { Express } from 'express';

const currentDir = dirname(fileURLToPath(import.meta.url));
const documentPath = join(currentDir, 'openapi.yaml');
const openApiDocument = z.record(z.unknown()).parse(YAML.parse(readFileSync(documentPath, 'utf-8')));

export function setupOpenAPI(app: Express): void {
  app.use('/docs', swaggerUi.serve, swaggerUi.setup(openApiDocument, {
    customCss: '.swagger-ui .topbar { display: none }',
    customSiteTitle: 'Receipt Reconciliation API',
  }));

  app.get('/openapi.json', (_req, res) => {
    res.json(openApiDocument);
  });
}
