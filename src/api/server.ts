import 'dotenv/config';
import { resolve } from 'node:path';
import { createApp } from './app.js';
import { loadConfig } from '../infrastructure/config.js';
import { logger } from '../infrastructure/logger.js';
import { createPipelineDeps } from '../services/pipeline/index.js';

function main(): void {
  const config = loadConfig();
  const app = createApp({ ...createPipelineDeps(config), receiptsDir: resolve(config.paths.receiptsDir) });

  app.listen(config.port, () => {
    logger.info({ port: config.port, llmProvider: config.llm.provider }, 'Receipt reconciliation API started');
  });
}

try {
  main();
} catch (err) {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start server');
  process.exit(1);
}
