import pino from 'pino';

export const logger = pino({
  name: 'receipt-reconciliation',
  level: process.env.LOG_LEVEL ?? 'info',
});

export function createDocumentLogger(
  documentId: string,
  mode?: string,
  runId?: string,
) {
  return logger.child({
    documentId,
    ...(mode !== undefined && { mode }),
    ...(runId !== undefined && { runId }),
  });
}
