import 'dotenv/config';
import { loadConfig } from '../src/infrastructure/config.js';
import { logger } from '../src/infrastructure/logger.js';
import { createPipelineDeps, formatReport, runValidation } from '../src/services/pipeline/index.js';

const log = logger.child({ module: 'validate-receipts' });

function printUsage(): never {
  console.error('Usage: npm run validate -- [documentId] [--self-test] [--json]');
  console.error('  --self-test  compare pipeline output against verified ground truth');
  console.error('  --json       print the full report as JSON');
  process.exit(1);
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  const flags = new Set(argv.filter((arg) => arg.startsWith('--')));
  const positional = argv.filter((arg) => !arg.startsWith('--'));

  for (const flag of flags) {
    if (flag !== '--self-test' && flag !== '--json') printUsage();
  }
  if (positional.length > 1) printUsage();

  const deps = createPipelineDeps(loadConfig());
  const result = await runValidation(deps, { documentId: positional[0], selfTest: flags.has('--self-test') });
  if (!result.ok) {
    log.error({ errorCode: result.error.code, retryable: result.error.retryable }, result.error.message);
    process.exit(1);
  }

  if (flags.has('--json')) {
    console.log(JSON.stringify(result.value, null, 2));
  } else {
    console.log(formatReport(result.value).join('\n'));
  }
  process.exitCode = result.value.failed > 0 || result.value.fatal > 0 ? 1 : 0;
}

main().catch((err) => {
  log.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Validation crashed');
  process.exit(1);
});
