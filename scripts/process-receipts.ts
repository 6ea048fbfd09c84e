import 'dotenv/config';
import { pipelineModeSchema } from '../src/domain/schemas.js';
import { loadConfig } from '../src/infrastructure/config.js';
import { logger } from '../src/infrastructure/logger.js';
import {
  collectInputs,
  createPipelineDeps,
  documentIdFor,
  formatReport,
  processBatch,
  runValidation,
} from '../src/services/pipeline/index.js';
import type { BatchReport } from '../src/services/pipeline/index.js';

const log = logger.child({ module: 'process-receipts' });

function printUsage(): never {
  console.error('Usage: npm run process -- [file|dir] [--mode <mode>] [--concurrency <n>]');
  console.error(`  mode: ${pipelineModeSchema.options.join(' | ')} (default: full)`);
  console.error('  file|dir defaults to RECEIPTS_DIR; with --mode validate it names one document');
  process.exit(1);
}

interface CliArgs {
  target?: string;
  mode: string;
  concurrency?: number;
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { mode: 'full' };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--mode') {
      args.mode = argv[++i] ?? printUsage();
    } else if (arg === '--concurrency') {
      const value = Number(argv[++i]);
      if (!Number.isInteger(value) || value < 1) printUsage();
      args.concurrency = value;
    } else if (arg === '--help' || arg === '-h' || arg.startsWith('--')) {
      printUsage();
    } else if (args.target === undefined) {
      args.target = arg;
    } else {
      printUsage();
    }
  }
  return args;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const mode = pipelineModeSchema.safeParse(args.mode);
  if (!mode.success) {
    console.error(`Unknown mode: ${args.mode}`);
    printUsage();
  }

  const config = loadConfig();
  const deps = createPipelineDeps(config);

  let report: BatchReport;
  if (mode.data === 'validate') {
    const documentId = args.target === undefined ? undefined : documentIdFor(args.target);
    const result = await runValidation(deps, { documentId });
    if (!result.ok) {
      log.error({ errorCode: result.error.code, retryable: result.error.retryable }, result.error.message);
      process.exit(1);
    }
    report = result.value;
  } else {
    const inputs = await collectInputs(args.target ?? config.paths.receiptsDir);
    if (!inputs.ok) {
      console.error(inputs.error.message);
      process.exit(1);
    }
    report = await processBatch(inputs.value, mode.data, deps, {
      concurrency: args.concurrency ?? config.pipeline.concurrency,
    });
  }

  await deps.tracer?.flush();
  console.log(formatReport(report).join('\n'));
  process.exitCode = report.failed > 0 || report.fatal > 0 ? 1 : 0;
}

main().catch((err) => {
  log.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Receipt processing crashed');
  process.exit(1);
});
