import { z } from 'zod';
import { fieldNameSchema } from '../domain/schemas.js';
import type { FieldName } from '../domain/types.js';

const DEFAULT_REQUIRED_FIELDS: FieldName[] = ['date', 'amount', 'company'];

const fieldList = z
  .string()
  .transform((value) => value.split(',').map((part) => part.trim()).filter((part) => part.length > 0))
  .pipe(z.array(fieldNameSchema).min(1));

const envSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  PORT: z.coerce.number().int().positive().default(3000),

  LLM_PROVIDER: z.enum(['groq', 'ollama']).default('ollama'),
  LLM_MODEL: z.string().min(1).optional(),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  GROQ_API_KEY: z.string().min(1).optional(),
  OLLAMA_BASE_URL: z.string().url().default('http://localhost:11434'),

  LANGFUSE_PUBLIC_KEY: z.string().min(1).optional(),
  LANGFUSE_SECRET_KEY: z.string().min(1).optional(),
  LANGFUSE_BASE_URL: z.string().url().default('https://cloud.langfuse.com'),

  RECEIPTS_DIR: z.string().min(1).default('receipts'),
  EXTRACTED_DIR: z.string().min(1).default('extracted'),
  VERIFIED_DIR: z.string().min(1).default('verified'),

  REQUIRED_FIELDS: fieldList.optional(),
  AMOUNT_TOLERANCE: z.coerce.number().nonnegative().default(0.01),
  ODOMETER_MIN_KM: z.coerce.number().int().nonnegative().default(0),
  ODOMETER_MAX_KM: z.coerce.number().int().positive().default(1_000_000),
  CONCURRENCY: z.coerce.number().int().positive().default(1),
});

export interface AppConfig {
  port: number;
  llm: {
    provider: 'groq' | 'ollama';
    model?: string;
    timeoutMs: number;
    groqApiKey?: string;
    ollamaBaseUrl: string;
  };
  langfuse: { publicKey: string; secretKey: string; baseUrl: string } | null;
  paths: {
    receiptsDir: string;
    extractedDir: string;
    verifiedDir: string;
  };
  pipeline: {
    requiredFields: FieldName[];
    amountTolerance: number;
    odometer: { minKm: number; maxKm: number };
    concurrency: number;
  };
}

/** @throws {Error} Listing every invalid variable when the environment does not validate */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;

  if (e.LLM_PROVIDER === 'groq' && !e.GROQ_API_KEY) {
    throw new Error('Invalid configuration: GROQ_API_KEY must be set when LLM_PROVIDER is groq');
  }

  return {
    port: e.PORT,
    llm: {
      provider: e.LLM_PROVIDER,
      model: e.LLM_MODEL,
      timeoutMs: e.LLM_TIMEOUT_MS,
      groqApiKey: e.GROQ_API_KEY,
      ollamaBaseUrl: e.OLLAMA_BASE_URL,
    },
    langfuse:
      e.LANGFUSE_PUBLIC_KEY && e.LANGFUSE_SECRET_KEY
        ? { publicKey: e.LANGFUSE_PUBLIC_KEY, secretKey: e.LANGFUSE_SECRET_KEY, baseUrl: e.LANGFUSE_BASE_URL }
        : null,
    paths: {
      receiptsDir: e.RECEIPTS_DIR,
      extractedDir: e.EXTRACTED_DIR,
      verifiedDir: e.VERIFIED_DIR,
    },
    pipeline: {
      requiredFields: e.REQUIRED_FIELDS ?? DEFAULT_REQUIRED_FIELDS,
      amountTolerance: e.AMOUNT_TOLERANCE,
      odometer: { minKm: e.ODOMETER_MIN_KM, maxKm: e.ODOMETER_MAX_KM },
      concurrency: e.CONCURRENCY,
    },
  };
}
