import { Langfuse } from 'langfuse';
import { logger } from './logger.js';
import type { AppConfig } from './config.js';

export interface TraceGenerationParams {
  traceId: string;
  name: string;
  model: string;
  input: string;
  output: string;
  startTime: Date;
  endTime: Date;
  metadata?: Record<string, unknown>;
}

interface TraceObject {
  generation(params: {
    name: string;
    model: string;
    input: string;
    output: string;
    startTime: Date;
    endTime: Date;
    metadata?: Record<string, unknown>;
  }): unknown;
}

export interface LangfuseClient {
  trace(params: { id: string; name: string; metadata?: Record<string, unknown> }): TraceObject;
  flushAsync(): Promise<void>;
}

export interface GenerationTracer {
  traceGeneration(params: TraceGenerationParams): void;
  flush(): Promise<void>;
}

const log = logger.child({ module: 'langfuse' });

export class LangfuseService implements GenerationTracer {
  private readonly client: LangfuseClient;

  constructor(client: LangfuseClient) {
    this.client = client;
  }

  /** Fire-and-forget: tracing failures are logged but never block the pipeline */
  traceGeneration(params: TraceGenerationParams): void {
    try {
      const trace = this.client.trace({
        id: params.traceId,
        name: params.name,
        metadata: params.metadata,
      });

      trace.generation({
        name: params.name,
        model: params.model,
        input: params.input,
        output: params.output,
        startTime: params.startTime,
        endTime: params.endTime,
        metadata: params.metadata,
      });

      log.debug({ traceId: params.traceId, model: params.model }, 'Traced LLM generation');
    } catch (cause) {
      const details = cause instanceof Error ? cause.message : String(cause);
      log.warn({ traceId: params.traceId, details }, 'Failed to trace generation (non-blocking)');
    }
  }

  async flush(): Promise<void> {
    try {
      await this.client.flushAsync();
    } catch (cause) {
      const details = cause instanceof Error ? cause.message : String(cause);
      log.warn({ details }, 'Failed to flush Langfuse events');
    }
  }
}

export function createTracer(config: AppConfig['langfuse']): GenerationTracer | null {
  if (!config) {
    log.debug('Langfuse keys not set, generation tracing disabled');
    return null;
  }
  return new LangfuseService(
    new Langfuse({
      publicKey: config.publicKey,
      secretKey: config.secretKey,
      baseUrl: config.baseUrl,
    }),
  );
}
