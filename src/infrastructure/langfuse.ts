import { Langfuse } from 'langfuse';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, errorDetails, ErrorCode, type AppError } from '../domain/errors.js';
import { isRecord } from '../domain/types.js';
import { BoundedCache } from './cache.js';
import { logger } from './logger.js';
import type { AppConfig } from './config.js';

export interface ManagedPrompt {
  name: string;
  prompt: string;
  config: Record<string, unknown>;
}

export interface TraceGenerationParams {
  traceId: string;
  name: string;
  model: string;
  input: string;
  output: string;
  promptName?: string;
  startTime: Date;
  endTime: Date;
  usage?: { input: number; output: number };
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
    usage?: { input: number; output: number };
    metadata?: Record<string, unknown>;
  }): unknown;
}

export interface LangfuseClient {
  getPrompt(name: string, version?: number, options?: { label?: string; type?: 'text' }): Promise<{ name: string; prompt: string; config?: unknown }>;
  trace(params: { id: string; name: string; metadata?: Record<string, unknown> }): TraceObject;
}

interface CacheEntry {
  prompt: ManagedPrompt;
  fetchedAt: number;
}

export interface LangfuseServiceOptions {
  /** How long a fetched prompt is served without refetching. Defaults to 5 minutes. */
  ttlMs?: number;
  /** Distinct name/label pairs kept; the least recently used is evicted first. */
  cacheSize?: number;
  now?: () => number;
}

const DEFAULT_TTL_MS = 5 * 60 * 1000;
const DEFAULT_CACHE_SIZE = 32;
const log = logger.child({ module: 'langfuse' });

function cacheKey(name: string, label?: string): string {
  return label ? `${name}:${label}` : name;
}

/** Managed prompts with a TTL cache and stale fallback, plus generation tracing. */
export class LangfuseService {
  private readonly client: LangfuseClient;
  private readonly cache: BoundedCache<string, CacheEntry>;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(client: LangfuseClient, options: LangfuseServiceOptions = {}) {
    this.client = client;
    this.cache = new BoundedCache(options.cacheSize ?? DEFAULT_CACHE_SIZE);
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.now = options.now ?? (() => Date.now());
  }

  async getPrompt(
    name: string,
    label?: string,
    requestId?: string,
  ): Promise<Result<ManagedPrompt, AppError>> {
    const ctx = { promptName: name, label, requestId };
    const key = cacheKey(name, label);
    const cached = this.cache.get(key);
    const ageMs = cached ? this.now() - cached.fetchedAt : undefined;

    if (cached && ageMs !== undefined && ageMs < this.ttlMs) {
      log.debug({ ...ctx, cacheAgeMs: ageMs }, 'Returning cached prompt');
      return ok(cached.prompt);
    }

    try {
      const fetched = await this.client.getPrompt(name, undefined, { label, type: 'text' });
      const prompt: ManagedPrompt = {
        name: fetched.name,
        prompt: fetched.prompt,
        config: isRecord(fetched.config) ? fetched.config : {},
      };

      this.cache.set(key, { prompt, fetchedAt: this.now() });
      log.info({ ...ctx, refreshed: cached !== undefined }, 'Fetched prompt from Langfuse');
      return ok(prompt);
    } catch (cause) {
      const details = errorDetails(cause);

      if (cached) {
        log.warn({ ...ctx, staleForMs: ageMs, details }, 'Langfuse unavailable, returning stale cached prompt');
        return ok(cached.prompt);
      }

      log.error({ ...ctx, errorCode: ErrorCode.LANGFUSE_UNAVAILABLE, retryable: true, details }, 'Langfuse unavailable and no cached prompt');
      return err(
        createAppError(
          ErrorCode.LANGFUSE_UNAVAILABLE,
          `Cannot fetch prompt "${name}" from Langfuse and no cached version available`,
          true,
          details,
        ),
      );
    }
  }

  /** Fire-and-forget: tracing failures are logged but never reach the caller */
  traceGeneration(params: TraceGenerationParams): void {
    try {
      const trace = this.client.trace({ id: params.traceId, name: params.name, metadata: params.metadata });
      trace.generation({
        name: params.name,
        model: params.model,
        input: params.input,
        output: params.output,
        startTime: params.startTime,
        endTime: params.endTime,
        usage: params.usage,
        metadata: { promptName: params.promptName, ...params.metadata },
      });
      log.debug({ traceId: params.traceId, model: params.model }, 'Traced model generation');
    } catch (cause) {
      log.warn({ traceId: params.traceId, details: errorDetails(cause) }, 'Failed to trace generation (non-blocking)');
    }
  }
}

/** Substitutes `{{name}}` placeholders; unknown placeholders are left untouched. */
export function compilePrompt(template: string, variables: Record<string, string>): string {
  return template.replace(/\{\{\s*(\w+)\s*\}\}/g, (placeholder, key: string) => variables[key] ?? placeholder);
}

/** Returns null when Langfuse keys are not configured. */
export function createLangfuseClient(config: AppConfig['langfuse']): LangfuseClient | null {
  if (!config.publicKey || !config.secretKey) {
    return null;
  }
  return new Langfuse({
    publicKey: config.publicKey,
    secretKey: config.secretKey,
    baseUrl: config.baseUrl,
  });
}
