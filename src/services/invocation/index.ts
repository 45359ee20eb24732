import {
  GuardrailBlockedError,
  ModelUnavailableError,
  PipelineError,
  ProviderApiError,
  ProviderError,
  RateLimitError,
  ValidationError,
  errorDetails,
} from '../../domain/errors.js';
import {
  modelConfigSchema,
  retrievedDocumentSchema,
  type ModelConfig,
  type ModelConfigInput,
} from '../../domain/schemas.js';
import type { GuardrailResult, RetrievedDocument } from '../../domain/types.js';
import { logger } from '../../infrastructure/logger.js';
import { ProviderErrorCode, type TransportRequest, type TransportResponse } from '../../infrastructure/llm/types.js';
import { PromptBuilder, type BuiltPrompt } from '../prompts/builder.js';
import { EXTRACTION_SYSTEM_PROMPT, extractionPrompt } from '../prompts/templates.js';
import type { HealthStatus, InvocationClientDeps, InvocationResult, InvokeOptions } from './types.js';

export type {
  Retriever,
  InvokeOptions,
  InvocationResult,
  HealthStatus,
  InvocationClientDeps,
} from './types.js';

const log = logger.child({ module: 'invocation' });

export const MAX_RETRIEVED_DOCUMENTS = 5;
const HEALTH_CHECK_PROMPT = "Respond with 'OK' only.";

/** Maps a transport failure that survived the retry loop onto the caller-facing error taxonomy. */
export function classifyProviderError(error: unknown): unknown {
  if (!(error instanceof ProviderError)) return error;

  if (error.providerCode === ProviderErrorCode.THROTTLED || error.status === 429) {
    return new RateLimitError('Rate limit exceeded after retries', error.providerCode, error);
  }
  if (error.providerCode === ProviderErrorCode.SERVICE_UNAVAILABLE || error.status === 503) {
    return new ModelUnavailableError('Model is currently unavailable', error.providerCode, error);
  }
  return new ProviderApiError(`Model API error: ${error.providerCode}`, error.providerCode, error.status, error);
}

export function extractContent(response: Pick<TransportResponse, 'content'>): string {
  return response.content
    .filter((block) => block.type === 'text' && typeof block.text === 'string')
    .map((block) => block.text ?? '')
    .join('\n');
}

export class InvocationClient {
  private readonly deps: InvocationClientDeps;
  private readonly now: () => number;

  constructor(deps: InvocationClientDeps) {
    this.deps = deps;
    this.now = deps.now ?? (() => Date.now());
  }

  get modelId(): string {
    return this.deps.modelConfig.modelId;
  }

  /**
   * @throws {GuardrailBlockedError} Input or provider-side safety checks blocked the call
   * @throws {ValidationError} The model configuration override is invalid
   * @throws {RateLimitError | ModelUnavailableError | ProviderApiError} After retries are exhausted
   * @throws {CancelledError} The signal aborted or `timeoutMs` elapsed
   */
  async invoke(prompt: string, options: InvokeOptions = {}): Promise<InvocationResult> {
    const requestId = options.requestId ?? crypto.randomUUID();
    const startedAt = this.now();
    const config = this.resolveModelConfig(options.modelConfig);
    const ctx = { requestId, modelId: config.modelId, provider: this.deps.transport.provider };

    let inputGuardrailResult: GuardrailResult | undefined;
    let userPrompt = prompt;
    if (!options.skipInputGuardrails) {
      inputGuardrailResult = this.checkInput(prompt, requestId);
      userPrompt = inputGuardrailResult.sanitizedInput;
    }

    if (this.deps.logging?.logRequests) {
      log.info(
        { ...ctx, promptLength: userPrompt.length, hasSystemPrompt: options.systemPrompt !== undefined },
        'Invoking model',
      );
    }

    const request = buildRequest(userPrompt, options.systemPrompt, config);
    const deadline = options.timeoutMs !== undefined ? startedAt + options.timeoutMs : undefined;
    let retryCount = 0;

    let response: TransportResponse;
    let latencyMs: number;
    const callStartedAt = this.now();
    try {
      response = await this.deps.retry.execute(
        () => this.deps.transport.send(request, { signal: options.signal, timeoutMs: this.attemptTimeout(deadline) }),
        {
          signal: options.signal,
          deadline,
          requestId,
          onRetry: () => {
            retryCount++;
          },
        },
      );
      latencyMs = this.now() - callStartedAt;
    } catch (error) {
      const classified = classifyProviderError(error);
      log.error(
        {
          ...ctx,
          retryCount,
          errorCode: classified instanceof PipelineError ? classified.code : undefined,
          details: errorDetails(error),
        },
        'Model invocation failed',
      );
      throw classified;
    }

    const verdict = this.deps.guardrails.interpretProviderVerdict(response.safetyVerdict);
    if (verdict.isBlocked) {
      throw new GuardrailBlockedError('Response blocked by provider guardrails', verdict.violations, 'provider');
    }

    const content = extractContent(response);

    let guardrailResult: GuardrailResult | undefined;
    if (!options.skipOutputGuardrails) {
      guardrailResult = this.deps.guardrails.evaluateOutput(content, options.expectedFormat ?? 'json');
      if (!guardrailResult.isAllowed) {
        log.warn(
          { ...ctx, violations: guardrailResult.violations.map((v) => ({ type: v.type, message: v.message })) },
          'Output has guardrail violations',
        );
      }
    }

    const { inputTokens, outputTokens } = response.usage;

    if (this.deps.logging?.logResponses) {
      log.info(
        { ...ctx, contentLength: content.length, inputTokens, outputTokens, latencyMs, retryCount },
        'Model response received',
      );
    }

    return {
      content,
      inputTokens,
      outputTokens,
      totalTokens: inputTokens + outputTokens,
      stopReason: response.stopReason,
      modelId: response.model || config.modelId,
      latencyMs,
      retryCount,
      inputGuardrailResult,
      guardrailResult,
      retrievedDocumentsCount: 0,
      raw: response.raw,
    };
  }

  /** Builds the bundled extraction prompt (optionally with few-shot examples) and invokes the model. */
  extractGroceryItems(groceryText: string, options: InvokeOptions & { includeExamples?: boolean } = {}): Promise<InvocationResult> {
    const { includeExamples = true, ...invokeOptions } = options;
    const prompts = extractionPrompt(groceryText, includeExamples);
    return this.invoke(prompts.user, { systemPrompt: prompts.system, ...invokeOptions });
  }

  /**
   * Prepends retrieved catalog context to the prompt. Retrieval problems of any
   * kind fall back to a plain invocation.
   */
  async invokeWithRetrieval(query: string, options: InvokeOptions = {}): Promise<InvocationResult> {
    const requestId = options.requestId ?? crypto.randomUUID();
    const { retriever, knowledgeBase } = this.deps;

    if (!retriever || !knowledgeBase?.id) {
      log.warn({ requestId }, 'Knowledge base not configured, invoking without context');
      return this.invoke(query, { ...options, requestId });
    }

    let userQuery = query;
    let inputGuardrailResult: GuardrailResult | undefined;
    if (!options.skipInputGuardrails) {
      inputGuardrailResult = this.checkInput(query, requestId);
      userQuery = inputGuardrailResult.sanitizedInput;
    }

    let built: BuiltPrompt;
    try {
      const retrieved: unknown = await retriever.retrieve(userQuery, {
        knowledgeBaseId: knowledgeBase.id,
        topK: Math.min(knowledgeBase.topK, MAX_RETRIEVED_DOCUMENTS),
        signal: options.signal,
      });
      built = new PromptBuilder('extraction')
        .withSystemMessage(options.systemPrompt ?? EXTRACTION_SYSTEM_PROMPT)
        .withContextDocuments(usableDocuments(retrieved, requestId).slice(0, MAX_RETRIEVED_DOCUMENTS))
        .withUserMessage(userQuery)
        .build();
    } catch (error) {
      log.warn(
        { requestId, knowledgeBaseId: knowledgeBase.id, details: errorDetails(error) },
        'Knowledge base retrieval failed, falling back to direct invocation',
      );
      return this.invoke(userQuery, { ...options, requestId, skipInputGuardrails: true });
    }

    const lastMessage = built.messages[built.messages.length - 1];
    log.debug({ requestId, documentCount: built.contextDocumentsCount }, 'Invoking with retrieved context');

    const result = await this.invoke(lastMessage?.content ?? userQuery, {
      ...options,
      requestId,
      systemPrompt: built.system,
      skipInputGuardrails: true,
    });
    return { ...result, inputGuardrailResult, retrievedDocumentsCount: built.contextDocumentsCount };
  }

  /** Never throws; failures are reported as `unhealthy`. */
  async healthCheck(): Promise<HealthStatus> {
    const base = { modelId: this.modelId, provider: this.deps.transport.provider };
    try {
      const result = await this.invoke(HEALTH_CHECK_PROMPT, {
        modelConfig: { maxTokens: 10, temperature: 0 },
        skipInputGuardrails: true,
        skipOutputGuardrails: true,
      });
      return { status: 'healthy', ...base, latencyMs: result.latencyMs };
    } catch (error) {
      log.warn({ ...base, details: errorDetails(error) }, 'Model health check failed');
      return { status: 'unhealthy', ...base, error: errorDetails(error) };
    }
  }

  private checkInput(prompt: string, requestId: string): GuardrailResult {
    const result = this.deps.guardrails.evaluateInput(prompt);
    if (!result.isAllowed) {
      log.error(
        { requestId, violations: result.violations.map((v) => ({ type: v.type, ruleId: v.ruleId, matched: v.matchedContent })) },
        'Input blocked by guardrails',
      );
      throw new GuardrailBlockedError('Input blocked by guardrails', result.violations, 'input');
    }
    return result;
  }

  private resolveModelConfig(override?: Partial<ModelConfigInput>): ModelConfig {
    if (!override) return this.deps.modelConfig;

    const parsed = modelConfigSchema.safeParse({ ...this.deps.modelConfig, ...override });
    if (!parsed.success) {
      const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new ValidationError('Invalid model configuration', details);
    }
    return parsed.data;
  }

  private attemptTimeout(deadline?: number): number | undefined {
    const configured = this.deps.requestTimeoutMs;
    if (deadline === undefined) return configured;
    const remaining = Math.max(1, deadline - this.now());
    return configured === undefined ? remaining : Math.min(configured, remaining);
  }
}

/**
 * Keeps the retrieval hits that have string content, defaulting absent metadata.
 *
 * @throws {TypeError} When the retriever did not return a list
 */
function usableDocuments(retrieved: unknown, requestId: string): RetrievedDocument[] {
  if (!Array.isArray(retrieved)) {
    throw new TypeError(`Retriever returned ${typeof retrieved} instead of a document list`);
  }

  const documents: RetrievedDocument[] = [];
  retrieved.forEach((entry: unknown, index) => {
    const parsed = retrievedDocumentSchema.safeParse(entry);
    if (parsed.success) {
      documents.push(parsed.data);
    } else {
      log.warn({ requestId, index, issues: parsed.error.issues.map((issue) => issue.message) }, 'Dropping malformed retrieved document');
    }
  });
  return documents;
}

function buildRequest(prompt: string, systemPrompt: string | undefined, config: ModelConfig): TransportRequest {
  return {
    model: config.modelId,
    messages: [{ role: 'user', content: prompt }],
    maxTokens: config.maxTokens,
    temperature: config.temperature,
    topP: config.topP,
    ...(systemPrompt !== undefined && { system: systemPrompt }),
    ...(config.topK !== undefined && { topK: config.topK }),
    ...(config.stopSequences.length > 0 && { stopSequences: config.stopSequences }),
  };
}
