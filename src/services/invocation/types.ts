import type { GuardrailResult, RetrievedDocument } from '../../domain/types.js';
import type { ModelConfig, ModelConfigInput } from '../../domain/schemas.js';
import type { ModelTransport } from '../../infrastructure/llm/types.js';
import type { GuardrailsManager } from '../guardrails/manager.js';
import type { ExpectedFormat } from '../guardrails/output.js';
import type { RetryStrategy } from '../retry/index.js';

/** External retrieval collaborator. Indexing and embeddings live behind it. */
export interface Retriever {
  retrieve(
    query: string,
    options: { knowledgeBaseId: string; topK: number; signal?: AbortSignal },
  ): Promise<RetrievedDocument[]>;
}

export interface InvokeOptions {
  systemPrompt?: string;
  /** Merged over the client's model configuration and validated. */
  modelConfig?: Partial<ModelConfigInput>;
  skipInputGuardrails?: boolean;
  skipOutputGuardrails?: boolean;
  expectedFormat?: ExpectedFormat;
  signal?: AbortSignal;
  /** Overall budget across every attempt and backoff sleep. */
  timeoutMs?: number;
  requestId?: string;
}

export interface InvocationResult {
  content: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  stopReason: string | null;
  modelId: string;
  latencyMs: number;
  retryCount: number;
  inputGuardrailResult?: GuardrailResult;
  guardrailResult?: GuardrailResult;
  retrievedDocumentsCount: number;
  raw: unknown;
}

export interface HealthStatus {
  status: 'healthy' | 'unhealthy';
  modelId: string;
  provider: string;
  latencyMs?: number;
  error?: string;
}

export interface InvocationClientDeps {
  transport: ModelTransport;
  retry: RetryStrategy;
  guardrails: GuardrailsManager;
  modelConfig: ModelConfig;
  /** Per-attempt timeout handed to the transport. */
  requestTimeoutMs?: number;
  retriever?: Retriever;
  knowledgeBase?: { id?: string; topK: number };
  logging?: { logRequests: boolean; logResponses: boolean };
  now?: () => number;
}
