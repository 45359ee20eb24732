export interface TransportMessage {
  role: 'user' | 'assistant';
  content: string;
}

/** Provider-neutral request body built once per invocation. */
export interface TransportRequest {
  model: string;
  system?: string;
  messages: TransportMessage[];
  maxTokens: number;
  temperature: number;
  topP: number;
  topK?: number;
  stopSequences?: string[];
}

export interface TransportContentBlock {
  type: string;
  text?: string;
}

export interface TransportResponse {
  content: TransportContentBlock[];
  usage: { inputTokens: number; outputTokens: number };
  stopReason: string | null;
  model: string;
  /** Native safety verdict, for providers that run their own guardrails. */
  safetyVerdict?: unknown;
  raw: unknown;
}

export interface TransportCallOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * A single model call. Implementations throw `ProviderError` for every
 * provider-side failure and never retry on their own.
 */
export interface ModelTransport {
  readonly provider: string;
  send(request: TransportRequest, options?: TransportCallOptions): Promise<TransportResponse>;
}

/** Provider-neutral failure codes carried on `ProviderError`. */
export const ProviderErrorCode = {
  THROTTLED: 'THROTTLED',
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  MODEL_TIMEOUT: 'MODEL_TIMEOUT',
  MODEL_ERROR: 'MODEL_ERROR',
  STREAM_ERROR: 'STREAM_ERROR',
  CONNECTION_ERROR: 'CONNECTION_ERROR',
  BAD_REQUEST: 'BAD_REQUEST',
  AUTH_FAILED: 'AUTH_FAILED',
  NOT_FOUND: 'NOT_FOUND',
  UNKNOWN: 'UNKNOWN',
} as const;

export type ProviderErrorCode = (typeof ProviderErrorCode)[keyof typeof ProviderErrorCode];
