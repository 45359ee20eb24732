import type { GuardrailViolation } from './types.js';

export const ErrorCode = {
  // Caller input
  VALIDATION_FAILED: 'VALIDATION_FAILED',

  // Guardrails
  GUARDRAIL_BLOCKED: 'GUARDRAIL_BLOCKED',

  // Model invocation
  LLM_PROVIDER_ERROR: 'LLM_PROVIDER_ERROR',
  LLM_RATE_LIMITED: 'LLM_RATE_LIMITED',
  LLM_UNAVAILABLE: 'LLM_UNAVAILABLE',
  LLM_API_ERROR: 'LLM_API_ERROR',
  LLM_CANCELLED: 'LLM_CANCELLED',

  // Infrastructure
  LANGFUSE_UNAVAILABLE: 'LANGFUSE_UNAVAILABLE',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  code: ErrorCode;
  message: string;
  details?: string;
  retryable: boolean;
}

export function createAppError(
  code: ErrorCode,
  message: string,
  retryable: boolean,
  details?: string,
): AppError {
  return { code, message, retryable, details };
}

export class PipelineError extends Error implements AppError {
  readonly code: ErrorCode;
  readonly retryable: boolean;
  readonly details?: string;

  constructor(
    code: ErrorCode,
    message: string,
    retryable: boolean,
    options?: { details?: string; cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = new.target.name;
    this.code = code;
    this.retryable = retryable;
    this.details = options?.details;
  }

  toAppError(): AppError {
    return createAppError(this.code, this.message, this.retryable, this.details);
  }
}

export class ValidationError extends PipelineError {
  constructor(message: string, details?: string) {
    super(ErrorCode.VALIDATION_FAILED, message, false, { details });
  }
}

export class GuardrailBlockedError extends PipelineError {
  readonly violations: readonly GuardrailViolation[];
  readonly stage: 'input' | 'provider';

  constructor(message: string, violations: readonly GuardrailViolation[], stage: 'input' | 'provider') {
    super(ErrorCode.GUARDRAIL_BLOCKED, message, false, {
      details: violations.map((v) => v.message).join('; '),
    });
    this.violations = violations;
    this.stage = stage;
  }
}

/** Raw failure reported by a model transport, before classification. */
export class ProviderError extends PipelineError {
  readonly providerCode: string;
  readonly status?: number;
  readonly retryAfterMs?: number;

  constructor(
    providerCode: string,
    message: string,
    options?: { status?: number; retryAfterMs?: number; cause?: unknown },
  ) {
    super(ErrorCode.LLM_PROVIDER_ERROR, message, true, {
      details: options?.status !== undefined ? `${providerCode} (HTTP ${options.status})` : providerCode,
      cause: options?.cause,
    });
    this.providerCode = providerCode;
    this.status = options?.status;
    this.retryAfterMs = options?.retryAfterMs;
  }
}

export class RateLimitError extends PipelineError {
  readonly providerCode: string;

  constructor(message: string, providerCode: string, cause?: unknown) {
    super(ErrorCode.LLM_RATE_LIMITED, message, true, { details: providerCode, cause });
    this.providerCode = providerCode;
  }
}

export class ModelUnavailableError extends PipelineError {
  readonly providerCode: string;

  constructor(message: string, providerCode: string, cause?: unknown) {
    super(ErrorCode.LLM_UNAVAILABLE, message, true, { details: providerCode, cause });
    this.providerCode = providerCode;
  }
}

export class ProviderApiError extends PipelineError {
  readonly providerCode: string;
  readonly status?: number;

  constructor(message: string, providerCode: string, status?: number, cause?: unknown) {
    super(ErrorCode.LLM_API_ERROR, message, false, { details: providerCode, cause });
    this.providerCode = providerCode;
    this.status = status;
  }
}

export class CancelledError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.LLM_CANCELLED, message, false, { cause });
  }
}

export function errorDetails(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
