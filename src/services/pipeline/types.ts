import type {
  ExtractionResult,
  ExtractionStatistics,
  GuardrailViolation,
} from '../../domain/types.js';
import type { LangfuseService } from '../../infrastructure/langfuse.js';
import type { BatchConfidence } from '../extraction/types.js';
import type { ConfidenceScorer } from '../extraction/confidence.js';
import type { Extractor } from '../extraction/extractor.js';
import type { GuardrailsManager } from '../guardrails/manager.js';
import type { InvocationClient } from '../invocation/index.js';

export interface InvocationSummary {
  modelId: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  latencyMs: number;
  retryCount: number;
  retrievedDocumentsCount: number;
}

export interface PipelineSuccess {
  status: 'ok';
  requestId: string;
  extraction: ExtractionResult;
  statistics: ExtractionStatistics;
  confidence: BatchConfidence;
  /** Non-blocking findings from the input and output checks. */
  violations: GuardrailViolation[];
  invocation: InvocationSummary;
}

export interface PipelineBlocked {
  status: 'blocked';
  requestId: string;
  stage: 'input' | 'provider';
  violations: GuardrailViolation[];
}

export interface PipelineParseFailed {
  status: 'parse_failed';
  requestId: string;
  diagnostics: string[];
  extraction: ExtractionResult;
  invocation: InvocationSummary;
}

export type PipelineOutcome = PipelineSuccess | PipelineBlocked | PipelineParseFailed;

export interface PipelineDeps {
  client: InvocationClient;
  guardrails: GuardrailsManager;
  extractor: Extractor;
  scorer: ConfidenceScorer;
  langfuse?: LangfuseService | null;
  prompt?: { name: string; label: string };
  includeExamples?: boolean;
}
