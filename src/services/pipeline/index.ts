import type { Logger } from 'pino';
import { ok, err, type Result } from '../../domain/result.js';
import {
  createAppError,
  ErrorCode,
  GuardrailBlockedError,
  PipelineError,
  type AppError,
} from '../../domain/errors.js';
import { processListInput } from '../../domain/schemas.js';
import { compilePrompt } from '../../infrastructure/langfuse.js';
import { createRequestLogger } from '../../infrastructure/logger.js';
import { computeStatistics, PARSE_FAILURE_NOTE } from '../extraction/extractor.js';
import { EXTRACTION_SYSTEM_PROMPT, EXTRACTION_USER_TEMPLATE, withExamples } from '../prompts/templates.js';
import type { InvocationResult } from '../invocation/index.js';
import type { InvocationSummary, PipelineDeps, PipelineOutcome } from './types.js';

export type {
  PipelineOutcome,
  PipelineSuccess,
  PipelineBlocked,
  PipelineParseFailed,
  PipelineDeps,
  InvocationSummary,
} from './types.js';

function summarize(result: InvocationResult): InvocationSummary {
  return {
    modelId: result.modelId,
    inputTokens: result.inputTokens,
    outputTokens: result.outputTokens,
    totalTokens: result.totalTokens,
    latencyMs: result.latencyMs,
    retryCount: result.retryCount,
    retrievedDocumentsCount: result.retrievedDocumentsCount,
  };
}

/**
 * Guardrails, invocation, extraction and scoring for one grocery list.
 * Blocked input and unparseable output are outcomes, not errors; provider
 * failures come back as `err`.
 */
export class GroceryListPipeline {
  private readonly deps: PipelineDeps;

  constructor(deps: PipelineDeps) {
    this.deps = deps;
  }

  async process(request: unknown, signal?: AbortSignal): Promise<Result<PipelineOutcome, AppError>> {
    const parsed = processListInput.safeParse(request);
    if (!parsed.success) {
      const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      return err(createAppError(ErrorCode.VALIDATION_FAILED, 'Invalid grocery list request', false, details));
    }

    const input = parsed.data;
    const requestId = crypto.randomUUID();
    const log = createRequestLogger(requestId, input.orderId, input.correlationId);

    log.info({ textLength: input.text.length, useRetrieval: input.useRetrieval }, 'Processing grocery list');

    const inputCheck = this.deps.guardrails.evaluateInput(input.text);
    if (!inputCheck.isAllowed) {
      log.warn({ violationCount: inputCheck.violations.length }, 'Grocery list blocked by input guardrails');
      return ok({ status: 'blocked', requestId, stage: 'input', violations: inputCheck.violations });
    }

    const { systemPrompt, promptName } = await this.resolveSystemPrompt(requestId, log);
    const userPrompt = compilePrompt(EXTRACTION_USER_TEMPLATE, { grocery_text: inputCheck.sanitizedInput });
    const startTime = new Date();

    let invocation: InvocationResult;
    try {
      const options = { systemPrompt, skipInputGuardrails: true, requestId, signal };
      invocation = input.useRetrieval
        ? await this.deps.client.invokeWithRetrieval(userPrompt, options)
        : await this.deps.client.invoke(userPrompt, options);
    } catch (error) {
      if (error instanceof GuardrailBlockedError) {
        log.warn({ stage: error.stage, violationCount: error.violations.length }, 'Grocery list blocked');
        return ok({ status: 'blocked', requestId, stage: error.stage, violations: [...error.violations] });
      }
      if (error instanceof PipelineError) {
        log.error({ errorCode: error.code, retryable: error.retryable, details: error.details }, 'Model invocation failed');
        return err(error.toAppError());
      }
      throw error;
    }

    this.deps.langfuse?.traceGeneration({
      traceId: requestId,
      name: 'grocery-extraction',
      model: invocation.modelId,
      input: userPrompt,
      output: invocation.content,
      promptName,
      startTime,
      endTime: new Date(),
      usage: { input: invocation.inputTokens, output: invocation.outputTokens },
      metadata: { orderId: input.orderId, correlationId: input.correlationId, retryCount: invocation.retryCount },
    });

    const extraction = this.deps.extractor.extract(invocation.content, requestId);
    const outputCheck = invocation.guardrailResult;

    if (outputCheck && !outputCheck.isAllowed) {
      const diagnostics = outputCheck.violations.map((v) => v.message);
      log.warn({ diagnostics }, 'Model output failed output guardrails');
      return ok({ status: 'parse_failed', requestId, diagnostics, extraction, invocation: summarize(invocation) });
    }
    if (extraction.items.length === 0 && extraction.parsingNotes === PARSE_FAILURE_NOTE) {
      return ok({
        status: 'parse_failed',
        requestId,
        diagnostics: [PARSE_FAILURE_NOTE],
        extraction,
        invocation: summarize(invocation),
      });
    }

    const items = input.calibrate ? this.deps.scorer.calibrate(extraction.items, requestId) : extraction.items;
    const finalExtraction = { ...extraction, items };
    const statistics = computeStatistics(finalExtraction);
    const confidence = this.deps.scorer.calculateBatchConfidence(items);

    log.info(
      {
        itemCount: statistics.totalItems,
        averageConfidence: statistics.averageConfidence,
        uncertainItems: statistics.uncertainItemsCount,
        latencyMs: invocation.latencyMs,
      },
      'Grocery list processed',
    );

    return ok({
      status: 'ok',
      requestId,
      extraction: finalExtraction,
      statistics,
      confidence,
      violations: [...inputCheck.violations, ...(outputCheck?.violations ?? [])],
      invocation: summarize(invocation),
    });
  }

  private async resolveSystemPrompt(requestId: string, log: Logger): Promise<{ systemPrompt: string; promptName?: string }> {
    const bundled = { systemPrompt: this.bundledSystemPrompt() };
    const { langfuse, prompt } = this.deps;
    if (!langfuse || !prompt) return bundled;

    const fetched = await langfuse.getPrompt(prompt.name, prompt.label, requestId);
    if (!fetched.ok) {
      log.warn(
        { errorCode: fetched.error.code, details: fetched.error.details },
        'Using bundled extraction prompt',
      );
      return bundled;
    }
    return { systemPrompt: fetched.value.prompt, promptName: fetched.value.name };
  }

  private bundledSystemPrompt(): string {
    return this.deps.includeExamples === false ? EXTRACTION_SYSTEM_PROMPT : withExamples(EXTRACTION_SYSTEM_PROMPT);
  }
}
