import { LangfuseService, createLangfuseClient } from './infrastructure/langfuse.js';
import { createModelTransport } from './infrastructure/llm/index.js';
import type { ModelTransport } from './infrastructure/llm/types.js';
import type { AppConfig } from './infrastructure/config.js';
import { RetryStrategy } from './services/retry/index.js';
import { GuardrailsManager } from './services/guardrails/manager.js';
import { InputGuardrails } from './services/guardrails/input.js';
import { OutputGuardrails } from './services/guardrails/output.js';
import type { GuardrailPolicy } from './services/guardrails/rules.js';
import { InvocationClient, type Retriever } from './services/invocation/index.js';
import { Extractor } from './services/extraction/extractor.js';
import { ConfidenceScorer } from './services/extraction/confidence.js';
import { GroceryListPipeline } from './services/pipeline/index.js';

export interface ContainerOverrides {
  transport?: ModelTransport;
  retriever?: Retriever;
  langfuse?: LangfuseService | null;
  guardrailPolicy?: Partial<GuardrailPolicy>;
}

export interface Container {
  client: InvocationClient;
  guardrails: GuardrailsManager;
  pipeline: GroceryListPipeline;
}

/** Wires every collaborator from validated configuration. Nothing here is a module-level singleton. */
export function createContainer(config: AppConfig, overrides: ContainerOverrides = {}): Container {
  const transport = overrides.transport ?? createModelTransport(config);

  const guardrails = new GuardrailsManager({
    input: new InputGuardrails({ policy: overrides.guardrailPolicy }),
    output: new OutputGuardrails(),
    guardrailId: config.guardrail.id,
    guardrailVersion: config.guardrail.version,
  });

  const client = new InvocationClient({
    transport,
    retry: new RetryStrategy(config.retry),
    guardrails,
    modelConfig: config.llm.model,
    requestTimeoutMs: config.requestTimeoutMs,
    retriever: overrides.retriever,
    knowledgeBase: config.knowledgeBase,
    logging: config.logging,
  });

  let langfuse = overrides.langfuse;
  if (langfuse === undefined) {
    const langfuseClient = createLangfuseClient(config.langfuse);
    langfuse = langfuseClient ? new LangfuseService(langfuseClient) : null;
  }

  const pipeline = new GroceryListPipeline({
    client,
    guardrails,
    extractor: new Extractor({ uncertaintyThreshold: config.extraction.uncertaintyThreshold }),
    scorer: new ConfidenceScorer(config.extraction.uncertaintyThreshold, {
      logScores: config.logging.logConfidenceScores,
    }),
    langfuse,
    prompt: { name: config.langfuse.promptName, label: config.langfuse.promptLabel },
  });

  return { client, guardrails, pipeline };
}
