export * from './domain/types.js';
export * from './domain/errors.js';
export * from './domain/result.js';
export * from './domain/schemas.js';
export { loadConfig, configSchema, modelPreset, MODEL_PRESETS, DEFAULT_MODEL_IDS } from './infrastructure/config.js';
export type { AppConfig, Environment, LLMProviderName, ModelPresetName } from './infrastructure/config.js';
export { logger, createRequestLogger } from './infrastructure/logger.js';
export { BoundedCache } from './infrastructure/cache.js';
export { LangfuseService, createLangfuseClient, compilePrompt } from './infrastructure/langfuse.js';
export type { LangfuseClient, LangfuseServiceOptions, ManagedPrompt, TraceGenerationParams } from './infrastructure/langfuse.js';
export * from './infrastructure/llm/index.js';
export * from './services/retry/index.js';
export * from './services/guardrails/index.js';
export * from './services/extraction/index.js';
export * from './services/prompts/index.js';
export * from './services/invocation/index.js';
export * from './services/embeddings/index.js';
export * from './services/pipeline/index.js';
export { createContainer } from './container.js';
export type { Container, ContainerOverrides } from './container.js';
