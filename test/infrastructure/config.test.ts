import { describe, it, expect } from 'vitest';
import { loadConfig, modelPreset, MODEL_PRESETS } from '../../src/infrastructure/config.js';

const baseEnv = { GROQ_API_KEY: 'test-key' };

describe('loadConfig', () => {
  it('applies dev defaults', () => {
    const config = loadConfig(baseEnv);

    expect(config.environment).toBe('dev');
    expect(config.llm.provider).toBe('groq');
    expect(config.llm.model.modelId).toBe('llama-3.3-70b-versatile');
    expect(config.llm.model.maxTokens).toBe(4096);
    expect(config.llm.model.stopSequences).toEqual(['```', '\n\n\n']);
    expect(config.retry).toEqual({ maxRetries: 3, baseDelayMs: 1000, maxDelayMs: 30_000, jitter: true });
    expect(config.requestTimeoutMs).toBe(60_000);
    expect(config.guardrail).toEqual({ id: undefined, version: 'DRAFT' });
    expect(config.knowledgeBase.topK).toBe(5);
    expect(config.logging).toEqual({ logRequests: true, logResponses: true, logConfidenceScores: true });
    expect(config.extraction.uncertaintyThreshold).toBe(0.7);
  });

  it('applies production presets', () => {
    const config = loadConfig({ ...baseEnv, ENVIRONMENT: 'production' });

    expect(config.retry.maxRetries).toBe(5);
    expect(config.retry.maxDelayMs).toBe(60_000);
    expect(config.requestTimeoutMs).toBe(120_000);
    expect(config.logging.logRequests).toBe(false);
    expect(config.logging.logResponses).toBe(false);
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      ...baseEnv,
      LLM_MODEL_ID: 'llama-3.1-8b-instant',
      LLM_TEMPERATURE: '0.3',
      LLM_STOP_SEQUENCES: 'END,\\n\\n',
      LLM_RETRY_JITTER: 'false',
      GUARDRAIL_ID: 'gr-1',
      GUARDRAIL_VERSION: '2',
      KNOWLEDGE_BASE_ID: 'kb-1',
      KNOWLEDGE_BASE_TOP_K: '3',
    });

    expect(config.llm.model.modelId).toBe('llama-3.1-8b-instant');
    expect(config.llm.model.temperature).toBe(0.3);
    expect(config.llm.model.stopSequences).toEqual(['END', '\n\n']);
    expect(config.retry.jitter).toBe(false);
    expect(config.guardrail).toEqual({ id: 'gr-1', version: '2' });
    expect(config.knowledgeBase).toEqual({ id: 'kb-1', topK: 3 });
  });

  it('uses the Anthropic key and default model for the anthropic provider', () => {
    const config = loadConfig({ LLM_PROVIDER: 'anthropic', ANTHROPIC_API_KEY: 'test-key' });

    expect(config.llm.apiKey).toBe('test-key');
    expect(config.llm.model.modelId).toBe('claude-3-5-sonnet-20241022');
  });

  it('throws listing every invalid setting', () => {
    expect(() => loadConfig({ LLM_TEMPERATURE: '2', KNOWLEDGE_BASE_TOP_K: '9' })).toThrow(
      /Invalid configuration:\n {2}llm\.apiKey: .*\n {2}llm\.model\.temperature: .*\n {2}knowledgeBase\.topK: /,
    );
  });

  it('rejects an unknown provider', () => {
    expect(() => loadConfig({ ...baseEnv, LLM_PROVIDER: 'other' })).toThrow(/llm\.provider/);
  });
});

describe('modelPreset', () => {
  it('copies the preset with the given model id', () => {
    const config = modelPreset('product-matching', 'model-x');

    expect(config).toEqual({
      modelId: 'model-x',
      maxTokens: 2048,
      temperature: 0.05,
      topP: 0.95,
      topK: 200,
      stopSequences: ['```'],
    });
    config.stopSequences.push('extra');
    expect(MODEL_PRESETS['product-matching'].stopSequences).toEqual(['```']);
  });
});
