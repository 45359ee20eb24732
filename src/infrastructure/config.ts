import { z } from 'zod';
import { modelConfigSchema, type ModelConfig } from '../domain/schemas.js';

export const ENVIRONMENTS = ['dev', 'production'] as const;
export type Environment = (typeof ENVIRONMENTS)[number];

export const LLM_PROVIDERS = ['groq', 'anthropic'] as const;
export type LLMProviderName = (typeof LLM_PROVIDERS)[number];

export const DEFAULT_MODEL_IDS: Record<LLMProviderName, string> = {
  groq: 'llama-3.3-70b-versatile',
  anthropic: 'claude-3-5-sonnet-20241022',
};

export const MODEL_PRESETS = {
  'grocery-extraction': {
    maxTokens: 4096,
    temperature: 0.1,
    topP: 0.9,
    topK: 250,
    stopSequences: ['```', '\n\n\n'],
  },
  'product-matching': {
    maxTokens: 2048,
    temperature: 0.05,
    topP: 0.95,
    topK: 200,
    stopSequences: ['```'],
  },
} satisfies Record<string, Omit<ModelConfig, 'modelId'>>;

export type ModelPresetName = keyof typeof MODEL_PRESETS;

export function modelPreset(name: ModelPresetName, modelId: string): ModelConfig {
  const preset = MODEL_PRESETS[name];
  return { modelId, ...preset, stopSequences: [...preset.stopSequences] };
}

export const configSchema = z.object({
  environment: z.enum(ENVIRONMENTS),
  llm: z.object({
    provider: z.enum(LLM_PROVIDERS),
    apiKey: z.string().min(1, 'API key for the selected LLM provider must be set'),
    model: modelConfigSchema,
  }),
  retry: z.object({
    maxRetries: z.number().int().nonnegative(),
    baseDelayMs: z.number().positive(),
    maxDelayMs: z.number().positive(),
    jitter: z.boolean(),
  }),
  requestTimeoutMs: z.number().int().positive(),
  guardrail: z.object({
    id: z.string().min(1).optional(),
    version: z.string().min(1),
  }),
  knowledgeBase: z.object({
    id: z.string().min(1).optional(),
    topK: z.number().int().min(1).max(5),
  }),
  logging: z.object({
    logRequests: z.boolean(),
    logResponses: z.boolean(),
    logConfidenceScores: z.boolean(),
  }),
  extraction: z.object({
    uncertaintyThreshold: z.number().min(0).max(1),
  }),
  langfuse: z.object({
    publicKey: z.string().min(1).optional(),
    secretKey: z.string().min(1).optional(),
    baseUrl: z.string().url(),
    promptName: z.string().min(1),
    promptLabel: z.string().min(1),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;

const ENVIRONMENT_DEFAULTS: Record<
  Environment,
  { maxRetries: number; maxDelayMs: number; requestTimeoutMs: number; logRequests: boolean; logResponses: boolean }
> = {
  dev: { maxRetries: 3, maxDelayMs: 30_000, requestTimeoutMs: 60_000, logRequests: true, logResponses: true },
  production: { maxRetries: 5, maxDelayMs: 60_000, requestTimeoutMs: 120_000, logRequests: false, logResponses: false },
};

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return value.trim().toLowerCase() !== 'false';
}

function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((entry) => entry.replace(/\\n/g, '\n'))
    .filter((entry) => entry.length > 0);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/** @throws {Error} Listing every invalid setting when validation fails */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const environment = env.ENVIRONMENT === 'production' ? 'production' : 'dev';
  const defaults = ENVIRONMENT_DEFAULTS[environment];
  const provider = env.LLM_PROVIDER ?? 'groq';
  const preset = MODEL_PRESETS['grocery-extraction'];

  const rawConfig = {
    environment,
    llm: {
      provider,
      apiKey: (provider === 'anthropic' ? env.ANTHROPIC_API_KEY : env.GROQ_API_KEY) ?? '',
      model: {
        modelId:
          nonEmpty(env.LLM_MODEL_ID) ??
          (provider === 'anthropic' ? DEFAULT_MODEL_IDS.anthropic : DEFAULT_MODEL_IDS.groq),
        maxTokens: parseNumber(env.LLM_MAX_TOKENS) ?? preset.maxTokens,
        temperature: parseNumber(env.LLM_TEMPERATURE) ?? preset.temperature,
        topP: parseNumber(env.LLM_TOP_P) ?? preset.topP,
        topK: parseNumber(env.LLM_TOP_K) ?? preset.topK,
        stopSequences: parseList(env.LLM_STOP_SEQUENCES) ?? [...preset.stopSequences],
      },
    },
    retry: {
      maxRetries: parseNumber(env.LLM_MAX_RETRIES) ?? defaults.maxRetries,
      baseDelayMs: parseNumber(env.LLM_RETRY_BASE_DELAY_MS) ?? 1000,
      maxDelayMs: parseNumber(env.LLM_RETRY_MAX_DELAY_MS) ?? defaults.maxDelayMs,
      jitter: parseFlag(env.LLM_RETRY_JITTER, true),
    },
    requestTimeoutMs: parseNumber(env.LLM_TIMEOUT_MS) ?? defaults.requestTimeoutMs,
    guardrail: {
      id: nonEmpty(env.GUARDRAIL_ID),
      version: nonEmpty(env.GUARDRAIL_VERSION) ?? 'DRAFT',
    },
    knowledgeBase: {
      id: nonEmpty(env.KNOWLEDGE_BASE_ID),
      topK: parseNumber(env.KNOWLEDGE_BASE_TOP_K) ?? 5,
    },
    logging: {
      logRequests: parseFlag(env.LOG_REQUESTS, defaults.logRequests),
      logResponses: parseFlag(env.LOG_RESPONSES, defaults.logResponses),
      logConfidenceScores: parseFlag(env.LOG_CONFIDENCE_SCORES, true),
    },
    extraction: {
      uncertaintyThreshold: parseNumber(env.UNCERTAINTY_THRESHOLD) ?? 0.7,
    },
    langfuse: {
      publicKey: nonEmpty(env.LANGFUSE_PUBLIC_KEY),
      secretKey: nonEmpty(env.LANGFUSE_SECRET_KEY),
      baseUrl: nonEmpty(env.LANGFUSE_BASE_URL) ?? 'https://cloud.langfuse.com',
      promptName: nonEmpty(env.LANGFUSE_PROMPT_NAME) ?? 'grocery-extraction',
      promptLabel: nonEmpty(env.LANGFUSE_PROMPT_LABEL) ?? 'production',
    },
  };

  const parsed = configSchema.safeParse(rawConfig);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n  ${issues.join('\n  ')}`);
  }
  return parsed.data;
}
