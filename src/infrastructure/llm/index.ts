export type {
  ModelTransport,
  TransportRequest,
  TransportResponse,
  TransportMessage,
  TransportContentBlock,
  TransportCallOptions,
} from './types.js';
export { ProviderErrorCode } from './types.js';
export { GroqTransport, createGroqClient } from './groq.js';
export type { GroqClient } from './groq.js';
export { AnthropicTransport, createAnthropicClient } from './anthropic.js';
export type { AnthropicClient } from './anthropic.js';
export { toProviderError, extractRetryAfterMs } from './errors.js';

import { createAnthropicClient, AnthropicTransport } from './anthropic.js';
import { createGroqClient, GroqTransport } from './groq.js';
import type { ModelTransport } from './types.js';
import type { AppConfig } from '../config.js';

export function createModelTransport(config: Pick<AppConfig, 'llm' | 'requestTimeoutMs'>): ModelTransport {
  switch (config.llm.provider) {
    case 'groq':
      return new GroqTransport(createGroqClient(config.llm.apiKey, config.requestTimeoutMs));
    case 'anthropic':
      return new AnthropicTransport(createAnthropicClient(config.llm.apiKey, config.requestTimeoutMs));
    default:
      throw new Error(`Unsupported LLM provider: ${String(config.llm.provider)}`);
  }
}
