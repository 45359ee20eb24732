import Anthropic from '@anthropic-ai/sdk';
import { logger } from '../logger.js';
import { toProviderError } from './errors.js';
import type { ModelTransport, TransportCallOptions, TransportRequest, TransportResponse } from './types.js';

const log = logger.child({ module: 'llm-anthropic' });

export interface AnthropicClient {
  messages: {
    create(
      params: {
        model: string;
        max_tokens: number;
        system?: string;
        messages: Array<{ role: 'user' | 'assistant'; content: string }>;
        temperature?: number;
        top_p?: number;
        top_k?: number;
        stop_sequences?: string[];
      },
      options?: { signal?: AbortSignal; timeout?: number },
    ): Promise<{
      content: Array<{ type: string; text?: string }>;
      model: string;
      stop_reason: string | null;
      usage: { input_tokens: number; output_tokens: number };
    }>;
  };
}

export class AnthropicTransport implements ModelTransport {
  readonly provider = 'anthropic';
  private readonly client: AnthropicClient;

  constructor(client: AnthropicClient) {
    this.client = client;
  }

  async send(request: TransportRequest, options?: TransportCallOptions): Promise<TransportResponse> {
    try {
      const message = await this.client.messages.create(
        {
          model: request.model,
          max_tokens: request.maxTokens,
          messages: request.messages,
          temperature: request.temperature,
          top_p: request.topP,
          ...(request.system !== undefined && { system: request.system }),
          ...(request.topK !== undefined && { top_k: request.topK }),
          ...(request.stopSequences && request.stopSequences.length > 0 && { stop_sequences: request.stopSequences }),
        },
        { signal: options?.signal, timeout: options?.timeoutMs },
      );

      return {
        content: message.content.map((block) => ({ type: block.type, text: block.text })),
        usage: { inputTokens: message.usage.input_tokens, outputTokens: message.usage.output_tokens },
        stopReason: message.stop_reason,
        model: message.model,
        raw: message,
      };
    } catch (cause) {
      const error = toProviderError(cause, 'Anthropic', options?.signal);
      log.warn({ model: request.model, errorCode: error.code, details: error.details }, 'Anthropic messages call failed');
      throw error;
    }
  }
}

export function createAnthropicClient(apiKey: string, timeoutMs?: number): AnthropicClient {
  return new Anthropic({ apiKey, maxRetries: 0, timeout: timeoutMs });
}
