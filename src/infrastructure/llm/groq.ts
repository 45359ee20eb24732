import Groq from 'groq-sdk';
import { logger } from '../logger.js';
import { toProviderError } from './errors.js';
import type { ModelTransport, TransportCallOptions, TransportRequest, TransportResponse } from './types.js';

const log = logger.child({ module: 'llm-groq' });

export interface GroqClient {
  chat: {
    completions: {
      create(
        params: {
          model: string;
          messages: Array<{ role: 'system' | 'user' | 'assistant'; content: string }>;
          temperature?: number;
          max_tokens?: number;
          top_p?: number;
          stop?: string[];
        },
        options?: { signal?: AbortSignal; timeout?: number },
      ): Promise<{
        choices: Array<{ message?: { content?: string | null }; finish_reason?: string | null }>;
        model: string;
        usage?: { prompt_tokens?: number; completion_tokens?: number; total_tokens?: number };
      }>;
    };
  };
}

/** Chat-completions transport. Groq has no top-k sampling, so that parameter is dropped. */
export class GroqTransport implements ModelTransport {
  readonly provider = 'groq';
  private readonly client: GroqClient;

  constructor(client: GroqClient) {
    this.client = client;
  }

  async send(request: TransportRequest, options?: TransportCallOptions): Promise<TransportResponse> {
    const ctx = { model: request.model };

    if (request.topK !== undefined) {
      log.debug({ ...ctx, topK: request.topK }, 'Groq does not support top_k, ignoring');
    }

    try {
      const response = await this.client.chat.completions.create(
        {
          model: request.model,
          messages: [
            ...(request.system !== undefined ? [{ role: 'system' as const, content: request.system }] : []),
            ...request.messages,
          ],
          temperature: request.temperature,
          max_tokens: request.maxTokens,
          top_p: request.topP,
          ...(request.stopSequences && request.stopSequences.length > 0 && { stop: request.stopSequences }),
        },
        { signal: options?.signal, timeout: options?.timeoutMs },
      );

      const content = response.choices
        .map((choice) => choice.message?.content)
        .filter((text): text is string => typeof text === 'string')
        .map((text) => ({ type: 'text', text }));

      return {
        content,
        usage: {
          inputTokens: response.usage?.prompt_tokens ?? 0,
          outputTokens: response.usage?.completion_tokens ?? 0,
        },
        stopReason: response.choices[0]?.finish_reason ?? null,
        model: response.model,
        raw: response,
      };
    } catch (cause) {
      const error = toProviderError(cause, 'Groq', options?.signal);
      log.warn({ ...ctx, errorCode: error.code, details: error.details }, 'Groq chat completion failed');
      throw error;
    }
  }
}

export function createGroqClient(apiKey: string, timeoutMs?: number): GroqClient {
  return new Groq({ apiKey, maxRetries: 0, timeout: timeoutMs });
}
