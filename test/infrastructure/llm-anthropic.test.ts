import { describe, it, expect, vi } from 'vitest';
import { AnthropicTransport, type AnthropicClient } from '../../src/infrastructure/llm/index.js';
import type { TransportRequest } from '../../src/infrastructure/llm/types.js';

function createMockClient(): AnthropicClient {
  return { messages: { create: vi.fn() } };
}

const request: TransportRequest = {
  model: 'claude-3-5-sonnet-20241022',
  messages: [{ role: 'user', content: 'milk' }],
  maxTokens: 1024,
  temperature: 0.1,
  topP: 0.9,
};

const message = {
  content: [
    { type: 'text', text: '{"items":' },
    { type: 'text', text: '[]}' },
  ],
  model: 'claude-3-5-sonnet-20241022',
  stop_reason: 'end_turn',
  usage: { input_tokens: 20, output_tokens: 8 },
};

describe('AnthropicTransport.send', () => {
  it('maps the message response', async () => {
    const client = createMockClient();
    vi.mocked(client.messages.create).mockResolvedValue(message);
    const transport = new AnthropicTransport(client);

    const response = await transport.send(request);

    expect(response.content).toEqual(message.content);
    expect(response.usage).toEqual({ inputTokens: 20, outputTokens: 8 });
    expect(response.stopReason).toBe('end_turn');
  });

  it('omits optional parameters that are not set', async () => {
    const client = createMockClient();
    vi.mocked(client.messages.create).mockResolvedValue(message);
    const transport = new AnthropicTransport(client);

    await transport.send(request);

    expect(client.messages.create).toHaveBeenCalledWith(
      {
        model: 'claude-3-5-sonnet-20241022',
        max_tokens: 1024,
        messages: [{ role: 'user', content: 'milk' }],
        temperature: 0.1,
        top_p: 0.9,
      },
      { signal: undefined, timeout: undefined },
    );
  });

  it('passes system, top_k and stop sequences', async () => {
    const client = createMockClient();
    vi.mocked(client.messages.create).mockResolvedValue(message);
    const transport = new AnthropicTransport(client);

    await transport.send({ ...request, system: 'be precise', topK: 250, stopSequences: ['```'] });

    expect(client.messages.create).toHaveBeenCalledWith(
      expect.objectContaining({ system: 'be precise', top_k: 250, stop_sequences: ['```'] }),
      expect.anything(),
    );
  });

  it('maps 529 overload to SERVICE_UNAVAILABLE', async () => {
    const client = createMockClient();
    vi.mocked(client.messages.create).mockRejectedValue(Object.assign(new Error('Overloaded'), { status: 529 }));
    const transport = new AnthropicTransport(client);

    await expect(transport.send(request)).rejects.toMatchObject({ providerCode: 'SERVICE_UNAVAILABLE', status: 529 });
  });
});
