import { describe, it, expect, vi, afterEach } from 'vitest';
import { createProvider, ensureProviderAvailable, OllamaProvider } from './index.js';
import type { ModelProvider } from '../model-provider.js';
import type { ModelSettings } from '../config.js';
import { ConfigurationError } from '../errors.js';

const settings: ModelSettings = {
  provider: 'ollama',
  temperature: 0,
  anthropic: { model: 'claude-sonnet-4-20250514' },
  ollama: { baseUrl: 'http://localhost:11434/v1', model: 'qwen2.5-coder:32b' },
};

describe('createProvider', () => {
  it('builds the Ollama provider', () => {
    const provider = createProvider(settings);
    expect(provider.name).toBe('ollama');
    expect(provider.getModelName()).toBe('qwen2.5-coder:32b');
  });

  it('requires an API key for Anthropic', () => {
    expect(() => createProvider({ ...settings, provider: 'anthropic' })).toThrow(ConfigurationError);
  });

  it('builds the Anthropic provider when a key is set', () => {
    const provider = createProvider({
      ...settings,
      provider: 'anthropic',
      anthropic: { apiKey: 'test-secret', model: 'claude-sonnet-4-20250514' },
    });
    expect(provider.name).toBe('anthropic');
    expect(provider.getModelName()).toBe('claude-sonnet-4-20250514');
  });
});

describe('ensureProviderAvailable', () => {
  function createProviderStub(healthy: boolean): ModelProvider {
    return {
      name: 'mock',
      defaultModel: 'mock-model',
      chat: vi.fn(),
      healthCheck: vi.fn().mockResolvedValue(healthy),
      getModelName: vi.fn().mockReturnValue('mock-model'),
    };
  }

  it('passes when the provider answers', async () => {
    await expect(ensureProviderAvailable(createProviderStub(true))).resolves.toBeUndefined();
  });

  it('raises a ConfigurationError when the provider is unreachable', async () => {
    const check = ensureProviderAvailable(createProviderStub(false));

    await expect(check).rejects.toBeInstanceOf(ConfigurationError);
    await expect(ensureProviderAvailable(createProviderStub(false))).rejects.toThrow(
      'Model provider mock (mock-model) is not reachable'
    );
  });
});

describe('OllamaProvider', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts to the native chat endpoint with the schema as format', async () => {
    const fetchMock = vi.fn<typeof fetch>(
      async () =>
        new Response(
          JSON.stringify({
            message: { role: 'assistant', content: '{"findings":[]}' },
            done: true,
            done_reason: 'stop',
            prompt_eval_count: 120,
            eval_count: 8,
          }),
          { status: 200 }
        )
    );
    vi.stubGlobal('fetch', fetchMock);
    const provider = new OllamaProvider(settings.ollama);
    const schema = { type: 'object', properties: { findings: { type: 'array' } } };

    const result = await provider.chat({
      system: 'extract errors',
      messages: [{ role: 'user', content: 'tool output' }],
      maxTokens: 4096,
      jsonSchema: schema,
      temperature: 0,
    });

    expect(result).toEqual({
      content: '{"findings":[]}',
      finishReason: 'stop',
      usage: { inputTokens: 120, outputTokens: 8 },
    });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://localhost:11434/api/chat');
    expect(typeof init?.body).toBe('string');
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'qwen2.5-coder:32b',
      messages: [
        { role: 'system', content: 'extract errors' },
        { role: 'user', content: 'tool output' },
      ],
      stream: false,
      options: { temperature: 0, num_predict: 4096 },
      format: schema,
    });
  });

  it('raises on an HTTP error', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn<typeof fetch>(async () => new Response('model not found', { status: 404 }))
    );
    const provider = new OllamaProvider(settings.ollama);

    await expect(
      provider.chat({ messages: [{ role: 'user', content: 'tool output' }] })
    ).rejects.toThrow('ollama /api/chat returned 404: model not found');
  });

  it('reports an unreachable server as unhealthy', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn<typeof fetch>(async () => {
        throw new TypeError('fetch failed');
      })
    );

    await expect(new OllamaProvider(settings.ollama).healthCheck()).resolves.toBe(false);
  });
});
