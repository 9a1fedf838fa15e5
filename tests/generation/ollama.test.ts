import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OllamaClient, initOllamaClient } from '../../src/generation/ollama.js';
import { ModelClientError } from '../../src/generation/errors.js';
import { DEFAULTS } from '../../src/config/loader.js';

describe('initOllamaClient', () => {
  const originalHost = process.env.OLLAMA_HOST;
  const fetchMock = vi.fn(
    async (_input: string | URL | Request, _init?: RequestInit) =>
      new Response(JSON.stringify({ models: [] }), {
        status: 200,
        headers: { 'Content-Type': 'application/json' },
      }),
  );

  beforeEach(() => {
    delete process.env.OLLAMA_HOST;
    fetchMock.mockClear();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    if (originalHost !== undefined) {
      process.env.OLLAMA_HOST = originalHost;
    } else {
      delete process.env.OLLAMA_HOST;
    }
  });

  async function requestedUrl(): Promise<string> {
    await initOllamaClient().list();
    return String(fetchMock.mock.calls[0]?.[0]);
  }

  it('talks to the configured default host', async () => {
    expect(await requestedUrl()).toBe(`${DEFAULTS.ollama.host}/api/tags`);
  });

  it('prefers OLLAMA_HOST over the default', async () => {
    process.env.OLLAMA_HOST = 'http://ollama.test:11434';

    expect(await requestedUrl()).toBe('http://ollama.test:11434/api/tags');
  });
});

describe('OllamaClient', () => {
  const client = new OllamaClient(initOllamaClient({ host: 'http://127.0.0.1:11434' }));

  it('builds a chat request with generation options', () => {
    expect(
      client.convertInputsToApiKwargs('Hi', { model: 'llama3.3', temperature: 0.1, maxTokens: 64 }, 'chat'),
    ).toEqual({
      kind: 'chat',
      request: {
        model: 'llama3.3',
        messages: [{ role: 'user', content: 'Hi' }],
        options: { temperature: 0.1, num_predict: 64 },
        stream: false,
      },
    });
  });

  it('builds a generate request for the completion model type', () => {
    const apiKwargs = client.convertInputsToApiKwargs('Once', { model: 'llama3.3', stop: ['\n'] }, 'completion');

    expect(apiKwargs).toEqual({
      kind: 'completion',
      request: { model: 'llama3.3', prompt: 'Once', options: { stop: ['\n'] }, stream: false },
    });
  });

  it('parses chat and generate responses', () => {
    expect(client.parseChatCompletion({ message: { content: 'from chat' } })).toBe('from chat');
    expect(client.parseChatCompletion({ response: 'from generate' })).toBe('from generate');
  });

  it('throws on an empty response', () => {
    expect(() => client.parseChatCompletion({})).toThrow(ModelClientError);
  });
});
