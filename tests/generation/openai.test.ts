/**
 * Unit tests for the OpenAI client.
 *
 * Tests focus on:
 * - SDK client initialization and graceful degradation
 * - Request building for chat, completion and reasoning models
 * - Completion parsing
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  OpenAIClient,
  initOpenAIClient,
  isReasoningModel,
} from '../../src/generation/openai.js';
import { ModelClientError } from '../../src/generation/errors.js';

describe('initOpenAIClient', () => {
  const originalEnv = process.env.OPENAI_API_KEY;

  beforeEach(() => {
    delete process.env.OPENAI_API_KEY;
  });

  afterEach(() => {
    if (originalEnv !== undefined) {
      process.env.OPENAI_API_KEY = originalEnv;
    } else {
      delete process.env.OPENAI_API_KEY;
    }
  });

  it('returns null when no API key provided or in env', () => {
    expect(initOpenAIClient()).toBeNull();
  });

  it('returns OpenAI client when API key provided as parameter', () => {
    const client = initOpenAIClient('test-api-key');
    expect(client).not.toBeNull();
    expect(client).toHaveProperty('chat');
  });

  it('returns OpenAI client when API key in env var', () => {
    process.env.OPENAI_API_KEY = 'test-env-key';
    expect(initOpenAIClient()).not.toBeNull();
  });
});

describe('isReasoningModel', () => {
  it('detects o-series models', () => {
    expect(isReasoningModel('o1')).toBe(true);
    expect(isReasoningModel('o1-mini')).toBe(true);
    expect(isReasoningModel('o3-mini')).toBe(true);
  });

  it('does not flag chat models', () => {
    expect(isReasoningModel('gpt-4o')).toBe(false);
    expect(isReasoningModel('gpt-4o-mini')).toBe(false);
    expect(isReasoningModel('omni-test')).toBe(false);
  });
});

describe('OpenAIClient', () => {
  const sdk = initOpenAIClient('test-api-key');
  if (!sdk) {
    throw new Error('expected an SDK client for a test key');
  }
  const client = new OpenAIClient(sdk);

  it('does not support blocking calls', () => {
    expect(client.supportsBlockingCalls).toBe(false);
    expect(() => client.call({ kind: 'chat', params: { model: 'gpt-4o', messages: [] } }, 'chat')).toThrow(
      ModelClientError,
    );
  });

  it('sends the prompt as a user chat message', () => {
    const apiKwargs = client.convertInputsToApiKwargs(
      'Answer: hi',
      { model: 'gpt-4o-mini', temperature: 0.2, maxTokens: 100, topP: 0.9, stop: ['END'] },
      'chat',
    );

    expect(apiKwargs).toEqual({
      kind: 'chat',
      params: {
        model: 'gpt-4o-mini',
        messages: [{ role: 'user', content: 'Answer: hi' }],
        temperature: 0.2,
        max_tokens: 100,
        top_p: 0.9,
        stop: ['END'],
      },
    });
  });

  it('uses max_completion_tokens and drops temperature for reasoning models', () => {
    const apiKwargs = client.convertInputsToApiKwargs(
      'Think',
      { model: 'o3-mini', temperature: 0.2, maxTokens: 500 },
      'chat',
    );

    expect(apiKwargs).toEqual({
      kind: 'chat',
      params: {
        model: 'o3-mini',
        messages: [{ role: 'user', content: 'Think' }],
        max_completion_tokens: 500,
        stop: undefined,
      },
    });
  });

  it('builds a text completion request for the completion model type', () => {
    const apiKwargs = client.convertInputsToApiKwargs(
      'Once upon a time',
      { model: 'gpt-3.5-turbo-instruct', maxTokens: 20 },
      'completion',
    );

    expect(apiKwargs.kind).toBe('completion');
    expect(apiKwargs.params).toMatchObject({
      model: 'gpt-3.5-turbo-instruct',
      prompt: 'Once upon a time',
      max_tokens: 20,
    });
  });

  it('requires a model', () => {
    expect(() => client.convertInputsToApiKwargs('hi', {}, 'chat')).toThrow(ModelClientError);
  });

  it('parses chat completions', () => {
    expect(
      client.parseChatCompletion({
        object: 'chat.completion',
        choices: [{ message: { content: 'Paris' } }],
      }),
    ).toBe('Paris');
  });

  it('parses text completions', () => {
    expect(
      client.parseChatCompletion({ object: 'text_completion', choices: [{ text: ' there was' }] }),
    ).toBe(' there was');
  });

  it('throws on completions without text', () => {
    expect(() =>
      client.parseChatCompletion({ object: 'chat.completion', choices: [{ message: { content: null } }] }),
    ).toThrow('OpenAI chat.completion has no text content');
    expect(() => client.parseChatCompletion({ object: 'chat.completion', choices: [] })).toThrow(
      ModelClientError,
    );
  });
});
