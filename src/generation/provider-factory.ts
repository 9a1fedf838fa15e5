/**
 * Model client factory for multi-provider support.
 *
 * Design pattern:
 * - Config-driven provider selection (config.llm.provider)
 * - Graceful degradation when provider unavailable (null)
 * - Lazy initialization (create SDK client only when selected)
 * - Type-safe dispatch using discriminated union
 */

import { AnthropicClient, initAnthropicClient } from './anthropic.js';
import { OpenAIClient, initOpenAIClient } from './openai.js';
import { OllamaClient, initOllamaClient } from './ollama.js';
import type { ResolvedModelKwargs } from './types.js';
import { DEFAULTS } from '../config/loader.js';
import type { PromptwrightConfig } from '../config/schema.js';

export interface OpenAIProvider {
  name: 'OpenAI';
  client: OpenAIClient;
  modelKwargs: ResolvedModelKwargs;
}

export interface AnthropicProvider {
  name: 'Anthropic';
  client: AnthropicClient;
  modelKwargs: ResolvedModelKwargs;
}

export interface OllamaProvider {
  name: 'Ollama';
  client: OllamaClient;
  modelKwargs: ResolvedModelKwargs;
}

/**
 * Union type for all provider types.
 * Enables type-safe dispatch based on provider.name.
 */
export type Provider = OpenAIProvider | AnthropicProvider | OllamaProvider;

/**
 * Initialize the configured model client together with its default model kwargs.
 *
 * Graceful degradation:
 * - OpenAI/Anthropic: Returns null if no API key configured
 * - Ollama: Always returns a client (server check happens on first use)
 *
 * @throws {Error} If config.llm.provider names an unknown provider
 *
 * @example
 * ```typescript
 * const provider = initModelClient(await loadConfig());
 * if (!provider) {
 *   console.log('No model provider available');
 *   return;
 * }
 *
 * const generator = new Generator({
 *   modelClient: provider.client,
 *   modelKwargs: provider.modelKwargs,
 * });
 * ```
 */
export function initModelClient(config: PromptwrightConfig): Provider | null {
  const activeProvider = config.llm?.provider ?? DEFAULTS.llm.provider;

  switch (activeProvider) {
    case 'openai': {
      const client = initOpenAIClient(config.openai?.apiKey);
      if (!client) {
        return null;
      }
      return {
        name: 'OpenAI',
        client: new OpenAIClient(client),
        modelKwargs: {
          model: config.openai?.model ?? DEFAULTS.openai.model,
          maxTokens: config.openai?.maxTokens,
          temperature: config.openai?.temperature,
        },
      };
    }

    case 'anthropic': {
      const client = initAnthropicClient(config.anthropic?.apiKey);
      if (!client) {
        return null;
      }
      return {
        name: 'Anthropic',
        client: new AnthropicClient(client),
        modelKwargs: {
          model: config.anthropic?.model ?? DEFAULTS.anthropic.model,
          maxTokens: config.anthropic?.maxTokens ?? DEFAULTS.anthropic.maxTokens,
          temperature: config.anthropic?.temperature,
        },
      };
    }

    case 'ollama': {
      return {
        name: 'Ollama',
        client: new OllamaClient(initOllamaClient(config.ollama)),
        modelKwargs: {
          model: config.ollama?.model ?? DEFAULTS.ollama.model,
          temperature: config.ollama?.temperature,
        },
      };
    }

    default: {
      // Unknown provider - configuration bug
      throw new Error(
        `Unknown LLM provider: ${String(activeProvider)}. Valid options: openai, anthropic, ollama`,
      );
    }
  }
}
