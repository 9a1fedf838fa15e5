/**
 * Ollama model client.
 *
 * Provides:
 * - Client initialization with lazy detection (no upfront health checks)
 * - Chat (`chat`) and raw prompt (`generate`) request shapes
 * - User-friendly error messages for connection issues
 * - Configurable host via OLLAMA_HOST env var or config
 *
 * CRITICAL: Lazy detection pattern - only check if Ollama running when actually using it.
 */

import { Ollama } from 'ollama';
import type { ChatRequest, GenerateRequest, Options } from 'ollama';
import { BaseModelClient, requireModel } from './model-client.js';
import { ModelClientError } from './errors.js';
import type { ModelKwargs, ModelType } from './types.js';
import { DEFAULTS } from '../config/loader.js';
import type { OllamaConfig } from '../config/schema.js';

export type OllamaApiKwargs =
  | { kind: 'chat'; request: ChatRequest & { stream: false } }
  | { kind: 'completion'; request: GenerateRequest & { stream: false } };

/**
 * The parts of a ChatResponse or GenerateResponse the parser reads.
 */
export interface OllamaCompletion {
  message?: { content: string };
  response?: string;
}

/**
 * Initialize Ollama SDK client.
 *
 * Configuration priority:
 * 1. config.host parameter
 * 2. process.env.OLLAMA_HOST
 * 3. Default: http://127.0.0.1:11434
 *
 * Does NOT check if Ollama is running; availability surfaces on first call.
 */
export function initOllamaClient(config?: OllamaConfig): Ollama {
  const host = config?.host || process.env.OLLAMA_HOST || DEFAULTS.ollama.host;
  return new Ollama({ host });
}

export class OllamaClient extends BaseModelClient<OllamaApiKwargs, OllamaCompletion> {
  readonly name = 'OllamaClient';

  constructor(private readonly client: Ollama) {
    super();
  }

  convertInputsToApiKwargs(input: string, modelKwargs: ModelKwargs, modelType: ModelType): OllamaApiKwargs {
    const model = requireModel(modelKwargs);
    const options: Partial<Options> = {
      temperature: modelKwargs.temperature,
      num_predict: modelKwargs.maxTokens,
      top_p: modelKwargs.topP,
      stop: modelKwargs.stop,
    };

    if (modelType === 'completion') {
      return { kind: 'completion', request: { model, prompt: input, options, stream: false } };
    }
    return {
      kind: 'chat',
      request: { model, messages: [{ role: 'user', content: input }], options, stream: false },
    };
  }

  async acall(apiKwargs: OllamaApiKwargs): Promise<OllamaCompletion> {
    try {
      if (apiKwargs.kind === 'completion') {
        return await this.client.generate(apiKwargs.request);
      }
      return await this.client.chat(apiKwargs.request);
    } catch (error) {
      if (error instanceof Error) {
        const isConnectionRefused =
          ('code' in error && error.code === 'ECONNREFUSED') ||
          error.message.includes('ECONNREFUSED') ||
          error.message.includes('fetch failed');

        if (isConnectionRefused) {
          throw new ModelClientError('Ollama not running. Start Ollama and try again.', {
            cause: error,
          });
        }

        throw new ModelClientError(`Failed to call Ollama: ${error.message}`, { cause: error });
      }

      throw error;
    }
  }

  /**
   * @throws {ModelClientError} If the response has neither message content nor text
   */
  parseChatCompletion(completion: OllamaCompletion): string {
    const text = completion.message?.content ?? completion.response;
    if (typeof text !== 'string') {
      throw new ModelClientError('Ollama response has no text content');
    }
    return text;
  }
}
