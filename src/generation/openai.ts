/**
 * OpenAI model client.
 *
 * Provides:
 * - Client initialization with graceful degradation (no API key = null client)
 * - Chat (`chat.completions`) and legacy text completion (`completions`) request shapes
 * - Reasoning-model detection (o1/o3/o4 take max_completion_tokens and no temperature)
 * - Rate limit error handling with retry-after display
 */

import OpenAI from 'openai';
import { BaseModelClient, requireModel } from './model-client.js';
import { ModelClientError } from './errors.js';
import type { ModelKwargs, ModelType } from './types.js';

/**
 * Request arguments for either endpoint.
 */
export type OpenAIApiKwargs =
  | { kind: 'chat'; params: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming }
  | { kind: 'completion'; params: OpenAI.Completions.CompletionCreateParamsNonStreaming };

/**
 * The parts of a ChatCompletion or Completion the parser reads.
 */
export interface OpenAICompletion {
  object: string;
  choices: ReadonlyArray<{
    text?: string;
    message?: { content?: string | null };
  }>;
}

/**
 * Initialize OpenAI SDK client with optional API key.
 *
 * Configuration priority:
 * 1. Provided apiKey parameter
 * 2. process.env.OPENAI_API_KEY
 *
 * @returns OpenAI client instance or null if no API key available
 */
export function initOpenAIClient(apiKey?: string): OpenAI | null {
  const resolvedApiKey = apiKey || process.env.OPENAI_API_KEY;

  if (!resolvedApiKey) {
    return null;
  }

  return new OpenAI({
    apiKey: resolvedApiKey,
    maxRetries: 2, // SDK default - handles 429/408/5xx automatically
    timeout: 120000,
  });
}

/**
 * Whether a model is an o-series reasoning model.
 *
 * @example
 * ```typescript
 * isReasoningModel('o1-mini'); // true
 * isReasoningModel('o3'); // true
 * isReasoningModel('gpt-4o'); // false
 * ```
 */
export function isReasoningModel(model: string): boolean {
  return /^o\d/.test(model);
}

export class OpenAIClient extends BaseModelClient<OpenAIApiKwargs, OpenAICompletion> {
  readonly name = 'OpenAIClient';

  constructor(private readonly client: OpenAI) {
    super();
  }

  /**
   * Build request arguments. The rendered prompt is sent as a single user
   * message (chat) or as the raw prompt (completion).
   */
  convertInputsToApiKwargs(input: string, modelKwargs: ModelKwargs, modelType: ModelType): OpenAIApiKwargs {
    const model = requireModel(modelKwargs);
    const { temperature, maxTokens, topP, stop } = modelKwargs;

    if (modelType === 'completion') {
      return {
        kind: 'completion',
        params: { model, prompt: input, temperature, max_tokens: maxTokens, top_p: topP, stop },
      };
    }

    if (isReasoningModel(model)) {
      return {
        kind: 'chat',
        params: {
          model,
          messages: [{ role: 'user', content: input }],
          max_completion_tokens: maxTokens,
          stop,
        },
      };
    }

    return {
      kind: 'chat',
      params: {
        model,
        messages: [{ role: 'user', content: input }],
        temperature,
        max_tokens: maxTokens,
        top_p: topP,
        stop,
      },
    };
  }

  async acall(apiKwargs: OpenAIApiKwargs): Promise<OpenAICompletion> {
    try {
      if (apiKwargs.kind === 'completion') {
        return await this.client.completions.create(apiKwargs.params);
      }
      return await this.client.chat.completions.create(apiKwargs.params);
    } catch (error) {
      if (error instanceof OpenAI.APIError) {
        // Rate limit error (429) - show retry-after time
        if (error.status === 429) {
          const retryAfter = error.headers?.['retry-after'] ?? undefined;
          const message = retryAfter
            ? `Rate limit exceeded. Retry after ${retryAfter} seconds.`
            : 'Rate limit exceeded. Please try again later.';

          throw new ModelClientError(message, { cause: error, status: 429, retryAfter });
        }

        throw new ModelClientError(`OpenAI API error (${error.status}): ${error.message}`, {
          cause: error,
          status: error.status,
        });
      }

      if (error instanceof Error) {
        throw new ModelClientError(`Failed to call OpenAI: ${error.message}`, { cause: error });
      }

      throw error;
    }
  }

  /**
   * Extract the generated text from the first choice.
   *
   * @throws {ModelClientError} If the completion carries no text
   */
  parseChatCompletion(completion: OpenAICompletion): string {
    const choice = completion.choices[0];
    const text = choice?.message?.content ?? choice?.text;
    if (typeof text !== 'string') {
      throw new ModelClientError(`OpenAI ${completion.object} has no text content`);
    }
    return text;
  }
}
