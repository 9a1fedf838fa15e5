/**
 * Anthropic Claude model client.
 *
 * Provides:
 * - Client initialization with graceful degradation (no API key = null client)
 * - Messages API request building (the rendered prompt becomes one user message)
 * - Rate limit error handling with retry-after display
 *
 * The Messages API has a single request shape, so both model types map to it.
 */

import Anthropic from '@anthropic-ai/sdk';
import { BaseModelClient, requireModel } from './model-client.js';
import { ModelClientError } from './errors.js';
import type { ModelKwargs } from './types.js';

export type AnthropicApiKwargs = Anthropic.Messages.MessageCreateParamsNonStreaming;

/**
 * The parts of a Message the parser reads.
 */
export interface AnthropicCompletion {
  stop_reason?: string | null;
  content: ReadonlyArray<{ type: string; text?: string }>;
}

/** Messages API requires max_tokens */
export const DEFAULT_ANTHROPIC_MAX_TOKENS = 4096;

/**
 * Initialize Anthropic SDK client with optional API key.
 *
 * Configuration priority:
 * 1. Provided apiKey parameter
 * 2. process.env.ANTHROPIC_API_KEY
 *
 * @returns Anthropic client instance or null if no API key available
 */
export function initAnthropicClient(apiKey?: string): Anthropic | null {
  const resolvedApiKey = apiKey || process.env.ANTHROPIC_API_KEY;

  if (!resolvedApiKey) {
    return null;
  }

  return new Anthropic({
    apiKey: resolvedApiKey,
    maxRetries: 2, // SDK default - handles 429/408/5xx automatically
    timeout: 120000,
  });
}

export class AnthropicClient extends BaseModelClient<AnthropicApiKwargs, AnthropicCompletion> {
  readonly name = 'AnthropicClient';

  constructor(private readonly client: Anthropic) {
    super();
  }

  convertInputsToApiKwargs(input: string, modelKwargs: ModelKwargs): AnthropicApiKwargs {
    const model = requireModel(modelKwargs);
    const { temperature, maxTokens, topP, stop } = modelKwargs;

    return {
      model,
      max_tokens: maxTokens ?? DEFAULT_ANTHROPIC_MAX_TOKENS,
      messages: [{ role: 'user', content: input }],
      temperature,
      top_p: topP,
      stop_sequences: stop,
    };
  }

  async acall(apiKwargs: AnthropicApiKwargs): Promise<AnthropicCompletion> {
    try {
      return await this.client.messages.create(apiKwargs);
    } catch (error) {
      if (error instanceof Anthropic.APIError) {
        // Rate limit error (429) - show retry-after time
        if (error.status === 429) {
          const retryAfter = error.headers?.['retry-after'] ?? undefined;
          const message = retryAfter
            ? `Rate limit exceeded. Retry after ${retryAfter} seconds.`
            : 'Rate limit exceeded. Please try again later.';

          throw new ModelClientError(message, { cause: error, status: 429, retryAfter });
        }

        throw new ModelClientError(`Anthropic API error (${error.status}): ${error.message}`, {
          cause: error,
          status: error.status,
        });
      }

      if (error instanceof Error) {
        throw new ModelClientError(`Failed to call Anthropic: ${error.message}`, { cause: error });
      }

      throw error;
    }
  }

  /**
   * Join the text blocks of a message.
   *
   * @throws {ModelClientError} If the message has no text block
   */
  parseChatCompletion(completion: AnthropicCompletion): string {
    const texts = completion.content
      .filter((block) => block.type === 'text' && typeof block.text === 'string')
      .map((block) => block.text ?? '');

    if (texts.length === 0) {
      throw new ModelClientError(
        `Anthropic message has no text content (stop_reason: ${completion.stop_reason ?? 'unknown'})`,
      );
    }
    return texts.join('');
  }
}
