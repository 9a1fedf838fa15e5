/**
 * Shared types for generation.
 *
 * Used across the generator, the prompt renderer and the model clients.
 */

/**
 * Backend call shape.
 *
 * - chat: the rendered prompt is sent as a chat message
 * - completion: the rendered prompt is sent as a raw text prompt
 */
export type ModelType = 'chat' | 'completion';

/**
 * Values filled into the prompt template, keyed by variable name.
 */
export type PromptKwargs = Record<string, unknown>;

/**
 * Model invocation arguments.
 *
 * Clients read the named fields; any other key is kept through composition
 * so custom clients can consume it.
 */
export interface ModelKwargs {
  /**
   * Model identifier. Required on the generator defaults.
   *
   * Examples: 'gpt-4o-mini', 'claude-sonnet-4-5-20250929', 'llama3.3'
   */
  model?: string;

  /** Sampling temperature */
  temperature?: number;

  /** Maximum number of tokens to generate */
  maxTokens?: number;

  /** Nucleus sampling */
  topP?: number;

  /** Stop sequences */
  stop?: string[];

  [key: string]: unknown;
}

/**
 * Model kwargs once the `model` entry has been validated.
 */
export type ResolvedModelKwargs = ModelKwargs & { model: string };

/**
 * Structured result of a generator call.
 *
 * When errorMessage is set, data holds the best-effort value (partially
 * processed or unprocessed), or undefined when the completion never parsed.
 */
export interface GeneratorOutput {
  /** Parsed backend response, or the raw completion as text when parsing failed */
  readonly rawResponse: unknown;

  /** Post-processed payload */
  readonly data: unknown;

  /** Set iff a recoverable failure occurred */
  readonly errorMessage: string | null;
}
