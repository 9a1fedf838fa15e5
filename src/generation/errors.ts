/**
 * Error taxonomy for generation.
 *
 * Only ConfigurationError and PromptRenderError escape the generator's call
 * entry points. ModelClientError and OutputProcessingError are recovered into
 * GeneratorOutput.errorMessage.
 */

/**
 * Raised at construction time (missing model, unknown trainable variable,
 * unparseable template) or when an entry point is used with a client that
 * cannot serve it.
 */
export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when the prompt template cannot be rendered with the given variables.
 */
export class PromptRenderError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PromptRenderError';
  }
}

/**
 * Raised by model clients for backend failures and unparseable completions.
 */
export class ModelClientError extends Error {
  /** HTTP status reported by the backend, when there was one */
  readonly status?: number;

  /** Seconds to wait before retrying (from the retry-after header) */
  readonly retryAfter?: string;

  constructor(
    message: string,
    options: ErrorOptions & { status?: number; retryAfter?: string } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'ModelClientError';
    this.status = options.status;
    this.retryAfter = options.retryAfter;
  }
}

/**
 * Raised by an output-processor pipeline when one of its stages fails.
 *
 * `partial` is the value produced by the last stage that succeeded (the
 * pipeline input when the first stage fails).
 */
export class OutputProcessingError extends Error {
  readonly partial: unknown;
  readonly stage: number;

  constructor(message: string, partial: unknown, stage: number, options?: ErrorOptions) {
    super(message, options);
    this.name = 'OutputProcessingError';
    this.partial = partial;
    this.stage = stage;
  }
}

/**
 * Message text for any thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}
