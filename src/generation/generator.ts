/**
 * Generator: prompt template + model client + output processors in one callable unit.
 *
 * Pipeline: Trained values → Prompt rendering → Model kwargs composition → Client call → Parse → Output processors
 *
 * Error policy:
 * - Configuration errors (missing model, unknown trainable variable) throw at construction,
 *   and from call/acall when a per-call override blanks the model
 * - Rendering errors throw from call/acall (caller bug, nothing was sent)
 * - Request-building, client, parse and processor failures are returned in GeneratorOutput.errorMessage
 *
 * A caller can therefore tell "failed before reaching the model" (thrown)
 * from "reached the model but something downstream was imperfect" (errorMessage).
 */

import { cloneDeep } from 'lodash-es';
import { composeModelKwargs } from './functional.js';
import { ConfigurationError, OutputProcessingError, describeError } from './errors.js';
import type { ModelClient } from './model-client.js';
import type { OutputProcessor } from './output-processors.js';
import { Parameter } from './parameter.js';
import { Prompt } from './prompt.js';
import type {
  GeneratorOutput,
  ModelKwargs,
  ModelType,
  PromptKwargs,
  ResolvedModelKwargs,
} from './types.js';
import { createLogger, logLevelFromEnv } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

/**
 * Which value wins when a trainable variable is also passed by the caller
 * in training mode.
 */
export type TrainablePrecedence = 'trained' | 'caller';

export interface GeneratorOptions<TApiKwargs, TCompletion> {
  /** Backend client. Held, not owned. */
  modelClient: ModelClient<TApiKwargs, TCompletion>;

  /** Default model kwargs; must contain `model` */
  modelKwargs: ModelKwargs;

  /** Prompt template (default: DEFAULT_SYSTEM_PROMPT) */
  template?: string;

  /** Values for template variables the caller does not pass */
  presetPromptKwargs?: PromptKwargs;

  /** Template variables exposed as trainable parameters */
  trainableParams?: string[];

  /** Transform applied to every parsed response */
  outputProcessors?: OutputProcessor;

  /** Backend call shape (default: 'chat') */
  modelType?: ModelType;

  /** Inject trainable parameter values on every call (default: false) */
  training?: boolean;

  /** Default: 'trained' */
  trainablePrecedence?: TrainablePrecedence;

  /** Fail rendering on missing template variables */
  strictPrompt?: boolean;

  logger?: Logger;
}

/**
 * Backend call arguments, or the output to return when they could not be built.
 */
type PreparedCall<TApiKwargs> =
  | { ok: true; apiKwargs: TApiKwargs }
  | { ok: false; output: GeneratorOutput };

const defaultLogger = createLogger({ level: logLevelFromEnv(), prefix: '[generator]' });

/**
 * Best-effort text form of a completion that could not be parsed.
 */
/**
 * @throws {ConfigurationError} If `model` is missing or blank
 */
function modelOf(modelKwargs: ModelKwargs): string {
  const model = modelKwargs.model;
  if (typeof model !== 'string' || model.trim() === '') {
    throw new ConfigurationError(
      `Generator requires a 'model' in modelKwargs: ${JSON.stringify(modelKwargs)}`,
    );
  }
  return model;
}

function stringifyCompletion(completion: unknown): string {
  if (typeof completion === 'string') {
    return completion;
  }
  try {
    return JSON.stringify(completion) ?? String(completion);
  } catch {
    // Circular or BigInt payloads
    return String(completion);
  }
}

/**
 * Orchestrates one model call from prompt variables to structured output.
 *
 * @example
 * ```typescript
 * const generator = new Generator({
 *   modelClient: new OpenAIClient(client),
 *   modelKwargs: { model: 'gpt-4o-mini', temperature: 0.3 },
 *   template: 'Answer using the context.\n{{ context_str }}\nQuestion: {{ input_str }}',
 *   outputProcessors: sequential(jsonParser()),
 * });
 *
 * const output = await generator.acall({
 *   context_str: 'Paris is the capital of France.',
 *   input_str: 'What is the capital of France?',
 * });
 *
 * if (output.errorMessage) {
 *   console.warn(output.errorMessage);
 * }
 * ```
 */
export class Generator<TApiKwargs = unknown, TCompletion = unknown> {
  readonly modelClient: ModelClient<TApiKwargs, TCompletion>;
  readonly modelKwargs: Readonly<ResolvedModelKwargs>;
  readonly modelType: ModelType;
  readonly prompt: Prompt;
  readonly training: boolean;
  readonly trainablePrecedence: TrainablePrecedence;
  readonly outputProcessors?: OutputProcessor;

  private readonly parameters = new Map<string, Parameter>();
  private readonly logger: Logger;

  constructor(options: GeneratorOptions<TApiKwargs, TCompletion>) {
    const model = modelOf(options.modelKwargs);

    this.modelClient = options.modelClient;
    this.modelKwargs = { ...options.modelKwargs, model };
    this.modelType = options.modelType ?? 'chat';
    this.training = options.training ?? false;
    this.trainablePrecedence = options.trainablePrecedence ?? 'trained';
    this.outputProcessors = options.outputProcessors;
    this.logger = options.logger ?? defaultLogger;
    this.prompt = new Prompt({
      template: options.template,
      presetPromptKwargs: options.presetPromptKwargs,
      strict: options.strictPrompt,
    });

    const promptVariables = this.prompt.getPromptVariables();
    for (const name of options.trainableParams ?? []) {
      if (!promptVariables.includes(name)) {
        throw new ConfigurationError(
          `Trainable parameter '${name}' not found in prompt variables: [${promptVariables.join(', ')}]`,
        );
      }
      this.parameters.set(name, new Parameter(this.prompt.presetPromptKwargs[name]));
    }
  }

  /** Trainable variable names, in declaration order */
  get trainableParams(): string[] {
    return [...this.parameters.keys()];
  }

  /**
   * The parameter backing a trainable variable. An external training
   * procedure writes `data` on it; the generator only reads.
   */
  parameter(name: string): Parameter | undefined {
    return this.parameters.get(name);
  }

  /**
   * Current value of every trainable parameter.
   */
  state(): Record<string, unknown> {
    const state: Record<string, unknown> = {};
    for (const [name, param] of this.parameters) {
      state[name] = param.data;
    }
    return state;
  }

  /**
   * Text that would be sent to the model for these variables.
   */
  renderPrompt(promptKwargs: PromptKwargs = {}): string {
    return this.prompt.call(this.resolvePromptKwargs(promptKwargs)).trim();
  }

  /**
   * Blocking call. Requires a client whose `call` answers without awaiting.
   *
   * @throws {ConfigurationError} If the client does not support blocking calls,
   * or `modelKwargs` overrides the model with an empty value
   * @throws {PromptRenderError} If the template cannot be rendered
   */
  call(promptKwargs: PromptKwargs = {}, modelKwargs: ModelKwargs = {}): GeneratorOutput {
    if (!this.modelClient.supportsBlockingCalls) {
      throw new ConfigurationError(
        `${this.modelClient.name} does not support blocking calls. Use acall() instead.`,
      );
    }

    const prepared = this.preCall(promptKwargs, modelKwargs);
    if (!prepared.ok) {
      return this.finish(prepared.output);
    }

    let completion: TCompletion;
    try {
      completion = this.modelClient.call(prepared.apiKwargs, this.modelType);
    } catch (error) {
      return this.finish(this.failedCall(error));
    }

    return this.finish(this.postCall(completion));
  }

  /**
   * Suspending call. Rate limiting and timeouts are left to the caller and
   * the client.
   *
   * @throws {ConfigurationError} If `modelKwargs` overrides the model with an empty value
   * @throws {PromptRenderError} If the template cannot be rendered
   */
  async acall(promptKwargs: PromptKwargs = {}, modelKwargs: ModelKwargs = {}): Promise<GeneratorOutput> {
    const prepared = this.preCall(promptKwargs, modelKwargs);
    if (!prepared.ok) {
      return this.finish(prepared.output);
    }

    let completion: TCompletion;
    try {
      completion = await this.modelClient.acall(prepared.apiKwargs, this.modelType);
    } catch (error) {
      return this.finish(this.failedCall(error));
    }

    return this.finish(this.postCall(completion));
  }

  /**
   * Merge trainable parameter values into the caller's variables when training.
   * Returns a new object; the caller's is never mutated.
   */
  private resolvePromptKwargs(promptKwargs: PromptKwargs): PromptKwargs {
    if (!this.training || this.parameters.size === 0) {
      return { ...promptKwargs };
    }
    const trained = this.state();
    return this.trainablePrecedence === 'trained'
      ? { ...promptKwargs, ...trained }
      : { ...trained, ...promptKwargs };
  }

  /**
   * Render the prompt, compose model kwargs and build backend call arguments.
   * Configuration and rendering errors throw; a client that cannot convert
   * the inputs yields a failed output.
   */
  private preCall(promptKwargs: PromptKwargs, modelKwargs: ModelKwargs): PreparedCall<TApiKwargs> {
    const resolvedPromptKwargs = this.resolvePromptKwargs(promptKwargs);
    const composedModelKwargs = composeModelKwargs(this.modelKwargs, modelKwargs);
    modelOf(composedModelKwargs);

    this.logger.debug('prompt kwargs', { promptKwargs: resolvedPromptKwargs });
    this.logger.debug('model kwargs', { modelKwargs: composedModelKwargs });

    const input = this.prompt.call(resolvedPromptKwargs).trim();

    try {
      return {
        ok: true,
        apiKwargs: this.modelClient.convertInputsToApiKwargs(input, composedModelKwargs, this.modelType),
      };
    } catch (error) {
      return { ok: false, output: this.failedCall(error) };
    }
  }

  private failedCall(error: unknown): GeneratorOutput {
    return {
      rawResponse: null,
      data: undefined,
      errorMessage: describeError(error),
    };
  }

  /**
   * Parse the completion and run output processors. Never throws.
   */
  private postCall(completion: TCompletion): GeneratorOutput {
    let response: unknown;
    try {
      response = this.modelClient.parseChatCompletion(completion);
    } catch (error) {
      return {
        rawResponse: stringifyCompletion(completion),
        data: undefined,
        errorMessage: describeError(error),
      };
    }

    // Processors work on a copy so they cannot mutate rawResponse.
    // cloneDeep keeps prototypes and shares function values.
    let data: unknown;
    try {
      data = cloneDeep(response);
    } catch (error) {
      this.logger.warn(`could not copy parsed response: ${describeError(error)}`);
      data = response;
    }

    if (!this.outputProcessors) {
      return { rawResponse: response, data, errorMessage: null };
    }

    try {
      return { rawResponse: response, data: this.outputProcessors(data), errorMessage: null };
    } catch (error) {
      return {
        rawResponse: response,
        data: error instanceof OutputProcessingError ? error.partial : data,
        errorMessage: describeError(error),
      };
    }
  }

  private finish(output: GeneratorOutput): GeneratorOutput {
    if (output.errorMessage) {
      this.logger.warn(`generation failed: ${output.errorMessage}`);
    }
    this.logger.info('output', { output });
    return Object.freeze(output);
  }

  toString(): string {
    const params = this.trainableParams;
    return (
      `Generator(model_client=${this.modelClient.name}, ` +
      `model_kwargs=${JSON.stringify(this.modelKwargs)}, model_type=${this.modelType}` +
      (params.length > 0 ? `, trainable_params=[${params.join(', ')}]` : '') +
      `, training=${this.training})`
    );
  }
}
