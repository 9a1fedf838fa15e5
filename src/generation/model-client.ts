/**
 * Model client contract consumed by the generator.
 *
 * A client turns rendered prompt text plus model kwargs into backend call
 * arguments, performs the call, and parses the raw completion.
 */

import { ModelClientError } from './errors.js';
import type { ModelKwargs, ModelType } from './types.js';

/**
 * Capability set the generator depends on.
 *
 * `TApiKwargs` is the backend request shape, `TCompletion` the raw response.
 */
export interface ModelClient<TApiKwargs = unknown, TCompletion = unknown> {
  /** Client name for logging and introspection */
  readonly name: string;

  /** Whether `call` can return a completion without awaiting */
  readonly supportsBlockingCalls: boolean;

  convertInputsToApiKwargs(input: string, modelKwargs: ModelKwargs, modelType: ModelType): TApiKwargs;

  call(apiKwargs: TApiKwargs, modelType: ModelType): TCompletion;

  acall(apiKwargs: TApiKwargs, modelType: ModelType): Promise<TCompletion>;

  /**
   * @throws If the completion is malformed
   */
  parseChatCompletion(completion: TCompletion): unknown;
}

/**
 * Base class for clients.
 *
 * Subclasses that only talk to a network backend override `acall`; clients
 * that can answer in-process override `call` and set `supportsBlockingCalls`.
 */
export abstract class BaseModelClient<TApiKwargs = unknown, TCompletion = unknown>
  implements ModelClient<TApiKwargs, TCompletion>
{
  abstract readonly name: string;

  readonly supportsBlockingCalls: boolean = false;

  abstract convertInputsToApiKwargs(
    input: string,
    modelKwargs: ModelKwargs,
    modelType: ModelType,
  ): TApiKwargs;

  abstract parseChatCompletion(completion: TCompletion): unknown;

  call(_apiKwargs: TApiKwargs, _modelType: ModelType): TCompletion {
    throw new ModelClientError(`${this.name} does not support blocking calls. Use acall() instead.`);
  }

  async acall(apiKwargs: TApiKwargs, modelType: ModelType): Promise<TCompletion> {
    return this.call(apiKwargs, modelType);
  }

  toString(): string {
    return `${this.name}()`;
  }
}

/**
 * Read the `model` entry from composed kwargs.
 *
 * @throws {ModelClientError} If no model identifier is present
 */
export function requireModel(modelKwargs: ModelKwargs): string {
  const model = modelKwargs.model;
  if (typeof model !== 'string' || model.trim() === '') {
    throw new ModelClientError(
      `A 'model' entry is required in model kwargs: ${JSON.stringify(modelKwargs)}`,
    );
  }
  return model;
}
