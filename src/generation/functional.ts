import type { ModelKwargs } from './types.js';

/**
 * Merge caller model kwargs over defaults.
 *
 * Overrides win on key collision. Neither input is mutated.
 *
 * @example
 * ```typescript
 * composeModelKwargs({ model: 'gpt-4o', temperature: 0.5 }, { model: 'gpt-4o-mini' });
 * // => { model: 'gpt-4o-mini', temperature: 0.5 }
 * ```
 */
export function composeModelKwargs(defaults: ModelKwargs, overrides: ModelKwargs = {}): ModelKwargs {
  return { ...defaults, ...overrides };
}
