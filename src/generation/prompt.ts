/**
 * Prompt template rendering.
 *
 * Templates use Liquid syntax and are rendered with liquidjs:
 * - `{{ context_str }}` outputs a variable
 * - `{% if context_str %}...{% endif %}` emits a section only when the variable is set
 *
 * Truthiness follows JavaScript, so an empty string skips its section.
 * Missing variables render as empty text unless the prompt is strict.
 */

import { Liquid } from 'liquidjs';
import type { Template } from 'liquidjs';
import { ConfigurationError, PromptRenderError, describeError } from './errors.js';
import type { PromptKwargs } from './types.js';
import { DEFAULT_SYSTEM_PROMPT } from './default-prompt-template.js';

export interface PromptOptions {
  /** Template text (default: DEFAULT_SYSTEM_PROMPT) */
  template?: string;

  /** Values used for variables the caller does not pass */
  presetPromptKwargs?: PromptKwargs;

  /** Fail rendering when an output variable is missing */
  strict?: boolean;
}

/**
 * A parsed prompt template plus its preset variable values.
 *
 * @example
 * ```typescript
 * const prompt = new Prompt({
 *   template: 'Context: {{ context_str }}\nQuestion: {{ input_str }}',
 *   presetPromptKwargs: { context_str: 'Paris is the capital of France.' },
 * });
 *
 * prompt.getPromptVariables(); // ['context_str', 'input_str']
 * prompt.call({ input_str: 'What is the capital of France?' });
 * ```
 */
export class Prompt {
  readonly template: string;
  readonly presetPromptKwargs: Readonly<PromptKwargs>;

  private readonly engine: Liquid;
  private readonly parsed: Template[];
  private readonly variables: string[];

  constructor(options: PromptOptions = {}) {
    this.template = options.template ?? DEFAULT_SYSTEM_PROMPT;
    this.presetPromptKwargs = { ...options.presetPromptKwargs };
    this.engine = new Liquid({
      jsTruthy: true,
      strictVariables: options.strict ?? false,
      lenientIf: true,
    });

    try {
      this.parsed = this.engine.parse(this.template);
      this.variables = [...new Set(this.engine.globalVariablesSync(this.parsed))];
    } catch (error) {
      throw new ConfigurationError(`Invalid prompt template: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Names of the variables the template reads without defining them itself,
   * in order of first appearance.
   */
  getPromptVariables(): string[] {
    return [...this.variables];
  }

  /**
   * Render the template. Caller values win over preset values.
   *
   * @throws {PromptRenderError} If rendering fails (missing variable in strict mode, filter errors)
   */
  call(promptKwargs: PromptKwargs = {}): string {
    const scope = { ...this.presetPromptKwargs, ...promptKwargs };
    try {
      return String(this.engine.renderSync(this.parsed, scope));
    } catch (error) {
      throw new PromptRenderError(`Failed to render prompt: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  toString(): string {
    const preview = this.template.length > 60 ? `${this.template.slice(0, 57)}...` : this.template;
    return `Prompt(template=${JSON.stringify(preview)}, variables=[${this.variables.join(', ')}])`;
  }
}
