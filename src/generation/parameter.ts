/**
 * Named, mutable value holder for a trainable prompt variable.
 *
 * The generator creates one per trainable variable and only reads `data`.
 * An external training procedure writes it between calls.
 */
export class Parameter<T = unknown> {
  data: T | undefined;

  constructor(data?: T) {
    this.data = data;
  }

  toString(): string {
    return `Parameter(data=${JSON.stringify(this.data) ?? 'undefined'})`;
  }
}
