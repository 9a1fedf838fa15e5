/**
 * Output processors applied to parsed model responses.
 *
 * A processor is a plain function. `sequential` composes several of them
 * and reports the last good value when a stage fails, so the generator can
 * return a partial result.
 */

import { OutputProcessingError, describeError } from './errors.js';

export type OutputProcessor<TIn = unknown, TOut = unknown> = (value: TIn) => TOut;

/**
 * Compose processors left to right.
 *
 * @throws {OutputProcessingError} When a stage throws; `partial` holds the
 *   value produced by the previous stage and `stage` the failed index
 *
 * @example
 * ```typescript
 * const pipeline = sequential(trimText(), jsonParser());
 * pipeline('  {"answer": "Paris"}  '); // { answer: 'Paris' }
 * ```
 */
export function sequential(...processors: OutputProcessor[]): OutputProcessor {
  return (value: unknown) => {
    let current = value;
    for (let stage = 0; stage < processors.length; stage++) {
      try {
        current = processors[stage](current);
      } catch (error) {
        throw new OutputProcessingError(
          `Output processor ${stage + 1}/${processors.length} failed: ${describeError(error)}`,
          current,
          stage,
          { cause: error },
        );
      }
    }
    return current;
  };
}

/**
 * Trim surrounding whitespace from string output. Non-strings pass through.
 */
export function trimText(): OutputProcessor {
  return (value) => (typeof value === 'string' ? value.trim() : value);
}

// ```json ... ``` or ``` ... ```
const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * Locate the JSON payload in model text.
 *
 * Prefers a fenced code block, then the span from the first opening
 * bracket to the last matching closing bracket.
 */
export function extractJsonString(text: string): string {
  const fenced = FENCED_BLOCK.exec(text);
  const body = fenced ? fenced[1].trim() : text.trim();

  const objectStart = body.indexOf('{');
  const arrayStart = body.indexOf('[');
  if (objectStart === -1 && arrayStart === -1) {
    throw new Error('No JSON object or array found in output');
  }

  const isArray = arrayStart !== -1 && (objectStart === -1 || arrayStart < objectStart);
  const start = isArray ? arrayStart : objectStart;
  const end = body.lastIndexOf(isArray ? ']' : '}');
  if (end < start) {
    throw new Error('Unterminated JSON in output');
  }
  return body.slice(start, end + 1);
}

/**
 * Parse the first JSON object or array in string output.
 */
export function jsonParser(): OutputProcessor {
  return (value) => {
    if (typeof value !== 'string') {
      throw new Error(`Expected string output, got ${typeof value}`);
    }
    return JSON.parse(extractJsonString(value));
  };
}

/**
 * Parse a JSON array from string output.
 */
export function listParser(): OutputProcessor<unknown, unknown[]> {
  const parse = jsonParser();
  return (value) => {
    const parsed = parse(value);
    if (!Array.isArray(parsed)) {
      throw new Error('Expected a JSON array in output');
    }
    return parsed;
  };
}
