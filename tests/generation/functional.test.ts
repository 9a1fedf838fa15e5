import { describe, it, expect } from 'vitest';
import { composeModelKwargs } from '../../src/generation/functional.js';

describe('composeModelKwargs', () => {
  it('returns the defaults for empty overrides', () => {
    const defaults = { model: 'gpt-4o-mini', temperature: 0.3 };

    expect(composeModelKwargs(defaults, {})).toEqual(defaults);
    expect(composeModelKwargs(defaults)).toEqual(defaults);
  });

  it('lets overrides win on collision', () => {
    expect(composeModelKwargs({ model: 'a' }, { model: 'b' }).model).toBe('b');
  });

  it('adds keys that only the overrides carry', () => {
    expect(composeModelKwargs({ model: 'a', temperature: 0 }, { maxTokens: 256, seed: 7 })).toEqual({
      model: 'a',
      temperature: 0,
      maxTokens: 256,
      seed: 7,
    });
  });

  it('does not mutate its inputs', () => {
    const defaults = { model: 'a', stop: ['\n'] };
    const overrides = { model: 'b' };

    const merged = composeModelKwargs(defaults, overrides);

    expect(merged).not.toBe(defaults);
    expect(defaults).toEqual({ model: 'a', stop: ['\n'] });
    expect(overrides).toEqual({ model: 'b' });
  });
});
