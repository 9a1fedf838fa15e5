import { describe, it, expect } from 'vitest';
import { Prompt } from '../../src/generation/prompt.js';
import { DEFAULT_SYSTEM_PROMPT } from '../../src/generation/default-prompt-template.js';
import { ConfigurationError, PromptRenderError } from '../../src/generation/errors.js';

describe('Prompt.getPromptVariables', () => {
  it('lists output and condition variables', () => {
    const prompt = new Prompt({
      template: 'Hello {{ name }}. {% if topic %}Topic: {{ topic }}{% endif %}',
    });

    expect([...prompt.getPromptVariables()].sort()).toEqual(['name', 'topic']);
  });

  it('reports root names for property access', () => {
    const prompt = new Prompt({ template: '{{ user.name }} ({{ user.email }})' });

    expect(prompt.getPromptVariables()).toEqual(['user']);
  });

  it('excludes variables the template defines itself', () => {
    const prompt = new Prompt({
      template: '{% for item in items %}{{ item }}{% endfor %}{% assign greeting = "hi" %}{{ greeting }}',
    });

    expect(prompt.getPromptVariables()).toEqual(['items']);
  });

  it('lists every section variable of the default template', () => {
    const prompt = new Prompt();

    expect(prompt.template).toBe(DEFAULT_SYSTEM_PROMPT);
    expect([...prompt.getPromptVariables()].sort()).toEqual([
      'chat_history_str',
      'context_str',
      'example_str',
      'input_str',
      'steps_str',
      'task_desc_str',
      'tools_str',
    ]);
  });

  it('returns a copy', () => {
    const prompt = new Prompt({ template: '{{ a }}' });
    prompt.getPromptVariables().push('b');

    expect(prompt.getPromptVariables()).toEqual(['a']);
  });
});

describe('Prompt.call', () => {
  it('renders caller values over preset values', () => {
    const prompt = new Prompt({
      template: '{{ greeting }}, {{ name }}!',
      presetPromptKwargs: { greeting: 'Hello', name: 'preset' },
    });

    expect(prompt.call({ name: 'caller' })).toBe('Hello, caller!');
    expect(prompt.call()).toBe('Hello, preset!');
  });

  it('renders missing variables as empty text', () => {
    const prompt = new Prompt({ template: 'A{{ missing }}B' });

    expect(prompt.call()).toBe('AB');
  });

  it('skips sections for empty strings', () => {
    const prompt = new Prompt({ template: '{% if context_str %}Context: {{ context_str }}{% endif %}' });

    expect(prompt.call({ context_str: '' })).toBe('');
    expect(prompt.call({ context_str: 'X' })).toBe('Context: X');
  });

  it('throws PromptRenderError for missing variables in strict mode', () => {
    const prompt = new Prompt({ template: 'A{{ missing }}B', strict: true });

    expect(() => prompt.call()).toThrow(PromptRenderError);
  });

  it('allows conditions on missing variables in strict mode', () => {
    const prompt = new Prompt({ template: '{% if missing %}yes{% endif %}done', strict: true });

    expect(prompt.call()).toBe('done');
  });

  it('does not mutate preset values', () => {
    const preset = { name: 'preset' };
    const prompt = new Prompt({ template: '{{ name }}', presetPromptKwargs: preset });

    prompt.call({ name: 'caller' });

    expect(preset).toEqual({ name: 'preset' });
    expect(prompt.presetPromptKwargs).toEqual({ name: 'preset' });
  });

  it('renders the default template with only the sections that are set', () => {
    const prompt = new Prompt();

    expect(prompt.call({ task_desc_str: 'Be brief.', input_str: 'Hi' }).trim()).toBe(
      '<instructions>\nBe brief.\n</instructions>\n\n<question>\nHi\n</question>',
    );
    expect(prompt.call().trim()).toBe(
      '<instructions>\nYou are a helpful assistant.\n</instructions>',
    );
  });
});

describe('Prompt construction', () => {
  it('rejects templates that do not parse', () => {
    expect(() => new Prompt({ template: '{% if open %}never closed' })).toThrow(ConfigurationError);
  });

  it('describes itself', () => {
    const prompt = new Prompt({ template: 'Q: {{ input_str }}' });

    expect(prompt.toString()).toBe('Prompt(template="Q: {{ input_str }}", variables=[input_str])');
  });
});
