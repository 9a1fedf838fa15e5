/**
 * Unit tests for configuration loader.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULTS, loadConfig } from '../../src/config/loader.js';

describe('loadConfig', () => {
  // Store original env vars to restore after tests
  const originalEnv = { ...process.env };

  beforeEach(() => {
    // Clear config-related env vars before each test
    delete process.env.OPENAI_API_KEY;
    delete process.env.ANTHROPIC_API_KEY;
    delete process.env.OLLAMA_HOST;
    delete process.env.PROMPTWRIGHT_LOG_LEVEL;
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it('returns defaults when no env vars or config file', async () => {
    const config = await loadConfig();

    expect(config.llm?.provider).toBe('openai');
    expect(config.openai?.apiKey).toBeUndefined();
    expect(config.openai?.model).toBe('gpt-4o-mini');
    expect(config.anthropic?.model).toBe('claude-sonnet-4-5-20250929');
    expect(config.anthropic?.maxTokens).toBe(4096);
    expect(config.ollama?.host).toBe(DEFAULTS.ollama.host);
    expect(config.log?.level).toBe('warn');
  });

  it('uses API keys from env vars', async () => {
    process.env.OPENAI_API_KEY = 'test-openai-key';
    process.env.ANTHROPIC_API_KEY = 'test-anthropic-key';

    const config = await loadConfig();

    expect(config.openai?.apiKey).toBe('test-openai-key');
    expect(config.anthropic?.apiKey).toBe('test-anthropic-key');
  });

  it('uses OLLAMA_HOST when set', async () => {
    process.env.OLLAMA_HOST = 'http://ollama.internal:11434';

    const config = await loadConfig();

    expect(config.ollama?.host).toBe('http://ollama.internal:11434');
  });

  it('reads the log level from PROMPTWRIGHT_LOG_LEVEL', async () => {
    process.env.PROMPTWRIGHT_LOG_LEVEL = 'DEBUG';

    const config = await loadConfig();

    expect(config.log?.level).toBe('debug');
  });

  it('ignores an unknown log level', async () => {
    process.env.PROMPTWRIGHT_LOG_LEVEL = 'verbose';

    const config = await loadConfig();

    expect(config.log?.level).toBe('warn');
  });

  describe('config file', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'promptwright-config-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('reads values from .promptwrightrc.json', async () => {
      writeFileSync(
        join(dir, '.promptwrightrc.json'),
        JSON.stringify({
          llm: { provider: 'anthropic' },
          anthropic: { apiKey: 'file-key', model: 'claude-haiku', temperature: 0.4 },
          log: { level: 'info' },
        }),
      );

      const config = await loadConfig(dir);

      expect(config.llm?.provider).toBe('anthropic');
      expect(config.anthropic).toEqual({
        apiKey: 'file-key',
        model: 'claude-haiku',
        maxTokens: 4096,
        temperature: 0.4,
      });
      expect(config.log?.level).toBe('info');
    });

    it('lets env vars win over the file', async () => {
      writeFileSync(
        join(dir, '.promptwrightrc.json'),
        JSON.stringify({ openai: { apiKey: 'file-key' }, log: { level: 'info' } }),
      );
      process.env.OPENAI_API_KEY = 'env-key';
      process.env.PROMPTWRIGHT_LOG_LEVEL = 'error';

      const config = await loadConfig(dir);

      expect(config.openai?.apiKey).toBe('env-key');
      expect(config.log?.level).toBe('error');
    });

    it('falls back to the default provider for unknown names', async () => {
      writeFileSync(join(dir, '.promptwrightrc.json'), JSON.stringify({ llm: { provider: 'mystery' } }));

      const config = await loadConfig(dir);

      expect(config.llm?.provider).toBe('openai');
    });

    it('keeps defaults when the file does not parse', async () => {
      writeFileSync(join(dir, '.promptwrightrc.json'), '{ not json');

      const config = await loadConfig(dir);

      expect(config.openai?.model).toBe('gpt-4o-mini');
    });
  });
});
