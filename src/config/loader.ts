/**
 * Configuration loader with three-tier fallback.
 *
 * Priority order:
 * 1. Environment variables (highest priority)
 * 2. Config file (.promptwrightrc, promptwright.config.js, package.json)
 * 3. Defaults (lowest priority)
 */

import { cosmiconfig } from 'cosmiconfig';
import { PROVIDER_NAMES } from './schema.js';
import type { PromptwrightConfig, ProviderName } from './schema.js';
import { createLogger, isLogLevel } from '../utils/logger.js';

const logger = createLogger({ level: 'warn', prefix: '[config]' });

/**
 * Default configuration values.
 */
export const DEFAULTS = {
  llm: {
    provider: 'openai',
  },
  openai: {
    model: 'gpt-4o-mini',
  },
  anthropic: {
    model: 'claude-sonnet-4-5-20250929',
    maxTokens: 4096,
  },
  ollama: {
    host: 'http://127.0.0.1:11434',
    model: 'llama3.3',
  },
  log: {
    level: 'warn',
  },
} as const;

function isProviderName(value: unknown): value is ProviderName {
  return typeof value === 'string' && (PROVIDER_NAMES as readonly string[]).includes(value);
}

/**
 * Loads promptwright configuration with three-tier fallback.
 *
 * Edge cases:
 * - No .env file: Continue (not required)
 * - No config file: Use defaults + env vars
 * - Invalid config file: Log warning, use defaults + env vars
 * - Missing API keys: Return undefined (provider factory degrades to null)
 *
 * @param searchFrom - Directory to start the config file search from (default: cwd)
 */
export async function loadConfig(searchFrom?: string): Promise<PromptwrightConfig> {
  // Tier 1: Load .env file (Node 20.6+ native support)
  try {
    if (typeof process.loadEnvFile === 'function') {
      process.loadEnvFile();
    }
  } catch {
    // No .env file - env vars may come from the shell or the config file
  }

  // Tier 2: Load config file via cosmiconfig
  let fileConfig: PromptwrightConfig | undefined;
  try {
    const explorer = cosmiconfig('promptwright');
    const result = await explorer.search(searchFrom);

    if (result && !result.isEmpty) {
      fileConfig = result.config as PromptwrightConfig;
    }
  } catch (error) {
    logger.warn(
      `Failed to load config file: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const envLogLevel = process.env.PROMPTWRIGHT_LOG_LEVEL?.toLowerCase();
  const fileLogLevel = fileConfig?.log?.level;
  const fileProvider = fileConfig?.llm?.provider;
  if (fileProvider !== undefined && !isProviderName(fileProvider)) {
    logger.warn(`Unknown provider '${String(fileProvider)}' in config file, using default`);
  }

  // Tier 3: Merge with priority (env var > config file > defaults)
  return {
    llm: {
      provider: isProviderName(fileProvider) ? fileProvider : DEFAULTS.llm.provider,
    },
    openai: {
      apiKey: process.env.OPENAI_API_KEY || fileConfig?.openai?.apiKey,
      model: fileConfig?.openai?.model || DEFAULTS.openai.model,
      maxTokens: fileConfig?.openai?.maxTokens,
      temperature: fileConfig?.openai?.temperature,
    },
    anthropic: {
      apiKey: process.env.ANTHROPIC_API_KEY || fileConfig?.anthropic?.apiKey,
      model: fileConfig?.anthropic?.model || DEFAULTS.anthropic.model,
      maxTokens: fileConfig?.anthropic?.maxTokens || DEFAULTS.anthropic.maxTokens,
      temperature: fileConfig?.anthropic?.temperature,
    },
    ollama: {
      host: process.env.OLLAMA_HOST || fileConfig?.ollama?.host || DEFAULTS.ollama.host,
      model: fileConfig?.ollama?.model || DEFAULTS.ollama.model,
      temperature: fileConfig?.ollama?.temperature,
    },
    log: {
      level: isLogLevel(envLogLevel)
        ? envLogLevel
        : isLogLevel(fileLogLevel)
          ? fileLogLevel
          : DEFAULTS.log.level,
    },
  };
}
