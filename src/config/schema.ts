/**
 * Configuration schema and types for promptwright.
 *
 * Used by loader.ts for type-safe config loading and by the provider
 * factory to build model clients.
 */

import type { LogLevel } from '../utils/logger.js';

/**
 * OpenAI configuration.
 */
export interface OpenAIConfig {
  /** OpenAI API key (env var: OPENAI_API_KEY) */
  apiKey?: string;

  /** Model name to use (default: gpt-4o-mini) */
  model?: string;

  /** Maximum tokens to generate */
  maxTokens?: number;

  /** Sampling temperature */
  temperature?: number;
}

/**
 * Anthropic Claude configuration.
 */
export interface AnthropicConfig {
  /** Anthropic API key (env var: ANTHROPIC_API_KEY) */
  apiKey?: string;

  /** Model name to use (default: claude-sonnet-4-5-20250929) */
  model?: string;

  /** Maximum tokens to generate (default: 4096) */
  maxTokens?: number;

  /** Sampling temperature */
  temperature?: number;
}

/**
 * Ollama configuration.
 */
export interface OllamaConfig {
  /** Ollama host URL (env var: OLLAMA_HOST, default: http://127.0.0.1:11434) */
  host?: string;

  /** Model name to use (e.g., 'llama3.3', 'qwen2.5') */
  model?: string;

  /** Sampling temperature */
  temperature?: number;
}

export type ProviderName = 'openai' | 'anthropic' | 'ollama';

export const PROVIDER_NAMES: readonly ProviderName[] = ['openai', 'anthropic', 'ollama'];

/**
 * LLM provider configuration.
 */
export interface LLMConfig {
  /** Active provider (default: 'openai') */
  provider?: ProviderName;
}

/**
 * Logging configuration.
 */
export interface LogConfig {
  /** Minimum level (env var: PROMPTWRIGHT_LOG_LEVEL, default: 'warn') */
  level?: LogLevel;
}

/**
 * promptwright configuration structure.
 *
 * Can be defined in:
 * - .promptwrightrc (JSON or YAML)
 * - .promptwrightrc.json / .promptwrightrc.yaml
 * - promptwright.config.js
 * - package.json "promptwright" property
 *
 * Environment variables take precedence over config file values.
 */
export interface PromptwrightConfig {
  llm?: LLMConfig;
  openai?: OpenAIConfig;
  anthropic?: AnthropicConfig;
  ollama?: OllamaConfig;
  log?: LogConfig;
}
