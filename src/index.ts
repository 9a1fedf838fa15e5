export { Generator } from './generation/generator.js';
export type { GeneratorOptions, TrainablePrecedence } from './generation/generator.js';
export { Parameter } from './generation/parameter.js';
export { Prompt } from './generation/prompt.js';
export type { PromptOptions } from './generation/prompt.js';
export { DEFAULT_SYSTEM_PROMPT } from './generation/default-prompt-template.js';
export { composeModelKwargs } from './generation/functional.js';
export { BaseModelClient, requireModel } from './generation/model-client.js';
export type { ModelClient } from './generation/model-client.js';
export {
  sequential,
  trimText,
  jsonParser,
  listParser,
  extractJsonString,
} from './generation/output-processors.js';
export type { OutputProcessor } from './generation/output-processors.js';
export {
  ConfigurationError,
  PromptRenderError,
  ModelClientError,
  OutputProcessingError,
  describeError,
} from './generation/errors.js';
export type {
  GeneratorOutput,
  ModelKwargs,
  ModelType,
  PromptKwargs,
  ResolvedModelKwargs,
} from './generation/types.js';
export { OpenAIClient, initOpenAIClient, isReasoningModel } from './generation/openai.js';
export { AnthropicClient, initAnthropicClient } from './generation/anthropic.js';
export { OllamaClient, initOllamaClient } from './generation/ollama.js';
export { initModelClient } from './generation/provider-factory.js';
export type { Provider } from './generation/provider-factory.js';
export { loadConfig } from './config/loader.js';
export type { PromptwrightConfig } from './config/schema.js';
export { createLogger } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
