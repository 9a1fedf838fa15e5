/**
 * Run command: render a template file and send it through a Generator.
 *
 * Pipeline flow:
 * 1. Load configuration (provider, API keys, model defaults)
 * 2. Read the template and collect prompt variables (--vars-file, then --var)
 * 3. Build the Generator (JSON output parsing with --json)
 * 4. Dry-run: print the rendered prompt and exit
 * 5. Call the model and print the result (exit 1 when errorMessage is set)
 */

import { readFile } from 'node:fs/promises';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { loadConfig } from '../../config/loader.js';
import { PROVIDER_NAMES } from '../../config/schema.js';
import type { ProviderName } from '../../config/schema.js';
import { Generator } from '../../generation/generator.js';
import { jsonParser, sequential, trimText } from '../../generation/output-processors.js';
import { initModelClient } from '../../generation/provider-factory.js';
import type { ModelKwargs, PromptKwargs } from '../../generation/types.js';
import { createLogger } from '../../utils/logger.js';

interface RunOptions {
  var: PromptKwargs;
  varsFile?: string;
  provider?: ProviderName;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  completion?: boolean;
  json?: boolean;
  dryRun?: boolean;
}

/**
 * Parse a `key=value` assignment and add it to the accumulated variables.
 * Commander calls this once per --var occurrence.
 */
export function collectVar(assignment: string, previous: PromptKwargs = {}): PromptKwargs {
  const separator = assignment.indexOf('=');
  if (separator <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got "${assignment}"`);
  }
  const key = assignment.slice(0, separator).trim();
  if (!key) {
    throw new InvalidArgumentError(`Expected key=value, got "${assignment}"`);
  }
  return { ...previous, [key]: assignment.slice(separator + 1) };
}

export function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new InvalidArgumentError(`Expected a number, got "${value}"`);
  }
  return parsed;
}

function parseProvider(value: string): ProviderName {
  const match = PROVIDER_NAMES.find((name) => name === value);
  if (!match) {
    throw new InvalidArgumentError(`Expected one of: ${PROVIDER_NAMES.join(', ')}`);
  }
  return match;
}

/**
 * Read prompt variables from a JSON file holding an object.
 */
export async function loadVarsFile(path: string): Promise<PromptKwargs> {
  const parsed: unknown = JSON.parse(await readFile(path, 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`${path} must contain a JSON object of prompt variables`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function formatData(data: unknown): string {
  return typeof data === 'string' ? data : JSON.stringify(data, null, 2);
}

export const runCommand = new Command('run')
  .description('Render a prompt template and generate a response')
  .argument('<template-file>', 'Path to a Liquid prompt template')
  .option('--var <key=value>', 'Prompt variable (repeatable)', collectVar, {})
  .option('--vars-file <path>', 'JSON file with prompt variables')
  .option('--provider <name>', 'Override the configured provider', parseProvider)
  .option('--model <name>', 'Override the configured model')
  .option('--temperature <number>', 'Sampling temperature', parseNumberOption)
  .option('--max-tokens <number>', 'Maximum tokens to generate', parseNumberOption)
  .option('--completion', 'Send the prompt as a raw completion instead of a chat message')
  .option('--json', 'Parse the response as JSON')
  .option('--dry-run', 'Print the rendered prompt without calling the model')
  .addHelpText(
    'after',
    `

Examples:
  # Fill variables inline
  $ promptwright run answer.liquid --var context_str="Paris is the capital of France." --var input_str="Capital?"

  # Variables from a file, JSON output
  $ promptwright run extract.liquid --vars-file vars.json --json

  # Preview the prompt
  $ promptwright run answer.liquid --var input_str="Hello" --dry-run

Notes:
  - --var values override --vars-file values
  - Configure providers with 'promptwright config' or environment variables
`,
  )
  .action(async (templateFile: string, options: RunOptions) => {
    try {
      const config = await loadConfig();
      if (options.provider) {
        config.llm = { ...config.llm, provider: options.provider };
      }

      const template = await readFile(templateFile, 'utf-8');
      const fileVars = options.varsFile ? await loadVarsFile(options.varsFile) : {};
      const promptKwargs: PromptKwargs = { ...fileVars, ...options.var };

      const provider = initModelClient(config);
      if (!provider) {
        console.error(chalk.red('✗ Provider unavailable:'));
        console.error(`  Missing API key for ${config.llm?.provider ?? 'openai'}`);
        console.error('  Run `promptwright config` to configure or set environment variable');
        process.exit(1);
      }

      const overrides: ModelKwargs = {};
      if (options.model) overrides.model = options.model;
      if (options.temperature !== undefined) overrides.temperature = options.temperature;
      if (options.maxTokens !== undefined) overrides.maxTokens = options.maxTokens;

      const generator = new Generator<unknown, unknown>({
        modelClient: provider.client,
        modelKwargs: provider.modelKwargs,
        template,
        modelType: options.completion ? 'completion' : 'chat',
        outputProcessors: options.json ? sequential(trimText(), jsonParser()) : undefined,
        logger: createLogger({ level: config.log?.level, prefix: '[generator]' }),
      });

      if (options.dryRun) {
        console.log(chalk.yellow('⚠️  DRY-RUN MODE - No API call will be made\n'));
        console.log(chalk.bold('Prompt that would be sent:'));
        console.log('─'.repeat(80));
        console.log(generator.renderPrompt(promptKwargs));
        console.log('─'.repeat(80));
        console.log(`\nProvider: ${provider.name}`);
        console.log(`Model: ${options.model ?? provider.modelKwargs.model}`);
        return;
      }

      const modelName = options.model ?? provider.modelKwargs.model;
      const spinner = ora(`Generating with ${provider.name} ${modelName}...`).start();
      const output = await generator.acall(promptKwargs, overrides);
      spinner.stop();

      if (output.data !== undefined) {
        console.log(formatData(output.data));
      }

      if (output.errorMessage) {
        console.error(chalk.yellow(`\n⚠️  ${output.errorMessage}`));
        if (output.data === undefined && output.rawResponse !== null) {
          console.error(chalk.dim(formatData(output.rawResponse)));
        }
        process.exit(1);
      }
    } catch (error) {
      console.error(chalk.red('\n❌ Error:'), error instanceof Error ? error.message : 'Unknown error');
      process.exit(1);
    }
  });
