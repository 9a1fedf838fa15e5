import { Command } from 'commander';
import { runCommand } from './commands/run.js';
import { configCommand } from './commands/config.js';

export const program = new Command()
  .name('promptwright')
  .description('Render prompt templates and run them against LLM providers')
  .version('0.1.0');

program.addCommand(runCommand);
program.addCommand(configCommand);
