/**
 * @file src/commands/init.ts
 * @description Writes defaults for the model and the server to `.policylensrc.json`.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import {
  CONFIG_PATH,
  parsePort,
  readConfig,
  writeConfig,
  type PolicyLensConfig,
} from '../shared/config';
import { OPENAI_DEFAULT_MODEL } from '../shared/analyzer-config';

type InitOptions = {
  apiKey?: string;
  model?: string;
  endpoint?: string;
  port?: number;
  strict?: boolean;
};

const normalize = (value?: string | null) =>
  value && value.trim().length ? value.trim() : undefined;

const initCommand = new Command('init')
  .description('Store OpenAI and server defaults in .policylensrc.json')
  .option('--api-key <key>', 'OpenAI API key')
  .option('--model <model>', `OpenAI model identifier (default: ${OPENAI_DEFAULT_MODEL})`)
  .option('--endpoint <url>', 'OpenAI-compatible API base URL')
  .option('--port <number>', 'Default port for `serve`', (value: string) => parsePort(value))
  .option('--strict', 'Throw on invalid highlight ranges instead of clamping them')
  .action((options: InitOptions) => {
    try {
      const existing = readConfig();
      const update: Partial<PolicyLensConfig> = {
        openaiApiKey: normalize(options.apiKey) ?? existing.openaiApiKey,
        openaiModel: normalize(options.model) ?? existing.openaiModel ?? OPENAI_DEFAULT_MODEL,
        openaiEndpoint: normalize(options.endpoint) ?? existing.openaiEndpoint,
        port: options.port ?? existing.port,
        strict: options.strict ?? existing.strict,
      };
      writeConfig(update);
      console.log(chalk.green(`Saved configuration to ${CONFIG_PATH}`));
      if (!update.openaiApiKey) {
        console.log(
          chalk.yellow('No OpenAI API key stored; analysis will use pattern matching.'),
        );
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(`[error] ${message}`));
      process.exitCode = 1;
    }
  });

export default initCommand;
