#!/usr/bin/env node
/**
 * @file src/cli.ts
 * @description Bootstraps the `policylens` CLI, which finds the Wikipedia policies, guidelines and
 *              essays cited in a talk page discussion and ties each one to the sentences citing it.
 *
 * Commands exposed by the entry point:
 *   - `init`: store OpenAI and server defaults in `.policylensrc.json`.
 *   - `analyse`: print the mentions of one discussion (or the full result as JSON).
 *   - `export`: print the mentions as TSV, CSV or JSON for a spreadsheet.
 *   - `serve`: expose the analysis over HTTP.
 *
 * @example
 *   policylens init --model gpt-4o-mini
 *   policylens analyse "https://en.wikipedia.org/wiki/Talk:Example#Sourcing" --html-out out.html
 *   policylens export "https://en.wikipedia.org/wiki/Talk:Example#Sourcing" --format csv > rows.csv
 *   policylens serve --port 5001
 */

import chalk from 'chalk';
import { Command } from 'commander';
import figlet from 'figlet';
import pkg from '../package.json';
import analyseCommand from './commands/analyse';
import exportCommand from './commands/export';
import initCommand from './commands/init';
import serveCommand from './commands/serve';

const program = new Command();
program
  .name('policylens')
  .description('Find the policies, guidelines and essays cited in Wikipedia talk page discussions')
  .version(pkg.version, '-v, --version', 'Display CLI version');

program.addCommand(initCommand);
program.addCommand(analyseCommand);
program.addCommand(exportCommand);
program.addCommand(serveCommand);

const args = process.argv.slice(2);

if (!args.length) {
  const banner = figlet.textSync('Policy Lens', { font: 'Standard' });
  console.log(chalk.hex('#9be2ff')(banner));
  program.outputHelp();
  process.exit(0);
} else {
  program.parseAsync().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red(`[error] ${message}`));
    process.exitCode = 1;
  });
}
