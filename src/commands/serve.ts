/**
 * @file src/commands/serve.ts
 * @description Starts the HTTP server that exposes `POST /analyze`.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { startServer } from '../server';
import { parsePort, resolveAnalyzerConfig } from '../shared/config';
import { resolveExtractor, runAnalyzeWorkflow } from '../workflows/analyze-workflow';

interface ServeCliOptions {
  port?: number;
  host: string;
}

const serveCommand = new Command('serve')
  .description('Serve the analyzer over HTTP')
  .option('-p, --port <number>', 'Port to listen on (default: PORT or 5001)', (value: string) =>
    parsePort(value),
  )
  .option('--host <host>', 'Interface to bind', '127.0.0.1')
  .action(async (options: ServeCliOptions) => {
    try {
      const config = resolveAnalyzerConfig({ port: options.port });
      const logger = console;
      const extractor = resolveExtractor(config, logger);
      await startServer(
        {
          runAnalysis: (url) =>
            runAnalyzeWorkflow({ url, extractor, annotate: { strict: config.strict }, logger }),
          logger,
        },
        config.port,
        options.host,
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(`[serve] ${message}`));
      process.exitCode = 1;
    }
  });

export default serveCommand;
