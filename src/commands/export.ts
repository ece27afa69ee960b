/**
 * @file src/commands/export.ts
 * @description Analyzes a discussion and prints its mentions as TSV, CSV or JSON for pasting into a
 *              spreadsheet. Progress goes to stderr so stdout can be redirected.
 */

import { Command } from 'commander';
import fs from 'node:fs';
import ora from 'ora';
import { buildExportRows, formatForSheets, parseExportFormat } from '../lib/sheet-exporter';
import { resolveAnalyzerConfig } from '../shared/config';
import { createStderrLogger } from '../shared/logger';
import { resolveExtractor, runAnalyzeWorkflow } from '../workflows/analyze-workflow';

interface ExportCliOptions {
  format: string;
  output?: string;
  apiKey?: string;
  model?: string;
}

const runExport = async (url: string, options: ExportCliOptions): Promise<void> => {
  const logger = createStderrLogger();
  const spinner = ora({ text: '[export] analyzing discussion', stream: process.stderr }).start();
  try {
    const format = parseExportFormat(options.format);
    const config = resolveAnalyzerConfig({ apiKey: options.apiKey, model: options.model });
    const result = await runAnalyzeWorkflow({
      url,
      extractor: resolveExtractor(config, logger),
      annotate: { strict: config.strict },
      logger,
    });
    const rows = buildExportRows(result.grounding, result.sentenceSpans);
    const output = formatForSheets(rows, format);

    if (options.output) {
      fs.writeFileSync(options.output, output, 'utf8');
      spinner.succeed(`[export] ${rows.length} row(s) written to ${options.output}`);
    } else {
      spinner.succeed(`[export] ${rows.length} row(s)`);
      process.stdout.write(output.endsWith('\n') ? output : `${output}\n`);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    spinner.fail(`[export] ${message}`);
    process.exitCode = 1;
  }
};

const exportCommand = new Command('export')
  .description('Export the mentions of a talk page discussion for a spreadsheet')
  .argument('<url>', 'Talk page URL')
  .option('-f, --format <format>', 'Output format: tsv, csv or json', 'tsv')
  .option('-o, --output <file>', 'Write to a file instead of stdout')
  .option('--api-key <key>', 'OpenAI API key (falls back to OPENAI_API_KEY)')
  .option('--model <model>', 'OpenAI model identifier (falls back to OPENAI_MODEL)')
  .action(async (url: string, options: ExportCliOptions) => {
    await runExport(url, options);
  });

export default exportCommand;
