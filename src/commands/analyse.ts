/**
 * @file src/commands/analyse.ts
 * @description Analyzes one talk page discussion and prints the policies, guidelines and essays it
 *              cites, optionally writing the annotated discussion HTML.
 */

import chalk from 'chalk';
import { Command } from 'commander';
import fs from 'node:fs';
import ora from 'ora';
import { createPatternExtractor } from '../lib/pattern-extractor';
import { resolveAnalyzerConfig } from '../shared/config';
import { createQuietLogger, createStderrLogger } from '../shared/logger';
import { CATEGORY_KEYS, MENTION_CATEGORIES, type CategoryOutcome } from '../shared/types';
import {
  resolveExtractor,
  runAnalyzeWorkflow,
  type AnalyzeResult,
  type AnalyzeStage,
} from '../workflows/analyze-workflow';

interface AnalyseCliOptions {
  json?: boolean;
  htmlOut?: string;
  apiKey?: string;
  model?: string;
  pattern?: boolean;
  verbose?: boolean;
}

const STAGE_LABELS: Record<AnalyzeStage, string> = {
  fetch: 'fetching discussion',
  extract: 'extracting mentions',
  annotate: 'grounding and annotating',
};

const describeOutcome = (outcome: CategoryOutcome): string => {
  const title = CATEGORY_KEYS[outcome.category];
  const heading = chalk.bold(`${title[0].toUpperCase()}${title.slice(1)}`);
  if (outcome.status !== 'found') {
    return `${heading}: ${chalk.gray(outcome.message ?? '')}`;
  }
  const items = outcome.mentions.map((mention) => {
    const sentences = mention.sentenceIds.length
      ? chalk.gray(` (sentences ${mention.sentenceIds.join(', ')})`)
      : '';
    return `  ${chalk.cyan(mention.shortcut)}${mention.name ? ` ${mention.name}` : ''}${sentences}`;
  });
  return [`${heading}:`, ...items].join('\n');
};

const printSummary = (result: AnalyzeResult): void => {
  console.log(chalk.bold(`${result.title} / ${result.section}`));
  console.log(
    chalk.gray(
      `${result.sentences.length} sentence(s), ${result.mentions.length} grounded mention(s), ` +
        `${result.dropped.length} dropped, extractor: ${result.extractor}`,
    ),
  );
  for (const category of MENTION_CATEGORIES) {
    console.log(describeOutcome(result.grounding.categories[category]));
  }
};

const runAnalyse = async (url: string, options: AnalyseCliOptions): Promise<void> => {
  const logger = options.json || !options.verbose ? createQuietLogger() : createStderrLogger();
  const spinner = ora({ text: '[analyse] starting', stream: process.stderr }).start();
  try {
    const config = resolveAnalyzerConfig({ apiKey: options.apiKey, model: options.model });
    const extractor = options.pattern ? createPatternExtractor() : resolveExtractor(config, logger);
    const result = await runAnalyzeWorkflow({
      url,
      extractor,
      annotate: { strict: config.strict },
      logger,
      hooks: {
        onStage: (stage) => {
          spinner.text = `[analyse] ${STAGE_LABELS[stage]}`;
        },
      },
    });
    if (options.htmlOut) {
      fs.writeFileSync(options.htmlOut, result.discussion_html, 'utf8');
    }
    spinner.succeed(
      `[analyse] ${result.mentions.length} mention(s) grounded` +
        (options.htmlOut ? `, wrote ${options.htmlOut}` : ''),
    );
    if (options.json) {
      const { grounding: _grounding, sentenceSpans: _spans, ...payload } = result;
      console.log(JSON.stringify(payload, null, 2));
    } else {
      printSummary(result);
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    spinner.fail(`[analyse] ${message}`);
    process.exitCode = 1;
  }
};

const analyseCommand = new Command('analyse')
  .description('Find the policies, guidelines and essays cited in a talk page discussion')
  .argument('<url>', 'Talk page URL, e.g. https://en.wikipedia.org/wiki/Talk:Example#Section')
  .option('--json', 'Print the full result as JSON')
  .option('--html-out <file>', 'Write the annotated discussion HTML to a file')
  .option('--api-key <key>', 'OpenAI API key (falls back to OPENAI_API_KEY)')
  .option('--model <model>', 'OpenAI model identifier (falls back to OPENAI_MODEL)')
  .option('--pattern', 'Use pattern matching even when an API key is configured')
  .option('--verbose', 'Log workflow details to stderr')
  .action(async (url: string, options: AnalyseCliOptions) => {
    await runAnalyse(url, options);
  });

export default analyseCommand;
