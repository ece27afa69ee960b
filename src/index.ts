/**
 * @file src/index.ts
 * @description Library entry point re-exporting the analyzer modules.
 */

export * from './lib/discussion-annotator';
export * from './lib/dom-text-mapper';
export * from './lib/mention-grounder';
export * from './lib/mention-parser';
export * from './lib/openai-extractor';
export * from './lib/pattern-extractor';
export * from './lib/policy-catalog';
export * from './lib/prompts';
export * from './lib/sentence-segmenter';
export * from './lib/sheet-exporter';
export * from './server';
export * from './shared/analyzer-config';
export * from './shared/config';
export * from './shared/logger';
export * from './shared/types';
export * from './workflows/analyze-workflow';
export * from './workflows/fetch-workflow';
