/**
 * @file src/workflows/analyze-workflow.ts
 * @description Shared analysis workflow reused by the CLI commands and the HTTP server: fetch a
 *              discussion, extract mention candidates, ground and annotate them, render the lists.
 */

import {
  annotateDiscussion,
  highlightElementId,
  sentenceElementId,
  type AnnotateOptions,
} from '../lib/discussion-annotator';
import { renderMentionList } from '../lib/mention-parser';
import { createOpenAiExtractor } from '../lib/openai-extractor';
import { createPatternExtractor } from '../lib/pattern-extractor';
import { defaultPolicyCatalog, type PolicyCatalog } from '../lib/policy-catalog';
import { sentenceTexts } from '../lib/sentence-segmenter';
import type { ResolvedAnalyzerConfig } from '../shared/config';
import type {
  DiscussionSnapshot,
  DroppedMention,
  ExtractorName,
  GroundedMention,
  GroundingResult,
  Logger,
  MentionExtractor,
  SentenceSpan,
} from '../shared/types';
import { fetchDiscussion as fetchFromWikipedia, type FetchDiscussionOptions } from './fetch-workflow';

export type AnalyzeStage = 'fetch' | 'extract' | 'annotate';

export interface AnalyzeWorkflowHooks {
  onStage?: (stage: AnalyzeStage) => void;
}

export interface AnalyzeWorkflowOptions {
  url?: string;
  /** Already fetched discussion; skips the fetch stage. */
  discussion?: DiscussionSnapshot;
  /** Defaults to the pattern extractor. */
  extractor?: MentionExtractor;
  fetchDiscussion?: (url: string, options: FetchDiscussionOptions) => Promise<DiscussionSnapshot>;
  annotate?: AnnotateOptions;
  catalog?: PolicyCatalog;
  logger?: Logger;
  hooks?: AnalyzeWorkflowHooks;
}

export interface AnalyzeResult {
  url: string;
  title: string;
  section: string;
  discussion_html: string;
  policies: string;
  guidelines: string;
  essays: string;
  sentences: string[];
  mentions: GroundedMention[];
  dropped: DroppedMention[];
  /** `highlight-<id>` -> `sent-<index>` element ids. */
  bindings: Record<string, string[]>;
  extractor: ExtractorName;
  grounding: GroundingResult;
  sentenceSpans: SentenceSpan[];
}

const getLogger = (logger?: Logger): Logger => logger ?? console;

/**
 * The model extractor when an API key is configured, pattern matching otherwise.
 */
export const resolveExtractor = (
  config: Pick<ResolvedAnalyzerConfig, 'apiKey' | 'model' | 'endpoint'>,
  logger?: Logger,
  catalog: PolicyCatalog = defaultPolicyCatalog,
): MentionExtractor => {
  const activeLogger = getLogger(logger);
  if (!config.apiKey) {
    activeLogger.warn('[analyse] OPENAI_API_KEY not set; falling back to pattern matching.');
    return createPatternExtractor(catalog);
  }
  return createOpenAiExtractor({
    apiKey: config.apiKey,
    model: config.model,
    endpoint: config.endpoint,
    catalog,
    logger: activeLogger,
  });
};

export const runAnalyzeWorkflow = async ({
  url,
  discussion,
  extractor,
  fetchDiscussion = fetchFromWikipedia,
  annotate,
  catalog = defaultPolicyCatalog,
  logger,
  hooks,
}: AnalyzeWorkflowOptions): Promise<AnalyzeResult> => {
  const activeLogger = getLogger(logger);
  let snapshot = discussion;
  if (!snapshot) {
    if (!url) {
      throw new Error('Provide a discussion URL or an already fetched discussion.');
    }
    hooks?.onStage?.('fetch');
    snapshot = await fetchDiscussion(url, { logger: activeLogger });
  }

  const activeExtractor = extractor ?? createPatternExtractor(catalog);
  hooks?.onStage?.('extract');
  const extraction = await activeExtractor.extract({ html: snapshot.html, text: snapshot.text });
  activeLogger.log(
    `[analyse] ${activeExtractor.name} extractor returned ${extraction.candidates.length} candidate(s)`,
  );

  hooks?.onStage?.('annotate');
  const annotated = annotateDiscussion({
    html: snapshot.html,
    plainText: snapshot.text,
    candidates: extraction.candidates,
    options: annotate,
  });
  const { grounding } = annotated;
  for (const dropped of grounding.dropped) {
    activeLogger.warn(`[analyse] dropped ${dropped.shortcut}: not found in the discussion text`);
  }

  const bindings: Record<string, string[]> = {};
  for (const [highlightId, sentenceIds] of grounding.binding.sentenceIdsByHighlight.entries()) {
    bindings[highlightElementId(highlightId)] = sentenceIds.map(sentenceElementId);
  }

  return {
    url: snapshot.url,
    title: snapshot.title,
    section: snapshot.section,
    discussion_html: annotated.html,
    policies: renderMentionList(grounding.categories.policy, catalog),
    guidelines: renderMentionList(grounding.categories.guideline, catalog),
    essays: renderMentionList(grounding.categories.essay, catalog),
    sentences: sentenceTexts(annotated.sentences),
    mentions: grounding.mentions,
    dropped: grounding.dropped,
    bindings,
    extractor: activeExtractor.name,
    grounding,
    sentenceSpans: annotated.sentences,
  };
};
