/**
 * @file tests/analyze-workflow.test.ts
 * @description Runs the analysis workflow end to end with a stubbed fetcher and extractor.
 */

import { describe, expect, it, vi } from 'vitest';
import type { DiscussionSnapshot, MentionExtractor } from '../src/shared/types';
import { resolveExtractor, runAnalyzeWorkflow, type AnalyzeStage } from '../src/workflows/analyze-workflow';

const TALK_URL = 'https://en.wikipedia.org/wiki/Talk:Example#Balance';

const snapshot: DiscussionSnapshot = {
  url: TALK_URL,
  title: 'Talk:Example',
  section: 'Balance',
  html: '<p>Per WP:NPOV we need balance. Also see WP:OR for this.</p>',
  text: 'Per WP:NPOV we need balance. Also see WP:OR for this.',
};

const stubExtractor: MentionExtractor = {
  name: 'openai',
  extract: async () => ({
    candidates: [
      { category: 'policy', shortcut: 'WP:OR' },
      { category: 'policy', shortcut: 'WP:NPOV', quote: 'we need balance' },
      { category: 'essay', shortcut: 'WP:ZZZTEST' },
    ],
  }),
};

const createLogger = () => ({ log: vi.fn(), warn: vi.fn(), error: vi.fn() });

describe('runAnalyzeWorkflow', () => {
  it('fetches, extracts and annotates in order', async () => {
    const logger = createLogger();
    const stages: AnalyzeStage[] = [];
    const fetchDiscussion = vi.fn(async () => snapshot);

    const result = await runAnalyzeWorkflow({
      url: TALK_URL,
      extractor: stubExtractor,
      fetchDiscussion,
      logger,
      hooks: { onStage: (stage) => stages.push(stage) },
    });

    expect(stages).toEqual(['fetch', 'extract', 'annotate']);
    expect(fetchDiscussion).toHaveBeenCalledWith(TALK_URL, { logger });
    expect(result.extractor).toBe('openai');
    expect(result.sentences).toEqual(['Per WP:NPOV we need balance.', 'Also see WP:OR for this.']);
    expect(result.bindings).toEqual({ 'highlight-0': ['sent-0'], 'highlight-1': ['sent-1'] });
    expect(result.discussion_html).toContain(
      '<span id="highlight-1" class="policy-mention" data-shortcut="WP:OR">WP:OR</span>',
    );
    expect(result.dropped).toEqual([{ category: 'essay', shortcut: 'WP:ZZZTEST', quote: null }]);
    expect(logger.warn).toHaveBeenCalledWith(
      '[analyse] dropped WP:ZZZTEST: not found in the discussion text',
    );
  });

  it('renders a list or a message per category', async () => {
    const result = await runAnalyzeWorkflow({
      discussion: snapshot,
      extractor: stubExtractor,
      logger: createLogger(),
    });
    expect(result.policies.startsWith('<ul class="mention-list">')).toBe(true);
    expect(result.guidelines).toBe(
      '<p class="no-mentions">No guidelines explicitly mentioned in this discussion.</p>',
    );
    expect(result.essays).toBe('<p class="no-mentions">No essays found in this discussion.</p>');
  });

  it('uses pattern matching when no extractor is given', async () => {
    const stages: AnalyzeStage[] = [];
    const result = await runAnalyzeWorkflow({
      discussion: snapshot,
      logger: createLogger(),
      hooks: { onStage: (stage) => stages.push(stage) },
    });
    expect(stages).toEqual(['extract', 'annotate']);
    expect(result.extractor).toBe('pattern');
    expect(result.mentions.map((mention) => mention.shortcut)).toEqual(['WP:NPOV', 'WP:OR']);
  });

  it('needs a URL or a discussion', async () => {
    await expect(runAnalyzeWorkflow({ logger: createLogger() })).rejects.toThrow(
      'Provide a discussion URL or an already fetched discussion.',
    );
  });
});

describe('resolveExtractor', () => {
  it('falls back to pattern matching without an API key', () => {
    const logger = createLogger();
    const extractor = resolveExtractor(
      { apiKey: null, model: 'gpt-4o-mini', endpoint: 'https://api.openai.com' },
      logger,
    );
    expect(extractor.name).toBe('pattern');
    expect(logger.warn).toHaveBeenCalledWith(
      '[analyse] OPENAI_API_KEY not set; falling back to pattern matching.',
    );
  });

  it('selects the model extractor when a key is configured', () => {
    const extractor = resolveExtractor(
      { apiKey: 'test-secret', model: 'gpt-4o-mini', endpoint: 'https://api.openai.com' },
      createLogger(),
    );
    expect(extractor.name).toBe('openai');
  });
});
