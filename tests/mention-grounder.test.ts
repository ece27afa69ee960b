/**
 * @file tests/mention-grounder.test.ts
 * @description Grounding of extracted mentions against the discussion text, sentence linking and
 *              highlight id assignment.
 */

import { describe, expect, it } from 'vitest';
import {
  assignHighlightIds,
  findShortcut,
  findWholeToken,
  groundMentions,
  normalizeAliases,
  normalizeShortcut,
} from '../src/lib/mention-grounder';
import { segmentSentences } from '../src/lib/sentence-segmenter';
import type { MentionCandidate } from '../src/shared/types';

const ground = (text: string, candidates: MentionCandidate[]) =>
  groundMentions({ candidates, plainText: text, sentences: segmentSentences(text) });

describe('findShortcut', () => {
  it('prefers the full shortcut, case-insensitively', () => {
    expect(findShortcut('see wp:npov above', 'WP:NPOV')).toEqual({
      kind: 'exact',
      index: 4,
      length: 7,
    });
  });

  it('falls back to the bare suffix as a whole word', () => {
    expect(findShortcut('This fails DUE in my view.', 'WP:DUE')).toEqual({
      kind: 'bare-suffix',
      index: 11,
      length: 3,
    });
    expect(findShortcut('This is overdue.', 'WP:DUE')).toBeNull();
  });

  it('ignores bare suffixes shorter than the configured minimum', () => {
    expect(findShortcut('that is v. odd', 'WP:V')).toBeNull();
    expect(findShortcut('that is v. odd', 'WP:V', { minBareSuffixLength: 1 })).toMatchObject({
      kind: 'bare-suffix',
      index: 8,
    });
  });

  it('can require the exact case for short suffixes', () => {
    expect(findShortcut('this or that', 'WP:OR')).toMatchObject({ kind: 'bare-suffix', index: 5 });
    expect(findShortcut('this or that', 'WP:OR', { caseSensitiveSuffixMaxLength: 2 })).toBeNull();
  });
});

describe('findWholeToken', () => {
  it('skips occurrences inside a longer shortcut', () => {
    expect(findWholeToken('See WP:NOTCENSORED and WP:NOT.', 'WP:NOT')).toEqual({
      kind: 'exact',
      index: 23,
      length: 6,
    });
  });
});

describe('normalization helpers', () => {
  it('upper-cases and collapses shortcuts', () => {
    expect(normalizeShortcut('  wp:npov ')).toBe('WP:NPOV');
    expect(normalizeShortcut('   ')).toBeNull();
    expect(normalizeShortcut(null)).toBeNull();
  });

  it('gives namespace-less aliases the shortcut namespace', () => {
    expect(normalizeAliases('WP:NPOV', ['undue', 'WP:WEIGHT', 'WP:NPOV', 'MOS:LABEL'])).toEqual([
      'WP:UNDUE',
      'WP:WEIGHT',
      'MOS:LABEL',
    ]);
  });

  it('numbers shortcuts in lexicographic order', () => {
    expect(assignHighlightIds(['WP:OR', 'WP:NPOV', 'WP:OR', 'MOS:LABEL'])).toEqual({
      'MOS:LABEL': 0,
      'WP:NPOV': 1,
      'WP:OR': 2,
    });
  });
});

describe('groundMentions', () => {
  it('drops mentions whose shortcut never occurs in the text', () => {
    const result = ground('Nothing relevant here.', [{ category: 'policy', shortcut: 'WP:ZZZTEST' }]);
    expect(result.mentions).toEqual([]);
    expect(result.dropped).toEqual([{ category: 'policy', shortcut: 'WP:ZZZTEST', quote: null }]);
    expect(result.categories.policy).toMatchObject({
      status: 'none-grounded',
      candidateCount: 1,
      message: 'No policies found in this discussion.',
    });
  });

  it('keeps a mention whose bare suffix appears on its own', () => {
    const result = ground('This fails DUE in my view.', [{ category: 'policy', shortcut: 'WP:DUE' }]);
    expect(result.mentions).toHaveLength(1);
    expect(result.mentions[0]).toMatchObject({
      shortcut: 'WP:DUE',
      matchedBy: 'bare-suffix',
      matchedForm: 'WP:DUE',
      sentenceIds: [0],
    });
  });

  it('assigns highlight ids by shortcut order, not discovery order', () => {
    const result = ground('WP:OR and WP:NPOV apply.', [
      { category: 'policy', shortcut: 'WP:OR' },
      { category: 'policy', shortcut: 'WP:NPOV' },
    ]);
    expect(result.binding.highlightIds).toEqual({ 'WP:NPOV': 0, 'WP:OR': 1 });
    expect(result.mentions.map((mention) => [mention.shortcut, mention.highlightId])).toEqual([
      ['WP:OR', 1],
      ['WP:NPOV', 0],
    ]);
  });

  it('links each mention to the sentences that contain it', () => {
    const result = ground('Per WP:NPOV we need balance. Also see WP:OR for this.', [
      { category: 'policy', shortcut: 'WP:NPOV', quote: '“we need balance”' },
      { category: 'policy', shortcut: 'WP:OR', quote: 'something else' },
    ]);
    expect(result.binding.sentenceIdsByHighlight).toEqual([[0], [1]]);
    expect(result.mentions[0]).toMatchObject({
      highlightId: 0,
      sentenceIds: [0],
      quote: 'we need balance',
      quoteVerified: true,
    });
    expect(result.mentions[1]).toMatchObject({ highlightId: 1, sentenceIds: [1], quoteVerified: false });
    expect(result.categories.policy.status).toBe('found');
    expect(result.categories.policy.message).toBeNull();
  });

  it('reports categories without candidates separately', () => {
    const result = ground('Per WP:NPOV.', [{ category: 'policy', shortcut: 'WP:NPOV' }]);
    expect(result.categories.guideline).toEqual({
      category: 'guideline',
      status: 'no-candidates',
      candidateCount: 0,
      mentions: [],
      message: 'No guidelines explicitly mentioned in this discussion.',
    });
  });

  it('grounds a mention through an alias reported with it', () => {
    const result = ground('That section is UNDUE.', [
      { category: 'policy', shortcut: 'WP:NPOV', aliases: ['UNDUE'] },
    ]);
    expect(result.mentions[0]).toMatchObject({
      shortcut: 'WP:NPOV',
      aliases: ['WP:UNDUE'],
      matchedBy: 'bare-suffix',
      matchedForm: 'WP:UNDUE',
      sentenceIds: [0],
    });
    expect(result.binding.formsByShortcut).toEqual({ 'WP:NPOV': ['WP:NPOV', 'WP:UNDUE'] });
  });

  it('grounds one mention exactly and another through its bare suffix in separate sentences', () => {
    const text = 'Editors disagree about WP:NPOV here. Later the OR concern was raised.';
    const candidates: MentionCandidate[] = [
      { category: 'policy', shortcut: 'WP:NPOV' },
      { category: 'policy', shortcut: 'WP:OR' },
    ];
    const result = ground(text, candidates);

    expect(segmentSentences(text).map((span) => span.text)).toEqual([
      'Editors disagree about WP:NPOV here.',
      'Later the OR concern was raised.',
    ]);
    expect(result.dropped).toEqual([]);
    expect(result.mentions.map(({ shortcut, matchedBy, highlightId, sentenceIds }) => [
      shortcut,
      matchedBy,
      highlightId,
      sentenceIds,
    ])).toEqual([
      ['WP:NPOV', 'exact', 0, [0]],
      ['WP:OR', 'bare-suffix', 1, [1]],
    ]);
    expect(result.binding.highlightIds).toEqual({ 'WP:NPOV': 0, 'WP:OR': 1 });

    const stricter = groundMentions({
      candidates,
      plainText: text,
      sentences: segmentSentences(text),
      options: { minBareSuffixLength: 3 },
    });
    expect(stricter.mentions.map((mention) => mention.shortcut)).toEqual(['WP:NPOV']);
    expect(stricter.dropped).toEqual([{ category: 'policy', shortcut: 'WP:OR', quote: null }]);
  });

  it('skips candidates without a usable shortcut', () => {
    const result = ground('Per WP:NPOV.', [
      { category: 'policy', shortcut: null },
      { category: 'policy', shortcut: '   ' },
      { category: 'policy', shortcut: 'wp:npov' },
    ]);
    expect(result.skipped).toBe(2);
    expect(result.mentions.map((mention) => mention.shortcut)).toEqual(['WP:NPOV']);
  });

  it('drops everything when there is no text', () => {
    const result = groundMentions({
      candidates: [{ category: 'essay', shortcut: 'WP:1AM' }],
      plainText: null,
      sentences: [],
    });
    expect(result.mentions).toEqual([]);
    expect(result.categories.essay.status).toBe('none-grounded');
  });
});
