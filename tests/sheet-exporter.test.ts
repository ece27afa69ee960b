/**
 * @file tests/sheet-exporter.test.ts
 * @description Export rows and their TSV, CSV and JSON serializations.
 */

import { describe, expect, it } from 'vitest';
import { groundMentions } from '../src/lib/mention-grounder';
import { segmentSentences } from '../src/lib/sentence-segmenter';
import {
  buildExportRows,
  formatForSheets,
  parseExportFormat,
  type ExportRow,
} from '../src/lib/sheet-exporter';

const NPOV_URL = 'https://en.wikipedia.org/wiki/Wikipedia:Neutral_point_of_view';
const RS_URL = 'https://en.wikipedia.org/wiki/Wikipedia:Reliable_sources';

const text = 'Per WP:NPOV this fails. WP:NPOV again, see WP:RS.';
const sentences = segmentSentences(text);
const grounding = groundMentions({
  candidates: [
    { category: 'policy', shortcut: 'WP:NPOV', quote: 'this fails' },
    { category: 'guideline', shortcut: 'WP:RS' },
    { category: 'policy', shortcut: 'wp:npov', name: 'Duplicate' },
  ],
  plainText: text,
  sentences,
});

describe('buildExportRows', () => {
  it('emits one row per shortcut with sentence counts and catalog names', () => {
    expect(buildExportRows(grounding, sentences)).toEqual([
      {
        category: 'policy',
        name: 'Neutral point of view',
        shortcut: 'WP:NPOV',
        count: 2,
        firstContext: 'Per WP:NPOV this fails.',
        url: NPOV_URL,
      },
      {
        category: 'guideline',
        name: 'Reliable sources',
        shortcut: 'WP:RS',
        count: 1,
        firstContext: 'WP:NPOV again, see WP:RS.',
        url: RS_URL,
      },
    ]);
  });

  it('cuts long contexts and flattens line breaks', () => {
    const longText = `WP:FOOBAR says\n${'b'.repeat(120)}.`;
    const longSentences = segmentSentences(longText);
    const rows = buildExportRows(
      groundMentions({
        candidates: [{ category: 'essay', shortcut: 'WP:FOOBAR' }],
        plainText: longText,
        sentences: longSentences,
      }),
      longSentences,
    );
    expect(rows).toEqual([
      {
        category: 'essay',
        name: 'WP:FOOBAR',
        shortcut: 'WP:FOOBAR',
        count: 1,
        firstContext: `WP:FOOBAR says ${'b'.repeat(85)}`,
        url: 'https://en.wikipedia.org/wiki/Wikipedia:FOOBAR',
      },
    ]);
  });

  it('falls back to the quote when no sentence carries the mention', () => {
    const rows = buildExportRows(
      groundMentions({
        candidates: [{ category: 'essay', shortcut: 'WP:FOOBAR', quote: 'as noted' }],
        plainText: 'WP:FOOBAR',
        sentences: [],
      }),
      [],
    );
    expect(rows[0]).toMatchObject({ count: 0, firstContext: 'as noted' });
  });
});

describe('formatForSheets', () => {
  const rows: ExportRow[] = buildExportRows(grounding, sentences);

  it('writes tab separated lines', () => {
    expect(formatForSheets(rows, 'tsv')).toBe(
      [
        'Category\tName\tShortcut\tCount\tFirst Context\tURL',
        `Policy\tNeutral point of view\tWP:NPOV\t2\tPer WP:NPOV this fails.\t${NPOV_URL}`,
        `Guideline\tReliable sources\tWP:RS\t1\tWP:NPOV again, see WP:RS.\t${RS_URL}`,
      ].join('\n'),
    );
  });

  it('quotes csv cells that contain commas', () => {
    expect(formatForSheets(rows, 'csv')).toBe(
      'Category,Name,Shortcut,Count,First Context,URL\r\n' +
        `Policy,Neutral point of view,WP:NPOV,2,Per WP:NPOV this fails.,${NPOV_URL}\r\n` +
        `Guideline,Reliable sources,WP:RS,1,"WP:NPOV again, see WP:RS.",${RS_URL}\r\n`,
    );
  });

  it('groups json rows by category', () => {
    const parsed: unknown = JSON.parse(formatForSheets(rows, 'json'));
    expect(parsed).toEqual({
      policies: [rows[0]],
      guidelines: [rows[1]],
      essays: [],
    });
  });
});

describe('parseExportFormat', () => {
  it('accepts known formats in any case', () => {
    expect(parseExportFormat(' CSV ')).toBe('csv');
  });

  it('rejects anything else', () => {
    expect(() => parseExportFormat('xlsx')).toThrow(
      "Unsupported format: xlsx. Use 'tsv', 'csv', or 'json'.",
    );
  });
});
