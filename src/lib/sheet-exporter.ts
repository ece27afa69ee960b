/**
 * @file src/lib/sheet-exporter.ts
 * @description Turns grounded mentions into spreadsheet rows and serializes them as TSV, CSV or JSON
 *              ready to paste into a sheet.
 */

import { CONTEXT_PREVIEW_CHARS } from '../shared/analyzer-config';
import {
  CATEGORY_KEYS,
  MENTION_CATEGORIES,
  type GroundingResult,
  type MentionCategory,
  type SentenceSpan,
} from '../shared/types';
import { defaultPolicyCatalog, type PolicyCatalog } from './policy-catalog';

export const EXPORT_FORMATS = ['tsv', 'csv', 'json'] as const;

export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export interface ExportRow {
  category: MentionCategory;
  name: string;
  shortcut: string;
  count: number;
  firstContext: string;
  url: string;
}

const HEADERS = ['Category', 'Name', 'Shortcut', 'Count', 'First Context', 'URL'];

const CATEGORY_TITLES: Record<MentionCategory, string> = {
  policy: 'Policy',
  guideline: 'Guideline',
  essay: 'Essay',
};

export const isExportFormat = (value: string): value is ExportFormat =>
  EXPORT_FORMATS.some((format) => format === value);

export const parseExportFormat = (value: string): ExportFormat => {
  const format = value.trim().toLowerCase();
  if (!isExportFormat(format)) {
    throw new Error(`Unsupported format: ${value}. Use 'tsv', 'csv', or 'json'.`);
  }
  return format;
};

const previewContext = (value: string): string =>
  value.slice(0, CONTEXT_PREVIEW_CHARS).replace(/[\t\r\n]/g, ' ').trim();

/**
 * One row per distinct shortcut and category. `count` is the number of sentences that mention
 * the shortcut; the first of them is the context, falling back to the model's quote.
 */
export const buildExportRows = (
  grounding: GroundingResult,
  sentences: readonly SentenceSpan[],
  catalog: PolicyCatalog = defaultPolicyCatalog,
): ExportRow[] => {
  const rows: ExportRow[] = [];
  for (const category of MENTION_CATEGORIES) {
    const seen = new Set<string>();
    const mentions = [...grounding.categories[category].mentions].sort(
      (a, b) => a.highlightId - b.highlightId,
    );
    for (const mention of mentions) {
      if (seen.has(mention.shortcut)) continue;
      seen.add(mention.shortcut);
      const first = sentences.find((sentence) => sentence.index === mention.sentenceIds[0]);
      rows.push({
        category,
        name: mention.name ?? catalog.lookup(mention.shortcut)?.entry.name ?? mention.shortcut,
        shortcut: mention.shortcut,
        count: mention.sentenceIds.length,
        firstContext: previewContext(first?.text ?? mention.quote ?? ''),
        url: mention.href ?? catalog.urlFor(mention.shortcut),
      });
    }
  }
  return rows;
};

const rowCells = (row: ExportRow): string[] => [
  CATEGORY_TITLES[row.category],
  row.name,
  row.shortcut,
  String(row.count),
  row.firstContext,
  row.url,
];

const csvCell = (value: string): string =>
  /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;

const formatTsv = (rows: readonly ExportRow[]): string =>
  [HEADERS, ...rows.map(rowCells)]
    .map((cells) => cells.map((cell) => cell.replace(/[\t\r\n]/g, ' ')).join('\t'))
    .join('\n');

const formatCsv = (rows: readonly ExportRow[]): string =>
  [HEADERS, ...rows.map(rowCells)]
    .map((cells) => cells.map(csvCell).join(','))
    .map((line) => `${line}\r\n`)
    .join('');

const formatJson = (rows: readonly ExportRow[]): string => {
  const grouped: Record<string, ExportRow[]> = {};
  for (const category of MENTION_CATEGORIES) {
    grouped[CATEGORY_KEYS[category]] = rows.filter((row) => row.category === category);
  }
  return JSON.stringify(grouped, null, 2);
};

export const formatForSheets = (rows: readonly ExportRow[], format: ExportFormat): string => {
  switch (format) {
    case 'tsv':
      return formatTsv(rows);
    case 'csv':
      return formatCsv(rows);
    case 'json':
      return formatJson(rows);
    default:
      throw new Error(`Unsupported format: ${String(format)}. Use 'tsv', 'csv', or 'json'.`);
  }
};
