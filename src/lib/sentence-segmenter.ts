/**
 * @file src/lib/sentence-segmenter.ts
 * @description Splits flattened discussion text into ordered, trimmed sentence spans whose offsets
 *              point back into the original string.
 */

import type { SentenceSpan } from '../shared/types';

export interface SegmentOptions {
  /**
   * Tokens such as `Mr.` or `e.g.` after which a terminal mark does not end a sentence.
   * Compared case-insensitively against the word that carries the mark.
   */
  abbreviations?: readonly string[];
}

const TERMINALS = new Set(['.', '!', '?']);
const CLOSERS = new Set(['"', "'", ')', ']', '”', '’', '»']);
const PARAGRAPH_BREAK = /\n[^\S\n]*\n\s*/y;
const WHITESPACE = /\s/;

const isWhitespace = (char: string | undefined): boolean =>
  char !== undefined && WHITESPACE.test(char);

const precedingWord = (text: string, end: number): string => {
  let start = end;
  while (start > 0 && !isWhitespace(text[start - 1])) {
    start -= 1;
  }
  return text.slice(start, end);
};

const pushTrimmed = (text: string, from: number, to: number, spans: SentenceSpan[]): void => {
  let start = from;
  let end = to;
  while (start < end && isWhitespace(text[start])) start += 1;
  while (end > start && isWhitespace(text[end - 1])) end -= 1;
  if (end <= start) return;
  spans.push({ index: spans.length, start, end, text: text.slice(start, end) });
};

export const segmentSentences = (text: string, options: SegmentOptions = {}): SentenceSpan[] => {
  const spans: SentenceSpan[] = [];
  if (!text) return spans;

  const abbreviations = new Set((options.abbreviations ?? []).map((token) => token.toLowerCase()));
  let cursor = 0;
  let index = 0;

  while (index < text.length) {
    const char = text[index];

    if (char === '\n') {
      PARAGRAPH_BREAK.lastIndex = index;
      const match = PARAGRAPH_BREAK.exec(text);
      if (match) {
        pushTrimmed(text, cursor, index, spans);
        index += match[0].length;
        cursor = index;
        continue;
      }
    }

    if (TERMINALS.has(char)) {
      let end = index + 1;
      while (end < text.length && (TERMINALS.has(text[end]) || CLOSERS.has(text[end]))) {
        end += 1;
      }
      if (end < text.length && isWhitespace(text[end])) {
        const word = precedingWord(text, index + 1).toLowerCase();
        if (!abbreviations.has(word)) {
          pushTrimmed(text, cursor, end, spans);
          cursor = end;
        }
      }
      index = end;
      continue;
    }

    index += 1;
  }

  pushTrimmed(text, cursor, text.length, spans);
  return spans;
};

/**
 * Sentence texts in order, the shape the grounder and the HTTP payload consume.
 */
export const sentenceTexts = (spans: SentenceSpan[]): string[] => spans.map((span) => span.text);
