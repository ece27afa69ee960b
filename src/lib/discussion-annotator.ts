/**
 * @file src/lib/discussion-annotator.ts
 * @description Runs segmentation, grounding and span wrapping over one discussion. All ranges are
 *              computed from a single flattened snapshot of the (de-annotated) tree and applied in
 *              one rewrite, so re-running on its own output gives the same HTML.
 */

import {
  HIGHLIGHT_ID_PREFIX,
  SENTENCE_ID_PREFIX,
  isStrictMode,
} from '../shared/analyzer-config';
import type {
  GroundingResult,
  HighlightBinding,
  MentionCandidate,
  SentenceSpan,
} from '../shared/types';
import {
  buildSegments,
  flattenSegments,
  HIGHLIGHT_MARKUP,
  parseDiscussionHtml,
  renderDiscussionHtml,
  SENTENCE_MARKUP,
  stripAnnotations,
  wrapRanges,
  type WrapRange,
} from './dom-text-mapper';
import {
  findAnyForm,
  findWholeToken,
  groundMentions,
  type GroundingOptions,
} from './mention-grounder';
import { segmentSentences, type SegmentOptions } from './sentence-segmenter';

export interface AnnotateOptions {
  segmentation?: SegmentOptions;
  grounding?: GroundingOptions;
  strict?: boolean;
}

export interface AnnotateInput {
  html: string;
  /**
   * Scraper-provided plain text used for grounding. Omitted means "use the flattened HTML";
   * `null` or an empty string means there is no text and every candidate is dropped.
   */
  plainText?: string | null;
  candidates: readonly MentionCandidate[];
  options?: AnnotateOptions;
}

export interface AnnotatedDiscussion {
  html: string;
  flatText: string;
  sentences: SentenceSpan[];
  grounding: GroundingResult;
}

export const sentenceElementId = (index: number): string => `${SENTENCE_ID_PREFIX}${index}`;

export const highlightElementId = (highlightId: number): string =>
  `${HIGHLIGHT_ID_PREFIX}${highlightId}`;

const sentenceRanges = (sentences: SentenceSpan[]): WrapRange[] =>
  sentences.map((sentence) => ({
    start: sentence.start,
    end: sentence.end,
    id: sentenceElementId(sentence.index),
    markup: SENTENCE_MARKUP,
  }));

const containing = (sentences: SentenceSpan[], start: number, end: number): SentenceSpan | null =>
  sentences.find((sentence) => sentence.start <= start && end <= sentence.end) ?? null;

const crosses = (a: WrapRange, start: number, end: number): boolean =>
  (start < a.start && end > a.start && end < a.end) || (start > a.start && start < a.end && end > a.end);

/**
 * One range per highlight id at the first occurrence of its shortcut (or an alias) in the
 * flattened text. Whole-token occurrences win over partial ones; a range that would leave its
 * sentence or cross another highlight is skipped.
 */
export const highlightRanges = (
  flatText: string,
  sentences: SentenceSpan[],
  binding: HighlightBinding,
  options: GroundingOptions = {},
): WrapRange[] => {
  const ranges: WrapRange[] = [];
  const ordered = Object.entries(binding.highlightIds).sort(([, a], [, b]) => a - b);

  for (const [shortcut, highlightId] of ordered) {
    const forms = binding.formsByShortcut[shortcut] ?? [shortcut];
    const whole = forms
      .map((form) => findWholeToken(flatText, form))
      .find((match) => match !== null);
    const match = whole ?? findAnyForm(flatText, forms, options);
    if (!match) continue;

    const start = match.index;
    const end = match.index + match.length;
    if (!containing(sentences, start, end)) continue;
    if (ranges.some((range) => crosses(range, start, end))) continue;

    ranges.push({
      start,
      end,
      id: highlightElementId(highlightId),
      markup: HIGHLIGHT_MARKUP,
      attributes: { 'data-shortcut': shortcut },
    });
  }
  return ranges;
};

export const annotateDiscussion = ({
  html,
  plainText,
  candidates,
  options = {},
}: AnnotateInput): AnnotatedDiscussion => {
  const tree = stripAnnotations(parseDiscussionHtml(html));
  const flatText = flattenSegments(buildSegments(tree));
  const sentences = segmentSentences(flatText, options.segmentation);
  const grounding = groundMentions({
    candidates,
    plainText: plainText === undefined ? flatText : plainText,
    sentences,
    options: options.grounding,
  });

  if (!sentences.length) {
    return { html, flatText, sentences, grounding };
  }

  const ranges = [
    ...sentenceRanges(sentences),
    ...highlightRanges(flatText, sentences, grounding.binding, options.grounding),
  ];
  const annotated = wrapRanges(tree, ranges, { strict: options.strict ?? isStrictMode() });
  return { html: renderDiscussionHtml(annotated), flatText, sentences, grounding };
};
