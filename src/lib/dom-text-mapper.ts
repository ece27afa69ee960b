/**
 * @file src/lib/dom-text-mapper.ts
 * @description Maps flattened text offsets onto the text nodes of a parsed discussion and rewrites
 *              those nodes so that absolute ranges end up wrapped in marker elements.
 *
 * The tree is parsed as a fragment by cheerio (parse5 backend). Text node `data` holds decoded
 * characters, so the flattened text never contains entities and the serializer escapes the text
 * of new nodes exactly once.
 */

import { load, type CheerioAPI } from 'cheerio';
import {
  cloneNode,
  Element,
  hasChildren,
  isTag,
  isText,
  Text,
  type AnyNode,
  type ChildNode,
  type ParentNode,
} from 'domhandler';
import {
  HIGHLIGHT_CLASS,
  isStrictMode,
  SENTENCE_CLASS,
  SENTENCE_ID_ATTRIBUTE,
} from '../shared/analyzer-config';
import type { TextSegment } from '../shared/types';

export type DiscussionTree = CheerioAPI;

export interface WrapMarkup {
  tagName: string;
  className: string;
  /** Attribute that receives the range id, e.g. `id` or `data-sentence-id`. */
  idAttribute: string;
}

export interface WrapRange {
  start: number;
  end: number;
  id: string;
  markup?: WrapMarkup;
  attributes?: Record<string, string>;
}

export interface WrapOptions {
  /** Throw on out-of-bounds or crossing ranges instead of clamping/dropping them. */
  strict?: boolean;
}

export const SENTENCE_MARKUP: WrapMarkup = {
  tagName: 'span',
  className: SENTENCE_CLASS,
  idAttribute: SENTENCE_ID_ATTRIBUTE,
};

export const HIGHLIGHT_MARKUP: WrapMarkup = {
  tagName: 'span',
  className: HIGHLIGHT_CLASS,
  idAttribute: 'id',
};

const HTML_NAMESPACE = 'http://www.w3.org/1999/xhtml';

/** Elements whose text is never rendered as discussion prose. */
const OPAQUE_TAGS = new Set(['script', 'style', 'noscript', 'template', 'iframe']);

/** Elements that cannot hold a wrapper; the parser hoists anything but whitespace out of them. */
const WRAP_FORBIDDEN_PARENTS = new Set([
  'table',
  'thead',
  'tbody',
  'tfoot',
  'tr',
  'colgroup',
  'select',
]);

const isUnwrappable = (node: Text): boolean =>
  !node.data.trim() &&
  node.parent !== null &&
  isTag(node.parent) &&
  WRAP_FORBIDDEN_PARENTS.has(node.parent.name);

export class RangeInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RangeInvariantError';
  }
}

export const parseDiscussionHtml = (html: string): DiscussionTree => load(html, null, false);

export const renderDiscussionHtml = (tree: DiscussionTree): string => tree.html();

export const cloneDiscussion = (tree: DiscussionTree): DiscussionTree =>
  load(cloneNode(tree.root()[0], true), null, false);

const collectText = (node: AnyNode, segments: TextSegment[], cursor: { offset: number }): void => {
  if (isText(node)) {
    if (!node.data.length) return;
    const start = cursor.offset;
    cursor.offset += node.data.length;
    segments.push({ node, start, end: cursor.offset });
    return;
  }
  if (isTag(node) && OPAQUE_TAGS.has(node.name)) return;
  if (hasChildren(node)) {
    for (const child of node.children) {
      collectText(child, segments, cursor);
    }
  }
};

export const buildSegments = (tree: DiscussionTree): TextSegment[] => {
  const segments: TextSegment[] = [];
  collectText(tree.root()[0], segments, { offset: 0 });
  return segments;
};

export const flattenSegments = (segments: TextSegment[]): string =>
  segments.map((segment) => segment.node.data).join('');

export const flattenHtml = (html: string): string =>
  flattenSegments(buildSegments(parseDiscussionHtml(html)));

const relinkChildren = (parent: ParentNode, children: ChildNode[]): void => {
  children.forEach((child, index) => {
    child.parent = parent;
    child.prev = children[index - 1] ?? null;
    child.next = children[index + 1] ?? null;
  });
  parent.children = children;
};

/**
 * Removes sentence and highlight wrappers from an earlier run and merges the text nodes they
 * leave behind, so the tree flattens to exactly the segments it had before annotation.
 */
export const stripAnnotations = (tree: DiscussionTree): DiscussionTree => {
  const stripped = cloneDiscussion(tree);
  const selector = [
    `span.${HIGHLIGHT_CLASS}`,
    `span.${SENTENCE_CLASS}[${SENTENCE_ID_ATTRIBUTE}]`,
  ].join(', ');
  stripped(selector)
    .toArray()
    .reverse()
    .forEach((element) => {
      stripped(element).replaceWith(stripped(element).contents());
    });
  mergeAdjacentText(stripped.root()[0]);
  return stripped;
};

const mergeAdjacentText = (node: ParentNode): void => {
  const merged: ChildNode[] = [];
  for (const child of node.children) {
    const previous = merged[merged.length - 1];
    if (isText(child) && previous && isText(previous)) {
      previous.data += child.data;
      continue;
    }
    if (isText(child) && !child.data.length) continue;
    if (hasChildren(child)) mergeAdjacentText(child);
    merged.push(child);
  }
  relinkChildren(node, merged);
};

const compareRanges = (a: WrapRange, b: WrapRange): number =>
  a.start - b.start || b.end - a.end;

/**
 * Clamps ranges into `[0, length)`, drops empty ones and any range that crosses (rather than
 * nests inside) an earlier one. Result is sorted outer-first.
 */
export const normalizeRanges = (
  ranges: readonly WrapRange[],
  length: number,
  strict = isStrictMode(),
): WrapRange[] => {
  const violation = (message: string): void => {
    if (strict) throw new RangeInvariantError(message);
  };

  const clamped: WrapRange[] = [];
  for (const range of ranges) {
    if (range.start < 0 || range.end > length) {
      violation(`Range ${range.id} [${range.start}, ${range.end}) exceeds text length ${length}.`);
    }
    const start = Math.max(0, Math.min(range.start, length));
    const end = Math.max(0, Math.min(range.end, length));
    if (end <= start) {
      violation(`Range ${range.id} [${range.start}, ${range.end}) is empty.`);
      continue;
    }
    clamped.push({ ...range, start, end });
  }

  const sorted = clamped.sort(compareRanges);
  const accepted: WrapRange[] = [];
  const open: WrapRange[] = [];
  for (const range of sorted) {
    while (open.length && open[open.length - 1].end <= range.start) open.pop();
    const enclosing = open[open.length - 1];
    if (enclosing && range.end > enclosing.end) {
      violation(
        `Range ${range.id} [${range.start}, ${range.end}) crosses ${enclosing.id} [${enclosing.start}, ${enclosing.end}).`,
      );
      continue;
    }
    open.push(range);
    accepted.push(range);
  }
  return accepted;
};

const createWrapper = (range: WrapRange, children: ChildNode[]): Element => {
  const markup = range.markup ?? SENTENCE_MARKUP;
  const element = new Element(markup.tagName, {
    [markup.idAttribute]: range.id,
    class: markup.className,
    ...range.attributes,
  });
  element.namespace = HTML_NAMESPACE;
  relinkChildren(element, children);
  return element;
};

/**
 * Splits one text node's data into plain runs and (possibly nested) wrappers.
 * `ranges` are sorted outer-first and already filtered to the ones overlapping the segment.
 */
const buildPieces = (
  segment: TextSegment,
  from: number,
  to: number,
  ranges: WrapRange[],
): ChildNode[] => {
  const { data } = segment.node;
  const slice = (start: number, end: number): Text =>
    new Text(data.slice(start - segment.start, end - segment.start));

  const pieces: ChildNode[] = [];
  let position = from;
  let index = 0;
  while (index < ranges.length) {
    const range = ranges[index];
    const start = Math.max(range.start, from);
    const end = Math.min(range.end, to);
    let next = index + 1;
    while (next < ranges.length && ranges[next].start < range.end) next += 1;

    if (start > position) pieces.push(slice(position, start));
    pieces.push(createWrapper(range, buildPieces(segment, start, end, ranges.slice(index + 1, next))));
    position = end;
    index = next;
  }
  if (position < to) pieces.push(slice(position, to));
  return pieces;
};

/**
 * Returns a rewritten copy of `tree` with every range wrapped. A range spanning several text
 * nodes is wrapped once per node, each fragment carrying the same id.
 */
export const wrapRanges = (
  tree: DiscussionTree,
  ranges: readonly WrapRange[],
  options: WrapOptions = {},
): DiscussionTree => {
  const working = cloneDiscussion(tree);
  const segments = buildSegments(working);
  if (!segments.length || !ranges.length) return working;

  const total = segments[segments.length - 1].end;
  const normalized = normalizeRanges(ranges, total, options.strict ?? isStrictMode());

  for (const segment of segments) {
    if (isUnwrappable(segment.node)) continue;
    const overlapping = normalized.filter(
      (range) => range.start < segment.end && range.end > segment.start,
    );
    if (!overlapping.length) continue;
    const pieces = buildPieces(segment, segment.start, segment.end, overlapping);
    working(segment.node).replaceWith(pieces);
  }
  return working;
};
