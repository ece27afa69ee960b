/**
 * @file src/lib/pattern-extractor.ts
 * @description Model-free fallback: finds explicit `WP:`/`MOS:` shortcuts in the discussion text
 *              and policy links in its HTML, and classifies them through the policy catalog.
 */

import { load } from 'cheerio';
import type { MentionCandidate, MentionExtractor } from '../shared/types';
import { defaultPolicyCatalog, toShortcutForm, type PolicyCatalog } from './policy-catalog';
import { segmentSentences } from './sentence-segmenter';

export interface PatternExtractInput {
  html: string;
  text: string;
  catalog?: PolicyCatalog;
}

const SHORTCUT_IN_TEXT =
  /(?<![\p{L}\p{N}_])(?:WP|MOS|Wikipedia|Project)\s?:\s?[A-Za-z0-9][A-Za-z0-9_#-]*/giu;
const SHORTCUT_ONLY = /^(?:WP|MOS|Wikipedia|Project)\s?:\s?[A-Za-z0-9][A-Za-z0-9_#-]*$/iu;
const POLICY_LINK = /\/wiki\/((?:Wikipedia|WP|Project|MOS):[^#?]+)/i;

const cleanForm = (raw: string): string => raw.replace(/\s*:\s*/, ':').replace(/[#_-]+$/, '');

/**
 * Known forms resolve to the catalog entry's shortcut, keeping the spelling found in the text as
 * an alias (`WP:UNDUE` -> `WP:NPOV` + `WP:UNDUE`). Unknown forms stand for themselves.
 */
const canonicalize = (
  raw: string,
  catalog: PolicyCatalog,
): { shortcut: string; spelled: string } => {
  const form = cleanForm(raw);
  const spelled = toShortcutForm(form);
  const entry = catalog.lookup(form)?.entry;
  return { shortcut: entry ? toShortcutForm(entry.shortcut) : spelled, spelled };
};

const safeDecode = (value: string): string => {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
};

const buildCandidate = (
  shortcut: string,
  catalog: PolicyCatalog,
  extra: Partial<MentionCandidate> = {},
): MentionCandidate => {
  const match = catalog.lookup(shortcut);
  return {
    category: catalog.categorize(shortcut),
    shortcut,
    name: match?.entry.name ?? null,
    href: catalog.urlFor(shortcut),
    ...extra,
  };
};

/**
 * One candidate per occurrence: shortcuts spelled out in the text first, then policy links whose
 * visible text is prose (links reading `WP:X` are already covered by the text scan). A link
 * contributes its page's shortcut with the visible text as an alias.
 */
export const extractPatternMentions = ({
  html,
  text,
  catalog = defaultPolicyCatalog,
}: PatternExtractInput): MentionCandidate[] => {
  const candidates: MentionCandidate[] = [];
  const sentences = segmentSentences(text);
  const sentenceAt = (offset: number): string | null =>
    sentences.find((sentence) => sentence.start <= offset && offset < sentence.end)?.text ?? null;

  for (const match of text.matchAll(SHORTCUT_IN_TEXT)) {
    const { shortcut, spelled } = canonicalize(match[0], catalog);
    candidates.push(
      buildCandidate(shortcut, catalog, {
        aliases: spelled === shortcut ? [] : [spelled],
        quote: sentenceAt(match.index ?? 0),
      }),
    );
  }

  if (!html) return candidates;
  const $ = load(html, null, false);
  $('a[href]').each((_, element) => {
    const href = $(element).attr('href') ?? '';
    const page = POLICY_LINK.exec(href)?.[1];
    if (!page) return;
    const linkText = $(element).text().trim();
    if (!linkText || SHORTCUT_ONLY.test(linkText)) return;
    const { shortcut } = canonicalize(safeDecode(page).replace(/_/g, ' '), catalog);
    const offset = text.indexOf(linkText);
    candidates.push(
      buildCandidate(shortcut, catalog, {
        aliases: [linkText],
        quote: offset >= 0 ? sentenceAt(offset) : null,
      }),
    );
  });
  return candidates;
};

export const createPatternExtractor = (
  catalog: PolicyCatalog = defaultPolicyCatalog,
): MentionExtractor => ({
  name: 'pattern',
  extract: async ({ html, text }) => ({
    candidates: extractPatternMentions({ html, text, catalog }),
  }),
});
