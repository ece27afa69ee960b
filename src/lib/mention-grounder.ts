/**
 * @file src/lib/mention-grounder.ts
 * @description Keeps only extracted mentions whose shortcut actually occurs in the discussion,
 *              links each survivor to the sentences that contain it and assigns stable highlight ids.
 */

import {
  CASE_SENSITIVE_SUFFIX_MAX_LENGTH,
  MIN_BARE_SUFFIX_LENGTH,
} from '../shared/analyzer-config';
import {
  MENTION_CATEGORIES,
  type CategoryOutcome,
  type CategoryStatus,
  type DroppedMention,
  type GroundedMention,
  type GroundingResult,
  type HighlightBinding,
  type MatchKind,
  type MentionCandidate,
  type MentionCategory,
  type SentenceSpan,
} from '../shared/types';

export interface GroundingOptions {
  minBareSuffixLength?: number;
  caseSensitiveSuffixMaxLength?: number;
}

export interface GroundMentionsInput {
  candidates: readonly MentionCandidate[];
  plainText: string | null | undefined;
  sentences: readonly SentenceSpan[];
  options?: GroundingOptions;
}

export interface ShortcutMatch {
  kind: MatchKind;
  index: number;
  length: number;
}

const NAMESPACE_SEPARATOR = ':';

const CATEGORY_LABELS: Record<MentionCategory, string> = {
  policy: 'policies',
  guideline: 'guidelines',
  essay: 'essays',
};

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Canonical form used for de-duplication and ordering: trimmed, inner whitespace collapsed,
 * upper-cased (`wp:npov` and `WP:NPOV` are the same page).
 */
export const normalizeShortcut = (value: string | null | undefined): string | null => {
  if (typeof value !== 'string') return null;
  const cleaned = value.trim().replace(/\s+/g, ' ').toUpperCase();
  return cleaned.length ? cleaned : null;
};

export const bareSuffix = (shortcut: string): string | null => {
  const separator = shortcut.indexOf(NAMESPACE_SEPARATOR);
  if (separator < 0) return null;
  const suffix = shortcut.slice(separator + 1).trim();
  return suffix.length ? suffix : null;
};

const tokenPattern = (value: string, caseSensitive: boolean): RegExp =>
  new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(value)}(?![\\p{L}\\p{N}_])`, caseSensitive ? 'u' : 'iu');

/**
 * First case-insensitive occurrence of `value` that is not part of a longer token
 * (`WP:NOT` inside `WP:NOTCENSORED` is skipped).
 */
export const findWholeToken = (text: string, value: string): ShortcutMatch | null => {
  if (!text || !value) return null;
  const match = tokenPattern(value, false).exec(text);
  return match ? { kind: 'exact', index: match.index, length: match[0].length } : null;
};

/**
 * Finds the first occurrence of `shortcut` in `text`: the whole shortcut as a case-insensitive
 * substring first, then its bare suffix as a whole word.
 */
export const findShortcut = (
  text: string,
  shortcut: string,
  options: GroundingOptions = {},
): ShortcutMatch | null => {
  if (!text || !shortcut) return null;

  const exact = new RegExp(escapeRegExp(shortcut), 'iu').exec(text);
  if (exact) {
    return { kind: 'exact', index: exact.index, length: exact[0].length };
  }

  const suffix = bareSuffix(shortcut);
  const minLength = options.minBareSuffixLength ?? MIN_BARE_SUFFIX_LENGTH;
  if (!suffix || suffix.length < minLength) return null;

  const caseSensitive =
    suffix.length <= (options.caseSensitiveSuffixMaxLength ?? CASE_SENSITIVE_SUFFIX_MAX_LENGTH);
  const match = tokenPattern(suffix, caseSensitive).exec(text);
  return match ? { kind: 'bare-suffix', index: match.index, length: match[0].length } : null;
};

export const matchesShortcut = (
  text: string,
  shortcut: string,
  options: GroundingOptions = {},
): MatchKind | null => findShortcut(text, shortcut, options)?.kind ?? null;

export interface FormMatch extends ShortcutMatch {
  form: string;
}

/**
 * Tries each form (shortcut first, then its aliases) and returns the first one found.
 */
export const findAnyForm = (
  text: string,
  forms: readonly string[],
  options: GroundingOptions = {},
): FormMatch | null => {
  for (const form of forms) {
    const match = findShortcut(text, form, options);
    if (match) return { ...match, form };
  }
  return null;
};

/**
 * Aliases without a namespace inherit the shortcut's (`UNDUE` under `WP:NPOV` becomes `WP:UNDUE`).
 */
export const normalizeAliases = (
  shortcut: string,
  aliases: readonly string[] | null | undefined,
): string[] => {
  const separator = shortcut.indexOf(NAMESPACE_SEPARATOR);
  const namespace = separator > 0 ? shortcut.slice(0, separator) : null;
  const normalized = new Set<string>();
  for (const alias of aliases ?? []) {
    const cleaned = normalizeShortcut(alias);
    if (!cleaned) continue;
    const form =
      namespace && !cleaned.includes(NAMESPACE_SEPARATOR)
        ? `${namespace}${NAMESPACE_SEPARATOR}${cleaned}`
        : cleaned;
    if (form !== shortcut) normalized.add(form);
  }
  return Array.from(normalized);
};

const normalizeQuote = (value: string | null | undefined): string | null => {
  if (typeof value !== 'string') return null;
  const cleaned = value
    .replace(/^[\s"'“”‘’]+|[\s"'“”‘’]+$/g, '')
    .replace(/\s+/g, ' ');
  return cleaned.length ? cleaned : null;
};

const quoteOccursIn = (text: string, quote: string): boolean =>
  text.replace(/\s+/g, ' ').toLowerCase().includes(quote.toLowerCase());

const optionalString = (value: string | null | undefined): string | null => {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed.length ? trimmed : null;
};

export const categoryMessage = (
  category: MentionCategory,
  status: CategoryStatus,
): string | null => {
  const label = CATEGORY_LABELS[category];
  if (status === 'no-candidates') return `No ${label} explicitly mentioned in this discussion.`;
  if (status === 'none-grounded') return `No ${label} found in this discussion.`;
  return null;
};

/**
 * Highlight ids follow the lexicographic order of the distinct shortcuts, never discovery order.
 */
export const assignHighlightIds = (shortcuts: Iterable<string>): Record<string, number> => {
  const ordered = Array.from(new Set(shortcuts)).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.fromEntries(ordered.map((shortcut, index) => [shortcut, index]));
};

export const sentenceIdsFor = (
  forms: readonly string[],
  sentences: readonly SentenceSpan[],
  options: GroundingOptions = {},
): number[] =>
  sentences
    .filter((sentence) => findAnyForm(sentence.text, forms, options) !== null)
    .map((sentence) => sentence.index);

export const groundMentions = ({
  candidates,
  plainText,
  sentences,
  options = {},
}: GroundMentionsInput): GroundingResult => {
  const text = plainText ?? '';
  const dropped: DroppedMention[] = [];
  const retained: Array<Omit<GroundedMention, 'highlightId' | 'sentenceIds'>> = [];
  const candidateCounts: Record<MentionCategory, number> = { policy: 0, guideline: 0, essay: 0 };
  let skipped = 0;

  for (const candidate of candidates) {
    const shortcut = normalizeShortcut(candidate.shortcut);
    if (!shortcut || !MENTION_CATEGORIES.includes(candidate.category)) {
      skipped += 1;
      continue;
    }
    candidateCounts[candidate.category] += 1;

    const quote = normalizeQuote(candidate.quote);
    const aliases = normalizeAliases(shortcut, candidate.aliases);
    const match = findAnyForm(text, [shortcut, ...aliases], options);
    if (!match) {
      dropped.push({ category: candidate.category, shortcut, quote });
      continue;
    }
    retained.push({
      category: candidate.category,
      shortcut,
      aliases,
      quote,
      quoteVerified: quote !== null && quoteOccursIn(text, quote),
      href: optionalString(candidate.href),
      name: optionalString(candidate.name),
      matchedBy: match.kind,
      matchedForm: match.form,
    });
  }

  const formsByShortcut: Record<string, string[]> = {};
  for (const mention of retained) {
    const forms = formsByShortcut[mention.shortcut] ?? [mention.shortcut];
    for (const alias of mention.aliases) {
      if (!forms.includes(alias)) forms.push(alias);
    }
    formsByShortcut[mention.shortcut] = forms;
  }

  const highlightIds = assignHighlightIds(Object.keys(formsByShortcut));
  const sentenceIdsByHighlight: number[][] = [];
  for (const [shortcut, highlightId] of Object.entries(highlightIds)) {
    sentenceIdsByHighlight[highlightId] = sentenceIdsFor(formsByShortcut[shortcut], sentences, options);
  }

  const mentions: GroundedMention[] = retained.map((mention) => {
    const highlightId = highlightIds[mention.shortcut];
    return { ...mention, highlightId, sentenceIds: [...sentenceIdsByHighlight[highlightId]] };
  });

  const outcome = (category: MentionCategory): CategoryOutcome => {
    const found = mentions.filter((mention) => mention.category === category);
    const candidateCount = candidateCounts[category];
    const status: CategoryStatus = found.length
      ? 'found'
      : candidateCount
        ? 'none-grounded'
        : 'no-candidates';
    return {
      category,
      status,
      candidateCount,
      mentions: found,
      message: categoryMessage(category, status),
    };
  };
  const categories: Record<MentionCategory, CategoryOutcome> = {
    policy: outcome('policy'),
    guideline: outcome('guideline'),
    essay: outcome('essay'),
  };

  const binding: HighlightBinding = { highlightIds, sentenceIdsByHighlight, formsByShortcut };
  return { mentions, dropped, skipped, categories, binding };
};
