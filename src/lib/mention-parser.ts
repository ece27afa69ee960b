/**
 * @file src/lib/mention-parser.ts
 * @description Reads the model's HTML answer into mention candidates and renders grounded
 *              mentions back into the per-category HTML lists shown next to the discussion.
 */

import { load } from 'cheerio';
import type { CategoryOutcome, GroundedMention, MentionCandidate, MentionCategory } from '../shared/types';
import { highlightElementId, sentenceElementId } from './discussion-annotator';
import { defaultPolicyCatalog, type PolicyCatalog } from './policy-catalog';

const POLICY_HREF = /(?:wikipedia\.org)?\/wiki\/(?:Wikipedia|WP|Project):([^"#?\s]+)/i;
const LEADING_SHORTCUT = /^\s*((?:WP|MOS):[A-Za-z0-9]+)/;
const PARENTHESIZED = /\(([^)]*)\)/;
const QUOTED = /[“"]([^“”"]+)[”"]/;
const LINE_BREAKS = /\r?\n|<br\s*\/?>|<\/li>|<\/p>/i;
const NO_MENTIONS = /\bNo\s+(?:policies|guidelines|essays|items)\b[^.]*\bmentioned\b/i;

const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');

const safeDecode = (value: string): string => {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
};

export const isNoMentionsMessage = (text: string): boolean => {
  const plain = load(text, null, false).root().text();
  return NO_MENTIONS.test(plain) && !POLICY_HREF.test(text);
};

/**
 * `WP:NPOV (WEIGHT/UNDUE)` -> shortcut `WP:NPOV`, aliases `WEIGHT`, `UNDUE`.
 */
export const parseLinkText = (
  linkText: string,
  href: string | null,
): { shortcut: string | null; aliases: string[] } => {
  const leading = LEADING_SHORTCUT.exec(linkText);
  const fromHref = href ? POLICY_HREF.exec(href) : null;
  const shortcut = leading
    ? leading[1].toUpperCase()
    : fromHref
      ? `WP:${safeDecode(fromHref[1]).toUpperCase()}`
      : null;
  const group = PARENTHESIZED.exec(linkText)?.[1] ?? '';
  const aliases = group
    .split(/[/,;|]|\s+/)
    .map((token) => token.trim())
    .filter((token) => /^[A-Za-z0-9:#]+$/.test(token));
  return { shortcut, aliases };
};

/**
 * One candidate per `<a href=".../wiki/Wikipedia:...">` line. Lines without a policy link
 * (including the "No policies explicitly mentioned" sentinel) yield nothing.
 */
export const parseMentionHtml = (html: string, category: MentionCategory): MentionCandidate[] => {
  if (!html || isNoMentionsMessage(html)) return [];
  const candidates: MentionCandidate[] = [];

  for (const line of html.split(LINE_BREAKS)) {
    if (!line.trim()) continue;
    const $ = load(line, null, false);
    $('a[href]').each((_, element) => {
      const href = $(element).attr('href') ?? null;
      if (!href || !POLICY_HREF.test(href)) return;
      const linkText = $(element).text();
      const { shortcut, aliases } = parseLinkText(linkText, href);
      const trailing = $.root().text().split(linkText).slice(1).join(linkText);
      const quote = QUOTED.exec(trailing)?.[1] ?? null;
      candidates.push({ category, shortcut, aliases, quote, href });
    });
  }
  return candidates;
};

const mentionLabel = (mention: GroundedMention): string =>
  mention.aliases.length
    ? `${mention.shortcut} (${mention.aliases.map((alias) => alias.replace(/^[A-Z]+:/, '')).join('/')})`
    : mention.shortcut;

const renderMention = (mention: GroundedMention, catalog: PolicyCatalog): string => {
  const href = mention.href ?? catalog.urlFor(mention.shortcut);
  const sentenceIds = mention.sentenceIds.map(sentenceElementId).join(' ');
  const anchorAttributes = [
    `href="${escapeHtml(href)}"`,
    'target="_blank"',
    'rel="noopener"',
    `data-highlight="${highlightElementId(mention.highlightId)}"`,
    sentenceIds ? `data-sentence-ids="${sentenceIds}"` : 'class="mention-unanchored"',
  ].join(' ');
  const quote = mention.quote ? `: “${escapeHtml(mention.quote)}”` : '';
  return `<li><a ${anchorAttributes}>${escapeHtml(mentionLabel(mention))}</a>${quote}</li>`;
};

export const renderMentionList = (
  outcome: CategoryOutcome,
  catalog: PolicyCatalog = defaultPolicyCatalog,
): string => {
  if (outcome.status !== 'found') {
    return `<p class="no-mentions">${escapeHtml(outcome.message ?? '')}</p>`;
  }
  const items = outcome.mentions.map((mention) => renderMention(mention, catalog)).join('');
  return `<ul class="mention-list">${items}</ul>`;
};
