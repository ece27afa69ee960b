/**
 * @file src/workflows/fetch-workflow.ts
 * @description Downloads one talk page section through the MediaWiki parse API and reduces its
 *              HTML to the discussion content that gets segmented and annotated.
 */

import { load } from 'cheerio';
import { isComment } from 'domhandler';
import fetch from 'node-fetch';
import { z } from 'zod';
import { flattenHtml } from '../lib/dom-text-mapper';
import { ANALYZER_VERSION } from '../shared/analyzer-config';
import type { DiscussionSnapshot, Logger } from '../shared/types';

const USER_AGENT = `${ANALYZER_VERSION} (talk page policy analysis)`;

export class DiscussionFetchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DiscussionFetchError';
  }
}

export interface TalkPageLocation {
  host: string;
  title: string;
  anchor: string | null;
}

const ApiErrorSchema = z.object({
  error: z.object({ code: z.string().optional(), info: z.string() }),
});

const SectionsSchema = z.object({
  parse: z.object({
    title: z.string(),
    sections: z.array(
      z.object({
        index: z.string(),
        line: z.string(),
        anchor: z.string(),
      }),
    ),
  }),
});

const SectionContentSchema = z.object({
  parse: z.object({
    title: z.string(),
    text: z.string(),
  }),
});

const safeDecode = (value: string): string => {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
};

const normalizeAnchor = (value: string): string => safeDecode(value).replace(/_/g, ' ').trim();

/**
 * Accepts `/wiki/Talk:X#Section` and `/w/index.php?title=Talk:X#Section` on any Wikipedia host.
 */
export const parseTalkUrl = (url: string): TalkPageLocation => {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    throw new DiscussionFetchError(`Not a valid URL: ${url}`);
  }
  if (!/(^|\.)wikipedia\.org$/i.test(parsed.hostname)) {
    throw new DiscussionFetchError(`Not a Wikipedia URL: ${url}`);
  }

  const fromPath = /^\/wiki\/(.+)$/.exec(parsed.pathname)?.[1];
  const rawTitle = fromPath ?? parsed.searchParams.get('title');
  if (!rawTitle) {
    throw new DiscussionFetchError(`No page title in URL: ${url}`);
  }
  const anchor = parsed.hash.replace(/^#/, '');
  return {
    host: parsed.hostname.toLowerCase(),
    title: safeDecode(rawTitle).replace(/_/g, ' '),
    anchor: anchor ? normalizeAnchor(anchor) : null,
  };
};

const REMOVED_SELECTORS = [
  'style',
  'script',
  'noscript',
  "link[rel='stylesheet']",
  '.mw-editsection',
  '.mw-empty-elt',
  '.mw-jump-link',
  'div#toc',
  '.toc',
  '.navbox',
].join(', ');

/**
 * Strips edit links, styles and other page chrome from parser output and drops comments. Links
 * are kept: they carry the policy pages that participants cite.
 */
export const sanitizeDiscussionHtml = (html: string): string => {
  const $ = load(html, null, false);
  $(REMOVED_SELECTORS).remove();
  $.root()
    .find('*')
    .addBack()
    .contents()
    .filter((_, node) => isComment(node))
    .remove();
  const root = $('.mw-parser-output').first();
  const inner = root.length ? root.html() : $.root().html();
  return (inner ?? '').trim();
};

const requestJson = async (host: string, params: Record<string, string>): Promise<unknown> => {
  const query = new URLSearchParams({ format: 'json', formatversion: '2', ...params });
  const target = `https://${host}/w/api.php?${query.toString()}`;
  const response = await fetch(target, { headers: { 'User-Agent': USER_AGENT } });
  if (!response.ok) {
    const snippet = (await response.text()).slice(0, 200);
    throw new DiscussionFetchError(`HTTP ${response.status} ${response.statusText} (${snippet})`);
  }
  const payload: unknown = await response.json();
  const apiError = ApiErrorSchema.safeParse(payload);
  if (apiError.success) {
    throw new DiscussionFetchError(`MediaWiki API error: ${apiError.data.error.info}`);
  }
  return payload;
};

export interface FetchDiscussionOptions {
  logger?: Logger;
}

export const fetchDiscussion = async (
  url: string,
  { logger = console }: FetchDiscussionOptions = {},
): Promise<DiscussionSnapshot> => {
  const location = parseTalkUrl(url);
  const params: Record<string, string> = { action: 'parse', page: location.title };
  let sectionTitle = location.title;

  if (location.anchor) {
    const sections = SectionsSchema.safeParse(
      await requestJson(location.host, { ...params, prop: 'sections' }),
    );
    if (!sections.success) {
      throw new DiscussionFetchError(`Unexpected sections response for '${location.title}'`);
    }
    const wanted = location.anchor;
    const section = sections.data.parse.sections.find(
      (entry) => normalizeAnchor(entry.anchor) === wanted || entry.line.trim() === wanted,
    );
    if (!section) {
      throw new DiscussionFetchError(`Section '${wanted}' not found on '${location.title}'`);
    }
    params.section = section.index;
    sectionTitle = load(section.line, null, false).root().text();
    logger.log(`[fetch] ${location.title} section ${section.index} (${sectionTitle})`);
  } else {
    logger.log(`[fetch] ${location.title} (whole page)`);
  }

  const content = SectionContentSchema.safeParse(
    await requestJson(location.host, { ...params, prop: 'text' }),
  );
  if (!content.success) {
    throw new DiscussionFetchError(`Unexpected content response for '${location.title}'`);
  }

  const html = sanitizeDiscussionHtml(content.data.parse.text);
  return {
    url,
    title: content.data.parse.title,
    section: sectionTitle,
    html,
    text: flattenHtml(html),
  };
};
