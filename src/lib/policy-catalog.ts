/**
 * @file src/lib/policy-catalog.ts
 * @description Known policy, guideline and essay shortcuts with their aliases, loaded from
 *              `data/policy-catalog.json`.
 */

import { z } from 'zod';
import catalogData from '../../data/policy-catalog.json';
import type { MentionCategory } from '../shared/types';

export const WIKI_BASE_URL = 'https://en.wikipedia.org/wiki/';

const CatalogEntrySchema = z.object({
  shortcut: z.string().min(1),
  name: z.string().min(1),
  page: z.string().min(1),
  category: z.enum(['policy', 'guideline', 'essay']),
  aliases: z.array(z.string()).default([]),
});

const CatalogSchema = z.object({
  entries: z.array(CatalogEntrySchema),
});

export type CatalogEntry = z.infer<typeof CatalogEntrySchema>;

export interface CatalogMatch {
  entry: CatalogEntry;
  /** The form that was looked up, upper-cased, e.g. `WP:UNDUE`. */
  form: string;
}

export interface PolicyCatalog {
  entries: CatalogEntry[];
  lookup: (value: string) => CatalogMatch | null;
  categorize: (shortcut: string) => MentionCategory;
  urlFor: (shortcut: string) => string;
}

const normalizePage = (value: string): string => value.trim().replace(/[\s_]+/g, '_').toUpperCase();

/**
 * `Wikipedia:NPOV`, `Project:NPOV` and `WP:NPOV` all name the same shortcut.
 */
export const toShortcutForm = (value: string): string =>
  value
    .trim()
    .replace(/^(?:wikipedia|project)\s*:/i, 'WP:')
    .replace(/\s+/g, '_')
    .toUpperCase();

export const createPolicyCatalog = (raw: unknown): PolicyCatalog => {
  const { entries } = CatalogSchema.parse(raw);
  const byForm = new Map<string, CatalogEntry>();
  const byPage = new Map<string, CatalogEntry>();

  for (const entry of entries) {
    byForm.set(toShortcutForm(entry.shortcut), entry);
    for (const alias of entry.aliases) {
      byForm.set(toShortcutForm(alias), entry);
    }
    byPage.set(normalizePage(entry.page), entry);
  }

  const lookup = (value: string): CatalogMatch | null => {
    const form = toShortcutForm(value);
    const entry = byForm.get(form) ?? byPage.get(normalizePage(value)) ?? null;
    return entry ? { entry, form } : null;
  };

  const categorize = (shortcut: string): MentionCategory => {
    const match = lookup(shortcut);
    if (match) return match.entry.category;
    return /^MOS:/i.test(shortcut) ? 'guideline' : 'essay';
  };

  const urlFor = (shortcut: string): string => {
    const match = lookup(shortcut);
    if (match) return `${WIKI_BASE_URL}${match.entry.page}`;
    const form = toShortcutForm(shortcut);
    const title = form.startsWith('WP:') ? `Wikipedia:${form.slice(3)}` : form;
    return `${WIKI_BASE_URL}${title}`;
  };

  return { entries, lookup, categorize, urlFor };
};

export const defaultPolicyCatalog: PolicyCatalog = createPolicyCatalog(catalogData);
