/**
 * @file src/lib/prompts.ts
 * @description Prompt text for the chat model, one prompt per mention category.
 */

import { CATEGORY_KEYS, MENTION_CATEGORIES, type MentionCategory } from '../shared/types';
import { defaultPolicyCatalog, WIKI_BASE_URL, type PolicyCatalog } from './policy-catalog';

export const SYSTEM_PROMPT = [
  'You read Wikipedia talk page discussions and list the policies, guidelines and essays',
  'that participants cite. Report only what the text actually names; never infer a page',
  'from the topic of an argument.',
].join(' ');

const describeEntries = (category: MentionCategory, catalog: PolicyCatalog): string[] =>
  catalog.entries
    .filter((entry) => entry.category === category)
    .map((entry) => {
      const aliases = entry.aliases.length ? ` (also ${entry.aliases.join(', ')})` : '';
      return `- ${entry.shortcut}: ${entry.name}${aliases}`;
    });

const otherLabels = (category: MentionCategory): string =>
  MENTION_CATEGORIES.filter((other) => other !== category)
    .map((other) => CATEGORY_KEYS[other])
    .join(' or ');

export const buildAnalysisPrompt = (
  category: MentionCategory,
  discussionText: string,
  catalog: PolicyCatalog = defaultPolicyCatalog,
): string => {
  const label = CATEGORY_KEYS[category];
  const instructions = [
    `List every Wikipedia ${label.toUpperCase()} cited in the discussion below.`,
    '',
    `Known ${label}:`,
    ...describeEntries(category, catalog),
    '',
    `Do not list ${otherLabels(category)}.`,
    'A mention counts only when the shortcut (WP:UNDUE, MOS:LABEL) or its bare form (UNDUE)',
    'appears in the text. Treat aliases as the page they belong to.',
    '',
    'Answer with one line per page, exactly in this form:',
    `<a href="${WIKI_BASE_URL}Wikipedia:SHORTCUT">WP:SHORTCUT (ALIAS/ALIAS)</a>: "short quote from the discussion"`,
    'Leave out the parenthesis when no alias was used.',
    `If nothing is cited, answer: No ${label} explicitly mentioned in this discussion.`,
  ];
  return [...instructions, '', '=== DISCUSSION ===', discussionText].join('\n');
};
