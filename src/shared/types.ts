/**
 * @file src/shared/types.ts
 * @description Shared types for the segmenter, the DOM mapper, the grounder and the extractors.
 */

import type { Text } from 'domhandler';

export type MentionCategory = 'policy' | 'guideline' | 'essay';

export const MENTION_CATEGORIES: readonly MentionCategory[] = ['policy', 'guideline', 'essay'];

/** Plural keys used by the HTTP payload and the export rows. */
export const CATEGORY_KEYS = {
  policy: 'policies',
  guideline: 'guidelines',
  essay: 'essays',
} as const satisfies Record<MentionCategory, string>;

export type CategoryKey = (typeof CATEGORY_KEYS)[MentionCategory];

export interface TextSegment {
  node: Text;
  start: number;
  end: number;
}

export interface SentenceSpan {
  index: number;
  start: number;
  end: number;
  text: string;
}

/**
 * Raw mention as produced by an extractor. Every field is optional:
 * model output is untrusted and gets validated by the grounder.
 */
export interface MentionCandidate {
  category: MentionCategory;
  shortcut?: string | null;
  /** Alternative shortcuts for the same page, e.g. `UNDUE` reported under `WP:NPOV`. */
  aliases?: readonly string[] | null;
  quote?: string | null;
  href?: string | null;
  name?: string | null;
}

export type MatchKind = 'exact' | 'bare-suffix';

export interface GroundedMention {
  category: MentionCategory;
  shortcut: string;
  aliases: string[];
  quote: string | null;
  quoteVerified: boolean;
  href: string | null;
  name: string | null;
  matchedBy: MatchKind;
  /** The shortcut or alias whose occurrence grounded the mention. */
  matchedForm: string;
  highlightId: number;
  sentenceIds: number[];
}

export interface DroppedMention {
  category: MentionCategory;
  shortcut: string;
  quote: string | null;
}

export type CategoryStatus = 'found' | 'none-grounded' | 'no-candidates';

export interface CategoryOutcome {
  category: MentionCategory;
  status: CategoryStatus;
  candidateCount: number;
  mentions: GroundedMention[];
  message: string | null;
}

export interface HighlightBinding {
  /** Canonical shortcut -> highlight id. */
  highlightIds: Record<string, number>;
  /** Indexed by highlight id; sentence indices sorted ascending. */
  sentenceIdsByHighlight: number[][];
  /** Shortcut followed by every alias reported for it, in match priority order. */
  formsByShortcut: Record<string, string[]>;
}

export interface GroundingResult {
  mentions: GroundedMention[];
  dropped: DroppedMention[];
  skipped: number;
  categories: Record<MentionCategory, CategoryOutcome>;
  binding: HighlightBinding;
}

export interface DiscussionSnapshot {
  url: string;
  title: string;
  section: string;
  html: string;
  text: string;
}

export type ExtractorName = 'openai' | 'pattern';

export interface ExtractionInput {
  html: string;
  text: string;
}

export interface ExtractionResult {
  candidates: MentionCandidate[];
  /** The model's merged answer per category; absent for the pattern extractor. */
  raw?: Record<MentionCategory, string>;
}

export interface MentionExtractor {
  name: ExtractorName;
  extract: (input: ExtractionInput) => Promise<ExtractionResult>;
}

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;
