/**
 * @file src/shared/analyzer-config.ts
 * @description Centralized knobs for the mention analyzer: chunking, grounding and markup names.
 */

import pkg from '../../package.json';

export const ANALYZER_VERSION = `policy-lens@${pkg.version}`;

/**
 * Discussion text is sent to the model in overlapping windows of this many characters.
 */
export const CHUNK_SIZE = 3000;
export const CHUNK_OVERLAP = 300;

/**
 * How far back from a chunk's end we look for a sentence or paragraph break.
 */
export const CHUNK_BREAK_WINDOW = 200;

export const OPENAI_DEFAULT_MODEL = 'gpt-4o-mini';
export const OPENAI_DEFAULT_ENDPOINT = 'https://api.openai.com';
export const OPENAI_TEMPERATURE = 0.3;
export const OPENAI_MAX_TOKENS = 1500;

/**
 * Bare suffixes shorter than this (e.g. the `V` of `WP:V`) never ground a mention on their own.
 */
export const MIN_BARE_SUFFIX_LENGTH = 2;

/**
 * Bare suffixes up to this length must match in the shortcut's own case. 0 keeps
 * matching fully case-insensitive.
 */
export const CASE_SENSITIVE_SUFFIX_MAX_LENGTH = 0;

export const CONTEXT_PREVIEW_CHARS = 100;

export const SENTENCE_CLASS = 'discussion-sentence';
export const SENTENCE_ID_ATTRIBUTE = 'data-sentence-id';
export const SENTENCE_ID_PREFIX = 'sent-';

export const HIGHLIGHT_CLASS = 'policy-mention';
export const HIGHLIGHT_ID_PREFIX = 'highlight-';

export const DEFAULT_PORT = 5001;

/**
 * Range invariant violations throw instead of being clamped.
 */
export const isStrictMode = (): boolean => process.env.POLICY_LENS_STRICT === '1';
