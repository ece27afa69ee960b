/**
 * @file src/lib/openai-extractor.ts
 * @description Asks an OpenAI chat model which policies, guidelines and essays a discussion cites.
 *              Long discussions are split into overlapping chunks and the per-chunk answers merged.
 */

import fetch from 'node-fetch';
import { z } from 'zod';
import {
  CHUNK_BREAK_WINDOW,
  CHUNK_OVERLAP,
  CHUNK_SIZE,
  OPENAI_DEFAULT_ENDPOINT,
  OPENAI_DEFAULT_MODEL,
  OPENAI_MAX_TOKENS,
  OPENAI_TEMPERATURE,
} from '../shared/analyzer-config';
import {
  CATEGORY_KEYS,
  MENTION_CATEGORIES,
  type Logger,
  type MentionCandidate,
  type MentionCategory,
  type MentionExtractor,
} from '../shared/types';
import { isNoMentionsMessage, parseMentionHtml } from './mention-parser';
import { defaultPolicyCatalog, type PolicyCatalog } from './policy-catalog';
import { buildAnalysisPrompt, SYSTEM_PROMPT } from './prompts';

export class ModelRequestError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = 'ModelRequestError';
    this.status = status;
  }
}

export interface OpenAiExtractorOptions {
  apiKey: string;
  model?: string;
  temperature?: number;
  chunkSize?: number;
  endpoint?: string;
  catalog?: PolicyCatalog;
  logger?: Logger;
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      }),
    )
    .min(1),
});

const SENTENCE_BREAKS = ['. ', '! ', '? ', '\n\n'];
const POLICY_PAGE = /wikipedia\.org\/wiki\/(Wikipedia:[^"]+)/gi;

/**
 * Splits `text` into chunks of at most `maxChunkSize` characters that overlap by `overlap`.
 * A chunk ends after the last sentence end or paragraph break inside its final 200 characters
 * when there is one.
 */
export const chunkText = (
  text: string,
  maxChunkSize: number = CHUNK_SIZE,
  overlap: number = CHUNK_OVERLAP,
): string[] => {
  if (text.length <= maxChunkSize) return [text];

  const chunks: string[] = [];
  let start = 0;
  while (start < text.length) {
    let end = start + maxChunkSize;
    if (end < text.length) {
      const windowStart = Math.max(end - CHUNK_BREAK_WINDOW, start);
      const window = text.slice(windowStart, end);
      const breakAt = Math.max(...SENTENCE_BREAKS.map((marker) => window.lastIndexOf(marker)));
      if (breakAt >= 0 && windowStart + breakAt > start) {
        end = windowStart + breakAt + 1;
      }
    }

    const chunk = text.slice(start, end).trim();
    if (chunk) chunks.push(chunk);
    if (end >= text.length) break;
    start = Math.max(end - overlap, start + 1);
  }
  return chunks;
};

export const noMentionsMessage = (category?: MentionCategory): string =>
  `No ${category ? CATEGORY_KEYS[category] : 'items'} explicitly mentioned in this discussion.`;

/**
 * Keeps the first line naming each distinct policy page across all chunk answers.
 */
export const mergeChunkResults = (results: readonly string[], category?: MentionCategory): string => {
  const seen = new Set<string>();
  const lines: string[] = [];

  for (const result of results) {
    if (!result || isNoMentionsMessage(result)) continue;
    for (const match of result.matchAll(POLICY_PAGE)) {
      const page = match[1];
      if (seen.has(page)) continue;
      seen.add(page);
      const line = result.split('\n').find((candidate) => candidate.includes(page));
      if (line) lines.push(line.trim());
    }
  }
  return lines.length ? lines.join('\n') : noMentionsMessage(category);
};

export const createOpenAiExtractor = ({
  apiKey,
  model = OPENAI_DEFAULT_MODEL,
  temperature = OPENAI_TEMPERATURE,
  chunkSize = CHUNK_SIZE,
  endpoint = OPENAI_DEFAULT_ENDPOINT,
  catalog = defaultPolicyCatalog,
  logger = console,
}: OpenAiExtractorOptions): MentionExtractor => {
  const target = `${endpoint.replace(/\/$/, '')}/v1/chat/completions`;

  const complete = async (prompt: string): Promise<string> => {
    const response = await fetch(target, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${apiKey}`,
      },
      body: JSON.stringify({
        model,
        temperature,
        max_tokens: OPENAI_MAX_TOKENS,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: prompt },
        ],
      }),
    });
    if (!response.ok) {
      const detail = await response.text();
      throw new ModelRequestError(
        `OpenAI request failed (${response.status}): ${detail}`,
        response.status,
      );
    }
    const parsed = ChatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ModelRequestError('OpenAI response did not contain a completion.');
    }
    return (parsed.data.choices[0].message.content ?? '').trim();
  };

  return {
    name: 'openai',
    extract: async ({ text }) => {
      const chunks = chunkText(text, chunkSize);
      logger.log(`[openai] ${text.length} chars in ${chunks.length} chunk(s), model ${model}`);

      const raw: Record<MentionCategory, string> = { policy: '', guideline: '', essay: '' };
      const candidates: MentionCandidate[] = [];
      for (const category of MENTION_CATEGORIES) {
        const answers: string[] = [];
        for (const chunk of chunks) {
          answers.push(await complete(buildAnalysisPrompt(category, chunk, catalog)));
        }
        raw[category] = mergeChunkResults(answers, category);
        candidates.push(...parseMentionHtml(raw[category], category));
      }
      return { candidates, raw };
    },
  };
};
