/**
 * @file tests/openai-extractor.test.ts
 * @description Chunking, chunk-answer merging and the chat completions client (fetch mocked).
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('node-fetch', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node-fetch')>();
  return {
    ...actual,
    default: vi.fn(),
  };
});

import fetch, { Response } from 'node-fetch';
import {
  chunkText,
  createOpenAiExtractor,
  mergeChunkResults,
  ModelRequestError,
} from '../src/lib/openai-extractor';

const mockFetch = vi.mocked(fetch);

const NPOV_URL = 'https://en.wikipedia.org/wiki/Wikipedia:Neutral_point_of_view';
const OR_URL = 'https://en.wikipedia.org/wiki/Wikipedia:No_original_research';

const completion = (content: string) =>
  new Response(JSON.stringify({ choices: [{ message: { content } }] }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });

const silentLogger = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };

describe('chunkText', () => {
  it('returns short text as a single chunk', () => {
    expect(chunkText('Short discussion.')).toEqual(['Short discussion.']);
  });

  it('cuts overlapping chunks at sentence ends', () => {
    expect(chunkText('aaaa. bbbb. cccc. dddd.', 10, 3)).toEqual([
      'aaaa.',
      'aa. bbbb.',
      'bb. cccc.',
      'cc. dddd.',
    ]);
  });
});

describe('mergeChunkResults', () => {
  it('keeps the first line for each policy page', () => {
    const merged = mergeChunkResults([
      `<a href="${NPOV_URL}">WP:NPOV</a>: "x"\n<a href="${OR_URL}">WP:OR</a>: "y"`,
      'No policies explicitly mentioned in this discussion.',
      `<a href="${NPOV_URL}">WP:NPOV (UNDUE)</a>: "z"`,
    ]);
    expect(merged).toBe(
      `<a href="${NPOV_URL}">WP:NPOV</a>: "x"\n<a href="${OR_URL}">WP:OR</a>: "y"`,
    );
  });

  it('falls back to the no-mentions message', () => {
    expect(mergeChunkResults([], 'essay')).toBe('No essays explicitly mentioned in this discussion.');
    expect(mergeChunkResults(['No items explicitly mentioned in this discussion.'])).toBe(
      'No items explicitly mentioned in this discussion.',
    );
  });
});

describe('createOpenAiExtractor', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('asks once per category and parses the merged answers', async () => {
    mockFetch.mockImplementation(async (_url, init) => {
      const body = String(init?.body);
      if (body.includes('List every Wikipedia POLICIES')) {
        return completion(`<a href="${NPOV_URL}">WP:NPOV</a>: "needs balance"`);
      }
      if (body.includes('List every Wikipedia GUIDELINES')) {
        return completion('No guidelines explicitly mentioned in this discussion.');
      }
      return completion('No essays explicitly mentioned in this discussion.');
    });

    const extractor = createOpenAiExtractor({ apiKey: 'test-secret', logger: silentLogger });
    const result = await extractor.extract({ html: '', text: 'Per WP:NPOV this needs balance.' });

    expect(extractor.name).toBe('openai');
    expect(mockFetch).toHaveBeenCalledTimes(3);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://api.openai.com/v1/chat/completions');
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
    expect(result.candidates).toEqual([
      { category: 'policy', shortcut: 'WP:NPOV', aliases: [], quote: 'needs balance', href: NPOV_URL },
    ]);
    expect(result.raw).toEqual({
      policy: `<a href="${NPOV_URL}">WP:NPOV</a>: "needs balance"`,
      guideline: 'No guidelines explicitly mentioned in this discussion.',
      essay: 'No essays explicitly mentioned in this discussion.',
    });
  });

  it('surfaces HTTP failures as ModelRequestError', async () => {
    mockFetch.mockImplementation(async () => new Response('quota exceeded', { status: 429 }));
    const extractor = createOpenAiExtractor({ apiKey: 'test-secret', logger: silentLogger });
    const failure = extractor.extract({ html: '', text: 'Per WP:NPOV.' });
    await expect(failure).rejects.toBeInstanceOf(ModelRequestError);
    await expect(failure).rejects.toMatchObject({
      status: 429,
      message: 'OpenAI request failed (429): quota exceeded',
    });
  });

  it('rejects responses without a completion', async () => {
    mockFetch.mockImplementation(
      async () => new Response(JSON.stringify({ choices: [] }), { status: 200 }),
    );
    const extractor = createOpenAiExtractor({ apiKey: 'test-secret', logger: silentLogger });
    await expect(extractor.extract({ html: '', text: 'Text.' })).rejects.toThrow(
      'OpenAI response did not contain a completion.',
    );
  });
});
