/**
 * @file src/server.ts
 * @description HTTP front end: `POST /analyze` runs the analysis workflow for one talk page URL and
 *              returns the annotated discussion with its per-category mention lists.
 */

import express, { type ErrorRequestHandler, type Request, type Response } from 'express';
import type { Server } from 'node:http';
import { z } from 'zod';
import { ModelRequestError } from './lib/openai-extractor';
import { ANALYZER_VERSION } from './shared/analyzer-config';
import type { Logger } from './shared/types';
import { DiscussionFetchError } from './workflows/fetch-workflow';
import type { AnalyzeResult } from './workflows/analyze-workflow';

const AnalyzeBodySchema = z.object({
  url: z.string().trim().url(),
});

export type AnalyzeRunner = (url: string) => Promise<AnalyzeResult>;

export interface ServerDependencies {
  runAnalysis: AnalyzeRunner;
  logger?: Logger;
}

export interface HandlerOutcome {
  status: number;
  body: Record<string, unknown>;
}

const toResponseBody = (result: AnalyzeResult): Record<string, unknown> => ({
  url: result.url,
  title: result.title,
  section: result.section,
  discussion_html: result.discussion_html,
  policies: result.policies,
  guidelines: result.guidelines,
  essays: result.essays,
  sentences: result.sentences,
  bindings: result.bindings,
  extractor: result.extractor,
});

/**
 * Validates the body and maps workflow failures to status codes: 400 for bad input, 502 when
 * Wikipedia or the model cannot be reached, 500 for anything else.
 */
export const handleAnalyzeRequest = async (
  body: unknown,
  { runAnalysis, logger = console }: ServerDependencies,
): Promise<HandlerOutcome> => {
  const parsed = AnalyzeBodySchema.safeParse(body ?? {});
  if (!parsed.success) {
    return {
      status: 400,
      body: { error: 'Invalid request', message: 'Body must be JSON with a "url" string.' },
    };
  }

  try {
    const result = await runAnalysis(parsed.data.url);
    return { status: 200, body: toResponseBody(result) };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (error instanceof DiscussionFetchError || error instanceof ModelRequestError) {
      logger.warn(`[server] upstream failure for ${parsed.data.url}: ${message}`);
      return { status: 502, body: { error: 'Upstream failure', message } };
    }
    logger.error(`[server] analysis failed for ${parsed.data.url}:`, error);
    return { status: 500, body: { error: 'Internal error', message } };
  }
};

export const createServer = (deps: ServerDependencies): express.Express => {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', version: ANALYZER_VERSION });
  });

  app.post('/analyze', async (req: Request, res: Response) => {
    const outcome = await handleAnalyzeRequest(req.body, deps);
    if (!res.headersSent) {
      res.status(outcome.status).json(outcome.body);
    }
  });

  const handleError: ErrorRequestHandler = (error, _req, res, _next) => {
    const status = error instanceof SyntaxError ? 400 : 500;
    if (status === 500) {
      (deps.logger ?? console).error('[server] Unhandled error:', error);
    }
    res.status(status).json({
      error: status === 400 ? 'Invalid request' : 'Internal error',
      message: error instanceof Error ? error.message : String(error),
    });
  };
  app.use(handleError);

  return app;
};

export const startServer = (
  deps: ServerDependencies,
  port: number,
  host = '127.0.0.1',
): Promise<Server> => {
  const logger = deps.logger ?? console;
  const app = createServer(deps);
  return new Promise((resolve, reject) => {
    const server = app
      .listen(port, host, () => {
        logger.log(`[server] Listening on http://${host}:${port}`);
        resolve(server);
      })
      .on('error', (error) => {
        logger.error('[server] Failed to start server:', error);
        reject(error);
      });
  });
};
