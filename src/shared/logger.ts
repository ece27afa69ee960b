/**
 * @file src/shared/logger.ts
 * @description Loggers handed to the workflows.
 */

import type { Logger } from './types';

/**
 * Sends every level to stderr so that stdout carries only command output (JSON, TSV, CSV).
 */
export const createStderrLogger = (): Logger => ({
  log: (...args) => console.error(...args),
  warn: (...args) => console.error(...args),
  error: (...args) => console.error(...args),
});

/** Drops informational messages; warnings and errors still reach stderr. */
export const createQuietLogger = (): Logger => ({
  log: () => undefined,
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
});
