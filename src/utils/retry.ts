import type { Logger } from './logger.js';
import { delay } from './delay.js';
import { RetriesExhaustedError } from '../errors.js';

export interface RetryOptions {
  tries?: number;
  delayMs?: number;
  backoff?: number;
  maxIntervalMs?: number;
  /** Used in log lines and in the RetriesExhaustedError message. */
  name?: string;
  logger?: Logger;
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: unknown, waitMs: number) => void;
}

export const DEFAULT_RETRY_OPTIONS = {
  tries: 3,
  delayMs: 1000,
  backoff: 2,
  maxIntervalMs: 10000,
} as const;

/**
 * Runs `operation` up to `tries` times. Between failed attempts it waits the
 * current delay (capped at `maxIntervalMs`), then multiplies the delay by
 * `backoff`. An aborted `signal` ends the loop at once with the abort reason.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const tries = Math.max(1, options.tries ?? DEFAULT_RETRY_OPTIONS.tries);
  const backoff = options.backoff ?? DEFAULT_RETRY_OPTIONS.backoff;
  const maxIntervalMs = options.maxIntervalMs ?? DEFAULT_RETRY_OPTIONS.maxIntervalMs;
  const name = options.name ?? (operation.name || 'operation');
  const { logger, signal } = options;

  let currentDelay = options.delayMs ?? DEFAULT_RETRY_OPTIONS.delayMs;
  let lastError: unknown;

  for (let attempt = 1; attempt <= tries; attempt++) {
    signal?.throwIfAborted();
    logger?.debug(`${name} will attempt ${attempt} of ${tries}`);

    try {
      return await operation();
    } catch (error) {
      signal?.throwIfAborted();
      lastError = error;

      if (attempt === tries) break;

      const waitMs = Math.min(currentDelay, maxIntervalMs);
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      logger?.error(`${name} failed on attempt ${attempt}, retrying in ${waitMs}ms`, { error: errorMessage });
      options.onRetry?.(attempt, error, waitMs);

      await delay(waitMs, signal);
      currentDelay *= backoff;
    }
  }

  throw new RetriesExhaustedError(name, tries, lastError);
}
