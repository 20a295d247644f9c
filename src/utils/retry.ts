/**
 * Exponential backoff for calls to remote services that fail transiently
 * (uploads, logins). A target signals a permanent failure by throwing
 * NonRetryableError.
 */
import { errorMessage } from './errors.js';
import { logger } from './logger.js';

/** Thrown by a retried operation when another attempt cannot succeed (bad credentials, checkpoint). */
export class NonRetryableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'NonRetryableError';
  }
}

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs?: number;
  backoffFactor?: number;
  /** Names the operation in retry warnings */
  label?: string;
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (attempt: number, err: unknown) => void;
}

const DEFAULT_BASE_DELAY_MS = 1_000;
const DEFAULT_BACKOFF_FACTOR = 2;

/** Wait before the retry that follows failed attempt `attempt` (1-based). */
export function backoffDelay(attempt: number, baseDelayMs: number, backoffFactor: number): number {
  return baseDelayMs * backoffFactor ** (attempt - 1);
}

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

const isTransient = (err: unknown): boolean => !(err instanceof NonRetryableError);

export async function withRetry<T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> {
  const { maxAttempts, label = 'operation', isRetryable = isTransient } = opts;
  const baseDelayMs = opts.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const backoffFactor = opts.backoffFactor ?? DEFAULT_BACKOFF_FACTOR;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= maxAttempts || !isRetryable(err)) throw err;
      const delayMs = backoffDelay(attempt, baseDelayMs, backoffFactor);
      logger.warn(`Retry: ${label} failed (attempt ${attempt}/${maxAttempts})`, { delayMs, error: errorMessage(err) });
      opts.onRetry?.(attempt, err);
      await sleep(delayMs);
    }
  }
}
