/**
 * Exponential backoff retry, driven by the fetch error taxonomy.
 */

import { TransientFetchError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { sleep } from '../shared/utils.js';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  factor: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  factor: 2,
};

/**
 * Delay before retry number `attempt` (1-based): the exponential step with jitter drawn
 * from its upper half, raised to a server-provided Retry-After, capped at `maxDelayMs`.
 */
export function backoffDelay(
  attempt: number,
  policy: RetryPolicy,
  retryAfterMs?: number,
  random: () => number = Math.random,
): number {
  const step = Math.min(policy.baseDelayMs * policy.factor ** (attempt - 1), policy.maxDelayMs);
  const jittered = step / 2 + random() * (step / 2);
  return Math.min(Math.max(jittered, retryAfterMs ?? 0), policy.maxDelayMs);
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: Partial<RetryPolicy> = {},
  signal?: AbortSignal,
): Promise<T> {
  const resolved: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...policy };

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (!(error instanceof TransientFetchError)) throw error;

      if (attempt >= resolved.maxAttempts) {
        logger.warn(
          { url: error.url, status: error.status, attempt, maxAttempts: resolved.maxAttempts },
          'All retry attempts exhausted',
        );
        throw error;
      }

      const retryAfter = error.details?.['retryAfterMs'];
      const delay = backoffDelay(
        attempt,
        resolved,
        typeof retryAfter === 'number' ? retryAfter : undefined,
      );
      logger.debug(
        { url: error.url, error: error.message, attempt, nextDelayMs: Math.round(delay) },
        'Transient fetch failure, backing off',
      );
      await sleep(delay, signal);
    }
  }
}
