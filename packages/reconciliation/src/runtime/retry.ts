import { CollaboratorError } from '@snowmatch/core';
import { systemClock } from './clock.js';
import type { Clock } from './clock.js';

export interface RetryPolicy {
  /** Total attempts including the first */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Random spread around the delay, 0 to 1 */
  jitter: number;
}

const TRANSIENT_CODES = new Set(['TIMEOUT', 'RATE_LIMITED', 'UNAVAILABLE', 'CONNECTION_FAILED']);
const TRANSIENT_NODE_CODES = new Set(['ETIMEDOUT', 'ECONNRESET', 'ECONNREFUSED', 'EAI_AGAIN']);

/**
 * Timeouts, rate limits, unavailability, dropped connections and HTTP
 * 429/5xx. Malformed requests or responses and open circuits are not
 * transient.
 */
export function isTransientResolverError(err: unknown): boolean {
  if (err instanceof CollaboratorError) {
    return TRANSIENT_CODES.has(err.code);
  }

  if (typeof err !== 'object' || err === null) return false;

  if ('status' in err && typeof err.status === 'number') {
    return err.status === 429 || err.status >= 500;
  }

  return 'code' in err && typeof err.code === 'string' && TRANSIENT_NODE_CODES.has(err.code);
}

/**
 * Delay before retry number `retry` (1 for the second attempt):
 * base * 2^(retry-1), capped, then spread by the jitter factor.
 */
export function backoffDelayMs(policy: RetryPolicy, retry: number, random: () => number = Math.random): number {
  const capped = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (retry - 1));
  const spread = 1 + (random() * 2 - 1) * Math.min(1, Math.max(0, policy.jitter));
  return Math.max(0, Math.round(capped * spread));
}

export interface RetryEvent {
  /** The attempt about to run, starting at 2 */
  attempt: number;
  delayMs: number;
  error: unknown;
}

/**
 * Run `attempt` until it succeeds, the policy's attempts are spent, or
 * it throws something that is not transient. The last error is rethrown
 * unchanged.
 */
export async function retryTransient<T>(
  attempt: (attemptNumber: number) => Promise<T>,
  policy: RetryPolicy,
  onRetry?: (event: RetryEvent) => void,
  clock: Clock = systemClock
): Promise<T> {
  const attempts = Math.max(1, policy.attempts);

  for (let attemptNumber = 1; ; attemptNumber++) {
    try {
      return await attempt(attemptNumber);
    } catch (err) {
      if (attemptNumber >= attempts || !isTransientResolverError(err)) throw err;

      const delayMs = backoffDelayMs(policy, attemptNumber);
      onRetry?.({ attempt: attemptNumber + 1, delayMs, error: err });
      if (delayMs > 0) await clock.sleep(delayMs);
    }
  }
}
