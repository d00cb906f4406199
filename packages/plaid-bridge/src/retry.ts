/**
 * Page-level retry for upstream calls.
 *
 * Only TransientUpstreamError is retried by default: the upstream client has
 * already decided which Plaid failures are worth another attempt. Backoff
 * waits end early when the caller's AbortSignal fires.
 */

import { TransientUpstreamError, toError } from '@ledgersync/types';

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  /** Override which errors are worth another attempt. */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  signal?: AbortSignal;
}

type BackoffSettings = Required<Pick<RetryOptions, 'maxRetries' | 'initialDelayMs' | 'maxDelayMs' | 'backoffMultiplier'>>;

const DEFAULT_BACKOFF: BackoffSettings = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

/** Upper bound of the random extra wait, as a share of the base delay. */
const JITTER_RATIO = 0.3;

function abortReason(signal: AbortSignal): Error {
  return toError(signal.reason ?? new Error('Aborted'));
}

function wait(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal === undefined) {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
  if (signal.aborted) {
    return Promise.reject(abortReason(signal));
  }
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

export function isRetryableError(error: unknown): boolean {
  return error instanceof TransientUpstreamError;
}

/**
 * Backoff before retry number `attempt` (1-based): exponential growth plus
 * up to 30% jitter, capped at `maxDelayMs`.
 */
export function calculateDelay(
  attempt: number,
  initialDelayMs: number,
  maxDelayMs: number,
  backoffMultiplier: number
): number {
  const base = initialDelayMs * backoffMultiplier ** (attempt - 1);
  return Math.min(base * (1 + Math.random() * JITTER_RATIO), maxDelayMs);
}

/**
 * Run `fn` until it succeeds, a failure is not retryable, or `maxRetries`
 * retries have been spent. The last error is rethrown as is.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const backoff: BackoffSettings = {
    maxRetries: options.maxRetries ?? DEFAULT_BACKOFF.maxRetries,
    initialDelayMs: options.initialDelayMs ?? DEFAULT_BACKOFF.initialDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_BACKOFF.maxDelayMs,
    backoffMultiplier: options.backoffMultiplier ?? DEFAULT_BACKOFF.backoffMultiplier,
  };
  const shouldRetry = options.shouldRetry ?? isRetryableError;

  let retries = 0;
  for (;;) {
    try {
      return await fn();
    } catch (error) {
      if (retries >= backoff.maxRetries || !shouldRetry(error)) {
        throw error;
      }
      retries++;

      const delayMs = calculateDelay(retries, backoff.initialDelayMs, backoff.maxDelayMs, backoff.backoffMultiplier);
      options.onRetry?.(retries, toError(error), delayMs);
      await wait(delayMs, options.signal);
    }
  }
}

/**
 * Token bucket spacing out requests to Plaid: `capacity` requests in a burst,
 * then `refillPerSecond` per second.
 */
export class RateLimiter {
  private tokens: number;
  private refilledAt = Date.now();

  constructor(
    private readonly capacity: number = 10,
    private readonly refillPerSecond: number = 5
  ) {
    this.tokens = capacity;
  }

  async acquire(): Promise<void> {
    this.refill();
    if (this.tokens < 1) {
      await wait(((1 - this.tokens) / this.refillPerSecond) * 1000);
      this.refill();
    }
    this.tokens -= 1;
  }

  getAvailableTokens(): number {
    this.refill();
    return this.tokens;
  }

  private refill(): void {
    const now = Date.now();
    this.tokens = Math.min(this.capacity, this.tokens + ((now - this.refilledAt) / 1000) * this.refillPerSecond);
    this.refilledAt = now;
  }
}
