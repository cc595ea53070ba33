// Exponential backoff with jitter, used when opening the store connection

import { IClock, SystemClock } from './clock.util';
import { IRandomSource, MathRandomSource, uniform } from './random.util';

export interface RetryOptions {
  maxRetries: number;     // attempts after the first one
  baseDelay: number;      // milliseconds
  maxDelay: number;       // milliseconds
  jitterFactor: number;   // 0-1 (e.g., 0.1 = 10% jitter)
}

export interface RetryHooks {
  isRetryable(error: Error): boolean;
  /** Called before each wait; `attempt` is the 1-based attempt that just failed. */
  onRetry?(error: Error, attempt: number, delayMs: number): void;
}

export class RetryExhaustedError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastError: Error
  ) {
    super(message);
    this.name = 'RetryExhaustedError';
  }
}

const TRANSIENT_DRIVER_ERRORS = new Set([
  'MongoServerSelectionError',
  'MongoNetworkError',
  'MongoNetworkTimeoutError'
]);

const TRANSIENT_MESSAGE_FRAGMENTS = ['econnrefused', 'econnreset', 'enotfound', 'timed out', 'timeout'];

/** Wait before the retry that follows failed attempt `attempt` (1-based). */
export function backoffDelay(attempt: number, options: RetryOptions, random: IRandomSource): number {
  const capped = Math.min(options.baseDelay * 2 ** (attempt - 1), options.maxDelay);
  const spread = capped * options.jitterFactor;
  return Math.max(0, capped + uniform(random, -spread, spread));
}

export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
  hooks: RetryHooks,
  clock: IClock = new SystemClock(),
  random: IRandomSource = new MathRandomSource()
): Promise<T> {
  const attempts = options.maxRetries + 1;
  let lastError = new Error('Operation was never attempted');

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!hooks.isRetryable(lastError)) {
        throw lastError;
      }

      if (attempt < attempts) {
        const delay = backoffDelay(attempt, options, random);
        hooks.onRetry?.(lastError, attempt, delay);
        await clock.sleep(delay);
      }
    }
  }

  throw new RetryExhaustedError(
    `Gave up after ${attempts} attempts: ${lastError.message}`,
    attempts,
    lastError
  );
}

// Server selection, socket and DNS failures; anything else (auth, bad URI) is final
export function isTransientConnectionError(error: Error): boolean {
  if (TRANSIENT_DRIVER_ERRORS.has(error.name)) {
    return true;
  }
  const message = error.message.toLowerCase();
  return TRANSIENT_MESSAGE_FRAGMENTS.some(fragment => message.includes(fragment));
}
