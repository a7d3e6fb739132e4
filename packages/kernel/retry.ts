import { getLogger } from '@kernel/logger';

/**
* Retry Utilities
*
* Exponential backoff with jitter and abort support, plus a promise timeout.
*/

const logger = getLogger('retry');

// ============================================================================
// Types and Interfaces
// ============================================================================

export interface RetryOptions {
  /** Maximum number of retry attempts */
  maxRetries: number;
  /** Initial delay in milliseconds */
  initialDelayMs: number;
  /** Maximum delay in milliseconds */
  maxDelayMs: number;
  /** Multiplier for exponential backoff */
  backoffMultiplier: number;
  /** Whether a failure is worth another attempt; every failure is by default */
  shouldRetry?: (error: Error) => boolean;
  /** Callback invoked on each retry attempt */
  onRetry?: (error: Error, attempt: number) => void;
  /** Optional AbortSignal to cancel the retry loop */
  signal?: AbortSignal;
}

/**
* Error thrown when an operation is aborted via AbortSignal
*/
export class AbortError extends Error {
  constructor(message = 'Operation aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_OPTIONS: RetryOptions = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
};

function calculateDelay(attempt: number, options: RetryOptions): number {
  const exponentialDelay = options.initialDelayMs * Math.pow(options.backoffMultiplier, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, options.maxDelayMs);

  // ±25% jitter
  const jitter = cappedDelay * 0.25 * (Math.random() * 2 - 1);

  return Math.floor(cappedDelay + jitter);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new AbortError());
  if (!signal) return new Promise(resolve => setTimeout(resolve, ms));

  return new Promise((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    function onAbort() {
      clearTimeout(timeoutId);
      reject(new AbortError());
    }

    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
* Execute function with retry logic
* @param fn - Function to execute
* @param options - Retry options, merged over the defaults
*/
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  for (let attempt = 1; attempt <= opts.maxRetries + 1; attempt++) {
    if (opts.signal?.aborted) {
      throw new AbortError('Retry aborted');
    }

    try {
      return await fn();
    } catch (error: unknown) {
      if (error instanceof AbortError) {
        throw error;
      }

      const err = error instanceof Error ? error : new Error(String(error));
      const isLastAttempt = attempt > opts.maxRetries;

      if (isLastAttempt || !(opts.shouldRetry?.(err) ?? true)) {
        throw err;
      }

      const delay = calculateDelay(attempt, opts);

      logger.warn(`Retry attempt ${attempt}/${opts.maxRetries} after ${delay}ms: ${err.message}`, {
        error: err.message,
      });

      opts.onRetry?.(err, attempt);

      await sleep(delay, opts.signal);
    }
  }

  throw new Error('Retry loop exited unexpectedly');
}

export function isRetryableStatus(
  status: number,
  retryableStatuses: number[] = [408, 429, 500, 502, 503, 504]
): boolean {
  return retryableStatuses.includes(status);
}

/**
* Reject when the promise does not settle within `ms` (clamped to 1ms..5min)
*/
export async function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  const boundedMs = Math.min(Math.max(1, ms), 300000);
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(new Error(`Timeout exceeded after ${boundedMs}ms`)), boundedMs);
  });
  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}
