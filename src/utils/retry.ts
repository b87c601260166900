/**
 * Retry Logic with Exponential Backoff
 *
 * Used for SQLite writes that hit a busy lock. Mailbox polling retries per
 * attempt in core/mailbox-poller.ts, and UI actions have their own
 * round-based retry in core/retry-orchestrator.ts.
 */

import { logger } from './logger.js';
import { ProvisioningError } from './errors.js';

const log = logger.create('Retry');

/**
 * Options for retry behavior
 */
export interface RetryOptions {
  /**
   * Maximum number of total attempts (not retries).
   *
   * - maxAttempts: 1 = no retries (just the initial attempt)
   * - maxAttempts: 3 = 1 initial attempt + up to 2 retries
   *
   * @default 3
   */
  maxAttempts?: number;

  /**
   * Initial delay before first retry in milliseconds.
   * @default 1000
   */
  initialDelayMs?: number;

  /**
   * Maximum delay between retries in milliseconds.
   * @default 30000
   */
  maxDelayMs?: number;

  /**
   * delay = min(initialDelayMs * backoffMultiplier^retryCount, maxDelayMs)
   * @default 2
   */
  backoffMultiplier?: number;

  /**
   * Decide whether an error should trigger a retry.
   * @default Retries on transient system error codes and retryable ProvisioningErrors
   */
  retryOn?: (error: Error) => boolean;

  /**
   * Callback invoked before each retry attempt.
   */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

/**
 * System error codes treated as transient
 */
export const TRANSIENT_ERROR_CODES = new Set([
  'SQLITE_BUSY',
  'SQLITE_LOCKED',
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
]);

/**
 * Read the `code` property Node and native drivers attach to errors.
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function isTransientError(error: Error): boolean {
  if (error instanceof ProvisioningError) {
    return error.retryable;
  }
  const code = errorCode(error);
  return code !== undefined && TRANSIENT_ERROR_CODES.has(code);
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  retryOn: isTransientError,
  onRetry: () => {},
};

/**
 * Execute an async function with automatic retry on failure.
 *
 * @example
 * ```typescript
 * const record = await withRetry(() => store.upsert(tenantId, update), {
 *   maxAttempts: 3,
 *   initialDelayMs: 50,
 * });
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let lastError: Error | null = null;
  let delay = opts.initialDelayMs;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === opts.maxAttempts || !opts.retryOn(lastError)) {
        throw lastError;
      }

      opts.onRetry(attempt, lastError, delay);

      log.warn('Retry attempt failed', {
        attempt,
        maxAttempts: opts.maxAttempts,
        errorName: lastError.name,
        errorCode: errorCode(lastError),
        retryDelayMs: delay,
      });

      await sleep(delay);

      delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelayMs);
    }
  }

  throw lastError ?? new Error('withRetry called with maxAttempts < 1');
}

/**
 * Resolve after `ms`. An aborted signal rejects immediately with the signal's reason.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
