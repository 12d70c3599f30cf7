/**
 * Retry helpers for provider calls.
 *
 * @module providers/retry
 */

import { isRetryableError } from './errors.js';

// ============================================================================
// Defaults
// ============================================================================

/** Base delay in milliseconds for exponential backoff */
const BASE_DELAY_MS = 1000;

/** Maximum delay in milliseconds for exponential backoff */
const MAX_DELAY_MS = 8000;

/** Jitter range in milliseconds */
const JITTER_MS = 500;

// ============================================================================
// Types
// ============================================================================

/**
 * Retry configuration.
 */
export interface RetryOptions {
  /** Total attempts including the first one */
  maxAttempts: number;
  /**
   * Delay before retry number `attempt` (0-indexed). A number means a
   * fixed delay; omit for exponential backoff with jitter.
   */
  delayMs?: number | ((attempt: number) => number);
  /** Decides whether an error is worth another attempt */
  shouldRetry?: (error: unknown) => boolean;
  /** Called before each wait */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Sleep for a specified duration.
 *
 * @param ms - Duration in milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Calculate exponential backoff delay with jitter.
 *
 * @param attempt - Current attempt number (0-indexed)
 * @param random - Random source in [0, 1)
 * @returns Delay in milliseconds with jitter
 */
export function calculateBackoffDelay(attempt: number, random: () => number = Math.random): number {
  const exponential = Math.min(MAX_DELAY_MS, BASE_DELAY_MS * Math.pow(2, attempt));
  const jitter = (random() * 2 - 1) * JITTER_MS;
  return Math.max(0, exponential + jitter);
}

function resolveDelay(options: RetryOptions, attempt: number): number {
  const { delayMs } = options;
  if (typeof delayMs === 'number') {
    return delayMs;
  }
  if (typeof delayMs === 'function') {
    return delayMs(attempt);
  }
  return calculateBackoffDelay(attempt);
}

/**
 * Execute a call with retry logic.
 *
 * @param fn - Async function to execute
 * @param options - Retry configuration
 * @returns Result of the function
 * @throws Last error if all attempts are exhausted or the error is not retryable
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isRetryableError;
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, options.maxAttempts);
  let lastError: unknown;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (!shouldRetry(error) || attempt >= maxAttempts - 1) {
        break;
      }

      const delay = resolveDelay(options, attempt);
      options.onRetry?.(error, attempt + 1, delay);
      await wait(delay);
    }
  }

  throw lastError instanceof Error ? lastError : new Error(String(lastError));
}
