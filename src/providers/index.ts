/**
 * Providers
 *
 * Clients for the two external data sources plus the shared rate limiting,
 * retry and error classification they are built on.
 *
 * @module providers
 */

export * from './types.js';
export * from './errors.js';
export { RateLimiter, type RateLimiterStats, type RateLimiterHooks } from './rate-limiter.js';
export { withRetry, sleep, calculateBackoffDelay, type RetryOptions } from './retry.js';
export * from './places/index.js';
export * from './yelp/index.js';
