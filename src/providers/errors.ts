/**
 * Provider Errors
 *
 * Error taxonomy shared by the Google Places and Yelp clients.
 * Every failure a provider call can produce is classified into one of
 * four kinds, which drives the retry/degrade/abort decisions upstream.
 *
 * @module providers/errors
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Failure classification for provider calls.
 *
 * - `transient`: rate limit, 5xx, timeout, page token not yet active
 * - `incomplete`: the response lacks fields a valid record always has
 * - `not_found`: the provider has no such entity
 * - `fatal`: authentication or quota denial; aborts the run
 */
export type ProviderErrorKind = 'transient' | 'incomplete' | 'not_found' | 'fatal';

/**
 * Provider names used in errors, rate limits and call counts.
 */
export type ProviderName = 'places' | 'yelp';

/**
 * Provider API error with classification.
 */
export class ProviderApiError extends Error {
  constructor(
    message: string,
    public readonly provider: ProviderName,
    public readonly kind: ProviderErrorKind,
    public readonly statusCode: number,
    public readonly status: string
  ) {
    super(message);
    this.name = 'ProviderApiError';
  }

  /** Whether a retry may succeed */
  get isRetryable(): boolean {
    return this.kind === 'transient' || this.kind === 'incomplete';
  }
}

// ============================================================================
// Classification
// ============================================================================

/**
 * Classify an HTTP status code.
 *
 * @param statusCode - HTTP status of a failed response
 */
export function classifyHttpStatus(statusCode: number): ProviderErrorKind {
  if (statusCode === 401 || statusCode === 403) {
    return 'fatal';
  }
  if (statusCode === 404) {
    return 'not_found';
  }
  if (statusCode === 408 || statusCode === 429 || statusCode >= 500) {
    return 'transient';
  }
  // Other 4xx: the request itself is wrong and will not get better
  return 'not_found';
}

/**
 * Build a ProviderApiError from a failed HTTP response.
 *
 * @param provider - Provider that produced the response
 * @param response - Fetch response with a non-2xx status
 */
export async function errorFromResponse(
  provider: ProviderName,
  response: Response
): Promise<ProviderApiError> {
  const text = await response.text().catch(() => 'Unknown error');
  const kind = classifyHttpStatus(response.status);

  let message: string;
  if (response.status === 429) {
    message = `Quota exceeded: ${text}`;
  } else if (response.status >= 500) {
    message = `Server error (${response.status}): ${text}`;
  } else if (response.status === 401 || response.status === 403) {
    message = 'Authentication failed: Invalid or unauthorized API key';
  } else {
    message = `API error (${response.status}): ${text}`;
  }

  return new ProviderApiError(message, provider, kind, response.status, 'HTTP_ERROR');
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Check if an error is a provider API error
 */
export function isProviderApiError(error: unknown): error is ProviderApiError {
  return error instanceof ProviderApiError;
}

/**
 * Check if an error should abort the whole run
 */
export function isFatalError(error: unknown): boolean {
  return error instanceof ProviderApiError && error.kind === 'fatal';
}

/**
 * Check if an error is retryable
 *
 * @param error - Error to check
 * @returns true if the error is likely transient and worth retrying
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ProviderApiError) {
    return error.isRetryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('rate limit') ||
      message.includes('timeout') ||
      message.includes('network') ||
      message.includes('econnreset') ||
      message.includes('fetch failed')
    );
  }

  return false;
}
