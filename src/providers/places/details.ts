/**
 * Place Details with retry-on-incomplete.
 *
 * Detail responses sometimes come back without the fields every real
 * business has. Those are retried a fixed number of times; when the budget
 * runs out the caller gets an empty detail and continues with the bare
 * search result. Only fatal errors escape.
 *
 * @module providers/places/details
 */

import { silentLogger, type Logger } from '../../logger.js';
import { ProviderApiError, isFatalError } from '../errors.js';
import { withRetry } from '../retry.js';
import { emptyDetail, type PrimaryProvider, type RawDetail } from '../types.js';

/** Default attempt budget */
export const DEFAULT_DETAIL_ATTEMPTS = 3;

/** Default fixed wait between attempts */
export const DEFAULT_DETAIL_DELAY_MS = 1000;

export interface DetailRetryOptions {
  maxAttempts?: number;
  delayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export interface DetailFetchResult {
  detail: RawDetail;
  /** Number of details calls made */
  attempts: number;
  /** False when the empty fallback detail was returned */
  complete: boolean;
  /** Why the fallback was used */
  reason?: string;
}

/**
 * A detail counts as complete when at least one of address, website or
 * phone is present.
 */
export function isCompleteDetail(detail: RawDetail): boolean {
  return Boolean(detail.formattedAddress || detail.website || detail.formattedPhoneNumber);
}

/**
 * Fetch Place Details, retrying incomplete and transient responses.
 *
 * @param provider - Primary provider
 * @param placeId - Google Place ID
 * @param options - Retry budget and hooks
 * @throws ProviderApiError only for fatal errors
 */
export async function fetchDetailsWithRetry(
  provider: Pick<PrimaryProvider, 'details'>,
  placeId: string,
  options: DetailRetryOptions = {}
): Promise<DetailFetchResult> {
  const logger = options.logger ?? silentLogger;
  let attempts = 0;

  try {
    const detail = await withRetry(
      async () => {
        attempts++;
        const result = await provider.details(placeId);
        if (!isCompleteDetail(result)) {
          throw new ProviderApiError(
            'Detail response has no address, website or phone',
            'places',
            'incomplete',
            200,
            'INCOMPLETE'
          );
        }
        return result;
      },
      {
        maxAttempts: options.maxAttempts ?? DEFAULT_DETAIL_ATTEMPTS,
        delayMs: options.delayMs ?? DEFAULT_DETAIL_DELAY_MS,
        sleep: options.sleep,
        onRetry: (error, attempt) => {
          const message = error instanceof Error ? error.message : String(error);
          logger.debug(`Details ${placeId}: attempt ${attempt} failed (${message}), retrying`);
        },
      }
    );
    return { detail, attempts, complete: true };
  } catch (error) {
    if (isFatalError(error)) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    logger.warn(`Details ${placeId}: giving up after ${attempts} attempt(s), using search fields only (${reason})`);
    return { detail: emptyDetail(), attempts, complete: false, reason };
  }
}
