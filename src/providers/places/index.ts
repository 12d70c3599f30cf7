/**
 * Google Places provider (primary)
 *
 * Architecture:
 * - client.ts: Low-level API client for Nearby Search, Details and Photos
 * - mapper.ts: Payload validation and conversion to tagged records
 * - details.ts: Detail fetch with retry-on-incomplete
 *
 * @module providers/places
 */

export { PlacesClient, classifyPlacesStatus, type PlacesClientOptions } from './client.js';

export {
  fetchDetailsWithRetry,
  isCompleteDetail,
  DEFAULT_DETAIL_ATTEMPTS,
  DEFAULT_DETAIL_DELAY_MS,
  type DetailFetchResult,
  type DetailRetryOptions,
} from './details.js';

export { mapSearchResult, mapDetailsResult } from './mapper.js';
