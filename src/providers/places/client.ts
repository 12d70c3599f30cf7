/**
 * Google Places API Client
 *
 * Low-level client for the Google Places API (Nearby Search, Place Details
 * and Place Photo). Handles authentication, request formatting, rate
 * limiting, error classification and API call counting.
 *
 * @module providers/places/client
 */

import { ProviderApiError, errorFromResponse, type ProviderErrorKind } from '../errors.js';
import { RateLimiter } from '../rate-limiter.js';
import { isAbortError, withTimeout } from '../timeout.js';
import type {
  FetchFn,
  PrimaryProvider,
  RawDetail,
  SearchPage,
  SearchRequest,
} from '../types.js';
import {
  NearbySearchResponseSchema,
  PlaceDetailsResponseSchema,
  mapDetailsResult,
  mapSearchResult,
} from './mapper.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for constructing a PlacesClient
 */
export interface PlacesClientOptions {
  apiKey: string;
  /** Shared limiter; one slot per API call */
  rateLimiter?: RateLimiter;
  /** Fetch implementation (default: global fetch) */
  fetch?: FetchFn;
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  /** Language for results (default: 'en') */
  language?: string;
}

// ============================================================================
// Client Implementation
// ============================================================================

/**
 * Default configuration values
 */
const DEFAULTS = {
  baseUrl: 'https://maps.googleapis.com/maps/api/place',
  language: 'en',
  timeoutMs: 10000,
  photoMaxWidth: 800,
} as const;

/**
 * Fields to request from Place Details API
 * Using Field Masks to minimize quota usage
 */
const DETAILS_FIELDS = [
  'place_id',
  'name',
  'formatted_address',
  'geometry',
  'formatted_phone_number',
  'website',
  'types',
  'rating',
  'user_ratings_total',
  'price_level',
  'opening_hours',
  'editorial_summary',
  'photos',
  'url',
  'reviews',
].join(',');

/**
 * Map a Places API status to an error kind.
 *
 * `INVALID_REQUEST` on a paged search usually means the page token is not
 * active yet, so it is transient there.
 *
 * @param status - API status string
 * @param paged - Whether the request carried a page token
 */
export function classifyPlacesStatus(status: string, paged = false): ProviderErrorKind {
  switch (status) {
    case 'OVER_QUERY_LIMIT':
    case 'UNKNOWN_ERROR':
      return 'transient';
    case 'REQUEST_DENIED':
      return 'fatal';
    case 'INVALID_REQUEST':
      return paged ? 'transient' : 'not_found';
    default:
      return 'not_found';
  }
}

function statusCodeFor(kind: ProviderErrorKind): number {
  switch (kind) {
    case 'transient':
      return 429;
    case 'fatal':
      return 403;
    case 'incomplete':
      return 200;
    default:
      return 404;
  }
}

/**
 * PlacesClient provides access to the Google Places API.
 *
 * @example
 * ```typescript
 * const client = new PlacesClient({ apiKey, rateLimiter: new RateLimiter(200) });
 *
 * const page = await client.search({
 *   center: { lat: 47.7599, lng: -122.205 },
 *   radiusMeters: 3000,
 *   categoryHint: 'restaurant',
 * });
 *
 * const details = await client.details(page.results[0].placeId);
 * ```
 */
export class PlacesClient implements PrimaryProvider {
  private readonly apiKey: string;
  private readonly rateLimiter?: RateLimiter;
  private readonly fetchFn: FetchFn;
  private readonly timeoutMs: number;
  private readonly language: string;
  private callCount = 0;

  /**
   * Create a new Places client.
   *
   * @throws Error if the API key is empty
   */
  constructor(options: PlacesClientOptions) {
    if (!options.apiKey) {
      throw new Error('Google Places client requires an API key');
    }
    this.apiKey = options.apiKey;
    this.rateLimiter = options.rateLimiter;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? DEFAULTS.timeoutMs;
    this.language = options.language ?? DEFAULTS.language;
  }

  /**
   * Fetch one page of Nearby Search results.
   *
   * When a page token is given, only the token is sent: the provider
   * ignores every other parameter on continuation requests.
   *
   * @throws ProviderApiError on API errors
   */
  async search(request: SearchRequest): Promise<SearchPage> {
    const params = new URLSearchParams({ key: this.apiKey });

    if (request.pageToken) {
      params.set('pagetoken', request.pageToken);
    } else {
      params.set('location', `${request.center.lat},${request.center.lng}`);
      params.set('radius', String(request.radiusMeters));
      params.set('type', request.categoryHint);
      params.set('language', this.language);
    }

    const url = `${DEFAULTS.baseUrl}/nearbysearch/json?${params.toString()}`;
    const body = await this.getJson(url);

    const parsed = NearbySearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw this.invalidResponse('Nearby Search');
    }

    const data = parsed.data;
    if (data.status !== 'OK' && data.status !== 'ZERO_RESULTS') {
      throw this.apiError(data.status, data.error_message, request.pageToken !== undefined);
    }

    return {
      results: data.results.map(mapSearchResult),
      nextPageToken: data.next_page_token || undefined,
    };
  }

  /**
   * Get detailed information about a place.
   *
   * @param placeId - Google Place ID
   * @throws ProviderApiError on API errors
   */
  async details(placeId: string): Promise<RawDetail> {
    const params = new URLSearchParams({
      place_id: placeId,
      key: this.apiKey,
      fields: DETAILS_FIELDS,
      language: this.language,
    });

    const url = `${DEFAULTS.baseUrl}/details/json?${params.toString()}`;
    const body = await this.getJson(url);

    const parsed = PlaceDetailsResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw this.invalidResponse('Place Details');
    }

    const data = parsed.data;
    if (data.status !== 'OK') {
      throw this.apiError(data.status, data.error_message, false);
    }

    return mapDetailsResult(data.result ?? {});
  }

  /**
   * Download the image behind a photo reference.
   *
   * @param photoReference - Reference from a search or details payload
   * @returns Image bytes, or undefined on a non-success status
   */
  async fetchPhoto(photoReference: string): Promise<Uint8Array | undefined> {
    const params = new URLSearchParams({
      maxwidth: String(DEFAULTS.photoMaxWidth),
      photo_reference: photoReference,
      key: this.apiKey,
    });

    const url = `${DEFAULTS.baseUrl}/photo?${params.toString()}`;
    return this.request(url, async (response) =>
      response.ok ? new Uint8Array(await response.arrayBuffer()) : undefined
    );
  }

  /**
   * Get the total number of API calls made by this client.
   */
  getCallCount(): number {
    return this.callCount;
  }

  /**
   * Reset the API call counter.
   */
  resetCallCount(): void {
    this.callCount = 0;
  }

  private async getJson(url: string): Promise<unknown> {
    return this.request(url, async (response) => {
      if (!response.ok) {
        throw await errorFromResponse('places', response);
      }
      return response.json();
    });
  }

  /**
   * Rate-limited, counted fetch. `read` consumes the body inside the same
   * timeout as the request.
   */
  private async request<T>(url: string, read: (response: Response) => Promise<T>): Promise<T> {
    const send = async () => {
      try {
        return await this.fetchWithTimeout(url, read);
      } finally {
        this.callCount++;
      }
    };
    return this.rateLimiter ? this.rateLimiter.run(send) : send();
  }

  /**
   * Execute fetch and body read with timeout using AbortController.
   *
   * @throws ProviderApiError (transient) on timeout
   */
  private async fetchWithTimeout<T>(url: string, read: (response: Response) => Promise<T>): Promise<T> {
    try {
      return await withTimeout(this.timeoutMs, async (signal) =>
        read(await this.fetchFn(url, { signal }))
      );
    } catch (error) {
      if (isAbortError(error)) {
        throw new ProviderApiError(
          `Request timed out after ${this.timeoutMs}ms`,
          'places',
          'transient',
          408,
          'TIMEOUT'
        );
      }
      throw error;
    }
  }

  private apiError(status: string, errorMessage: string | undefined, paged: boolean): ProviderApiError {
    const kind = classifyPlacesStatus(status, paged);
    const message = errorMessage ?? `API returned status: ${status}`;
    return new ProviderApiError(message, 'places', kind, statusCodeFor(kind), status);
  }

  private invalidResponse(endpoint: string): ProviderApiError {
    return new ProviderApiError(
      `${endpoint} returned an unexpected payload`,
      'places',
      'transient',
      502,
      'INVALID_RESPONSE'
    );
  }
}
