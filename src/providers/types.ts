/**
 * Provider Record Types
 *
 * The three intermediate record shapes produced by the providers, plus the
 * contracts the orchestrator needs from each provider. Records are tagged
 * with `kind` so they cannot be mixed up before the Reconciler merges them.
 *
 * @module providers/types
 */

// ============================================================================
// Shared Types
// ============================================================================

/**
 * Geographic coordinates
 */
export interface LatLng {
  lat: number;
  lng: number;
}

/**
 * A single user review as returned by Place Details
 */
export interface RawReview {
  authorName: string;
  rating: number | null;
  text: string;
  relativeTimeDescription: string;
}

// ============================================================================
// Tagged Records
// ============================================================================

/**
 * Bare search result from a Nearby Search page.
 */
export interface RawResult {
  kind: 'bare';
  /** Google Place ID (external primary identifier) */
  placeId: string;
  name?: string;
  /** Short-form address */
  vicinity?: string;
  location?: LatLng;
  rating?: number;
  userRatingsTotal?: number;
  priceLevel?: number;
  types?: string[];
  /** First photo reference */
  photoReference?: string;
}

/**
 * Place Details record. Every field is optional: an empty detail is a
 * valid value and means "use bare search fields only".
 */
export interface RawDetail {
  kind: 'detail';
  placeId?: string;
  name?: string;
  formattedAddress?: string;
  location?: LatLng;
  formattedPhoneNumber?: string;
  website?: string;
  types?: string[];
  rating?: number;
  userRatingsTotal?: number;
  priceLevel?: number;
  /** Opaque opening hours structure, stored as-is */
  openingHours?: unknown;
  editorialSummary?: string;
  photoReference?: string;
  /** Google Maps URL */
  url?: string;
  reviews: RawReview[];
}

/**
 * Normalized secondary-provider match.
 */
export interface MatchResult {
  kind: 'match';
  externalId: string;
  phone?: string;
  /** Canonical website or profile URL */
  website?: string;
  /** Price tier, 1-4 */
  priceTier?: number;
  streetAddress?: string;
  reviewProfileId?: string;
}

/**
 * An empty detail, returned when the detail retry budget is exhausted.
 */
export function emptyDetail(): RawDetail {
  return { kind: 'detail', reviews: [] };
}

// ============================================================================
// Provider Contracts
// ============================================================================

/**
 * One page of search results
 */
export interface SearchPage {
  results: RawResult[];
  nextPageToken?: string;
}

/**
 * Search request for the primary provider
 */
export interface SearchRequest {
  center: LatLng;
  radiusMeters: number;
  categoryHint: string;
  pageToken?: string;
}

/**
 * What the orchestrator needs from the primary provider.
 */
export interface PrimaryProvider {
  search(request: SearchRequest): Promise<SearchPage>;
  details(placeId: string): Promise<RawDetail>;
  fetchPhoto(photoReference: string): Promise<Uint8Array | undefined>;
  getCallCount(): number;
}

/**
 * What the orchestrator needs from the enrichment provider.
 * `lookup` never rejects.
 */
export interface SecondaryProvider {
  lookup(name: string, location: LatLng): Promise<MatchResult | undefined>;
  getCallCount(): number;
}

/**
 * The fetch signature clients are built on; defaults to the global fetch.
 */
export type FetchFn = typeof fetch;
