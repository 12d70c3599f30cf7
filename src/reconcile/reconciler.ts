/**
 * Reconciler
 *
 * Merges a bare search result, a detail record, an optional enrichment
 * match and optional scraped extras into one CanonicalBusiness.
 *
 * Precedence per field, first present value wins:
 *
 * | Field | Order |
 * |---|---|
 * | name | bare > detail |
 * | phone, websiteUrl | detail > match > UNKNOWN_MARKER |
 * | address | detail > bare vicinity > match street |
 * | rating, ratingCount | detail > bare |
 * | category | detail tags > bare tags > category hint |
 * | priceLevel | detail > bare > match tier |
 * | location | detail > bare |
 * | description | detail summary > scraped meta description |
 * | openingHours, mapsUrl | detail |
 *
 * Pure: all I/O happens before `merge` is called.
 *
 * @module reconcile/reconciler
 */

import type { MatchResult, RawDetail, RawResult } from '../providers/types.js';
import type { ScrapeResult } from '../scraper/page-scraper.js';
import { UNKNOWN_MARKER, type CanonicalBusiness } from './types.js';

export { UNKNOWN_MARKER };

/**
 * Everything the merge reads.
 */
export interface MergeInput {
  bare: RawResult;
  detail: RawDetail;
  match?: MatchResult;
  extras?: ScrapeResult;
  /** Result of PhotoCache.fetch for `selectPhotoReference(detail, bare)` */
  photoPath: string;
  /** Category the record was found under */
  categoryHint?: string;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Trimmed non-empty string, else undefined.
 */
function text(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * First value that is neither null nor undefined.
 */
function firstPresent<T>(...values: Array<T | null | undefined>): T | null {
  for (const value of values) {
    if (value !== null && value !== undefined) {
      return value;
    }
  }
  return null;
}

/**
 * Contact fields never end up null: a missing value becomes the marker.
 */
function contactValue(primary: string | undefined, secondary: string | undefined): string {
  for (const candidate of [text(primary), text(secondary)]) {
    if (candidate && candidate !== UNKNOWN_MARKER) {
      return candidate;
    }
  }
  return UNKNOWN_MARKER;
}

/**
 * Display name: the search result's, else the detail's. Blank names do not count.
 */
export function selectName(bare: RawResult, detail: RawDetail): string | null {
  return firstPresent(text(bare.name), text(detail.name));
}

/**
 * Pick the photo reference to cache: detail's first photo, else the bare
 * result's.
 */
export function selectPhotoReference(detail: RawDetail, bare: RawResult): string | undefined {
  return text(detail.photoReference) ?? text(bare.photoReference);
}

// ============================================================================
// Merge
// ============================================================================

/**
 * Build the canonical business for one place.
 */
export function merge(input: MergeInput): CanonicalBusiness {
  const { bare, detail, match, extras } = input;

  return {
    externalPrimaryId: bare.placeId,
    externalSecondaryId: match?.externalId ?? null,
    name: selectName(bare, detail),
    address: firstPresent(text(detail.formattedAddress), text(bare.vicinity), text(match?.streetAddress)),
    phone: contactValue(detail.formattedPhoneNumber, match?.phone),
    websiteUrl: contactValue(detail.website, match?.website),
    location: firstPresent(detail.location, bare.location),
    category: firstPresent(detail.types?.[0], bare.types?.[0], text(input.categoryHint)),
    rating: firstPresent(detail.rating, bare.rating),
    ratingCount: firstPresent(detail.userRatingsTotal, bare.userRatingsTotal),
    priceLevel: firstPresent(detail.priceLevel, bare.priceLevel, match?.priceTier),
    openingHours: detail.openingHours ?? null,
    description: firstPresent(text(detail.editorialSummary), text(extras?.description)),
    photoPath: input.photoPath,
    mapsUrl: text(detail.url) ?? null,
  };
}
