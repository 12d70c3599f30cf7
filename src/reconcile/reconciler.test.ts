/**
 * Tests for the field precedence rules
 */

import { describe, it, expect } from '@jest/globals';
import { merge, selectName, selectPhotoReference, UNKNOWN_MARKER } from './reconciler.js';
import { emptyDetail, type MatchResult, type RawDetail, type RawResult } from '../providers/types.js';

// ============================================================================
// Fixtures
// ============================================================================

function bare(overrides: Partial<RawResult> = {}): RawResult {
  return {
    kind: 'bare',
    placeId: 'p1',
    name: 'Corner Cafe',
    vicinity: '1 Main St',
    location: { lat: 1, lng: 2 },
    rating: 4.1,
    userRatingsTotal: 10,
    priceLevel: 1,
    types: ['cafe', 'food'],
    photoReference: 'bare-ref',
    ...overrides,
  };
}

function detail(overrides: Partial<RawDetail> = {}): RawDetail {
  return {
    kind: 'detail',
    placeId: 'p1',
    name: 'Corner Cafe & Bakery',
    formattedAddress: '1 Main St, Kirkland, WA 98033',
    location: { lat: 1.5, lng: 2.5 },
    formattedPhoneNumber: '(425) 555-0100',
    website: 'https://cornercafe.test',
    types: ['bakery', 'cafe'],
    rating: 4.6,
    userRatingsTotal: 240,
    priceLevel: 2,
    openingHours: { weekday_text: ['Monday: 7 AM – 3 PM'] },
    editorialSummary: 'Neighbourhood cafe.',
    photoReference: 'detail-ref',
    url: 'https://maps.google.com/?cid=1',
    reviews: [],
    ...overrides,
  };
}

function match(overrides: Partial<MatchResult> = {}): MatchResult {
  return {
    kind: 'match',
    externalId: 'yelp-1',
    phone: '(425) 555-0199',
    website: 'https://www.yelp.com/biz/corner-cafe',
    priceTier: 3,
    streetAddress: '1 Main Street',
    ...overrides,
  };
}

// ============================================================================
// Tests
// ============================================================================

describe('merge', () => {
  it('prefers detail values for every field detail has', () => {
    const business = merge({ bare: bare(), detail: detail(), match: match(), photoPath: 'cache/p1.jpg' });

    expect(business).toEqual({
      externalPrimaryId: 'p1',
      externalSecondaryId: 'yelp-1',
      name: 'Corner Cafe',
      address: '1 Main St, Kirkland, WA 98033',
      phone: '(425) 555-0100',
      websiteUrl: 'https://cornercafe.test',
      location: { lat: 1.5, lng: 2.5 },
      category: 'bakery',
      rating: 4.6,
      ratingCount: 240,
      priceLevel: 2,
      openingHours: { weekday_text: ['Monday: 7 AM – 3 PM'] },
      description: 'Neighbourhood cafe.',
      photoPath: 'cache/p1.jpg',
      mapsUrl: 'https://maps.google.com/?cid=1',
    });
  });

  it('takes the name from the search result first', () => {
    expect(merge({ bare: bare(), detail: detail(), photoPath: 'x' }).name).toBe('Corner Cafe');
    expect(merge({ bare: bare({ name: undefined }), detail: detail(), photoPath: 'x' }).name).toBe(
      'Corner Cafe & Bakery'
    );
  });

  it('falls back to the search result when details are empty', () => {
    const business = merge({ bare: bare(), detail: emptyDetail(), photoPath: 'x', categoryHint: 'cafe' });

    expect(business).toMatchObject({
      address: '1 Main St',
      location: { lat: 1, lng: 2 },
      category: 'cafe',
      rating: 4.1,
      ratingCount: 10,
      priceLevel: 1,
      phone: UNKNOWN_MARKER,
      websiteUrl: UNKNOWN_MARKER,
      openingHours: null,
      description: null,
      mapsUrl: null,
      externalSecondaryId: null,
    });
  });

  it('fills contact fields from the match when details lack them', () => {
    const business = merge({
      bare: bare(),
      detail: detail({ formattedPhoneNumber: undefined, website: '  ' }),
      match: match(),
      photoPath: 'x',
    });

    expect(business.phone).toBe('(425) 555-0199');
    expect(business.websiteUrl).toBe('https://www.yelp.com/biz/corner-cafe');
  });

  it('skips the unknown marker when choosing contact fields', () => {
    const business = merge({
      bare: bare(),
      detail: detail({ formattedPhoneNumber: 'N/A' }),
      match: match({ phone: '555-0000' }),
      photoPath: 'x',
    });

    expect(business.phone).toBe('555-0000');
  });

  it('prefers the match website over an unknown detail website', () => {
    const input = {
      bare: bare(),
      detail: detail({ website: 'N/A' }),
      match: match({ website: 'https://x.test' }),
      photoPath: 'x',
    };

    expect(merge(input).websiteUrl).toBe('https://x.test');
    expect(merge(input)).toEqual(merge(input));
  });

  it('uses the match street address and price tier as last resorts', () => {
    const business = merge({
      bare: bare({ vicinity: undefined, priceLevel: undefined }),
      detail: emptyDetail(),
      match: match(),
      photoPath: 'x',
    });

    expect(business.address).toBe('1 Main Street');
    expect(business.priceLevel).toBe(3);
  });

  it('keeps a zero rating and price level', () => {
    const business = merge({ bare: bare(), detail: detail({ rating: 0, priceLevel: 0 }), photoPath: 'x' });

    expect(business.rating).toBe(0);
    expect(business.priceLevel).toBe(0);
  });

  it('uses the category hint only when no types are known', () => {
    const input = { detail: emptyDetail(), photoPath: 'x', categoryHint: 'gym' };

    expect(merge({ ...input, bare: bare() }).category).toBe('cafe');
    expect(merge({ ...input, bare: bare({ types: [] }) }).category).toBe('gym');
  });

  it('falls back to the scraped description', () => {
    const business = merge({
      bare: bare(),
      detail: detail({ editorialSummary: undefined }),
      extras: { description: 'Fresh bread daily.', menuLinks: [] },
      photoPath: 'x',
    });

    expect(business.description).toBe('Fresh bread daily.');
  });

  it('is deterministic for the same input', () => {
    const input = { bare: bare(), detail: detail(), match: match(), photoPath: 'x' };

    expect(merge(input)).toEqual(merge(input));
  });
});

describe('selectName', () => {
  it('falls through blank search names to the detail name', () => {
    expect(selectName(bare(), detail())).toBe('Corner Cafe');
    expect(selectName(bare({ name: '  ' }), detail())).toBe('Corner Cafe & Bakery');
    expect(selectName(bare({ name: undefined }), detail({ name: '' }))).toBeNull();
  });
});

describe('selectPhotoReference', () => {
  it('prefers the detail photo', () => {
    expect(selectPhotoReference(detail(), bare())).toBe('detail-ref');
  });

  it('falls back to the search photo', () => {
    expect(selectPhotoReference(emptyDetail(), bare())).toBe('bare-ref');
  });

  it('returns undefined when neither has one', () => {
    expect(selectPhotoReference(emptyDetail(), bare({ photoReference: undefined }))).toBeUndefined();
  });
});
