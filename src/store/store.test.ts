/**
 * Tests for persistence
 *
 * - InMemoryBusinessStore contract (idempotent upsert, review cap)
 * - PgBusinessStore statements against a recording SqlExecutor
 * - Offer synthesis
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { InMemoryBusinessStore } from './memory-store.js';
import { buildOffer, type OfferTable } from './offers.js';
import {
  INSERT_OFFER_SQL,
  PgBusinessStore,
  UPSERT_BUSINESS_SQL,
  UPSERT_EXTRAS_SQL,
  buildInsertReviewsSql,
  businessParams,
  type SqlExecutor,
} from './pg-store.js';
import { StoreError, type ReviewRecord } from './types.js';
import type { CanonicalBusiness } from '../reconcile/types.js';

// ============================================================================
// Fixtures
// ============================================================================

function business(overrides: Partial<CanonicalBusiness> = {}): CanonicalBusiness {
  return {
    externalPrimaryId: 'p1',
    externalSecondaryId: null,
    name: 'Corner Cafe',
    address: '1 Main St',
    phone: 'N/A',
    websiteUrl: 'https://cornercafe.test',
    location: { lat: 47.7, lng: -122.1 },
    category: 'cafe',
    rating: 4.5,
    ratingCount: 12,
    priceLevel: null,
    openingHours: null,
    description: null,
    photoPath: 'photo-cache/p1.jpg',
    mapsUrl: null,
    ...overrides,
  };
}

function reviews(count: number): ReviewRecord[] {
  return Array.from({ length: count }, (_, i) => ({
    authorName: `Reviewer ${i + 1}`,
    rating: 5,
    text: `Review ${i + 1}`,
    relativeTimeDescription: 'a week ago',
  }));
}

interface RecordedQuery {
  text: string;
  values?: readonly unknown[];
}

class RecordingExecutor implements SqlExecutor {
  readonly queries: RecordedQuery[] = [];
  rows: Array<Record<string, unknown>> = [{ id: '7' }];
  failWith?: Error;

  async query(text: string, values?: readonly unknown[]): Promise<{ rows: Array<Record<string, unknown>> }> {
    this.queries.push({ text, values });
    if (this.failWith) {
      throw this.failWith;
    }
    return { rows: this.rows };
  }
}

// ============================================================================
// InMemoryBusinessStore
// ============================================================================

describe('InMemoryBusinessStore', () => {
  let clock: number;
  let store: InMemoryBusinessStore;

  beforeEach(() => {
    clock = Date.UTC(2026, 0, 1);
    store = new InMemoryBusinessStore(() => new Date(clock));
  });

  it('returns the same id for repeated upserts of one business', async () => {
    const updated = business({ name: 'Corner Cafe II', phone: '(425) 555-0100', rating: 4.8, priceLevel: 2 });
    const first = await store.upsertBusiness(business());
    const second = await store.upsertBusiness(updated);
    const other = await store.upsertBusiness(business({ externalPrimaryId: 'p2' }));

    expect(second).toBe(first);
    expect(other).not.toBe(first);
    expect(store.listBusinesses()).toHaveLength(2);

    const stored = store.getBusiness('p1');
    expect(stored).toBeDefined();
    if (stored) {
      const { id, updatedAt, ...row } = stored;
      expect(id).toBe(first);
      expect(updatedAt).toBeInstanceOf(Date);
      expect(row).toEqual(updated);
    }
  });

  it('moves updatedAt forward on every upsert', async () => {
    await store.upsertBusiness(business());
    const firstUpdate = store.getBusiness('p1')?.updatedAt.getTime();

    await store.upsertBusiness(business());
    const sameClock = store.getBusiness('p1')?.updatedAt.getTime();

    clock += 60_000;
    await store.upsertBusiness(business());
    const later = store.getBusiness('p1')?.updatedAt.getTime();

    expect(firstUpdate).toBe(Date.UTC(2026, 0, 1));
    expect(sameClock).toBe(Date.UTC(2026, 0, 1) + 1);
    expect(later).toBe(Date.UTC(2026, 0, 1) + 60_000);
  });

  it('keeps at most five reviews per append', async () => {
    const id = await store.upsertBusiness(business());

    const written = await store.appendReviews(id, reviews(8));

    expect(written).toBe(5);
    expect(store.getReviews(id).map((r) => r.authorName)).toEqual([
      'Reviewer 1',
      'Reviewer 2',
      'Reviewer 3',
      'Reviewer 4',
      'Reviewer 5',
    ]);
  });

  it('appends offers and replaces extras', async () => {
    const id = await store.upsertBusiness(business());
    const offer = { category: 'cafe', text: 'Free pastry', validFrom: '2026-01-01', validUntil: '2026-01-31' };

    await store.appendOffer(id, offer);
    await store.appendOffer(id, offer);
    await store.upsertExtras(id, { description: 'Old', menuLinks: ['/menu'] });
    await store.upsertExtras(id, { description: 'New', menuLinks: [] });

    expect(store.getOffers(id)).toHaveLength(2);
    expect(store.getExtras(id)).toEqual({ description: 'New', menuLinks: [] });
  });

  it('rejects writes after close', async () => {
    await store.close();

    expect(store.isClosed()).toBe(true);
    await expect(store.upsertBusiness(business())).rejects.toThrow(StoreError);
  });
});

// ============================================================================
// PgBusinessStore
// ============================================================================

describe('PgBusinessStore', () => {
  let db: RecordingExecutor;
  let store: PgBusinessStore;

  beforeEach(() => {
    db = new RecordingExecutor();
    store = new PgBusinessStore(db);
  });

  it('upserts on the external primary id and returns the row id', async () => {
    const id = await store.upsertBusiness(business({ openingHours: { open_now: true } }));

    expect(id).toBe(7);
    expect(db.queries[0].text).toBe(UPSERT_BUSINESS_SQL);
    expect(db.queries[0].text).toContain('ON CONFLICT (google_place_id) DO UPDATE');
    expect(db.queries[0].values?.[0]).toBe('p1');
  });

  it('serializes parameters in column order', () => {
    expect(businessParams(business({ openingHours: { open_now: true } }))).toEqual([
      'p1',
      null,
      'Corner Cafe',
      'cafe',
      '1 Main St',
      47.7,
      -122.1,
      'N/A',
      'https://cornercafe.test',
      4.5,
      12,
      null,
      '{"open_now":true}',
      null,
      'photo-cache/p1.jpg',
      null,
    ]);
  });

  it('writes null coordinates when the location is unknown', () => {
    const params = businessParams(business({ location: null }));

    expect(params[5]).toBeNull();
    expect(params[6]).toBeNull();
  });

  it('fails when the upsert returns no row', async () => {
    db.rows = [];

    await expect(store.upsertBusiness(business())).rejects.toThrow('Upsert of p1 returned no id');
  });

  it('inserts up to five reviews in one statement', async () => {
    const written = await store.appendReviews(3, reviews(8));

    expect(written).toBe(5);
    expect(db.queries).toHaveLength(1);
    expect(db.queries[0].text).toBe(buildInsertReviewsSql(5));
    expect(db.queries[0].values).toHaveLength(25);
    expect(db.queries[0].values?.slice(0, 5)).toEqual([3, 'Reviewer 1', 5, 'Review 1', 'a week ago']);
  });

  it('skips the statement when there are no reviews', async () => {
    await expect(store.appendReviews(3, [])).resolves.toBe(0);
    expect(db.queries).toHaveLength(0);
  });

  it('writes offers and extras', async () => {
    await store.appendOffer(3, { category: null, text: 'Deal', validFrom: '2026-01-01', validUntil: '2026-01-31' });
    await store.upsertExtras(3, { description: null, menuLinks: ['/menu', '/menu.pdf'] });

    expect(db.queries[0]).toEqual({
      text: INSERT_OFFER_SQL,
      values: [3, null, 'Deal', '2026-01-01', '2026-01-31'],
    });
    expect(db.queries[1]).toEqual({
      text: UPSERT_EXTRAS_SQL,
      values: [3, null, '["/menu","/menu.pdf"]'],
    });
  });

  it('wraps driver errors in StoreError', async () => {
    db.failWith = new Error('relation "deals" does not exist');

    const error = await store
      .appendOffer(3, { category: null, text: 'Deal', validFrom: '2026-01-01', validUntil: '2026-01-31' })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StoreError);
    expect(error).toMatchObject({ message: 'Database write failed: relation "deals" does not exist' });
  });
});

describe('buildInsertReviewsSql', () => {
  it('numbers parameters five per row', () => {
    expect(buildInsertReviewsSql(2)).toBe(
      'INSERT INTO google_reviews (business_id, author_name, rating, text, relative_time)\n' +
        'VALUES ($1, $2, $3, $4, $5), ($6, $7, $8, $9, $10)'
    );
  });
});

// ============================================================================
// Offers
// ============================================================================

describe('buildOffer', () => {
  const table: OfferTable = {
    fallback: 'Ten percent off',
    byCategory: { cafe: 'Free pastry with any coffee' },
  };

  it('uses the category text and a thirty day window', () => {
    expect(buildOffer('cafe', table, new Date('2026-01-31T23:30:00Z'))).toEqual({
      category: 'cafe',
      text: 'Free pastry with any coffee',
      validFrom: '2026-01-31',
      validUntil: '2026-03-02',
    });
  });

  it('falls back for unknown and missing categories', () => {
    expect(buildOffer('gym', table, new Date('2026-05-01T00:00:00Z')).text).toBe('Ten percent off');
    expect(buildOffer(null, table, new Date('2026-05-01T00:00:00Z')).text).toBe('Ten percent off');
  });

  it('does not match inherited object keys', () => {
    expect(buildOffer('toString', table, new Date('2026-05-01T00:00:00Z')).text).toBe('Ten percent off');
  });
});
