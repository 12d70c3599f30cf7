/**
 * PostgreSQL Business Store
 *
 * Writes canonical businesses and their child rows with plain SQL. Every
 * statement autocommits, so rows written before a fatal error stay.
 *
 * Tables (see db/schema.sql):
 * - `businesses`       unique on google_place_id
 * - `google_reviews`   append-only, FK business_id
 * - `deals`            append-only, FK business_id
 * - `business_extras`  unique on business_id
 *
 * @module store/pg-store
 */

import { Pool } from 'pg';
import type { CanonicalBusiness } from '../reconcile/types.js';
import {
  MAX_REVIEWS,
  StoreError,
  type BusinessStore,
  type ExtrasRecord,
  type OfferRecord,
  type ReviewRecord,
} from './types.js';

// ============================================================================
// SQL Executor
// ============================================================================

/**
 * The one primitive the store needs from a database driver.
 */
export interface SqlExecutor {
  query(text: string, values?: readonly unknown[]): Promise<{ rows: Array<Record<string, unknown>> }>;
}

/**
 * Adapt a pg Pool to SqlExecutor.
 */
export function poolExecutor(pool: Pool): SqlExecutor {
  return {
    async query(text, values) {
      const result = await pool.query(text, values ? [...values] : undefined);
      return { rows: result.rows };
    },
  };
}

// ============================================================================
// Statements
// ============================================================================

export const UPSERT_BUSINESS_SQL = `
INSERT INTO businesses (
  google_place_id, yelp_id, name, category, address, lat, lon, phone, website,
  rating, rating_count, price_level, opening_hours, description, photo_path, maps_url, updated_at
)
VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, now())
ON CONFLICT (google_place_id) DO UPDATE SET
  yelp_id = EXCLUDED.yelp_id,
  name = EXCLUDED.name,
  category = EXCLUDED.category,
  address = EXCLUDED.address,
  lat = EXCLUDED.lat,
  lon = EXCLUDED.lon,
  phone = EXCLUDED.phone,
  website = EXCLUDED.website,
  rating = EXCLUDED.rating,
  rating_count = EXCLUDED.rating_count,
  price_level = EXCLUDED.price_level,
  opening_hours = EXCLUDED.opening_hours,
  description = EXCLUDED.description,
  photo_path = EXCLUDED.photo_path,
  maps_url = EXCLUDED.maps_url,
  updated_at = now()
RETURNING id`;

export const INSERT_OFFER_SQL = `
INSERT INTO deals (business_id, category, title, valid_from, valid_until)
VALUES ($1, $2, $3, $4, $5)`;

export const UPSERT_EXTRAS_SQL = `
INSERT INTO business_extras (business_id, description, menu_links, updated_at)
VALUES ($1, $2, $3, now())
ON CONFLICT (business_id) DO UPDATE SET
  description = EXCLUDED.description,
  menu_links = EXCLUDED.menu_links,
  updated_at = now()`;

/**
 * Multi-row review insert for `count` reviews.
 */
export function buildInsertReviewsSql(count: number): string {
  const rows: string[] = [];
  for (let i = 0; i < count; i++) {
    const base = i * 5;
    rows.push(`($${base + 1}, $${base + 2}, $${base + 3}, $${base + 4}, $${base + 5})`);
  }
  return (
    'INSERT INTO google_reviews (business_id, author_name, rating, text, relative_time)\n' +
    `VALUES ${rows.join(', ')}`
  );
}

/**
 * Positional parameters for UPSERT_BUSINESS_SQL.
 */
export function businessParams(business: CanonicalBusiness): unknown[] {
  return [
    business.externalPrimaryId,
    business.externalSecondaryId,
    business.name,
    business.category,
    business.address,
    business.location?.lat ?? null,
    business.location?.lng ?? null,
    business.phone,
    business.websiteUrl,
    business.rating,
    business.ratingCount,
    business.priceLevel,
    business.openingHours === null || business.openingHours === undefined
      ? null
      : JSON.stringify(business.openingHours),
    business.description,
    business.photoPath,
    business.mapsUrl,
  ];
}

function parseId(value: unknown): number {
  if (typeof value === 'number' && Number.isInteger(value)) {
    return value;
  }
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    return Number(value);
  }
  throw new StoreError(`Unexpected business id in RETURNING row: ${String(value)}`);
}

// ============================================================================
// Store
// ============================================================================

export class PgBusinessStore implements BusinessStore {
  constructor(
    private readonly db: SqlExecutor,
    private readonly onClose: () => Promise<void> = async () => undefined
  ) {}

  async upsertBusiness(business: CanonicalBusiness): Promise<number> {
    const { rows } = await this.run(UPSERT_BUSINESS_SQL, businessParams(business));
    const row = rows[0];
    if (!row) {
      throw new StoreError(`Upsert of ${business.externalPrimaryId} returned no id`);
    }
    return parseId(row['id']);
  }

  async appendReviews(businessId: number, reviews: readonly ReviewRecord[]): Promise<number> {
    const batch = reviews.slice(0, MAX_REVIEWS);
    if (batch.length === 0) {
      return 0;
    }

    const values = batch.flatMap((review) => [
      businessId,
      review.authorName,
      review.rating,
      review.text,
      review.relativeTimeDescription,
    ]);
    await this.run(buildInsertReviewsSql(batch.length), values);
    return batch.length;
  }

  async appendOffer(businessId: number, offer: OfferRecord): Promise<void> {
    await this.run(INSERT_OFFER_SQL, [
      businessId,
      offer.category,
      offer.text,
      offer.validFrom,
      offer.validUntil,
    ]);
  }

  async upsertExtras(businessId: number, extras: ExtrasRecord): Promise<void> {
    await this.run(UPSERT_EXTRAS_SQL, [
      businessId,
      extras.description,
      JSON.stringify(extras.menuLinks),
    ]);
  }

  async close(): Promise<void> {
    await this.onClose();
  }

  private async run(text: string, values: readonly unknown[]): Promise<{ rows: Array<Record<string, unknown>> }> {
    try {
      return await this.db.query(text, values);
    } catch (error) {
      if (error instanceof StoreError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new StoreError(`Database write failed: ${message}`, error);
    }
  }
}

/**
 * Open a pool and verify the connection before ingestion starts.
 *
 * @param connectionString - PostgreSQL connection string
 * @throws StoreError if the database is unreachable
 */
export async function connectPgStore(connectionString: string): Promise<PgBusinessStore> {
  const pool = new Pool({ connectionString, max: 2 });

  try {
    await pool.query('SELECT 1');
  } catch (error) {
    await pool.end().catch(() => undefined);
    const message = error instanceof Error ? error.message : String(error);
    throw new StoreError(`Could not connect to the database: ${message}`, error);
  }

  return new PgBusinessStore(poolExecutor(pool), () => pool.end());
}
