/**
 * Offer synthesis from the configured category table.
 *
 * @module store/offers
 */

import type { OfferRecord } from './types.js';

/** Length of an offer's validity window */
export const OFFER_VALIDITY_DAYS = 30;

/**
 * Category → offer text, loaded from the run settings.
 */
export interface OfferTable {
  fallback: string;
  byCategory: Record<string, string>;
}

function toDateString(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Build the offer for one ingestion of a business.
 *
 * @param category - Business category, may be null
 * @param table - Offer texts
 * @param now - Ingestion time; the window starts on its UTC date
 */
export function buildOffer(category: string | null, table: OfferTable, now: Date): OfferRecord {
  const text =
    category !== null && Object.prototype.hasOwnProperty.call(table.byCategory, category)
      ? table.byCategory[category]
      : table.fallback;

  const start = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
  const end = new Date(start.getTime());
  end.setUTCDate(end.getUTCDate() + OFFER_VALIDITY_DAYS);

  return {
    category,
    text,
    validFrom: toDateString(start),
    validUntil: toDateString(end),
  };
}
