/**
 * Persistence contracts.
 *
 * @module store/types
 */

import type { RawReview } from '../providers/types.js';
import type { CanonicalBusiness } from '../reconcile/types.js';

/** Reviews persisted per ingestion of a business */
export const MAX_REVIEWS = 5;

export type ReviewRecord = RawReview;

/**
 * Promotional offer, valid for [validFrom, validUntil). Dates are
 * `YYYY-MM-DD`.
 */
export interface OfferRecord {
  category: string | null;
  text: string;
  validFrom: string;
  validUntil: string;
}

/**
 * Scraped website extras, one row per business.
 */
export interface ExtrasRecord {
  description: string | null;
  menuLinks: string[];
}

/**
 * Store for canonical businesses and their child rows.
 *
 * `upsertBusiness` is keyed on `externalPrimaryId` and returns the same
 * internal id for every write of one business.
 */
export interface BusinessStore {
  upsertBusiness(business: CanonicalBusiness): Promise<number>;
  /** Appends at most MAX_REVIEWS reviews; returns the number written */
  appendReviews(businessId: number, reviews: readonly ReviewRecord[]): Promise<number>;
  appendOffer(businessId: number, offer: OfferRecord): Promise<void>;
  upsertExtras(businessId: number, extras: ExtrasRecord): Promise<void>;
  close(): Promise<void>;
}

/**
 * Connection or statement failure. Always fatal for the run.
 */
export class StoreError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StoreError';
  }
}
