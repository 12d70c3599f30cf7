/**
 * In-memory Business Store
 *
 * Same contract as the PostgreSQL store, held in process. Backs `--dry-run`
 * and the test suite.
 *
 * @module store/memory-store
 */

import type { CanonicalBusiness } from '../reconcile/types.js';
import {
  MAX_REVIEWS,
  StoreError,
  type BusinessStore,
  type ExtrasRecord,
  type OfferRecord,
  type ReviewRecord,
} from './types.js';

/**
 * A stored business row
 */
export interface StoredBusiness extends CanonicalBusiness {
  id: number;
  updatedAt: Date;
}

export interface StoredReview extends ReviewRecord {
  businessId: number;
}

export interface StoredOffer extends OfferRecord {
  businessId: number;
}

export class InMemoryBusinessStore implements BusinessStore {
  private readonly businesses = new Map<string, StoredBusiness>();
  private readonly reviews: StoredReview[] = [];
  private readonly offers: StoredOffer[] = [];
  private readonly extras = new Map<number, ExtrasRecord>();
  private nextId = 1;
  private closed = false;

  /**
   * @param now - Clock used for `updatedAt`
   */
  constructor(private readonly now: () => Date = () => new Date()) {}

  async upsertBusiness(business: CanonicalBusiness): Promise<number> {
    this.assertOpen();
    const existing = this.businesses.get(business.externalPrimaryId);
    const id = existing?.id ?? this.nextId++;

    // updatedAt must move forward even when the clock has not
    let updatedAt = this.now();
    if (existing && updatedAt.getTime() <= existing.updatedAt.getTime()) {
      updatedAt = new Date(existing.updatedAt.getTime() + 1);
    }

    this.businesses.set(business.externalPrimaryId, { ...business, id, updatedAt });
    return id;
  }

  async appendReviews(businessId: number, reviews: readonly ReviewRecord[]): Promise<number> {
    this.assertOpen();
    const batch = reviews.slice(0, MAX_REVIEWS);
    for (const review of batch) {
      this.reviews.push({ ...review, businessId });
    }
    return batch.length;
  }

  async appendOffer(businessId: number, offer: OfferRecord): Promise<void> {
    this.assertOpen();
    this.offers.push({ ...offer, businessId });
  }

  async upsertExtras(businessId: number, extras: ExtrasRecord): Promise<void> {
    this.assertOpen();
    this.extras.set(businessId, { description: extras.description, menuLinks: [...extras.menuLinks] });
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  // ==========================================================================
  // Inspection
  // ==========================================================================

  getBusiness(externalPrimaryId: string): StoredBusiness | undefined {
    return this.businesses.get(externalPrimaryId);
  }

  listBusinesses(): StoredBusiness[] {
    return [...this.businesses.values()];
  }

  getReviews(businessId: number): StoredReview[] {
    return this.reviews.filter((review) => review.businessId === businessId);
  }

  getOffers(businessId: number): StoredOffer[] {
    return this.offers.filter((offer) => offer.businessId === businessId);
  }

  getExtras(businessId: number): ExtrasRecord | undefined {
    return this.extras.get(businessId);
  }

  isClosed(): boolean {
    return this.closed;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StoreError('Store is closed');
    }
  }
}
