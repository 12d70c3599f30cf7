/**
 * Canonical business model.
 *
 * @module reconcile/types
 */

import type { LatLng } from '../providers/types.js';

/**
 * Sentinel stored for phone and website when no source has a value.
 */
export const UNKNOWN_MARKER = 'N/A';

/**
 * The reconciled entity, one per external primary identifier.
 * `updatedAt` is owned by the store.
 */
export interface CanonicalBusiness {
  externalPrimaryId: string;
  externalSecondaryId: string | null;
  name: string | null;
  address: string | null;
  /** Phone number or UNKNOWN_MARKER */
  phone: string;
  /** Website URL or UNKNOWN_MARKER */
  websiteUrl: string;
  location: LatLng | null;
  category: string | null;
  rating: number | null;
  ratingCount: number | null;
  priceLevel: number | null;
  /** Opaque; serialized as-is */
  openingHours: unknown;
  description: string | null;
  photoPath: string;
  mapsUrl: string | null;
}
