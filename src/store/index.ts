/**
 * Persistence
 *
 * @module store
 */

export * from './types.js';
export { buildOffer, OFFER_VALIDITY_DAYS, type OfferTable } from './offers.js';
export {
  PgBusinessStore,
  connectPgStore,
  poolExecutor,
  businessParams,
  buildInsertReviewsSql,
  UPSERT_BUSINESS_SQL,
  INSERT_OFFER_SQL,
  UPSERT_EXTRAS_SQL,
  type SqlExecutor,
} from './pg-store.js';
export {
  InMemoryBusinessStore,
  type StoredBusiness,
  type StoredReview,
  type StoredOffer,
} from './memory-store.js';
