/**
 * Reconciliation of provider records into canonical businesses
 *
 * @module reconcile
 */

export { merge, selectName, selectPhotoReference, type MergeInput } from './reconciler.js';
export { UNKNOWN_MARKER, type CanonicalBusiness } from './types.js';
