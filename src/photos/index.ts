/**
 * Photo cache
 *
 * @module photos
 */

export { PhotoCache, PLACEHOLDER_FILE, type PhotoCacheOptions } from './cache.js';
export { FsPhotoStore, type PhotoStore } from './store.js';
