/**
 * Photo Cache
 *
 * Local cache of business photos keyed by the external primary identifier.
 *
 * Cache Layout:
 * ```
 * <cacheDir>/
 * ├── placeholder.svg          # Shared fallback, created on first use
 * └── <placeId>.jpg            # One image per business
 * ```
 *
 * @module photos/cache
 */

import * as path from 'node:path';
import { silentLogger, type Logger } from '../logger.js';
import type { PrimaryProvider } from '../providers/types.js';
import type { PhotoStore } from './store.js';

/** File name of the shared placeholder inside the cache directory */
export const PLACEHOLDER_FILE = 'placeholder.svg';

const PLACEHOLDER_SVG = [
  '<svg xmlns="http://www.w3.org/2000/svg" width="400" height="300" viewBox="0 0 400 300">',
  '<rect width="400" height="300" fill="#e5e7eb"/>',
  '<text x="200" y="155" font-family="sans-serif" font-size="20" fill="#6b7280" text-anchor="middle">No photo</text>',
  '</svg>',
].join('');

export interface PhotoCacheOptions {
  cacheDir: string;
  photos: Pick<PrimaryProvider, 'fetchPhoto'>;
  store: PhotoStore;
  logger?: Logger;
}

/**
 * Rejects ids that would escape the cache directory.
 */
function isSafeId(id: string): boolean {
  return id.length > 0 && !id.includes('..') && !id.includes('/') && !id.includes('\\');
}

/**
 * PhotoCache returns a local path for a business photo.
 *
 * `fetch` never rejects: any failure resolves to the placeholder path.
 *
 * @example
 * ```typescript
 * const cache = new PhotoCache({ cacheDir: './photo-cache', photos: client, store: new FsPhotoStore() });
 * const photoPath = await cache.fetch(detail.photoReference, placeId);
 * ```
 */
export class PhotoCache {
  private readonly cacheDir: string;
  private readonly photos: Pick<PrimaryProvider, 'fetchPhoto'>;
  private readonly store: PhotoStore;
  private readonly logger: Logger;
  private downloads = 0;

  constructor(options: PhotoCacheOptions) {
    this.cacheDir = options.cacheDir;
    this.photos = options.photos;
    this.store = options.store;
    this.logger = options.logger ?? silentLogger;
  }

  /** Path of the shared placeholder asset */
  get placeholderPath(): string {
    return path.join(this.cacheDir, PLACEHOLDER_FILE);
  }

  /**
   * Deterministic cache path for a business photo.
   */
  pathFor(externalId: string): string {
    return path.join(this.cacheDir, `${externalId}.jpg`);
  }

  /**
   * Resolve a photo to a local path.
   *
   * @param photoReference - Provider photo reference, if any
   * @param externalId - External primary identifier of the business
   * @returns Cached image path or the placeholder path
   */
  async fetch(photoReference: string | undefined, externalId: string): Promise<string> {
    try {
      if (!isSafeId(externalId)) {
        this.logger.warn(`Photo: refusing unsafe id "${externalId}"`);
        return await this.placeholder();
      }

      const target = this.pathFor(externalId);
      if (await this.store.exists(target)) {
        return target;
      }

      if (!photoReference) {
        return await this.placeholder();
      }

      const bytes = await this.photos.fetchPhoto(photoReference);
      if (!bytes) {
        this.logger.debug(`Photo ${externalId}: download failed, using placeholder`);
        return await this.placeholder();
      }

      await this.store.write(target, bytes);
      this.downloads++;
      return target;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Photo ${externalId}: ${message}`);
      return this.placeholderPath;
    }
  }

  /** Number of photos downloaded by this cache */
  getDownloadCount(): number {
    return this.downloads;
  }

  private async placeholder(): Promise<string> {
    const target = this.placeholderPath;
    if (!(await this.store.exists(target))) {
      await this.store.write(target, new TextEncoder().encode(PLACEHOLDER_SVG));
    }
    return target;
  }
}
