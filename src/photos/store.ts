/**
 * Filesystem primitives for the photo cache.
 *
 * @module photos/store
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * The two operations PhotoCache needs from a filesystem.
 */
export interface PhotoStore {
  exists(filePath: string): Promise<boolean>;
  write(filePath: string, bytes: Uint8Array): Promise<void>;
}

/**
 * PhotoStore on the local disk. Parent directories are created on write.
 */
export class FsPhotoStore implements PhotoStore {
  async exists(filePath: string): Promise<boolean> {
    try {
      const stat = await fs.stat(filePath);
      return stat.isFile();
    } catch {
      return false;
    }
  }

  async write(filePath: string, bytes: Uint8Array): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    // Atomic: temp file + rename
    const tempPath = `${filePath}.tmp.${process.pid}`;
    await fs.writeFile(tempPath, bytes);
    await fs.rename(tempPath, filePath);
  }
}
