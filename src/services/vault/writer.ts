/**
 * Export directory file writing
 */

import { writeFile, mkdir } from 'fs/promises';
import { existsSync } from 'fs';
import { join, dirname } from 'path';
import { logger } from '../../utils/logger.js';

/**
 * Ensure directory exists
 */
export async function ensureDir(dirPath: string): Promise<void> {
  try {
    await mkdir(dirPath, { recursive: true });
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'EEXIST') {
      throw error;
    }
  }
}

/**
 * Writes documents below one export root. Paths are relative to that root.
 */
export class VaultWriter {
  constructor(readonly rootPath: string) {}

  resolve(relativePath: string): string {
    return join(this.rootPath, relativePath);
  }

  exists(relativePath: string): boolean {
    return existsSync(this.resolve(relativePath));
  }

  async writeDocument(relativePath: string, content: string): Promise<string> {
    const fullPath = this.resolve(relativePath);
    await ensureDir(dirname(fullPath));

    // Node's utf-8 encoder replaces lone surrogates with U+FFFD instead of throwing
    await writeFile(fullPath, content, 'utf-8');
    logger.debug(`Wrote ${relativePath}`);

    return fullPath;
  }
}
