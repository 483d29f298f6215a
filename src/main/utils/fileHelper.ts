/**
 * File Helper Utilities
 * Helper functions for file operations
 */

import * as fs from 'fs';
import { errorMessage } from './errors';
import { logger } from './logger';

/**
 * Sum of the sizes of the given files
 * Paths that can't be read count as zero bytes
 */
export async function getTotalFileSize(filePaths: readonly string[]): Promise<number> {
  const sizes = await Promise.all(
    filePaths.map(async (filePath) => {
      try {
        const stats = await fs.promises.stat(filePath);
        return stats.isFile() ? stats.size : 0;
      } catch (err) {
        logger.warn(`Couldn't read size of ${filePath}:`, errorMessage(err));
        return 0;
      }
    })
  );

  return sizes.reduce((total, size) => total + size, 0);
}

/**
 * Remove duplicate paths, keeping first occurrence order
 */
export function dedupeFilePaths(filePaths: readonly string[]): string[] {
  return Array.from(new Set(filePaths));
}
