/**
 * Empties the download directory left behind by a previous run
 */

import fs from 'fs';
import path from 'path';
import type { ILogger } from '../../domain/interfaces';

export interface ClearCacheResult {
  entriesRemoved: number;
  bytesFreed: number;
}

/**
 * Removes every entry under downloadDir, creating the directory if it is missing.
 * Entries that cannot be removed are logged and skipped.
 */
export async function clearDownloadCache(downloadDir: string, logger: ILogger): Promise<ClearCacheResult> {
  await fs.promises.mkdir(downloadDir, { recursive: true });
  const entries = await fs.promises.readdir(downloadDir);

  if (entries.length === 0) {
    logger.debug('Download directory is already empty');
    return { entriesRemoved: 0, bytesFreed: 0 };
  }

  let entriesRemoved = 0;
  let bytesFreed = 0;

  for (const entry of entries) {
    const entryPath = path.join(downloadDir, entry);
    try {
      const size = await sizeOnDisk(entryPath);
      await fs.promises.rm(entryPath, { recursive: true, force: true });
      entriesRemoved++;
      bytesFreed += size;
    } catch (error) {
      logger.warn(`Failed to delete ${entryPath}:`, error);
    }
  }

  const sizeMB = (bytesFreed / 1024 / 1024).toFixed(2);
  logger.info(`🧹 Cleared download cache: ${entriesRemoved} entries, ${sizeMB} MB freed`);
  return { entriesRemoved, bytesFreed };
}

async function sizeOnDisk(entryPath: string): Promise<number> {
  const stats = await fs.promises.lstat(entryPath);
  if (!stats.isDirectory()) {
    return stats.size;
  }

  let size = 0;
  for (const child of await fs.promises.readdir(entryPath)) {
    size += await sizeOnDisk(path.join(entryPath, child));
  }
  return size;
}
