import fs from 'fs';
import type { IDiskInspector } from '../../domain/interfaces';

/**
 * Looks up sizes of files the engine is writing
 */
export class FsDiskInspector implements IDiskInspector {
  async sizeOf(filePath: string): Promise<number | null> {
    try {
      const stats = await fs.promises.stat(filePath);
      return stats.isFile() ? stats.size : null;
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw error;
    }
  }
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}
