/**
 * Stream service interface
 * Serves files that may still be growing on disk
 */

import type { Request, Response } from 'express';
import type { FileDescriptor } from '../entities';

export interface StreamTarget {
  file: FileDescriptor;
  filePath: string;
  /**
   * Declared final size for the primary file, current on-disk size otherwise
   */
  expectedTotal: number;
  onDiskSize: number;
}

export interface IStreamService {
  /**
   * Streams the file over HTTP with range request support
   * @param req - Express request object
   * @param res - Express response object
   */
  streamFile(req: Request, res: Response, target: StreamTarget): Promise<void>;
}
