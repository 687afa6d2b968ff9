/**
 * Download engine port
 * The peer-to-peer transfer itself happens behind this interface; the core only
 * issues fast, synchronous-looking queries and commands against a handle.
 */

import type { EngineStateCode } from '../value-objects/EngineState';

export interface HandleStatus {
  state: EngineStateCode | number;
  hasMetadata: boolean;
  progress: number;
  downloadRate: number;
  uploadRate: number;
  numPeers: number;
}

export interface SourceFile {
  path: string;
  size: number;
}

export interface SourceMetadata {
  name: string;
  totalSize: number;
  files: SourceFile[];
}

/**
 * Per-file download priority, highest wins
 */
export enum FilePriority {
  NORMAL = 1,
  HIGHEST = 7
}

export interface IDownloadHandle {
  /**
   * Directory the engine writes this source's files into
   */
  readonly savePath: string;

  /**
   * False once the engine has dropped or failed this download
   */
  isValid(): boolean;

  /**
   * @throws EngineError when the handle is no longer valid
   */
  status(): HandleStatus;

  /**
   * Source metadata, or null while it is still being fetched from peers
   */
  metadata(): SourceMetadata | null;

  /**
   * Downloaded bytes per file, indexed like the metadata file list
   */
  fileProgress(): number[];

  setFilePriorities(priorities: FilePriority[]): void;

  setSequential(enabled: boolean): void;
}

export interface RemoveHandleOptions {
  deleteFiles: boolean;
}

export interface IDownloadEngine {
  /**
   * Starts downloading a source descriptor into savePath
   */
  add(sourceDescriptor: string, savePath: string): IDownloadHandle;

  /**
   * Stops a download, optionally deleting what it wrote to disk
   */
  remove(handle: IDownloadHandle, options: RemoveHandleOptions): void;

  /**
   * Stops every download and releases engine resources
   */
  destroy(): Promise<void>;
}
