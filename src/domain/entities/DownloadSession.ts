/**
 * Domain entity representing one downloaded source and the ids that refer to it
 * This is a domain model, independent of infrastructure
 */

import type { IDownloadHandle } from '../interfaces/IDownloadEngine';

export enum SessionState {
  ACQUIRING_METADATA = 'acquiring_metadata',
  READY = 'ready',
  FAILED = 'failed',
  REMOVED = 'removed'
}

export interface FileDescriptor {
  readonly index: number;
  readonly relativePath: string;
  readonly sizeBytes: number;
  readonly isVideo: boolean;
}

export interface DownloadSession {
  /**
   * Every id currently referring to this session; the first one created it
   */
  readonly ids: Set<string>;
  readonly sourceDescriptor: string;
  readonly handle: IDownloadHandle;
  readonly addedAt: number;
  readonly title: string | null;
  state: SessionState;
  files: readonly FileDescriptor[];
  primaryFile: FileDescriptor | null;
  totalSize: number;
  displayName: string | null;
  /**
   * Set once the primary file crosses its readiness threshold, never reset
   */
  streamingReadySticky: boolean;
  /**
   * File indexes that have been reported ready at least once
   */
  readonly readyFileIndexes: Set<number>;
}

export interface CreateDownloadSessionParams {
  id: string;
  sourceDescriptor: string;
  handle: IDownloadHandle;
  addedAt: number;
  title?: string | null;
}

export function createDownloadSession(params: CreateDownloadSessionParams): DownloadSession {
  return {
    ids: new Set([params.id]),
    sourceDescriptor: params.sourceDescriptor,
    handle: params.handle,
    addedAt: params.addedAt,
    title: params.title ?? null,
    state: SessionState.ACQUIRING_METADATA,
    files: [],
    primaryFile: null,
    totalSize: 0,
    displayName: null,
    streamingReadySticky: false,
    readyFileIndexes: new Set()
  };
}
