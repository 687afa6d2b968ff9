/**
 * Point-in-time view of a session as reported to API consumers
 */

import type { FileDescriptor, SessionState } from './DownloadSession';
import type { ReportedStatus } from '../value-objects/EngineState';

export interface SessionSnapshot {
  id: string;
  name: string;
  state: SessionState;
  status: ReportedStatus;
  progress: number;
  downloadRate: number;
  uploadRate: number;
  numPeers: number;
  files: FileDescriptor[];
  primaryFile: FileDescriptor | null;
  totalSize: number;
  hasMetadata: boolean;
  streamingReady: boolean;
  fileProgress: number;
  streamingThreshold: number;
  streamUrl: string | null;
  addedAt: string;
}
