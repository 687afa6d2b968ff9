/**
 * Decides whether enough of a file is on disk to start playback
 */

import type { ILogger } from '../../domain/interfaces';
import { SessionState } from '../../domain/entities';
import type { DownloadSession, FileDescriptor } from '../../domain/entities';
import { StreamingThreshold } from '../../domain/value-objects';
import { describeError } from '../../domain/errors';

export class StreamingReadinessEvaluator {
  constructor(private readonly logger: ILogger) {}

  /**
   * Defaults to the primary file. Once a file has been ready it stays ready for
   * the lifetime of the session.
   */
  isReady(session: DownloadSession, fileIndex?: number): boolean {
    const file = this.resolveFile(session, fileIndex);
    if (!file) {
      return false;
    }

    const isPrimary = session.primaryFile?.index === file.index;
    if (session.readyFileIndexes.has(file.index) || (isPrimary && session.streamingReadySticky)) {
      return true;
    }
    if (session.state === SessionState.REMOVED) {
      return false;
    }

    const downloaded = this.downloadedBytes(session, file);
    if (!this.thresholdFor(file).isMetBy(downloaded, file.sizeBytes)) {
      return false;
    }

    session.readyFileIndexes.add(file.index);
    if (isPrimary) {
      session.streamingReadySticky = true;
    }
    this.logger.info(
      `Streaming ready: ${file.relativePath} ` +
      `(${((downloaded / file.sizeBytes) * 100).toFixed(1)}% downloaded, ${(downloaded / 1024 / 1024).toFixed(1)} MB)`
    );
    return true;
  }

  thresholdFor(file: FileDescriptor): StreamingThreshold {
    return StreamingThreshold.forFile(file.relativePath, file.sizeBytes);
  }

  /**
   * Downloaded fraction of one file, 0 when unknown
   */
  fileProgress(session: DownloadSession, file: FileDescriptor): number {
    if (file.sizeBytes <= 0) {
      return 0;
    }
    return this.downloadedBytes(session, file) / file.sizeBytes;
  }

  downloadedBytes(session: DownloadSession, file: FileDescriptor): number {
    if (session.state === SessionState.REMOVED) {
      return 0;
    }
    try {
      return session.handle.fileProgress()[file.index] ?? 0;
    } catch (error) {
      this.logger.debug(`Could not read file progress for ${file.relativePath}: ${describeError(error)}`);
      return 0;
    }
  }

  private resolveFile(session: DownloadSession, fileIndex?: number): FileDescriptor | null {
    const index = fileIndex ?? session.primaryFile?.index;
    if (index === undefined) {
      return null;
    }
    return session.files[index] ?? null;
  }
}
