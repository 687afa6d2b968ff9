/**
 * Polls a fresh session's handle until the engine has the source's metadata
 */

import path from 'path';
import type { IClock, ILogger, SourceMetadata } from '../../domain/interfaces';
import { SessionState } from '../../domain/entities';
import type { DownloadSession, FileDescriptor } from '../../domain/entities';
import { StreamingErrorKind, describeError, fail, ok } from '../../domain/errors';
import type { StreamingResult } from '../../domain/errors';
import type { DownloadRegistry } from './DownloadRegistry';

export interface MetadataAcquirerOptions {
  registry: DownloadRegistry;
  clock: IClock;
  logger: ILogger;
  pollInterval: number;
  timeout: number;
  videoExtensions: readonly string[];
}

export class MetadataAcquirer {
  constructor(private readonly options: MetadataAcquirerOptions) {}

  /**
   * Waits for metadata and fills in the session's file list and primary file.
   * On any failure the session is evicted without deleting files.
   */
  async acquire(session: DownloadSession): Promise<StreamingResult<DownloadSession>> {
    const { clock, logger, pollInterval, timeout } = this.options;
    const deadline = clock.now() + timeout;

    while (clock.now() < deadline) {
      if (session.state === SessionState.REMOVED) {
        return fail(StreamingErrorKind.ENGINE_FAILURE, 'Download was removed while waiting for metadata');
      }

      const metadata = this.poll(session);
      if (!metadata.success) {
        return this.abandon(session, metadata.error, metadata.message);
      }

      if (metadata.value) {
        this.applyMetadata(session, metadata.value);
        return ok(session);
      }

      await clock.sleep(pollInterval);
    }

    logger.warn(`Metadata timeout after ${timeout / 1000} seconds`);
    return this.abandon(
      session,
      StreamingErrorKind.METADATA_TIMEOUT,
      `Metadata timeout after ${timeout / 1000} seconds`
    );
  }

  /**
   * Marks files as video by extension and picks the largest video file;
   * ties go to the earliest index
   */
  describeFiles(metadata: SourceMetadata): { files: FileDescriptor[]; primaryFile: FileDescriptor | null } {
    const files = metadata.files.map((file, index): FileDescriptor => ({
      index,
      relativePath: file.path,
      sizeBytes: file.size,
      isVideo: this.isVideo(file.path)
    }));

    let primaryFile: FileDescriptor | null = null;
    for (const file of files) {
      if (file.isVideo && (primaryFile === null || file.sizeBytes > primaryFile.sizeBytes)) {
        primaryFile = file;
      }
    }

    return { files, primaryFile };
  }

  private isVideo(filePath: string): boolean {
    return this.options.videoExtensions.includes(path.extname(filePath).toLowerCase());
  }

  private poll(session: DownloadSession): StreamingResult<SourceMetadata | null> {
    const { handle } = session;
    if (!handle.isValid()) {
      return fail(StreamingErrorKind.ENGINE_FAILURE, 'Download handle became invalid');
    }

    try {
      return ok(handle.status().hasMetadata ? handle.metadata() : null);
    } catch (error) {
      return fail(StreamingErrorKind.ENGINE_FAILURE, `Engine error: ${describeError(error)}`);
    }
  }

  private applyMetadata(session: DownloadSession, metadata: SourceMetadata): void {
    const { files, primaryFile } = this.describeFiles(metadata);

    session.files = files;
    session.primaryFile = primaryFile;
    session.totalSize = metadata.totalSize;
    session.displayName = metadata.name;
    session.state = SessionState.READY;

    this.options.logger.info(`Metadata received: ${metadata.name}`);
    this.options.logger.info(
      `Found ${files.length} files, largest video: ${primaryFile ? primaryFile.relativePath : 'None'}`
    );
  }

  private abandon(
    session: DownloadSession,
    error: StreamingErrorKind,
    message: string
  ): StreamingResult<DownloadSession> {
    if (session.state !== SessionState.REMOVED) {
      session.state = SessionState.FAILED;
      this.options.registry.evict(session, false);
    }
    this.options.logger.error(`Metadata acquisition failed: ${message}`);
    return fail(error, message);
  }
}
