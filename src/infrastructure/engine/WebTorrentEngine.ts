/**
 * WebTorrent implementation of the download engine port
 * Each handle wraps exactly one torrent added to a shared client
 */

import WebTorrent from 'webtorrent';
import type { Instance, Torrent } from 'webtorrent';
import {
  FilePriority,
  type HandleStatus,
  type IDownloadEngine,
  type IDownloadHandle,
  type ILogger,
  type RemoveHandleOptions,
  type SourceMetadata
} from '../../domain/interfaces';
import { EngineStateCode } from '../../domain/value-objects';
import { EngineError, describeError } from '../../domain/errors';
import { isExtendedTorrent, isExtendedTorrentFile } from './WebTorrentExtendedTypes';
import type { ExtendedTorrent } from './WebTorrentExtendedTypes';

export class WebTorrentHandle implements IDownloadHandle {
  private failure: string | null = null;
  private metadataReceived = false;
  private released = false;

  constructor(
    readonly torrent: ExtendedTorrent,
    readonly savePath: string,
    private readonly logger: ILogger
  ) {
    torrent.once('metadata', () => {
      this.metadataReceived = true;
    });
    torrent.on('error', (err: Error | string) => {
      this.failure = describeError(err);
      this.logger.error(`Torrent error: ${this.failure}`);
    });
  }

  isValid(): boolean {
    return !this.released && this.failure === null && !this.torrent.destroyed;
  }

  status(): HandleStatus {
    this.assertValid();
    const hasMetadata = this.hasMetadata();

    return {
      state: this.nativeState(hasMetadata),
      hasMetadata,
      progress: this.torrent.progress,
      downloadRate: this.torrent.downloadSpeed,
      uploadRate: this.torrent.uploadSpeed,
      numPeers: this.torrent.numPeers
    };
  }

  metadata(): SourceMetadata | null {
    this.assertValid();
    if (!this.hasMetadata()) {
      return null;
    }

    return {
      name: this.torrent.name,
      totalSize: this.torrent.length,
      files: this.torrent.files.map((file) => ({ path: file.path, size: file.length }))
    };
  }

  fileProgress(): number[] {
    this.assertValid();
    return this.torrent.files.map((file) => file.downloaded);
  }

  /**
   * Raises the pieces of every file above normal priority; normal files keep
   * the torrent-wide default selection
   */
  setFilePriorities(priorities: FilePriority[]): void {
    this.assertValid();

    this.torrent.files.forEach((file, index) => {
      const priority = priorities[index] ?? FilePriority.NORMAL;
      if (priority <= FilePriority.NORMAL || !isExtendedTorrentFile(file)) {
        return;
      }

      const { _startPiece: start, _endPiece: end } = file;
      if (start === undefined || end === undefined) {
        this.logger.debug(`[${file.name}] No piece bounds, skipping prioritization`);
        return;
      }

      this.torrent.select(start, end, priority);
      this.logger.debug(`[${file.name}] Selected pieces ${start}-${end} at priority ${priority}`);
    });
  }

  setSequential(enabled: boolean): void {
    this.assertValid();
    this.torrent.strategy = enabled ? 'sequential' : 'rarest';
  }

  markReleased(): void {
    this.released = true;
  }

  private hasMetadata(): boolean {
    return this.metadataReceived || Boolean(this.torrent.metadata);
  }

  private nativeState(hasMetadata: boolean): EngineStateCode {
    if (!hasMetadata) {
      return EngineStateCode.DOWNLOADING_METADATA;
    }
    if (!this.torrent.ready) {
      return EngineStateCode.CHECKING_FILES;
    }
    if (this.torrent.done) {
      return this.torrent.numPeers > 0 ? EngineStateCode.SEEDING : EngineStateCode.FINISHED;
    }
    return EngineStateCode.DOWNLOADING;
  }

  private assertValid(): void {
    if (this.released) {
      throw new EngineError('Torrent handle has been removed');
    }
    if (this.failure !== null) {
      throw new EngineError(`Torrent failed: ${this.failure}`);
    }
    if (this.torrent.destroyed) {
      throw new EngineError('Torrent has been destroyed');
    }
  }
}

export class WebTorrentEngine implements IDownloadEngine {
  private readonly client: Instance;

  constructor(private readonly logger: ILogger) {
    this.client = new WebTorrent();
    this.client.on('error', (err: Error | string) => {
      this.logger.error(`WebTorrent client error: ${describeError(err)}`);
    });
  }

  add(sourceDescriptor: string, savePath: string): IDownloadHandle {
    this.logger.info(`Loading torrent: ${sourceDescriptor.substring(0, 50)}...`);

    let torrent: Torrent;
    try {
      torrent = this.client.add(sourceDescriptor, { path: savePath });
    } catch (error) {
      throw new EngineError(`Failed to add torrent: ${describeError(error)}`, { cause: error });
    }

    if (!isExtendedTorrent(torrent)) {
      throw new EngineError('Failed to create torrent');
    }
    return new WebTorrentHandle(torrent, savePath, this.logger);
  }

  remove(handle: IDownloadHandle, options: RemoveHandleOptions): void {
    if (!(handle instanceof WebTorrentHandle)) {
      throw new EngineError('Handle was not created by this engine');
    }

    handle.markReleased();
    if (handle.torrent.destroyed) {
      return;
    }

    this.client.remove(handle.torrent, { destroyStore: options.deleteFiles }, (err: Error | string) => {
      if (err) {
        this.logger.error(`Failed to remove torrent ${handle.torrent.name || 'unknown'}: ${describeError(err)}`);
      }
    });
  }

  async destroy(): Promise<void> {
    await new Promise<void>((resolve) => {
      this.client.destroy((err: Error | string) => {
        if (err) {
          this.logger.error(`Error while destroying WebTorrent client: ${describeError(err)}`);
        }
        resolve();
      });
    });
  }
}
