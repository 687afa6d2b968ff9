/**
 * Mock implementation of WebTorrent for testing
 */

import { EventEmitter } from 'events';

export interface MockTorrentFile {
    name: string;
    path: string;
    length: number;
    downloaded: number;
    _startPiece: number;
    _endPiece: number;
}

export class MockTorrent extends EventEmitter {
    name = '';
    length = 0;
    progress = 0;
    downloadSpeed = 0;
    uploadSpeed = 0;
    numPeers = 0;
    ready = false;
    done = false;
    destroyed = false;
    metadata: Buffer | undefined = undefined;
    strategy: 'sequential' | 'rarest' = 'sequential';
    files: MockTorrentFile[] = [];
    readonly selections: Array<{ start: number; end: number; priority: number }> = [];

    constructor(readonly magnetURI: string, readonly path: string) {
        super();
    }

    select(start: number, end: number, priority: number): void {
        this.selections.push({ start, end, priority });
    }

    /**
     * Fills in name and files the way the client does when metadata arrives
     */
    receiveMetadata(name: string, files: Array<{ path: string; length: number }>, pieceLength = 16384): void {
        let offset = 0;
        this.name = name;
        this.files = files.map((file) => {
            const startPiece = Math.floor(offset / pieceLength);
            offset += file.length;
            return {
                name: file.path.split('/').pop() ?? file.path,
                path: file.path,
                length: file.length,
                downloaded: 0,
                _startPiece: startPiece,
                _endPiece: Math.max(startPiece, Math.floor((offset - 1) / pieceLength))
            };
        });
        this.length = offset;
        this.metadata = Buffer.from('info');
        this.emit('metadata');
    }
}

/**
 * Stands in for the WebTorrent client class; every instance is recorded
 */
export class MockWebTorrentClient extends EventEmitter {
    static readonly instances: MockWebTorrentClient[] = [];

    readonly torrents: MockTorrent[] = [];
    readonly removed: Array<{ torrent: MockTorrent; destroyStore: boolean }> = [];
    destroyed = false;
    failNextAdd: Error | null = null;

    constructor() {
        super();
        MockWebTorrentClient.instances.push(this);
    }

    add(magnetURI: string, options: { path: string }): MockTorrent {
        if (this.failNextAdd) {
            const error = this.failNextAdd;
            this.failNextAdd = null;
            throw error;
        }

        const torrent = new MockTorrent(magnetURI, options.path);
        this.torrents.push(torrent);
        return torrent;
    }

    remove(torrent: MockTorrent, options: { destroyStore: boolean }, callback: (err?: Error) => void): void {
        torrent.destroyed = true;
        this.removed.push({ torrent, destroyStore: options.destroyStore });
        setImmediate(() => callback());
    }

    destroy(callback: (err?: Error) => void): void {
        this.destroyed = true;
        setImmediate(() => callback());
    }

    static latest(): MockWebTorrentClient {
        const client = MockWebTorrentClient.instances[MockWebTorrentClient.instances.length - 1];
        if (!client) {
            throw new Error('No client has been created');
        }
        return client;
    }
}
