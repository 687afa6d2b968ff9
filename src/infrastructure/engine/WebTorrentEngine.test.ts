/**
 * Unit tests for the WebTorrent download engine adapter
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { WebTorrentEngine, WebTorrentHandle } from './WebTorrentEngine';
import { FilePriority } from '../../domain/interfaces';
import { EngineStateCode } from '../../domain/value-objects';
import { EngineError } from '../../domain/errors';
import { MockWebTorrentClient } from '../../__mocks__/webtorrent';
import type { MockTorrent } from '../../__mocks__/webtorrent';
import { createMockLogger } from '../../__mocks__/downloadEngine';

// WebTorrent is mocked at module level
vi.mock('webtorrent', async () => {
    const { MockWebTorrentClient: Client } = await import('../../__mocks__/webtorrent');
    return { default: Client };
});

const SOURCE = 'magnet:?xt=urn:btih:dddddddddddddddddddddddddddddddddddddddd';

describe('WebTorrentEngine', () => {
    let engine: WebTorrentEngine;
    let client: MockWebTorrentClient;

    beforeEach(() => {
        engine = new WebTorrentEngine(createMockLogger());
        client = MockWebTorrentClient.latest();
    });

    function addTorrent(): { handle: WebTorrentHandle; torrent: MockTorrent } {
        const handle = engine.add(SOURCE, '/downloads');
        const torrent = client.torrents[client.torrents.length - 1];
        if (!(handle instanceof WebTorrentHandle) || !torrent) {
            throw new Error('Torrent was not added');
        }
        return { handle, torrent };
    }

    it('should add the source into the save path', () => {
        const { handle, torrent } = addTorrent();

        expect(torrent.magnetURI).toBe(SOURCE);
        expect(torrent.path).toBe('/downloads');
        expect(handle.savePath).toBe('/downloads');
        expect(handle.isValid()).toBe(true);
    });

    it('should wrap client errors while adding', () => {
        client.failNextAdd = new Error('Invalid torrent identifier');

        expect(() => engine.add('nonsense', '/downloads')).toThrow(EngineError);
    });

    it('should report downloading metadata until metadata arrives', () => {
        const { handle } = addTorrent();

        expect(handle.status()).toMatchObject({
            state: EngineStateCode.DOWNLOADING_METADATA,
            hasMetadata: false
        });
        expect(handle.metadata()).toBeNull();
    });

    it('should describe files once metadata arrives', () => {
        const { handle, torrent } = addTorrent();
        torrent.receiveMetadata('Show', [
            { path: 'Show/ep1.mkv', length: 40000 },
            { path: 'Show/readme.txt', length: 100 }
        ]);

        expect(handle.metadata()).toEqual({
            name: 'Show',
            totalSize: 40100,
            files: [
                { path: 'Show/ep1.mkv', size: 40000 },
                { path: 'Show/readme.txt', size: 100 }
            ]
        });
        expect(handle.status().state).toBe(EngineStateCode.CHECKING_FILES);
    });

    it('should derive the native state from the torrent', () => {
        const { handle, torrent } = addTorrent();
        torrent.receiveMetadata('Show', [{ path: 'a.mp4', length: 10 }]);
        torrent.ready = true;
        torrent.progress = 0.4;
        torrent.downloadSpeed = 1000;
        torrent.uploadSpeed = 10;
        torrent.numPeers = 3;

        expect(handle.status()).toEqual({
            state: EngineStateCode.DOWNLOADING,
            hasMetadata: true,
            progress: 0.4,
            downloadRate: 1000,
            uploadRate: 10,
            numPeers: 3
        });

        torrent.done = true;
        expect(handle.status().state).toBe(EngineStateCode.SEEDING);

        torrent.numPeers = 0;
        expect(handle.status().state).toBe(EngineStateCode.FINISHED);
    });

    it('should report downloaded bytes per file', () => {
        const { handle, torrent } = addTorrent();
        torrent.receiveMetadata('Show', [
            { path: 'a.mp4', length: 100 },
            { path: 'b.txt', length: 50 }
        ]);
        torrent.files[0].downloaded = 64;

        expect(handle.fileProgress()).toEqual([64, 0]);
    });

    it('should select the pieces of the highest priority file', () => {
        const { handle, torrent } = addTorrent();
        torrent.receiveMetadata('Show', [
            { path: 'sample.mp4', length: 16384 },
            { path: 'feature.mp4', length: 65536 }
        ], 16384);

        handle.setFilePriorities([FilePriority.NORMAL, FilePriority.HIGHEST]);
        handle.setSequential(true);

        expect(torrent.selections).toEqual([{ start: 1, end: 4, priority: FilePriority.HIGHEST }]);
        expect(torrent.strategy).toBe('sequential');

        handle.setSequential(false);
        expect(torrent.strategy).toBe('rarest');
    });

    it('should invalidate the handle on torrent errors', () => {
        const { handle, torrent } = addTorrent();

        torrent.emit('error', new Error('tracker refused'));

        expect(handle.isValid()).toBe(false);
        expect(() => handle.status()).toThrow('Torrent failed: tracker refused');
    });

    it('should remove the torrent and release the handle', () => {
        const { handle, torrent } = addTorrent();

        engine.remove(handle, { deleteFiles: true });

        expect(client.removed).toEqual([{ torrent, destroyStore: true }]);
        expect(handle.isValid()).toBe(false);
        expect(() => handle.metadata()).toThrow(EngineError);
    });

    it('should not remove a torrent twice', () => {
        const { handle } = addTorrent();

        engine.remove(handle, { deleteFiles: false });
        engine.remove(handle, { deleteFiles: true });

        expect(client.removed).toHaveLength(1);
    });

    it('should reject handles from elsewhere', () => {
        const foreign = {
            savePath: '/x',
            isValid: () => true,
            status: vi.fn(),
            metadata: () => null,
            fileProgress: () => [],
            setFilePriorities: vi.fn(),
            setSequential: vi.fn()
        };

        expect(() => engine.remove(foreign, { deleteFiles: false })).toThrow('Handle was not created by this engine');
    });

    it('should destroy the client', async () => {
        await engine.destroy();

        expect(client.destroyed).toBe(true);
    });
});
