/**
 * Extended types for WebTorrent internal properties
 * These are not part of the public API but are needed to steer piece selection
 */

import type { Torrent, TorrentFile } from 'webtorrent';

export type PieceStrategy = 'sequential' | 'rarest';

/**
 * Extended Torrent type with internal properties
 * Uses intersection type to avoid conflicts with base Torrent interface
 */
export type ExtendedTorrent = Torrent & {
    /**
     * Raw info dictionary, present once metadata has arrived
     */
    readonly metadata?: unknown;

    /**
     * Set after destroy()
     */
    readonly destroyed?: boolean;

    /**
     * Piece picking strategy, read on every selection update
     */
    strategy?: PieceStrategy;
}

/**
 * Extended TorrentFile type with internal properties
 */
export type ExtendedTorrentFile = TorrentFile & {
    /**
     * First and last piece indexes covered by the file
     */
    readonly _startPiece?: number;
    readonly _endPiece?: number;
}

/**
 * Type guard to check if torrent has extended properties
 * In practice, all Torrent objects have these properties at runtime
 */
export function isExtendedTorrent(torrent: Torrent | ExtendedTorrent): torrent is ExtendedTorrent {
    return torrent !== null && typeof torrent === 'object';
}

/**
 * Type guard to check if file has extended properties
 * In practice, all TorrentFile objects have these properties at runtime
 */
export function isExtendedTorrentFile(file: TorrentFile | ExtendedTorrentFile): file is ExtendedTorrentFile {
    return file !== null && typeof file === 'object';
}
