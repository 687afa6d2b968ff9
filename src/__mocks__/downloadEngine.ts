/**
 * In-process stand-ins for the download engine and the clock
 */

import fs from 'fs';
import path from 'path';
import { vi } from 'vitest';
import type {
    FilePriority,
    HandleStatus,
    IClock,
    IDownloadEngine,
    IDownloadHandle,
    ILogger,
    RemoveHandleOptions,
    SourceMetadata
} from '../domain/interfaces';
import { EngineError } from '../domain/errors';
import { EngineStateCode } from '../domain/value-objects';

export type FakeHandleOperation = 'status' | 'metadata' | 'fileProgress' | 'setFilePriorities' | 'setSequential';

/**
 * Handle whose metadata, progress and failures are driven by the test
 */
export class FakeDownloadHandle implements IDownloadHandle {
    progress = 0;
    downloadRate = 0;
    uploadRate = 0;
    numPeers = 0;
    state: number | null = null;
    priorities: FilePriority[] = [];
    sequential = false;
    statusCalls = 0;
    /**
     * Metadata becomes visible on this status() call, when set
     */
    revealOnStatusCall: number | null = null;
    readonly failing = new Set<FakeHandleOperation>();

    private valid = true;
    private sourceMetadata: SourceMetadata | null = null;
    private pendingMetadata: SourceMetadata | null = null;
    private downloaded: number[] = [];

    constructor(
        readonly sourceDescriptor: string,
        readonly savePath: string
    ) { }

    isValid(): boolean {
        return this.valid;
    }

    status(): HandleStatus {
        this.check('status');
        this.statusCalls++;
        if (this.pendingMetadata && this.revealOnStatusCall !== null && this.statusCalls >= this.revealOnStatusCall) {
            this.sourceMetadata = this.pendingMetadata;
            this.pendingMetadata = null;
        }

        const hasMetadata = this.sourceMetadata !== null;
        return {
            state: this.state ?? (hasMetadata ? EngineStateCode.DOWNLOADING : EngineStateCode.DOWNLOADING_METADATA),
            hasMetadata,
            progress: this.progress,
            downloadRate: this.downloadRate,
            uploadRate: this.uploadRate,
            numPeers: this.numPeers
        };
    }

    metadata(): SourceMetadata | null {
        this.check('metadata');
        return this.sourceMetadata;
    }

    fileProgress(): number[] {
        this.check('fileProgress');
        return [...this.downloaded];
    }

    setFilePriorities(priorities: FilePriority[]): void {
        this.check('setFilePriorities');
        this.priorities = [...priorities];
    }

    setSequential(enabled: boolean): void {
        this.check('setSequential');
        this.sequential = enabled;
    }

    /**
     * Makes metadata available now, or on a later status() call
     */
    revealMetadata(files: Array<{ path: string; size: number }>, name = 'Fake Source', onStatusCall?: number): void {
        const metadata: SourceMetadata = {
            name,
            totalSize: files.reduce((sum, file) => sum + file.size, 0),
            files
        };
        this.downloaded = files.map(() => 0);

        if (onStatusCall === undefined) {
            this.sourceMetadata = metadata;
        } else {
            this.pendingMetadata = metadata;
            this.revealOnStatusCall = onStatusCall;
        }
    }

    /**
     * Reports bytes as downloaded without touching the disk
     */
    setDownloaded(index: number, bytes: number): void {
        this.downloaded[index] = bytes;
    }

    /**
     * Writes the first `bytes` bytes of a file to disk; byte n holds n % 256
     */
    writeBytes(index: number, bytes: number): string {
        const file = this.sourceMetadata?.files[index];
        if (!file) {
            throw new Error(`No file at index ${index}`);
        }

        const filePath = path.join(this.savePath, file.path);
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        fs.writeFileSync(filePath, patternBytes(0, bytes));
        this.downloaded[index] = bytes;
        return filePath;
    }

    invalidate(): void {
        this.valid = false;
    }

    filePaths(): string[] {
        return (this.sourceMetadata?.files ?? []).map((file) => path.join(this.savePath, file.path));
    }

    private check(operation: FakeHandleOperation): void {
        if (!this.valid) {
            throw new EngineError('Handle is no longer valid');
        }
        if (this.failing.has(operation)) {
            throw new EngineError(`Engine refused ${operation}`);
        }
    }
}

/**
 * Engine that hands out FakeDownloadHandles and records removals
 */
export class FakeDownloadEngine implements IDownloadEngine {
    readonly handles: FakeDownloadHandle[] = [];
    readonly removals: Array<{ handle: FakeDownloadHandle; deleteFiles: boolean }> = [];
    destroyed = false;
    /**
     * Called for every new handle, e.g. to reveal metadata straight away
     */
    onAdd: ((handle: FakeDownloadHandle) => void) | null = null;
    failOnAdd: string | null = null;

    add(sourceDescriptor: string, savePath: string): FakeDownloadHandle {
        if (this.failOnAdd !== null) {
            throw new EngineError(this.failOnAdd);
        }

        const handle = new FakeDownloadHandle(sourceDescriptor, savePath);
        this.handles.push(handle);
        this.onAdd?.(handle);
        return handle;
    }

    remove(handle: IDownloadHandle, options: RemoveHandleOptions): void {
        const fake = this.handles.find((candidate) => candidate === handle);
        if (!fake) {
            throw new EngineError('Unknown handle');
        }

        fake.invalidate();
        this.removals.push({ handle: fake, deleteFiles: options.deleteFiles });
        if (options.deleteFiles) {
            for (const filePath of fake.filePaths()) {
                fs.rmSync(filePath, { force: true });
            }
        }
    }

    async destroy(): Promise<void> {
        this.destroyed = true;
    }

    get lastHandle(): FakeDownloadHandle {
        const handle = this.handles[this.handles.length - 1];
        if (!handle) {
            throw new Error('No handle has been added');
        }
        return handle;
    }
}

/**
 * Clock whose sleep() advances virtual time instead of waiting
 */
export class FakeClock implements IClock {
    readonly sleeps: number[] = [];

    constructor(private current = 1_700_000_000_000) { }

    now(): number {
        return this.current;
    }

    async sleep(ms: number): Promise<void> {
        this.sleeps.push(ms);
        this.current += ms;
    }

    advance(ms: number): void {
        this.current += ms;
    }
}

export function createMockLogger(): ILogger {
    return {
        log: vi.fn(),
        error: vi.fn(),
        warn: vi.fn(),
        info: vi.fn(),
        debug: vi.fn()
    };
}

/**
 * Bytes [start, start + length) of the pattern written by writeBytes()
 */
export function patternBytes(start: number, length: number): Buffer {
    const buffer = Buffer.alloc(length);
    for (let i = 0; i < length; i++) {
        buffer[i] = (start + i) % 256;
    }
    return buffer;
}

/**
 * Id generator yielding id-1, id-2, ...
 */
export function sequentialIds(prefix = 'id'): () => string {
    let next = 0;
    return () => `${prefix}-${++next}`;
}
