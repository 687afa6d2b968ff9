/**
 * Unit tests for StreamFileUseCase
 */

import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { StreamFileUseCase } from './StreamFileUseCase';
import { StreamingErrorKind } from '../../domain/errors';
import type { IDiskInspector } from '../../domain/interfaces';
import { FsDiskInspector } from '../../infrastructure/disk/FsDiskInspector';
import { createTestServices } from '../../__mocks__/services';
import type { TestServices } from '../../__mocks__/services';
import type { FakeDownloadHandle } from '../../__mocks__/downloadEngine';

const MIB = 1024 * 1024;

describe('StreamFileUseCase', () => {
    let services: TestServices;
    let useCase: StreamFileUseCase;
    let handle: FakeDownloadHandle;

    beforeEach(async () => {
        services = createTestServices();
        useCase = new StreamFileUseCase(services.registry, services.evaluator, new FsDiskInspector(), services.logger);

        const { session } = services.registry.add('src-a');
        handle = services.engine.lastHandle;
        handle.revealMetadata([
            { path: 'Film/film.mp4', size: 100 * MIB },
            { path: 'Film/extra.mkv', size: 1000 }
        ]);
        await services.acquirer.acquire(session);
    });

    afterEach(() => {
        services.dispose();
    });

    it('should return error when session is not found', async () => {
        const result = await useCase.execute({ sessionId: 'missing', fileIndex: 0 });

        expect(result.errorKind).toBe(StreamingErrorKind.NOT_FOUND);
        expect(result.error).toBe('Torrent not found');
    });

    it('should return error when file index is out of range', async () => {
        const result = await useCase.execute({ sessionId: 'id-1', fileIndex: 5 });

        expect(result.errorKind).toBe(StreamingErrorKind.NOT_FOUND);
        expect(result.error).toBe('File not found');
    });

    it('should return error when nothing is on disk yet', async () => {
        const result = await useCase.execute({ sessionId: 'id-1', fileIndex: 0 });

        expect(result).toEqual({
            success: false,
            error: 'File not yet downloaded',
            errorKind: StreamingErrorKind.FILE_NOT_ON_DISK
        });
    });

    it('should refuse files below the readiness threshold', async () => {
        handle.writeBytes(0, 1500);
        handle.setDownloaded(0, 7 * MIB);

        const result = await useCase.execute({ sessionId: 'id-1', fileIndex: 0 });

        expect(result).toEqual({
            success: false,
            error: 'Not enough data for streaming. Progress: 7.0%, need 8.0%',
            errorKind: StreamingErrorKind.NOT_READY_FOR_STREAMING
        });
    });

    it('should use the declared size as the total for the primary file', async () => {
        handle.writeBytes(0, 1500);
        handle.setDownloaded(0, 9 * MIB);

        const result = await useCase.execute({ sessionId: 'id-1', fileIndex: 0 });

        expect(result.success).toBe(true);
        expect(result.target).toEqual({
            file: { index: 0, relativePath: 'Film/film.mp4', sizeBytes: 100 * MIB, isVideo: true },
            filePath: path.join(services.storageRoot, 'Film/film.mp4'),
            expectedTotal: 100 * MIB,
            onDiskSize: 1500
        });
    });

    it('should use the on-disk size as the total for other files', async () => {
        handle.writeBytes(1, 200);

        const result = await useCase.execute({ sessionId: 'id-1', fileIndex: 1 });

        expect(result.target?.expectedTotal).toBe(200);
        expect(result.target?.onDiskSize).toBe(200);
    });

    it('should notice a session removed while the disk was checked', async () => {
        const removingInspector: IDiskInspector = {
            sizeOf: async () => {
                services.registry.remove('id-1', false);
                return 1500;
            }
        };
        useCase = new StreamFileUseCase(services.registry, services.evaluator, removingInspector, services.logger);

        const result = await useCase.execute({ sessionId: 'id-1', fileIndex: 0 });

        expect(result.errorKind).toBe(StreamingErrorKind.NOT_FOUND);
    });
});
