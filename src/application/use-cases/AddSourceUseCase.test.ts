/**
 * Unit tests for AddSourceUseCase
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { AddSourceUseCase } from './AddSourceUseCase';
import { FilePriority } from '../../domain/interfaces';
import { StreamingErrorKind } from '../../domain/errors';
import { createTestServices } from '../../__mocks__/services';
import type { TestServices } from '../../__mocks__/services';

const SOURCE = 'magnet:?xt=urn:btih:cccccccccccccccccccccccccccccccccccccccc';

describe('AddSourceUseCase', () => {
    let services: TestServices;
    let useCase: AddSourceUseCase;

    beforeEach(() => {
        services = createTestServices();
        useCase = new AddSourceUseCase(
            services.registry,
            services.acquirer,
            services.policy,
            services.reporter,
            services.logger
        );
    });

    afterEach(() => {
        services.dispose();
    });

    it('should reject a blank source descriptor', async () => {
        const result = await useCase.execute({ sourceDescriptor: '   ' });

        expect(result).toEqual({
            success: false,
            error: 'Source descriptor required',
            errorKind: StreamingErrorKind.INVALID_REQUEST
        });
        expect(services.engine.handles).toHaveLength(0);
    });

    it('should add a source, pick the video and prioritize it', async () => {
        services.engine.onAdd = (handle) => {
            handle.revealMetadata([
                { path: 'video.mp4', size: 500_000_000 },
                { path: 'notes.txt', size: 1000 }
            ]);
        };

        const result = await useCase.execute({ sourceDescriptor: SOURCE, title: 'Movie night' });

        expect(result.success).toBe(true);
        expect(result.sessionId).toBe('id-1');
        expect(result.status?.primaryFile?.relativePath).toBe('video.mp4');
        expect(result.status?.streamUrl).toBe('/api/torrent/stream/id-1/0');
        expect(result.status?.name).toBe('Fake Source');
        expect(services.engine.lastHandle.priorities).toEqual([FilePriority.HIGHEST, FilePriority.NORMAL]);
        expect(services.engine.lastHandle.sequential).toBe(true);
    });

    it('should share a healthy download when the same source is added again', async () => {
        services.engine.onAdd = (handle) => {
            handle.revealMetadata([{ path: 'video.mp4', size: 1000 }]);
            handle.progress = 0.2;
        };
        await useCase.execute({ sourceDescriptor: SOURCE });

        const result = await useCase.execute({ sourceDescriptor: SOURCE });

        expect(result.success).toBe(true);
        expect(result.sessionId).toBe('id-2');
        expect(result.status?.id).toBe('id-2');
        expect(services.engine.handles).toHaveLength(1);
    });

    it('should fail with a timeout when metadata never arrives', async () => {
        const result = await useCase.execute({ sourceDescriptor: SOURCE });

        expect(result).toEqual({
            success: false,
            error: 'Metadata timeout after 30 seconds',
            errorKind: StreamingErrorKind.METADATA_TIMEOUT
        });
        expect(services.registry.size).toBe(0);
    });

    it('should evict the session when prioritization fails', async () => {
        services.engine.onAdd = (handle) => {
            handle.revealMetadata([{ path: 'video.mp4', size: 1000 }]);
            handle.failing.add('setFilePriorities');
        };

        const result = await useCase.execute({ sourceDescriptor: SOURCE });

        expect(result.success).toBe(false);
        expect(result.errorKind).toBe(StreamingErrorKind.ENGINE_FAILURE);
        expect(services.registry.size).toBe(0);
        expect(services.engine.removals).toEqual([{ handle: services.engine.lastHandle, deleteFiles: false }]);
    });

    it('should report engine errors thrown while adding', async () => {
        services.engine.failOnAdd = 'tracker unreachable';

        const result = await useCase.execute({ sourceDescriptor: SOURCE });

        expect(result).toEqual({
            success: false,
            error: 'tracker unreachable',
            errorKind: StreamingErrorKind.ENGINE_FAILURE
        });
        expect(services.logger.error).toHaveBeenCalledWith('Error in AddSourceUseCase:', expect.any(Error));
    });
});
