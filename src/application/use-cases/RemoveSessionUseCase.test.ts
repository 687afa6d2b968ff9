/**
 * Unit tests for RemoveSessionUseCase
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { RemoveSessionUseCase } from './RemoveSessionUseCase';
import { SessionState } from '../../domain/entities';
import { StreamingErrorKind } from '../../domain/errors';
import { createTestServices } from '../../__mocks__/services';
import type { TestServices } from '../../__mocks__/services';

describe('RemoveSessionUseCase', () => {
    let services: TestServices;
    let useCase: RemoveSessionUseCase;

    beforeEach(() => {
        services = createTestServices();
        useCase = new RemoveSessionUseCase(services.registry, services.lifecycle, services.logger);
    });

    afterEach(() => {
        services.dispose();
    });

    it('should return error when session is not found', () => {
        const result = useCase.execute({ sessionId: 'missing', deleteFiles: true });

        expect(result).toEqual({
            success: false,
            error: 'Torrent not found',
            errorKind: StreamingErrorKind.NOT_FOUND
        });
    });

    it('should remove the download and its files', () => {
        services.registry.add('src-a');

        const result = useCase.execute({ sessionId: 'id-1', deleteFiles: true });

        expect(result).toEqual({ success: true, message: 'Torrent removed' });
        expect(services.engine.removals).toEqual([{ handle: services.engine.lastHandle, deleteFiles: true }]);
    });

    it('should only unlink an id whose download is shared', () => {
        const { session } = services.registry.add('src-a');
        services.engine.lastHandle.revealMetadata([{ path: 'a.mp4', size: 10 }]);
        services.engine.lastHandle.progress = 0.5;
        session.state = SessionState.READY;
        services.registry.add('src-a');

        const result = useCase.execute({ sessionId: 'id-1', deleteFiles: true });

        expect(result).toEqual({ success: true, message: 'Session removed, download still shared' });
        expect(services.engine.removals).toHaveLength(0);
        expect(services.registry.get('id-2')).toBe(session);
    });
});
