/**
 * Use case for removing a session id
 * The download itself stops only when no other id shares it
 */

import type { ILogger } from '../../domain/interfaces';
import { StreamingErrorKind } from '../../domain/errors';
import type { DownloadRegistry } from '../services/DownloadRegistry';
import type { LifecycleManager } from '../services/LifecycleManager';

export interface RemoveSessionRequest {
    sessionId: string;
    deleteFiles: boolean;
}

export interface RemoveSessionResponse {
    success: boolean;
    message?: string;
    error?: string;
    errorKind?: StreamingErrorKind;
}

export class RemoveSessionUseCase {
    constructor(
        private registry: DownloadRegistry,
        private lifecycleManager: LifecycleManager,
        private logger: ILogger
    ) { }

    execute(request: RemoveSessionRequest): RemoveSessionResponse {
        const session = this.registry.get(request.sessionId);
        if (!session) {
            return {
                success: false,
                error: 'Torrent not found',
                errorKind: StreamingErrorKind.NOT_FOUND
            };
        }

        const name = session.displayName ?? session.title ?? request.sessionId;
        const sharedWith = session.ids.size - 1;

        if (!this.lifecycleManager.remove(request.sessionId, request.deleteFiles)) {
            return {
                success: false,
                error: 'Torrent not found',
                errorKind: StreamingErrorKind.NOT_FOUND
            };
        }

        if (sharedWith > 0) {
            this.logger.info(`Session ${request.sessionId} removed, download kept for ${sharedWith} other session(s): ${name}`);
            return { success: true, message: 'Session removed, download still shared' };
        }

        this.logger.info(`Torrent removed: ${name}${request.deleteFiles ? ' (files deleted)' : ''}`);
        return { success: true, message: 'Torrent removed' };
    }
}
