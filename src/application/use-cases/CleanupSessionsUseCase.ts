/**
 * Use case for ageing out old sessions, deleting their files
 */

import type { LifecycleManager } from '../services/LifecycleManager';

export interface CleanupSessionsRequest {
    maxAgeHours: number;
}

export interface CleanupSessionsResponse {
    success: boolean;
    removed: number;
    message: string;
}

export class CleanupSessionsUseCase {
    constructor(
        private lifecycleManager: LifecycleManager
    ) { }

    execute(request: CleanupSessionsRequest): CleanupSessionsResponse {
        const removed = this.lifecycleManager.cleanupOlderThan(request.maxAgeHours);

        return {
            success: true,
            removed,
            message: `Cleaned up torrents older than ${request.maxAgeHours} hours`
        };
    }
}
