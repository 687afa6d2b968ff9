/**
 * Use case for the administrative reset: drop every session, keep files on disk
 */

import type { LifecycleManager } from '../services/LifecycleManager';

export interface ClearSessionsResponse {
    success: boolean;
    cleared: number;
    message: string;
}

export class ClearSessionsUseCase {
    constructor(
        private lifecycleManager: LifecycleManager
    ) { }

    execute(): ClearSessionsResponse {
        const cleared = this.lifecycleManager.clearAll();

        return {
            success: true,
            cleared,
            message: 'All torrents cleared from session'
        };
    }
}
