/**
 * Use case for listing all sessions that can currently be reported
 */

import type { SessionSnapshot } from '../../domain/entities';
import type { StatusReporter } from '../services/StatusReporter';

export interface ListSessionsResponse {
    success: boolean;
    sessions: SessionSnapshot[];
    count: number;
}

export class ListSessionsUseCase {
    constructor(
        private statusReporter: StatusReporter
    ) { }

    execute(): ListSessionsResponse {
        const sessions = this.statusReporter.list();

        return {
            success: true,
            sessions,
            count: sessions.length
        };
    }
}
