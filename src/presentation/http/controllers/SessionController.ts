import type { Request, Response } from 'express';
import type {
    AddSourceUseCase,
    CleanupSessionsUseCase,
    ClearSessionsUseCase,
    GetSessionStatusUseCase,
    ListSessionsUseCase,
    RemoveSessionUseCase
} from '../../../application/use-cases';
import { statusForError } from '../utils/errorStatus';

export interface SessionControllerDeps {
    addSource: AddSourceUseCase;
    getStatus: GetSessionStatusUseCase;
    listSessions: ListSessionsUseCase;
    removeSession: RemoveSessionUseCase;
    cleanupSessions: CleanupSessionsUseCase;
    clearSessions: ClearSessionsUseCase;
    defaultMaxAgeHours: number;
}

/**
 * Controller for handling session-related HTTP requests
 */
export class SessionController {
    constructor(private deps: SessionControllerDeps) { }

    /**
     * Handles POST /add with body {sourceDescriptor, title?}
     */
    async add(req: Request, res: Response): Promise<void> {
        const body: unknown = req.body;
        const sourceDescriptor = readString(body, 'sourceDescriptor');
        const title = readString(body, 'title');

        if (!sourceDescriptor) {
            res.status(400).json({ error: 'Source descriptor required' });
            return;
        }

        const result = await this.deps.addSource.execute({ sourceDescriptor, title });

        if (result.success && result.sessionId && result.status) {
            res.json({ sessionId: result.sessionId, status: result.status });
        } else {
            res.status(statusForError(result.errorKind)).json({
                error: result.error || 'Failed to add torrent'
            });
        }
    }

    /**
     * Handles GET /status/:id
     */
    status(req: Request, res: Response): void {
        const result = this.deps.getStatus.execute({ sessionId: req.params.id });

        if (!result.success || !result.status) {
            res.status(statusForError(result.errorKind)).json({ error: result.error || 'Torrent not found' });
            return;
        }

        res.json(result.status);
    }

    /**
     * Handles DELETE /remove/:id?deleteFiles=true|false
     */
    remove(req: Request, res: Response): void {
        const result = this.deps.removeSession.execute({
            sessionId: req.params.id,
            deleteFiles: req.query.deleteFiles !== 'false'
        });

        if (result.success) {
            res.json({ success: true, message: result.message });
        } else {
            res.status(statusForError(result.errorKind)).json({ error: result.error });
        }
    }

    /**
     * Handles GET /list
     */
    list(_req: Request, res: Response): void {
        const result = this.deps.listSessions.execute();
        res.json({ sessions: result.sessions, count: result.count });
    }

    /**
     * Handles POST /cleanup?maxAgeHours=24
     */
    cleanup(req: Request, res: Response): void {
        const raw = req.query.maxAgeHours;
        const maxAgeHours = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : this.deps.defaultMaxAgeHours;

        if (!Number.isFinite(maxAgeHours) || maxAgeHours < 0) {
            res.status(400).json({ error: 'maxAgeHours must be a non-negative number' });
            return;
        }

        const result = this.deps.cleanupSessions.execute({ maxAgeHours });
        res.json({ success: result.success, removed: result.removed, message: result.message });
    }

    /**
     * Handles POST /clear-all
     */
    clearAll(_req: Request, res: Response): void {
        const result = this.deps.clearSessions.execute();
        res.json({ success: result.success, cleared: result.cleared, message: result.message });
    }
}

function readString(body: unknown, key: string): string | undefined {
    if (typeof body !== 'object' || body === null) {
        return undefined;
    }
    const value: unknown = Reflect.get(body, key);
    return typeof value === 'string' ? value : undefined;
}
