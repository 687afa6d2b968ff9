import type { Request, Response } from 'express';
import type { StreamFileUseCase } from '../../../application/use-cases';
import type { IStreamService } from '../../../domain/interfaces';
import { statusForError } from '../utils/errorStatus';

/**
 * Controller for handling stream-related HTTP requests
 */
export class StreamController {
    constructor(
        private streamFileUseCase: StreamFileUseCase,
        private streamService: IStreamService
    ) { }

    /**
     * Handles GET /stream/:id/:fileIndex
     */
    async stream(req: Request, res: Response): Promise<void> {
        const fileIndex = Number(req.params.fileIndex);
        if (!Number.isInteger(fileIndex) || fileIndex < 0) {
            res.status(400).json({ error: 'File index must be a non-negative integer' });
            return;
        }

        const result = await this.streamFileUseCase.execute({ sessionId: req.params.id, fileIndex });

        if (!result.success || !result.target) {
            res.status(statusForError(result.errorKind)).json({
                error: result.error || 'File not found'
            });
            return;
        }

        await this.streamService.streamFile(req, res, result.target);
    }
}
