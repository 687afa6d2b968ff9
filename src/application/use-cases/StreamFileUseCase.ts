/**
 * Use case for streaming a file from a download session
 * Checks the file is on disk and far enough along, and reconciles its sizes
 */

import path from 'path';
import type { IDiskInspector, ILogger, StreamTarget } from '../../domain/interfaces';
import { StreamingErrorKind } from '../../domain/errors';
import type { DownloadRegistry } from '../services/DownloadRegistry';
import type { StreamingReadinessEvaluator } from '../services/StreamingReadinessEvaluator';

export interface StreamFileRequest {
  sessionId: string;
  fileIndex: number;
}

export interface StreamFileResponse {
  success: boolean;
  target?: StreamTarget;
  error?: string;
  errorKind?: StreamingErrorKind;
}

export class StreamFileUseCase {
  constructor(
    private registry: DownloadRegistry,
    private evaluator: StreamingReadinessEvaluator,
    private diskInspector: IDiskInspector,
    private logger: ILogger
  ) {}

  async execute(request: StreamFileRequest): Promise<StreamFileResponse> {
    const session = this.registry.get(request.sessionId);
    if (!session) {
      return { success: false, error: 'Torrent not found', errorKind: StreamingErrorKind.NOT_FOUND };
    }

    const file = session.files[request.fileIndex];
    if (!file) {
      return { success: false, error: 'File not found', errorKind: StreamingErrorKind.NOT_FOUND };
    }

    const filePath = path.join(session.handle.savePath, file.relativePath);
    const onDiskSize = await this.diskInspector.sizeOf(filePath);
    if (onDiskSize === null) {
      return { success: false, error: 'File not yet downloaded', errorKind: StreamingErrorKind.FILE_NOT_ON_DISK };
    }

    // The session may have been removed while the disk was being read
    if (this.registry.get(request.sessionId) !== session) {
      return { success: false, error: 'Torrent not found', errorKind: StreamingErrorKind.NOT_FOUND };
    }

    if (!this.evaluator.isReady(session, file.index)) {
      const progress = this.evaluator.fileProgress(session, file) * 100;
      const threshold = this.evaluator.thresholdFor(file).fraction * 100;
      return {
        success: false,
        error: `Not enough data for streaming. Progress: ${progress.toFixed(1)}%, need ${threshold.toFixed(1)}%`,
        errorKind: StreamingErrorKind.NOT_READY_FOR_STREAMING
      };
    }

    const isPrimary = session.primaryFile?.index === file.index;
    const expectedTotal = isPrimary ? file.sizeBytes : onDiskSize;

    this.logger.info(`Streaming ${request.sessionId} file ${file.index}: ${onDiskSize}/${expectedTotal} bytes available`);

    return {
      success: true,
      target: { file, filePath, expectedTotal, onDiskSize }
    };
  }
}
