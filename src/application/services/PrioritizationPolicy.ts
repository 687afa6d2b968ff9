/**
 * Front-loads the primary file: highest priority plus sequential piece order,
 * which progressive playback of a partial file depends on
 */

import { FilePriority } from '../../domain/interfaces';
import type { ILogger } from '../../domain/interfaces';
import type { DownloadSession } from '../../domain/entities';
import { StreamingErrorKind, describeError, fail, ok } from '../../domain/errors';
import type { StreamingResult } from '../../domain/errors';
import { StreamingThreshold } from '../../domain/value-objects';

export class PrioritizationPolicy {
  constructor(private readonly logger: ILogger) {}

  /**
   * Returns false when there is no video file and default priorities were left alone
   */
  apply(session: DownloadSession): StreamingResult<boolean> {
    const primary = session.primaryFile;
    if (!primary) {
      this.logger.info(`No video file in ${session.displayName ?? 'download'}, keeping default priorities`);
      return ok(false);
    }

    const priorities = session.files.map((file) =>
      file.index === primary.index ? FilePriority.HIGHEST : FilePriority.NORMAL
    );

    try {
      session.handle.setFilePriorities(priorities);
      session.handle.setSequential(true);
    } catch (error) {
      return fail(StreamingErrorKind.ENGINE_FAILURE, `Failed to prioritize ${primary.relativePath}: ${describeError(error)}`);
    }

    const threshold = StreamingThreshold.fractionFor(primary.relativePath);
    this.logger.info(`Streaming setup complete: ${primary.relativePath}`);
    this.logger.info(`Will start streaming at ${(threshold * 100).toFixed(0)}% downloaded`);
    return ok(true);
  }
}
