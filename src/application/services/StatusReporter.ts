/**
 * Assembles session snapshots from the registry, the handle and the readiness evaluator
 */

import type { HandleStatus, ILogger } from '../../domain/interfaces';
import type { SessionSnapshot } from '../../domain/entities';
import { StreamingErrorKind, describeError, fail, ok } from '../../domain/errors';
import type { StreamingResult } from '../../domain/errors';
import { StreamingThreshold, toReportedStatus } from '../../domain/value-objects';
import type { DownloadRegistry } from './DownloadRegistry';
import type { LifecycleManager } from './LifecycleManager';
import type { StreamingReadinessEvaluator } from './StreamingReadinessEvaluator';

export interface StatusReporterOptions {
  registry: DownloadRegistry;
  evaluator: StreamingReadinessEvaluator;
  lifecycle: LifecycleManager;
  logger: ILogger;
  apiPrefix: string;
}

export class StatusReporter {
  constructor(private readonly options: StatusReporterOptions) {}

  /**
   * Stuck sessions are evicted here, when they are observed, and reported as such
   */
  snapshot(id: string): StreamingResult<SessionSnapshot> {
    const { registry, evaluator, lifecycle, logger } = this.options;

    const session = registry.get(id);
    if (!session) {
      return fail(StreamingErrorKind.NOT_FOUND, 'Torrent not found');
    }

    let status: HandleStatus;
    try {
      const checked = lifecycle.statusOrEvict(session);
      if (!checked.success) {
        logger.error(`Download ${id} failed: ${checked.message}`);
        return fail(StreamingErrorKind.ENGINE_FAILURE, `Status check failed: ${checked.message}`);
      }
      status = checked.value;
    } catch (error) {
      logger.error(`Error getting status for ${id}: ${describeError(error)}`);
      return fail(StreamingErrorKind.ENGINE_FAILURE, `Status check failed: ${describeError(error)}`);
    }

    const stuckMinutes = lifecycle.evictIfStuck(session, status);
    if (stuckMinutes !== null) {
      return fail(
        StreamingErrorKind.TORRENT_STUCK,
        `Torrent stuck - no metadata after ${stuckMinutes.toFixed(1)} minutes`
      );
    }

    const primary = session.primaryFile;

    return ok({
      id,
      name: session.displayName ?? session.title ?? 'Unknown',
      state: session.state,
      status: toReportedStatus(status.state),
      progress: status.progress,
      downloadRate: status.downloadRate,
      uploadRate: status.uploadRate,
      numPeers: status.numPeers,
      files: [...session.files],
      primaryFile: primary,
      totalSize: session.totalSize,
      hasMetadata: status.hasMetadata,
      streamingReady: primary ? evaluator.isReady(session) : false,
      fileProgress: primary ? evaluator.fileProgress(session, primary) : 0,
      streamingThreshold: primary
        ? StreamingThreshold.fractionFor(primary.relativePath)
        : StreamingThreshold.DEFAULT_FRACTION,
      streamUrl: primary ? `${this.options.apiPrefix}/stream/${id}/${primary.index}` : null,
      addedAt: new Date(session.addedAt).toISOString()
    });
  }

  /**
   * Snapshots for every id; ids that fail to snapshot are skipped
   */
  list(): SessionSnapshot[] {
    const snapshots: SessionSnapshot[] = [];
    for (const id of this.options.registry.listIds()) {
      const result = this.snapshot(id);
      if (result.success) {
        snapshots.push(result.value);
      }
    }
    return snapshots;
  }
}
