/**
 * Eviction of stuck sessions, ageing out old ones, explicit removal and reset
 */

import type { HandleStatus, IClock, ILogger } from '../../domain/interfaces';
import { SessionState } from '../../domain/entities';
import type { DownloadSession } from '../../domain/entities';
import { EngineError, StreamingErrorKind, describeError, fail, ok } from '../../domain/errors';
import type { StreamingResult } from '../../domain/errors';
import type { DownloadRegistry } from './DownloadRegistry';

const HOUR = 60 * 60 * 1000;

export interface LifecycleManagerOptions {
  registry: DownloadRegistry;
  clock: IClock;
  logger: ILogger;
  stuckGracePeriod: number;
}

export interface SweepResult {
  stuck: number;
  failed: number;
  aged: number;
}

export class LifecycleManager {
  private timer: NodeJS.Timeout | null = null;

  constructor(private readonly options: LifecycleManagerOptions) {}

  /**
   * Evicts the session (files kept) when it has had no metadata for longer than
   * the grace period. Returns the age in minutes when it did.
   */
  evictIfStuck(session: DownloadSession, status: HandleStatus): number | null {
    if (status.hasMetadata) {
      return null;
    }

    const age = this.options.clock.now() - session.addedAt;
    if (age <= this.options.stuckGracePeriod) {
      return null;
    }

    const minutes = age / 60000;
    this.options.logger.warn(`Removing stuck download (no metadata after ${minutes.toFixed(1)} minutes)`);
    this.options.registry.evict(session, false);
    return minutes;
  }

  /**
   * Marks a session whose handle died as failed and evicts it, files kept
   */
  evictFailed<T>(session: DownloadSession, reason: string): StreamingResult<T> {
    const name = session.displayName ?? session.sourceDescriptor.substring(0, 50);
    this.options.logger.warn(`Removing failed download ${name}: ${reason}`);
    session.state = SessionState.FAILED;
    this.options.registry.evict(session, false);
    return fail(StreamingErrorKind.ENGINE_FAILURE, reason);
  }

  /**
   * Status of a session's handle. When the handle is invalid or the engine
   * rejects the query the session is evicted as failed. Other errors are rethrown.
   */
  statusOrEvict(session: DownloadSession): StreamingResult<HandleStatus> {
    if (!session.handle.isValid()) {
      return this.evictFailed(session, 'Download handle is no longer valid');
    }

    try {
      return ok(session.handle.status());
    } catch (error) {
      if (error instanceof EngineError) {
        return this.evictFailed(session, error.message);
      }
      throw error;
    }
  }

  /**
   * Removes, with their files, all sessions at least maxAgeHours old
   */
  cleanupOlderThan(maxAgeHours: number): number {
    const now = this.options.clock.now();
    const expired = this.options.registry
      .listSessions()
      .filter((session) => now - session.addedAt >= maxAgeHours * HOUR);

    for (const session of expired) {
      this.options.registry.evict(session, true);
    }

    if (expired.length > 0) {
      this.options.logger.info(`Cleaned up ${expired.length} download(s) older than ${maxAgeHours} hours`);
    }
    return expired.length;
  }

  /**
   * Administrative reset; files are left on disk for later reuse
   */
  clearAll(): number {
    this.options.logger.info('Clearing all downloads');
    const cleared = this.options.registry.clear();
    this.options.logger.info(`Cleared ${cleared} download(s)`);
    return cleared;
  }

  remove(id: string, deleteFiles: boolean): boolean {
    return this.options.registry.remove(id, deleteFiles);
  }

  sweep(maxAgeHours: number): SweepResult {
    let stuck = 0;
    let failed = 0;
    for (const session of this.options.registry.listSessions()) {
      try {
        const status = this.statusOrEvict(session);
        if (!status.success) {
          failed++;
        } else if (this.evictIfStuck(session, status.value) !== null) {
          stuck++;
        }
      } catch (error) {
        this.options.logger.error(`Status check failed during sweep: ${describeError(error)}`);
      }
    }

    return { stuck, failed, aged: this.cleanupOlderThan(maxAgeHours) };
  }

  /**
   * Runs sweep() every intervalMs without keeping the process alive
   */
  start(intervalMs: number, maxAgeHours: number): void {
    if (this.timer || intervalMs <= 0) {
      return;
    }

    this.timer = setInterval(() => {
      const result = this.sweep(maxAgeHours);
      if (result.stuck + result.failed + result.aged > 0) {
        this.options.logger.info(
          `Periodic sweep: ${result.stuck} stuck, ${result.failed} failed, ${result.aged} aged out`
        );
      }
    }, intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
