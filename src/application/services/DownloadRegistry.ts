/**
 * Owns the id -> session map and the temporary storage root
 * Deduplicates by source descriptor and tracks every id that shares a handle
 */

import fs from 'fs';
import { randomUUID } from 'crypto';
import type { IClock, IDownloadEngine, ILogger } from '../../domain/interfaces';
import { createDownloadSession, SessionState } from '../../domain/entities';
import type { DownloadSession } from '../../domain/entities';
import { StreamingErrorKind, describeError, fail, ok } from '../../domain/errors';
import type { StreamingResult } from '../../domain/errors';

export interface RegistryAddResult {
  id: string;
  session: DownloadSession;
  reused: boolean;
}

export interface DownloadRegistryOptions {
  engine: IDownloadEngine;
  clock: IClock;
  logger: ILogger;
  storageRoot: string;
  generateId?: () => string;
}

export class DownloadRegistry {
  private readonly sessions = new Map<string, DownloadSession>();
  private readonly engine: IDownloadEngine;
  private readonly clock: IClock;
  private readonly logger: ILogger;
  private readonly generateId: () => string;
  readonly storageRoot: string;

  constructor(options: DownloadRegistryOptions) {
    try {
      fs.mkdirSync(options.storageRoot, { recursive: true });
    } catch (error) {
      options.logger.error('Failed to create download directory:', error);
      throw new Error(`Failed to create download directory: ${describeError(error)}`);
    }

    this.engine = options.engine;
    this.clock = options.clock;
    this.logger = options.logger;
    this.storageRoot = options.storageRoot;
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Registers a fresh id for the source. A healthy download of the same source is
   * shared instead of started again; an unhealthy one is evicted first.
   */
  add(sourceDescriptor: string, title?: string | null): RegistryAddResult {
    const id = this.generateId();
    const existing = this.findBySource(sourceDescriptor);

    if (existing) {
      const health = this.assessDuplicate(existing);
      if (health.success) {
        existing.ids.add(id);
        this.sessions.set(id, existing);
        this.logger.info(`Reusing healthy download for ${id} (${existing.ids.size} ids share it)`);
        return { id, session: existing, reused: true };
      }

      this.logger.warn(`Removing unhealthy download for ${sourceDescriptor.substring(0, 50)}...: ${health.message}`);
      this.evict(existing, false);
    }

    const handle = this.engine.add(sourceDescriptor, this.storageRoot);
    const session = createDownloadSession({
      id,
      sourceDescriptor,
      handle,
      addedAt: this.clock.now(),
      title
    });
    this.sessions.set(id, session);
    this.logger.info(`Download session created: ${id}`);

    return { id, session, reused: false };
  }

  get(id: string): DownloadSession | null {
    return this.sessions.get(id) ?? null;
  }

  /**
   * Drops one id. The handle is torn down only when no other id refers to it;
   * until then its files stay on disk whatever deleteFiles says.
   */
  remove(id: string, deleteFiles: boolean): boolean {
    const session = this.sessions.get(id);
    if (!session) {
      return false;
    }

    this.sessions.delete(id);
    session.ids.delete(id);

    if (session.ids.size > 0) {
      this.logger.info(`Unlinked ${id}; download kept for ${session.ids.size} other id(s)`);
      return true;
    }

    this.release(session, deleteFiles);
    this.logger.info(`Removed download session: ${id}`);
    return true;
  }

  /**
   * Tears down a whole session: the handle and every id that refers to it
   */
  evict(session: DownloadSession, deleteFiles: boolean): void {
    for (const id of session.ids) {
      this.sessions.delete(id);
    }
    session.ids.clear();
    this.release(session, deleteFiles);
  }

  listIds(): string[] {
    return Array.from(this.sessions.keys());
  }

  /**
   * Distinct sessions, each listed once however many ids share it
   */
  listSessions(): DownloadSession[] {
    return Array.from(new Set(this.sessions.values()));
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Removes every session without deleting files, which may be reused later
   */
  clear(): number {
    const sessions = this.listSessions();
    for (const session of sessions) {
      this.evict(session, false);
    }
    return sessions.length;
  }

  private findBySource(sourceDescriptor: string): DownloadSession | null {
    for (const session of this.sessions.values()) {
      if (session.sourceDescriptor === sourceDescriptor) {
        return session;
      }
    }
    return null;
  }

  private assessDuplicate(session: DownloadSession): StreamingResult<void> {
    if (session.state !== SessionState.READY) {
      return fail(StreamingErrorKind.DUPLICATE_SOURCE_UNHEALTHY, `session is ${session.state}`);
    }

    try {
      const status = session.handle.status();
      if (!status.hasMetadata || status.progress <= 0) {
        return fail(StreamingErrorKind.DUPLICATE_SOURCE_UNHEALTHY, 'no metadata or progress');
      }
    } catch (error) {
      return fail(StreamingErrorKind.DUPLICATE_SOURCE_UNHEALTHY, describeError(error));
    }

    return ok(undefined);
  }

  private release(session: DownloadSession, deleteFiles: boolean): void {
    if (session.state === SessionState.REMOVED) {
      return;
    }
    session.state = SessionState.REMOVED;

    try {
      this.engine.remove(session.handle, { deleteFiles });
    } catch (error) {
      this.logger.error(`Failed to remove download from engine: ${describeError(error)}`);
    }
  }
}
