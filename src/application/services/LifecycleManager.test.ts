import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DownloadRegistry } from './DownloadRegistry';
import { LifecycleManager } from './LifecycleManager';
import { SessionState } from '../../domain/entities';
import { StreamingErrorKind } from '../../domain/errors';
import { FakeClock, FakeDownloadEngine, createMockLogger, sequentialIds } from '../../__mocks__/downloadEngine';

const HOUR = 60 * 60 * 1000;

describe('LifecycleManager', () => {
  let tmpDir: string;
  let engine: FakeDownloadEngine;
  let clock: FakeClock;
  let registry: DownloadRegistry;
  let lifecycle: LifecycleManager;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'lifecycle-'));
    engine = new FakeDownloadEngine();
    clock = new FakeClock(0);
    const logger = createMockLogger();
    registry = new DownloadRegistry({ engine, clock, logger, storageRoot: tmpDir, generateId: sequentialIds() });
    lifecycle = new LifecycleManager({ registry, clock, logger, stuckGracePeriod: 120000 });
  });

  afterEach(() => {
    lifecycle.stop();
    vi.useRealTimers();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('evictIfStuck', () => {
    it('should keep a session inside the grace period', () => {
      const { id, session } = registry.add('src-a');
      clock.advance(120000);

      expect(lifecycle.evictIfStuck(session, session.handle.status())).toBeNull();
      expect(registry.get(id)).toBe(session);
    });

    it('should evict a session without metadata after the grace period', () => {
      const { id, session } = registry.add('src-a');
      clock.advance(121000);

      const minutes = lifecycle.evictIfStuck(session, session.handle.status());

      expect(minutes?.toFixed(1)).toBe('2.0');
      expect(registry.get(id)).toBeNull();
      expect(engine.removals).toEqual([{ handle: engine.lastHandle, deleteFiles: false }]);
    });

    it('should never evict a session that has metadata', () => {
      const { session } = registry.add('src-a');
      engine.lastHandle.revealMetadata([{ path: 'a.mp4', size: 10 }]);
      clock.advance(10 * HOUR);

      expect(lifecycle.evictIfStuck(session, session.handle.status())).toBeNull();
    });
  });

  describe('statusOrEvict', () => {
    it('should return the status of a live handle', () => {
      const { session } = registry.add('src-a');

      const result = lifecycle.statusOrEvict(session);

      expect(result.success).toBe(true);
      expect(result.success && result.value.hasMetadata).toBe(false);
      expect(registry.size).toBe(1);
    });

    it('should mark an invalid handle failed and evict it with its files kept', () => {
      const { id, session } = registry.add('src-a');
      const states: SessionState[] = [];
      const evict = registry.evict.bind(registry);
      vi.spyOn(registry, 'evict').mockImplementation((evicted, deleteFiles) => {
        states.push(evicted.state);
        evict(evicted, deleteFiles);
      });
      engine.lastHandle.invalidate();

      expect(lifecycle.statusOrEvict(session)).toEqual({
        success: false,
        error: StreamingErrorKind.ENGINE_FAILURE,
        message: 'Download handle is no longer valid'
      });
      expect(states).toEqual([SessionState.FAILED]);
      expect(registry.get(id)).toBeNull();
      expect(engine.removals).toEqual([{ handle: engine.lastHandle, deleteFiles: false }]);
    });
  });

  describe('cleanupOlderThan', () => {
    it('should remove every session and its files at zero hours', () => {
      registry.add('src-a');
      const first = engine.lastHandle;
      first.revealMetadata([{ path: 'a.mp4', size: 100 }]);
      const firstFile = first.writeBytes(0, 100);
      registry.add('src-b');
      const second = engine.lastHandle;
      second.revealMetadata([{ path: 'b.mp4', size: 100 }]);
      const secondFile = second.writeBytes(0, 40);

      expect(lifecycle.cleanupOlderThan(0)).toBe(2);
      expect(registry.size).toBe(0);
      expect(fs.existsSync(firstFile)).toBe(false);
      expect(fs.existsSync(secondFile)).toBe(false);
      expect(engine.removals.map((removal) => removal.deleteFiles)).toEqual([true, true]);
    });

    it('should only remove sessions past the age limit', () => {
      registry.add('src-old');
      clock.advance(3 * HOUR);
      registry.add('src-new');
      clock.advance(HOUR);

      expect(lifecycle.cleanupOlderThan(2)).toBe(1);
      expect(registry.listIds()).toEqual(['id-2']);
    });

    it('should count a shared download once', () => {
      const { session } = registry.add('src-a');
      engine.lastHandle.revealMetadata([{ path: 'a.mp4', size: 100 }]);
      engine.lastHandle.progress = 0.5;
      session.state = SessionState.READY;
      registry.add('src-a');

      expect(lifecycle.cleanupOlderThan(0)).toBe(1);
      expect(registry.size).toBe(0);
    });
  });

  it('should clear everything without deleting files', () => {
    registry.add('src-a');
    registry.add('src-b');

    expect(lifecycle.clearAll()).toBe(2);
    expect(engine.removals.every((removal) => !removal.deleteFiles)).toBe(true);
  });

  it('should sweep stuck and aged sessions', () => {
    registry.add('src-stuck');
    const { session: healthy } = registry.add('src-healthy');
    engine.lastHandle.revealMetadata([{ path: 'a.mp4', size: 100 }]);
    clock.advance(3 * 60 * 1000);

    expect(lifecycle.sweep(24)).toEqual({ stuck: 1, failed: 0, aged: 0 });
    expect(registry.listSessions()).toEqual([healthy]);
  });

  it('should sweep a ready session whose handle died', () => {
    const { id } = registry.add('src-a');
    const handle = engine.lastHandle;
    handle.revealMetadata([{ path: 'a.mp4', size: 100 }]);
    handle.invalidate();
    clock.advance(3 * 60 * 1000);

    expect(lifecycle.sweep(24)).toEqual({ stuck: 0, failed: 1, aged: 0 });
    expect(registry.get(id)).toBeNull();
    expect(engine.removals).toEqual([{ handle, deleteFiles: false }]);
  });

  it('should sweep a session whose status the engine refuses', () => {
    const { id } = registry.add('src-a');
    engine.lastHandle.failing.add('status');

    expect(lifecycle.sweep(24)).toEqual({ stuck: 0, failed: 1, aged: 0 });
    expect(registry.get(id)).toBeNull();
  });

  it('should sweep on a timer once started', () => {
    vi.useFakeTimers();
    registry.add('src-a');

    lifecycle.start(HOUR, 0);
    expect(registry.size).toBe(1);

    vi.advanceTimersByTime(HOUR);
    expect(registry.size).toBe(0);
  });

  it('should not start a timer when the interval is zero', () => {
    vi.useFakeTimers();
    registry.add('src-a');

    lifecycle.start(0, 0);
    vi.advanceTimersByTime(10 * HOUR);

    expect(registry.size).toBe(1);
  });
});
