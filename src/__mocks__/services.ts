/**
 * Real application services wired to the in-process fakes
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import {
    DownloadRegistry,
    LifecycleManager,
    MetadataAcquirer,
    PrioritizationPolicy,
    StatusReporter,
    StreamingReadinessEvaluator
} from '../application/services';
import type { ILogger } from '../domain/interfaces';
import { FakeClock, FakeDownloadEngine, createMockLogger, sequentialIds } from './downloadEngine';

export interface TestServices {
    storageRoot: string;
    engine: FakeDownloadEngine;
    clock: FakeClock;
    logger: ILogger;
    registry: DownloadRegistry;
    lifecycle: LifecycleManager;
    evaluator: StreamingReadinessEvaluator;
    acquirer: MetadataAcquirer;
    policy: PrioritizationPolicy;
    reporter: StatusReporter;
    dispose(): void;
}

export function createTestServices(): TestServices {
    const storageRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'services-'));
    const engine = new FakeDownloadEngine();
    const clock = new FakeClock(0);
    const logger = createMockLogger();

    const registry = new DownloadRegistry({ engine, clock, logger, storageRoot, generateId: sequentialIds() });
    const lifecycle = new LifecycleManager({ registry, clock, logger, stuckGracePeriod: 120000 });
    const evaluator = new StreamingReadinessEvaluator(logger);
    const acquirer = new MetadataAcquirer({
        registry,
        clock,
        logger,
        pollInterval: 1000,
        timeout: 30000,
        videoExtensions: ['.mp4', '.mkv', '.avi', '.mov', '.wmv', '.flv', '.webm', '.m4v']
    });
    const policy = new PrioritizationPolicy(logger);
    const reporter = new StatusReporter({ registry, evaluator, lifecycle, logger, apiPrefix: '/api/torrent' });

    return {
        storageRoot,
        engine,
        clock,
        logger,
        registry,
        lifecycle,
        evaluator,
        acquirer,
        policy,
        reporter,
        dispose: () => {
            lifecycle.stop();
            fs.rmSync(storageRoot, { recursive: true, force: true });
        }
    };
}
