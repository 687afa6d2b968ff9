import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import type { Config } from '../../config';
import type { IClock, IDiskInspector, IDownloadEngine, ILogger, IStreamService } from '../../domain/interfaces';
import { describeError } from '../../domain/errors';
import {
    DownloadRegistry,
    LifecycleManager,
    MetadataAcquirer,
    PrioritizationPolicy,
    StatusReporter,
    StreamingReadinessEvaluator
} from '../../application/services';
import {
    AddSourceUseCase,
    CleanupSessionsUseCase,
    ClearSessionsUseCase,
    GetSessionStatusUseCase,
    ListSessionsUseCase,
    RemoveSessionUseCase,
    StreamFileUseCase
} from '../../application/use-cases';
import { SystemClock } from '../../infrastructure/clock/SystemClock';
import { FsDiskInspector } from '../../infrastructure/disk/FsDiskInspector';
import { ProgressiveStreamService } from '../../infrastructure/streaming/ProgressiveStreamService';
import { RangeResponseBuilder } from '../../infrastructure/streaming/utils';
import { SessionController } from './controllers/SessionController';
import { StreamController } from './controllers/StreamController';
import { createSessionRoutes } from './routes/session.routes';

export type AppSettings = Pick<
    Config,
    | 'API_PREFIX'
    | 'DOWNLOAD_DIR'
    | 'METADATA_POLL_INTERVAL'
    | 'METADATA_TIMEOUT'
    | 'STUCK_GRACE_PERIOD'
    | 'STREAM_CHUNK_SIZE'
    | 'DEFAULT_MAX_AGE_HOURS'
    | 'VIDEO_EXTENSIONS'
>;

export interface AppDependencies {
    engine: IDownloadEngine;
    logger: ILogger;
    settings: AppSettings;
    clock?: IClock;
    diskInspector?: IDiskInspector;
    streamService?: IStreamService;
    generateId?: () => string;
}

export interface AppContext {
    app: Express;
    registry: DownloadRegistry;
    lifecycle: LifecycleManager;
}

/**
 * Creates and configures Express application
 * Can be used both for production server and testing
 */
export function createApp(deps: AppDependencies): AppContext {
    const { engine, logger, settings } = deps;
    const clock = deps.clock ?? new SystemClock();
    const diskInspector = deps.diskInspector ?? new FsDiskInspector();
    const streamService = deps.streamService ?? new ProgressiveStreamService(logger, settings.STREAM_CHUNK_SIZE);

    // Initialize services
    const registry = new DownloadRegistry({
        engine,
        clock,
        logger,
        storageRoot: settings.DOWNLOAD_DIR,
        generateId: deps.generateId
    });
    const lifecycle = new LifecycleManager({
        registry,
        clock,
        logger,
        stuckGracePeriod: settings.STUCK_GRACE_PERIOD
    });
    const evaluator = new StreamingReadinessEvaluator(logger);
    const metadataAcquirer = new MetadataAcquirer({
        registry,
        clock,
        logger,
        pollInterval: settings.METADATA_POLL_INTERVAL,
        timeout: settings.METADATA_TIMEOUT,
        videoExtensions: settings.VIDEO_EXTENSIONS
    });
    const prioritizationPolicy = new PrioritizationPolicy(logger);
    const statusReporter = new StatusReporter({
        registry,
        evaluator,
        lifecycle,
        logger,
        apiPrefix: settings.API_PREFIX
    });

    // Initialize controllers
    const sessionController = new SessionController({
        addSource: new AddSourceUseCase(registry, metadataAcquirer, prioritizationPolicy, statusReporter, logger),
        getStatus: new GetSessionStatusUseCase(statusReporter),
        listSessions: new ListSessionsUseCase(statusReporter),
        removeSession: new RemoveSessionUseCase(registry, lifecycle, logger),
        cleanupSessions: new CleanupSessionsUseCase(lifecycle),
        clearSessions: new ClearSessionsUseCase(lifecycle),
        defaultMaxAgeHours: settings.DEFAULT_MAX_AGE_HOURS
    });
    const streamController = new StreamController(
        new StreamFileUseCase(registry, evaluator, diskInspector, logger),
        streamService
    );

    // Initialize Express app
    const app: Express = express();
    app.use(express.json());

    // Setup routes
    app.use(settings.API_PREFIX, createSessionRoutes(sessionController, streamController, registry));

    app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
        logger.error('Unhandled request error:', error);
        RangeResponseBuilder.sendErrorIfHeadersNotSent(res, describeError(error));
    });

    return { app, registry, lifecycle };
}
