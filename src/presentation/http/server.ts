#!/usr/bin/env node

/**
 * Main server file for the progressive streaming bridge
 *
 * Usage:
 *   npm run dev
 *
 * Then add a source and stream its primary file:
 *   curl -X POST http://localhost:3000/api/torrent/add -H 'Content-Type: application/json' \
 *     -d '{"sourceDescriptor":"magnet:?xt=urn:btih:..."}'
 *   mpv http://localhost:3000/api/torrent/stream/<sessionId>/<fileIndex>
 */

import path from 'path';
import config from '../../config';
import { createApp } from './app';
import { CompositeLogger } from '../../infrastructure/logging/CompositeLogger';
import { ConsoleLogger } from '../../infrastructure/logging/ConsoleLogger';
import { FileLogger } from '../../infrastructure/logging/FileLogger';
import { WebTorrentEngine } from '../../infrastructure/engine/WebTorrentEngine';
import { clearDownloadCache } from '../../infrastructure/disk/clearDownloadCache';

// Initialize dependencies
const fileLogger = new FileLogger(path.join(config.RUNTIME_DIR, 'logs'));
const logger = new CompositeLogger(new ConsoleLogger(config.LOG_LEVEL), fileLogger);

// Initialize server asynchronously to allow cache clearing
(async () => {
  // Clear download cache before starting (unless CLEAR_CACHE=false)
  if (config.CLEAR_CACHE) {
    logger.info('🧹 Clearing download cache...');
    try {
      await clearDownloadCache(config.DOWNLOAD_DIR, logger);
    } catch (error) {
      logger.error('Failed to clear cache, continuing anyway:', error);
    }
  }

  const engine = new WebTorrentEngine(logger);
  const { app, lifecycle } = createApp({ engine, logger, settings: config });

  if (config.CLEANUP_INTERVAL > 0) {
    lifecycle.start(config.CLEANUP_INTERVAL, config.DEFAULT_MAX_AGE_HOURS);
  }

  // Start server
  const server = app.listen(config.PORT, () => {
    logger.info(`🚀 Streaming bridge running on http://localhost:${config.PORT}${config.API_PREFIX}`);
    logger.info(`💡 Use a video player with HTTP support (VLC, mpv, browser)`);
  });

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info(`🛑 ${signal} received, stopping server...`);
    lifecycle.stop();
    server.close();
    await engine.destroy();
    logger.info('✅ All downloads stopped');
    fileLogger.close();
    process.exit(0);
  };

  // Process termination handling
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        logger.error('Shutdown failed:', error);
        process.exit(1);
      });
    });
  }
})().catch((error) => {
  logger.error('Failed to start server:', error);
  process.exit(1);
});
