import { Router } from 'express';
import type { DownloadRegistry } from '../../../application/services';
import type { SessionController } from '../controllers/SessionController';
import type { StreamController } from '../controllers/StreamController';

/**
 * Creates and configures session and stream routes
 */
export function createSessionRoutes(
  sessionController: SessionController,
  streamController: StreamController,
  registry: DownloadRegistry
): Router {
  const router = Router();

  router.post('/add', (req, res, next) => {
    sessionController.add(req, res).catch(next);
  });

  router.get('/status/:id', (req, res) => sessionController.status(req, res));

  // Stream endpoint
  router.get('/stream/:id/:fileIndex', (req, res, next) => {
    streamController.stream(req, res).catch(next);
  });

  router.delete('/remove/:id', (req, res) => sessionController.remove(req, res));

  router.get('/list', (req, res) => sessionController.list(req, res));

  router.post('/cleanup', (req, res) => sessionController.cleanup(req, res));

  router.post('/clear-all', (req, res) => sessionController.clearAll(req, res));

  router.get('/health', (_req, res) => {
    res.json({ status: 'ok', sessions: registry.size });
  });

  return router;
}
