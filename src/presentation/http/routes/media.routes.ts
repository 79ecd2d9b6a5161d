import { Router } from 'express';
import { StreamController } from '../controllers/StreamController';
import { ThumbnailController } from '../controllers/ThumbnailController';

/**
 * Creates and configures media routes
 */
export function createMediaRoutes(
  streamController: StreamController,
  thumbnailController: ThumbnailController
): Router {
  const router = Router();

  // Video endpoint; Express routes HEAD through GET handlers
  router.get('/video/*', (req, res, next) => {
    streamController.stream(req, res).catch(next);
  });

  // Thumbnail endpoint
  router.get('/thumb/*', (req, res, next) => {
    thumbnailController.thumbnail(req, res).catch(next);
  });

  router.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  return router;
}
