#!/usr/bin/env node

/**
 * Main server file for media shelf
 *
 * Usage:
 *   MEDIA_ROOT=/path/to/videos npm start
 *
 * Then open:
 *   http://localhost:3000/video/<relative-path>
 *   http://localhost:3000/thumb/<relative-path>
 */

import config from '../../config';
import { createApp } from './app';
import { CompositeLogger } from '../../infrastructure/logging/CompositeLogger';
import { LocalMediaLibrary } from '../../infrastructure/library/LocalMediaLibrary';
import { DiskThumbnailCache } from '../../infrastructure/thumbnails/DiskThumbnailCache';
import { FfmpegFrameExtractor } from '../../infrastructure/thumbnails/FfmpegFrameExtractor';
import { FileStreamService } from '../../infrastructure/streaming/FileStreamService';

const logger = new CompositeLogger();

(async () => {
  const mediaLibrary = new LocalMediaLibrary(config.MEDIA_ROOT, config.VIDEO_EXTENSIONS);
  // Fail fast when the root is misconfigured
  await mediaLibrary.ensureRoot();

  const thumbnailCache = new DiskThumbnailCache(new FfmpegFrameExtractor(logger), logger);
  const streamService = new FileStreamService(logger);

  const app = createApp(mediaLibrary, thumbnailCache, logger, streamService);

  const server = app.listen(config.PORT, () => {
    logger.info(`🚀 Media shelf running on http://localhost:${config.PORT}`);
    logger.info(`📁 Media root: ${mediaLibrary.rootDir}`);
    logger.info(`🖼️  Thumbnail cache: ${config.CACHE_DIR}`);
  });

  const shutdown = (signal: string): void => {
    logger.info(`\n🛑 ${signal} received, stopping server...`);
    server.close(() => {
      void logger.close().finally(() => process.exit(0));
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
})().catch((error) => {
  logger.error('Failed to start server:', error);
  void logger.close().finally(() => process.exit(1));
});
