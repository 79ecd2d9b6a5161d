import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import config from '../../config';
import type { IMediaLibrary, IStreamService, IThumbnailCache, ILogger } from '../../domain/interfaces';
import { ConsoleLogger } from '../../infrastructure/logging/ConsoleLogger';
import { LocalMediaLibrary } from '../../infrastructure/library/LocalMediaLibrary';
import { FileStreamService } from '../../infrastructure/streaming/FileStreamService';
import { DiskThumbnailCache } from '../../infrastructure/thumbnails/DiskThumbnailCache';
import { FfmpegFrameExtractor } from '../../infrastructure/thumbnails/FfmpegFrameExtractor';
import { HTTP_STATUS } from '../../infrastructure/streaming/constants/HttpConstants';
import { StreamVideoUseCase } from '../../application/use-cases/StreamVideoUseCase';
import { GetThumbnailUseCase } from '../../application/use-cases/GetThumbnailUseCase';
import { StreamController } from './controllers/StreamController';
import { ThumbnailController } from './controllers/ThumbnailController';
import { createMediaRoutes } from './routes/media.routes';

function statusOf(error: unknown): number {
    if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
        return error.status;
    }
    return HTTP_STATUS.INTERNAL_SERVER_ERROR;
}

/**
 * Creates and configures Express application
 * Can be used both for production server and testing
 */
export function createApp(
    mediaLibrary?: IMediaLibrary,
    thumbnailCache?: IThumbnailCache,
    logger?: ILogger,
    streamService?: IStreamService
): Express {
    // Initialize dependencies (allow injection for testing)
    const appLogger = logger || new ConsoleLogger();
    const library = mediaLibrary || new LocalMediaLibrary(config.MEDIA_ROOT, config.VIDEO_EXTENSIONS);
    const cache = thumbnailCache || new DiskThumbnailCache(new FfmpegFrameExtractor(appLogger), appLogger);
    const service = streamService || new FileStreamService(appLogger);

    // Initialize use cases
    const streamVideoUseCase = new StreamVideoUseCase(library, appLogger);
    const getThumbnailUseCase = new GetThumbnailUseCase(library, cache, appLogger);

    // Initialize controllers
    const streamController = new StreamController(streamVideoUseCase, service);
    const thumbnailController = new ThumbnailController(getThumbnailUseCase, appLogger);

    // Initialize Express app
    const app: Express = express();
    app.disable('x-powered-by');

    // Setup routes
    app.use('/', createMediaRoutes(streamController, thumbnailController));

    app.use((_req: Request, res: Response) => {
        res.status(HTTP_STATUS.NOT_FOUND).json({ error: 'Not found' });
    });

    // Express recognises error handlers by their four parameters
    app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
        const status = statusOf(error);
        if (status >= HTTP_STATUS.INTERNAL_SERVER_ERROR) {
            appLogger.error(`Unhandled error for ${req.method} ${req.originalUrl}:`, error);
        }
        if (res.headersSent) {
            res.destroy();
            return;
        }
        res.status(status).json({ error: status >= HTTP_STATUS.INTERNAL_SERVER_ERROR ? 'Internal server error' : 'Bad request' });
    });

    return app;
}
