import type { Request, Response } from 'express';
import config from '../../../config';
import { GetThumbnailUseCase, THUMBNAIL_NOT_AVAILABLE } from '../../../application/use-cases/GetThumbnailUseCase';
import type { ILogger } from '../../../domain/interfaces/ILogger';
import { HTTP_HEADERS, HTTP_STATUS } from '../../../infrastructure/streaming/constants/HttpConstants';

/**
 * Controller for still-frame previews
 */
export class ThumbnailController {
    constructor(
        private getThumbnailUseCase: GetThumbnailUseCase,
        private logger: ILogger,
        private cacheControl: string = config.THUMBNAIL_CACHE_CONTROL
    ) { }

    /**
     * Handles GET /thumb/<relative-path>
     */
    async thumbnail(req: Request, res: Response): Promise<void> {
        const relativePath = req.params[0] ?? '';

        const result = await this.getThumbnailUseCase.execute({ path: relativePath });

        if (!result.success || !result.artifact) {
            res.status(HTTP_STATUS.NOT_FOUND).json({ error: THUMBNAIL_NOT_AVAILABLE });
            return;
        }

        const artifactPath = result.artifact.path;
        res.sendFile(
            artifactPath,
            {
                // The cache dir may sit under a dot-directory such as .runtime
                dotfiles: 'allow',
                cacheControl: false,
                headers: {
                    'Content-Type': HTTP_HEADERS.CONTENT_TYPE_THUMBNAIL,
                    'Cache-Control': this.cacheControl
                }
            },
            (error?: Error) => {
                if (!error) {
                    return;
                }
                this.logger.warn(`[thumbnail] Failed to send ${artifactPath}: ${error.message}`);
                if (!res.headersSent) {
                    res.status(HTTP_STATUS.NOT_FOUND).json({ error: THUMBNAIL_NOT_AVAILABLE });
                }
            }
        );
    }
}
