import type { Request, Response } from 'express';
import { StreamVideoUseCase, VIDEO_NOT_FOUND } from '../../../application/use-cases/StreamVideoUseCase';
import type { IStreamService } from '../../../domain/interfaces/IStreamService';
import { HTTP_STATUS } from '../../../infrastructure/streaming/constants/HttpConstants';
import { StreamErrorHandler } from '../../../infrastructure/streaming/utils';

/**
 * Controller for handling stream-related HTTP requests
 */
export class StreamController {
    constructor(
        private streamVideoUseCase: StreamVideoUseCase,
        private streamService: IStreamService
    ) { }

    /**
     * Handles GET|HEAD /video/<relative-path>
     */
    async stream(req: Request, res: Response): Promise<void> {
        const relativePath = req.params[0] ?? '';

        const result = await this.streamVideoUseCase.execute({ path: relativePath });

        if (!result.success || !result.file) {
            if (result.error === VIDEO_NOT_FOUND) {
                res.status(HTTP_STATUS.NOT_FOUND).json({ error: VIDEO_NOT_FOUND });
            } else {
                StreamErrorHandler.sendError(res, 'Internal server error');
            }
            return;
        }

        this.streamService.streamVideo(req, res, result.file);
    }
}
