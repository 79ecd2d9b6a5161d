import type { Response } from 'express';
import type { ILogger } from '../../../domain/interfaces/ILogger';
import { HTTP_STATUS } from '../constants/HttpConstants';

/**
 * Handles streaming errors consistently
 */
export class StreamErrorHandler {
  /**
   * Ensures headers are not sent before executing callback
   */
  static ensureHeadersNotSent(res: Response, callback: () => void): void {
    if (!res.headersSent) {
      callback();
    }
  }

  /**
   * Handles stream errors.
   * Before headers go out the client gets a bare 500; afterwards the
   * connection is torn down so no truncated body looks complete.
   */
  static handle(
    error: Error,
    res: Response,
    logger: ILogger,
    context: string,
    additionalInfo?: Record<string, unknown>
  ): void {
    logger.error(`[${context}] ${error.message}`, additionalInfo);

    if (res.headersSent) {
      if (!res.destroyed) {
        res.destroy();
      }
      return;
    }

    res.status(HTTP_STATUS.INTERNAL_SERVER_ERROR).json({ error: 'Internal server error' });
  }

  /**
   * Sends generic error response
   */
  static sendError(res: Response, error: string, status: number = HTTP_STATUS.INTERNAL_SERVER_ERROR): void {
    this.ensureHeadersNotSent(res, () => {
      res.status(status).json({ error });
    });
  }
}
