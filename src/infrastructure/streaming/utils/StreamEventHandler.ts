import type { Response } from 'express';
import type { ReadStream } from 'fs';
import type { ILogger } from '../../../domain/interfaces/ILogger';
import { ByteRange } from '../../../domain/value-objects/ByteRange';
import { ByteFormatter } from './ByteFormatter';
import { StreamErrorHandler } from './StreamErrorHandler';

/**
 * Handles file stream events (error, end, cleanup)
 */
export class StreamEventHandler {
  private isCleanedUp = false;

  constructor(
    private readonly logger: ILogger,
    private readonly fileName: string,
    private readonly range: ByteRange
  ) {}

  /**
   * Sets up all stream event handlers.
   * Safe to call before the file is opened: nothing here puts the stream into flowing mode.
   */
  setup(stream: ReadStream, res: Response): void {
    this.setupErrorHandler(stream, res);
    this.setupEndHandler(stream);
    this.setupCleanup(res, stream);
  }

  /**
   * Open failures arrive before any header is written and become a 500;
   * read failures after that abort the socket.
   */
  private setupErrorHandler(stream: ReadStream, res: Response): void {
    stream.on('error', (err: Error) => {
      StreamErrorHandler.handle(err, res, this.logger, this.fileName, {
        range: `${this.range.start}-${this.range.end}`,
        sent: stream.bytesRead,
        expected: this.range.size
      });
    });
  }

  /**
   * Handles end events - validates bytes sent
   */
  private setupEndHandler(stream: ReadStream): void {
    stream.on('end', () => {
      const bytesSent = stream.bytesRead;
      this.logger.debug(
        `[${this.fileName}] Range ${this.range.start}-${this.range.end} sent ` +
        `(${ByteFormatter.toHumanReadable(bytesSent)}, ` +
        `${ByteFormatter.toPercentage(bytesSent, this.range.size)})`
      );

      if (bytesSent !== this.range.size) {
        this.logger.warn(
          `[${this.fileName}] Sent ${bytesSent} bytes but expected ${this.range.size} bytes ` +
          `(file changed on disk?)`
        );
      }
    });
  }

  /**
   * Releases the file descriptor when the client goes away or the response finishes.
   * Response 'close' also fires on aborted connections.
   */
  private setupCleanup(res: Response, stream: ReadStream): void {
    const cleanup = (): void => {
      if (this.isCleanedUp) {
        return;
      }
      this.isCleanedUp = true;

      if (!stream.destroyed) {
        stream.destroy();
      }
    };

    res.on('close', cleanup);
    res.on('finish', cleanup);
  }
}
