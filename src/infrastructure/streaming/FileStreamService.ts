import fs from 'fs';
import type { Request, Response } from 'express';
import config from '../../config';
import type { IStreamService } from '../../domain/interfaces/IStreamService';
import type { ILogger } from '../../domain/interfaces/ILogger';
import type { SourceFile } from '../../domain/entities';
import { ByteRange } from '../../domain/value-objects';
import {
  RangeParser,
  RangeNormalizer,
  RangeResponseBuilder,
  StreamEventHandler,
  MimeTypeResolver,
  ByteFormatter
} from './utils';
import type { ContentHeaders } from './utils';

export interface FileStreamServiceOptions {
  cacheControl: string;
}

/**
 * Local filesystem implementation of IStreamService
 * Serves whole files (200) or a single byte span (206) straight from disk
 */
export class FileStreamService implements IStreamService {
  private readonly logger: ILogger;
  private readonly options: FileStreamServiceOptions;

  constructor(logger: ILogger, options: FileStreamServiceOptions = { cacheControl: config.VIDEO_CACHE_CONTROL }) {
    this.logger = logger;
    this.options = options;
  }

  // ========== Public API ==========

  /**
   * Streams file over HTTP with range request support.
   * HEAD is answered with the full-file headers and never opens the file.
   */
  streamVideo(req: Request, res: Response, file: SourceFile): void {
    const range = req.headers.range;
    const headers: ContentHeaders = {
      contentType: MimeTypeResolver.forFile(file.name),
      cacheControl: this.options.cacheControl
    };

    this.logger.debug(
      `[${file.relativePath}] ${req.method} range=${range || 'none'}, fileSize=${file.size}`
    );

    if (req.method === 'HEAD') {
      RangeResponseBuilder.sendFullContent(res, file.size, headers);
      res.end();
      return;
    }

    if (!range) {
      this._sendWholeFile(res, file, headers);
      return;
    }

    this._handleRangeRequest(res, file, headers, range);
  }

  // ========== Range Request Handling ==========

  private _sendWholeFile(res: Response, file: SourceFile, headers: ContentHeaders): void {
    const range = ByteRange.wholeFile(file.size);
    if (!range) {
      // Empty file: nothing to open
      RangeResponseBuilder.sendFullContent(res, 0, headers);
      res.end();
      return;
    }

    this._sendStreamResponse(res, file, range, () => {
      RangeResponseBuilder.sendFullContent(res, file.size, headers);
    });
  }

  private _handleRangeRequest(
    res: Response,
    file: SourceFile,
    headers: ContentHeaders,
    rangeHeader: string
  ): void {
    const parseResult = RangeParser.parse(rangeHeader);
    if (!parseResult.success) {
      this.logger.warn(`[${file.relativePath}] ${parseResult.message}`);
      RangeResponseBuilder.sendRangeNotSatisfiable(res, file.size);
      return;
    }

    const normalizedRange = RangeNormalizer.normalize(
      parseResult.value,
      file.size,
      this.logger,
      file.relativePath
    );

    if (!normalizedRange) {
      RangeResponseBuilder.sendRangeNotSatisfiable(res, file.size);
      return;
    }

    this.logger.debug(
      `[${file.relativePath}] Sending range response: ${normalizedRange.toContentRange(file.size)} ` +
      `(${ByteFormatter.toMB(normalizedRange.size)})`
    );

    this._sendStreamResponse(res, file, normalizedRange, () => {
      RangeResponseBuilder.sendPartialContent(res, normalizedRange, file.size, headers);
    });
  }

  // ========== HTTP Response ==========

  /**
   * Opens a bounded read of the range and pipes it once the file is open.
   * Headers are written only after a successful open, so open failures still get a clean 500.
   */
  private _sendStreamResponse(
    res: Response,
    file: SourceFile,
    range: ByteRange,
    writeHeaders: () => void
  ): void {
    if (res.writableEnded || res.destroyed) {
      this.logger.warn(`[${file.relativePath}] Response already ended, skipping stream`);
      return;
    }

    const stream = fs.createReadStream(file.absolutePath, { start: range.start, end: range.end });
    const eventHandler = new StreamEventHandler(this.logger, file.relativePath, range);
    eventHandler.setup(stream, res);

    stream.once('ready', () => {
      if (res.destroyed) {
        stream.destroy();
        return;
      }
      writeHeaders();
      stream.pipe(res);
    });
  }
}
