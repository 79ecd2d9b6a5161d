import type { Response } from 'express';
import { ByteRange } from '../../../domain/value-objects/ByteRange';
import { HTTP_STATUS, HTTP_HEADERS } from '../constants/HttpConstants';

export interface ContentHeaders {
  contentType: string;
  cacheControl: string;
}

/**
 * Builds and sends HTTP range responses
 */
export class RangeResponseBuilder {
  /**
   * Writes 200 OK headers for the whole file
   */
  static sendFullContent(res: Response, fileSize: number, headers: ContentHeaders): void {
    res.writeHead(HTTP_STATUS.OK, {
      'Accept-Ranges': HTTP_HEADERS.ACCEPT_RANGES,
      'Content-Length': fileSize,
      'Content-Type': headers.contentType,
      'Cache-Control': headers.cacheControl
    });
  }

  /**
   * Writes 206 Partial Content headers
   */
  static sendPartialContent(
    res: Response,
    range: ByteRange,
    fileSize: number,
    headers: ContentHeaders
  ): void {
    res.writeHead(HTTP_STATUS.PARTIAL_CONTENT, {
      'Content-Range': range.toContentRange(fileSize),
      'Accept-Ranges': HTTP_HEADERS.ACCEPT_RANGES,
      'Content-Length': range.size,
      'Content-Type': headers.contentType,
      'Cache-Control': headers.cacheControl
    });
  }

  /**
   * Sends 416 Range Not Satisfiable response
   */
  static sendRangeNotSatisfiable(res: Response, fileSize: number): void {
    res.writeHead(HTTP_STATUS.RANGE_NOT_SATISFIABLE, {
      'Content-Range': `bytes */${fileSize}`,
      'Accept-Ranges': HTTP_HEADERS.ACCEPT_RANGES
    });
    res.end();
  }
}
