/**
 * Stream service interface
 * Handles video streaming operations
 */

import type { Request, Response } from 'express';
import type { SourceFile } from '../entities/SourceFile';

export interface IStreamService {
  /**
   * Streams a file over HTTP with range request support.
   * Answers 200, 206 or 416 itself and never buffers the whole file.
   */
  streamVideo(req: Request, res: Response, file: SourceFile): void;
}
