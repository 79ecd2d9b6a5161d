/**
 * Use case for streaming a video from the media library
 * Resolves the request path to a file on disk
 */

import type { IMediaLibrary, ILogger } from '../../domain/interfaces';
import type { SourceFile } from '../../domain/entities';

export const VIDEO_NOT_FOUND = 'Video not found';

export interface StreamVideoRequest {
  path: string;
}

export interface StreamVideoResponse {
  success: boolean;
  file?: SourceFile;
  error?: string;
}

export class StreamVideoUseCase {
  constructor(
    private mediaLibrary: IMediaLibrary,
    private logger: ILogger
  ) {}

  async execute(request: StreamVideoRequest): Promise<StreamVideoResponse> {
    try {
      const file = await this.mediaLibrary.resolve(request.path);

      if (!file) {
        this.logger.debug(`Video not found: ${request.path}`);
        return {
          success: false,
          error: VIDEO_NOT_FOUND
        };
      }

      return {
        success: true,
        file
      };
    } catch (error) {
      this.logger.error(`Error in StreamVideoUseCase for ${request.path}:`, error);
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      return {
        success: false,
        error: errorMessage
      };
    }
  }
}
