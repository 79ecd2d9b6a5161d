/**
 * Use case for fetching a still-frame preview of a video
 * Every failure collapses to THUMBNAIL_NOT_AVAILABLE; the cause stays in the logs
 */

import type { IMediaLibrary, IThumbnailCache, ILogger } from '../../domain/interfaces';
import type { ThumbnailArtifact } from '../../domain/entities';

export const THUMBNAIL_NOT_AVAILABLE = 'Thumbnail not available';

export interface GetThumbnailRequest {
  path: string;
}

export interface GetThumbnailResponse {
  success: boolean;
  artifact?: ThumbnailArtifact;
  error?: string;
}

export class GetThumbnailUseCase {
  constructor(
    private mediaLibrary: IMediaLibrary,
    private thumbnailCache: IThumbnailCache,
    private logger: ILogger
  ) {}

  async execute(request: GetThumbnailRequest): Promise<GetThumbnailResponse> {
    try {
      const file = await this.mediaLibrary.resolve(request.path);
      if (!file || !this.mediaLibrary.isProbableVideo(file.name)) {
        return { success: false, error: THUMBNAIL_NOT_AVAILABLE };
      }

      const artifact = await this.thumbnailCache.getOrCreate(file);
      if (!artifact) {
        return { success: false, error: THUMBNAIL_NOT_AVAILABLE };
      }

      return { success: true, artifact };
    } catch (error) {
      this.logger.error(`Error in GetThumbnailUseCase for ${request.path}:`, error);
      return { success: false, error: THUMBNAIL_NOT_AVAILABLE };
    }
  }
}
