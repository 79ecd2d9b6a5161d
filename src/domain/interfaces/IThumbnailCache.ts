/**
 * Thumbnail cache interface
 */

import type { SourceFile, ThumbnailArtifact } from '../entities/SourceFile';

export interface IThumbnailCache {
  /**
   * Returns the cached preview for a file, generating it on a miss.
   * Resolves to null when no preview can be produced; failures are not remembered.
   */
  getOrCreate(file: SourceFile): Promise<ThumbnailArtifact | null>;
}
