/**
 * Domain entity representing a media file beneath the library root
 * Identity is the relative path; size and mtime are captured once per request
 */

export interface SourceFile {
  relativePath: string;
  absolutePath: string;
  name: string;
  size: number;
  modifiedAt: Date;
}

/**
 * A still-frame preview stored in the thumbnail cache
 */
export interface ThumbnailArtifact {
  key: string;
  path: string;
  size: number;
  // False when the artifact was produced by this call
  cached: boolean;
}
