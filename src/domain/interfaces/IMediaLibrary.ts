/**
 * Media library interface
 * Maps request paths onto files beneath the configured root
 */

import type { SourceFile } from '../entities/SourceFile';

export interface IMediaLibrary {
  /**
   * Resolves a path relative to the library root
   * @returns The file, or null when it escapes the root, is missing or is not a regular file
   */
  resolve(relativePath: string): Promise<SourceFile | null>;

  /**
   * Whether a file name looks like playable video
   */
  isProbableVideo(name: string): boolean;
}
