/**
 * Filesystem-backed media library
 * Resolves request paths beneath a fixed root without following them out of it
 */

import fs from 'fs';
import path from 'path';
import mime from 'mime-types';
import type { IMediaLibrary } from '../../domain/interfaces/IMediaLibrary';
import type { SourceFile } from '../../domain/entities';

const MISSING_FILE_CODES = new Set(['ENOENT', 'ENOTDIR', 'ENAMETOOLONG', 'ELOOP']);

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && MISSING_FILE_CODES.has(String(error.code));
}

export class LocalMediaLibrary implements IMediaLibrary {
  private readonly root: string;

  constructor(
    root: string,
    private readonly videoExtensions: readonly string[]
  ) {
    this.root = path.resolve(root);
  }

  get rootDir(): string {
    return this.root;
  }

  /**
   * Throws when the root does not exist or is not a directory
   */
  async ensureRoot(): Promise<void> {
    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(this.root);
    } catch (error) {
      throw new Error(`Media root does not exist: ${this.root}`, { cause: error });
    }
    if (!stat.isDirectory()) {
      throw new Error(`Media root is not a directory: ${this.root}`);
    }
  }

  async resolve(relativePath: string): Promise<SourceFile | null> {
    const absolutePath = this.toAbsolute(relativePath);
    if (!absolutePath) {
      return null;
    }

    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(absolutePath);
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }
      throw error;
    }

    if (!stat.isFile()) {
      return null;
    }

    return {
      relativePath: path.relative(this.root, absolutePath).split(path.sep).join('/'),
      absolutePath,
      name: path.basename(absolutePath),
      size: stat.size,
      modifiedAt: stat.mtime
    };
  }

  isProbableVideo(name: string): boolean {
    const type = mime.lookup(name);
    if (type && type.startsWith('video/')) {
      return true;
    }
    return this.videoExtensions.includes(path.extname(name).toLowerCase());
  }

  /**
   * Lexical containment check; symlinks inside the root are allowed to point anywhere
   */
  private toAbsolute(relativePath: string): string | null {
    if (!relativePath || relativePath.includes('\0')) {
      return null;
    }

    const candidate = path.resolve(this.root, relativePath);
    const relative = path.relative(this.root, candidate);
    if (!relative || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
      return null;
    }
    return candidate;
  }
}
