/**
 * Disk-backed thumbnail cache
 *
 * Artifacts are stored as <cacheDir>/<key[0..2]>/<key>.jpg where key is derived
 * from the relative path and mtime, so an edited source simply misses and the
 * old artifact is left orphaned. Generation is single-flight per key and bounded
 * globally by a semaphore. Failures are returned as null and never recorded.
 */

import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import config from '../../config';
import type { SourceFile, ThumbnailArtifact } from '../../domain/entities';
import type { IFrameExtractor, ILogger, IThumbnailCache } from '../../domain/interfaces';
import { ExtractionFailedError, isMediaError } from '../../domain/errors';
import { Semaphore, SingleFlight } from './utils';

export interface ThumbnailCacheOptions {
  cacheDir: string;
  concurrency: number;
  seekSeconds: number;
  width: number;
  quality: number;
  timeoutMs: number;
}

const JPEG_SOI = Buffer.from([0xff, 0xd8, 0xff]);

export class DiskThumbnailCache implements IThumbnailCache {
  private readonly flights = new SingleFlight<ThumbnailArtifact | null>();
  private readonly pool: Semaphore;
  private readonly options: ThumbnailCacheOptions;

  constructor(
    private readonly extractor: IFrameExtractor,
    private readonly logger: ILogger,
    options: Partial<ThumbnailCacheOptions> = {}
  ) {
    this.options = {
      cacheDir: config.CACHE_DIR,
      concurrency: config.THUMBNAIL_CONCURRENCY,
      seekSeconds: config.THUMBNAIL_SEEK_SECONDS,
      width: config.THUMBNAIL_WIDTH,
      quality: config.THUMBNAIL_QUALITY,
      timeoutMs: config.THUMBNAIL_TIMEOUT_MS,
      ...options
    };
    this.pool = new Semaphore(this.options.concurrency);
  }

  static keyFor(file: SourceFile): string {
    return crypto
      .createHash('sha1')
      .update(`${file.relativePath}:${file.modifiedAt.getTime()}`)
      .digest('hex');
  }

  artifactPath(key: string): string {
    return path.join(this.options.cacheDir, key.slice(0, 2), `${key}.jpg`);
  }

  async getOrCreate(file: SourceFile): Promise<ThumbnailArtifact | null> {
    const key = DiskThumbnailCache.keyFor(file);
    const finalPath = this.artifactPath(key);

    const cached = await this.readArtifact(key, finalPath);
    if (cached) {
      return cached;
    }

    return this.flights.run(key, () => this.generate(file, key, finalPath));
  }

  // ========== Generation ==========

  private generate(file: SourceFile, key: string, finalPath: string): Promise<ThumbnailArtifact | null> {
    return this.pool.use(async () => {
      // Another process sharing the cache dir may have finished while we queued
      const cached = await this.readArtifact(key, finalPath);
      if (cached) {
        return cached;
      }

      const dir = path.dirname(finalPath);
      const tmpPath = path.join(dir, `${key}.${process.pid}.${crypto.randomUUID()}.tmp.jpg`);
      const startedAt = Date.now();

      try {
        await fs.promises.mkdir(dir, { recursive: true });
        await this.extractor.extract({
          inputPath: file.absolutePath,
          outputPath: tmpPath,
          seekSeconds: this.options.seekSeconds,
          width: this.options.width,
          quality: this.options.quality,
          timeoutMs: this.options.timeoutMs
        });
        await this.validateImage(tmpPath);
        await fs.promises.rename(tmpPath, finalPath);
      } catch (error) {
        this.logFailure(file, error);
        await this.removeTemporary(tmpPath);
        return null;
      }

      const stat = await fs.promises.stat(finalPath);
      this.logger.info(
        `[thumbnail] Generated ${file.relativePath} -> ${path.basename(finalPath)} ` +
        `(${stat.size} bytes, ${Date.now() - startedAt} ms)`
      );
      return { key, path: finalPath, size: stat.size, cached: false };
    });
  }

  private async validateImage(imagePath: string): Promise<void> {
    const handle = await fs.promises.open(imagePath, 'r');
    try {
      const header = Buffer.alloc(JPEG_SOI.length);
      const { bytesRead } = await handle.read(header, 0, header.length, 0);
      if (bytesRead === 0) {
        throw new ExtractionFailedError('Extractor produced an empty image');
      }
      if (bytesRead < JPEG_SOI.length || !header.equals(JPEG_SOI)) {
        throw new ExtractionFailedError('Extractor output is not a JPEG image');
      }
    } finally {
      await handle.close();
    }
  }

  // ========== Helpers ==========

  private async readArtifact(key: string, artifactPath: string): Promise<ThumbnailArtifact | null> {
    try {
      const stat = await fs.promises.stat(artifactPath);
      if (stat.isFile() && stat.size > 0) {
        return { key, path: artifactPath, size: stat.size, cached: true };
      }
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        this.logger.warn(`[thumbnail] Could not stat ${artifactPath}:`, error);
      }
    }
    return null;
  }

  private async removeTemporary(tmpPath: string): Promise<void> {
    try {
      await fs.promises.rm(tmpPath, { force: true });
    } catch (error) {
      this.logger.warn(`[thumbnail] Could not remove temporary file ${tmpPath}:`, error);
    }
  }

  private logFailure(file: SourceFile, error: unknown): void {
    if (isMediaError(error)) {
      this.logger.warn(`[thumbnail] ${file.relativePath}: ${error.code} ${error.message}`, error.cause);
      return;
    }
    this.logger.error(`[thumbnail] ${file.relativePath}: unexpected failure`, error);
  }
}
