/**
 * Unit tests for DiskThumbnailCache
 * Uses a temporary cache directory and an in-process extractor
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { DiskThumbnailCache } from './DiskThumbnailCache';
import type { ILogger } from '../../domain/interfaces/ILogger';
import type { SourceFile } from '../../domain/entities';
import { ExtractionTimeoutError, ToolUnavailableError } from '../../domain/errors';
import { FAKE_JPEG, FakeFrameExtractor } from '../../__mocks__/frameExtractor';

describe('DiskThumbnailCache', () => {
    let cacheDir: string;
    let extractor: FakeFrameExtractor;
    let mockLogger: ILogger;
    let cache: DiskThumbnailCache;

    function sourceFile(relativePath: string, modifiedAt = new Date('2024-03-01T12:00:00Z')): SourceFile {
        return {
            relativePath,
            absolutePath: path.join('/srv/media', relativePath),
            name: path.basename(relativePath),
            size: 1000000,
            modifiedAt
        };
    }

    async function listCacheFiles(): Promise<string[]> {
        const files: string[] = [];
        for (const shard of await fs.promises.readdir(cacheDir)) {
            for (const name of await fs.promises.readdir(path.join(cacheDir, shard))) {
                if (name.endsWith('.jpg')) {
                    files.push(path.join(shard, name));
                }
            }
        }
        return files.sort();
    }

    beforeEach(async () => {
        cacheDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'media-shelf-cache-'));
        extractor = new FakeFrameExtractor();
        mockLogger = {
            log: vi.fn(),
            error: vi.fn(),
            warn: vi.fn(),
            info: vi.fn(),
            debug: vi.fn()
        };
        cache = new DiskThumbnailCache(extractor, mockLogger, {
            cacheDir,
            concurrency: 2,
            seekSeconds: 1,
            width: 320,
            quality: 5,
            timeoutMs: 5000
        });
    });

    afterEach(async () => {
        await fs.promises.rm(cacheDir, { recursive: true, force: true });
    });

    describe('keyFor', () => {
        it('should derive the key from path and modification time', () => {
            const original = sourceFile('clip.mp4');
            const edited = sourceFile('clip.mp4', new Date('2024-03-02T12:00:00Z'));

            expect(DiskThumbnailCache.keyFor(original)).toMatch(/^[0-9a-f]{40}$/);
            expect(DiskThumbnailCache.keyFor(original)).toBe(DiskThumbnailCache.keyFor(sourceFile('clip.mp4')));
            expect(DiskThumbnailCache.keyFor(original)).not.toBe(DiskThumbnailCache.keyFor(edited));
            expect(DiskThumbnailCache.keyFor(original)).not.toBe(DiskThumbnailCache.keyFor(sourceFile('other.mp4')));
        });

        it('should shard artifacts by the first two characters of the key', () => {
            const key = DiskThumbnailCache.keyFor(sourceFile('clip.mp4'));
            expect(cache.artifactPath(key)).toBe(path.join(cacheDir, key.slice(0, 2), `${key}.jpg`));
        });
    });

    describe('getOrCreate', () => {
        it('should generate the artifact on a miss', async () => {
            const file = sourceFile('shows/clip.mp4');

            const artifact = await cache.getOrCreate(file);

            const key = DiskThumbnailCache.keyFor(file);
            expect(artifact).toEqual({
                key,
                path: cache.artifactPath(key),
                size: FAKE_JPEG.length,
                cached: false
            });
            expect(await fs.promises.readFile(cache.artifactPath(key))).toEqual(FAKE_JPEG);
            expect(extractor.calls).toHaveLength(1);
            expect(extractor.calls[0]).toMatchObject({
                inputPath: path.join('/srv/media', 'shows/clip.mp4'),
                seekSeconds: 1,
                width: 320,
                quality: 5,
                timeoutMs: 5000
            });
        });

        it('should write to a temporary file in the artifact directory', async () => {
            const file = sourceFile('clip.mp4');
            const key = DiskThumbnailCache.keyFor(file);

            await cache.getOrCreate(file);

            const outputPath = extractor.calls[0].outputPath;
            expect(path.dirname(outputPath)).toBe(path.dirname(cache.artifactPath(key)));
            expect(outputPath).not.toBe(cache.artifactPath(key));
            expect(path.basename(outputPath)).toMatch(new RegExp(`^${key}\\..+\\.tmp\\.jpg$`));
            expect(await listCacheFiles()).toEqual([path.join(key.slice(0, 2), `${key}.jpg`)]);
        });

        it('should serve later requests from disk without extracting again', async () => {
            const file = sourceFile('clip.mp4');

            await cache.getOrCreate(file);
            const second = await cache.getOrCreate(file);

            expect(second?.cached).toBe(true);
            expect(extractor.calls).toHaveLength(1);
        });

        it('should extract once for concurrent requests of the same key', async () => {
            const file = sourceFile('clip.mp4');
            const release = extractor.hold();

            const requests = Array.from({ length: 8 }, () => cache.getOrCreate(file));
            await vi.waitFor(() => expect(extractor.calls).toHaveLength(1));
            release();

            const artifacts = await Promise.all(requests);
            expect(extractor.calls).toHaveLength(1);
            const paths = new Set(artifacts.map((artifact) => artifact?.path));
            expect(paths.size).toBe(1);
            for (const artifact of artifacts) {
                expect(artifact).not.toBeNull();
                expect(await fs.promises.readFile(artifact?.path ?? '')).toEqual(FAKE_JPEG);
            }
        });

        it('should bound concurrent extractions across different keys', async () => {
            const release = extractor.hold();

            const requests = ['a.mp4', 'b.mp4', 'c.mp4', 'd.mp4', 'e.mp4'].map((name) =>
                cache.getOrCreate(sourceFile(name))
            );
            await vi.waitFor(() => expect(extractor.calls).toHaveLength(2));
            release();

            const artifacts = await Promise.all(requests);
            expect(artifacts.every((artifact) => artifact !== null)).toBe(true);
            expect(extractor.calls).toHaveLength(5);
            expect(extractor.maxActive).toBe(2);
        });

        it('should regenerate when the source file changes', async () => {
            await cache.getOrCreate(sourceFile('clip.mp4'));
            const edited = await cache.getOrCreate(sourceFile('clip.mp4', new Date('2024-04-01T00:00:00Z')));

            expect(edited?.cached).toBe(false);
            expect(extractor.calls).toHaveLength(2);
            expect(await listCacheFiles()).toHaveLength(2);
        });

        it('should return null to every waiter when extraction fails', async () => {
            const file = sourceFile('broken.mp4');
            extractor.failWith(new ToolUnavailableError('ffmpeg'));
            const release = extractor.hold();

            const pending = Promise.all([cache.getOrCreate(file), cache.getOrCreate(file)]);
            await vi.waitFor(() => expect(extractor.calls).toHaveLength(1));
            release();
            const results = await pending;

            expect(results).toEqual([null, null]);
            expect(extractor.calls).toHaveLength(1);
            expect(mockLogger.warn).toHaveBeenCalledWith(
                '[thumbnail] broken.mp4: TOOL_UNAVAILABLE ffmpeg is not available',
                undefined
            );
        });

        it('should retry after a failure instead of remembering it', async () => {
            const file = sourceFile('flaky.mp4');
            extractor.failWith(new ExtractionTimeoutError(5000));

            expect(await cache.getOrCreate(file)).toBeNull();
            expect(await listCacheFiles()).toEqual([]);

            extractor.failWith(null);
            const artifact = await cache.getOrCreate(file);

            expect(artifact?.cached).toBe(false);
            expect(extractor.calls).toHaveLength(2);
            expect(await listCacheFiles()).toEqual([path.relative(cacheDir, artifact?.path ?? '')]);
        });

        it('should reject an empty image and leave nothing behind', async () => {
            extractor.produce('empty');

            expect(await cache.getOrCreate(sourceFile('clip.mp4'))).toBeNull();
            expect(await listCacheFiles()).toEqual([]);
            expect(mockLogger.warn).toHaveBeenCalledWith(
                '[thumbnail] clip.mp4: EXTRACTION_FAILED Extractor produced an empty image',
                undefined
            );
        });

        it('should reject output that is not a JPEG', async () => {
            extractor.produce('not-jpeg');

            expect(await cache.getOrCreate(sourceFile('clip.mp4'))).toBeNull();
            expect(await listCacheFiles()).toEqual([]);
        });

        it('should treat missing output as a failure', async () => {
            extractor.produce('nothing');

            expect(await cache.getOrCreate(sourceFile('clip.mp4'))).toBeNull();
            expect(mockLogger.error).toHaveBeenCalledWith(
                '[thumbnail] clip.mp4: unexpected failure',
                expect.objectContaining({ code: 'ENOENT' })
            );
        });

        it('should ignore an empty artifact left on disk and regenerate it', async () => {
            const file = sourceFile('clip.mp4');
            const artifactPath = cache.artifactPath(DiskThumbnailCache.keyFor(file));
            await fs.promises.mkdir(path.dirname(artifactPath), { recursive: true });
            await fs.promises.writeFile(artifactPath, '');

            const artifact = await cache.getOrCreate(file);

            expect(artifact?.size).toBe(FAKE_JPEG.length);
            expect(extractor.calls).toHaveLength(1);
        });
    });
});
