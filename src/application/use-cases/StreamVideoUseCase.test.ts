/**
 * Unit tests for StreamVideoUseCase
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { StreamVideoUseCase, VIDEO_NOT_FOUND } from './StreamVideoUseCase';
import type { IMediaLibrary, ILogger } from '../../domain/interfaces';
import type { SourceFile } from '../../domain/entities';

describe('StreamVideoUseCase', () => {
    let useCase: StreamVideoUseCase;
    let mockMediaLibrary: IMediaLibrary;
    let mockLogger: ILogger;

    const clip: SourceFile = {
        relativePath: 'shows/clip.mp4',
        absolutePath: '/srv/media/shows/clip.mp4',
        name: 'clip.mp4',
        size: 1000000,
        modifiedAt: new Date('2024-01-01T00:00:00Z')
    };

    beforeEach(() => {
        mockMediaLibrary = {
            resolve: vi.fn(),
            isProbableVideo: vi.fn()
        };

        mockLogger = {
            log: vi.fn(),
            error: vi.fn(),
            warn: vi.fn(),
            info: vi.fn(),
            debug: vi.fn()
        };

        useCase = new StreamVideoUseCase(mockMediaLibrary, mockLogger);
    });

    it('should return the resolved file', async () => {
        vi.mocked(mockMediaLibrary.resolve).mockResolvedValue(clip);

        const result = await useCase.execute({ path: 'shows/clip.mp4' });

        expect(result.success).toBe(true);
        expect(result.file).toEqual(clip);
        expect(mockMediaLibrary.resolve).toHaveBeenCalledWith('shows/clip.mp4');
    });

    it('should return not found when the library cannot resolve the path', async () => {
        vi.mocked(mockMediaLibrary.resolve).mockResolvedValue(null);

        const result = await useCase.execute({ path: '../etc/passwd' });

        expect(result.success).toBe(false);
        expect(result.error).toBe(VIDEO_NOT_FOUND);
        expect(result.file).toBeUndefined();
    });

    it('should handle errors from the library', async () => {
        vi.mocked(mockMediaLibrary.resolve).mockRejectedValue(new Error('EACCES: permission denied'));

        const result = await useCase.execute({ path: 'locked.mp4' });

        expect(result.success).toBe(false);
        expect(result.error).toBe('EACCES: permission denied');
        expect(mockLogger.error).toHaveBeenCalled();
    });
});
