import ffmpeg from 'fluent-ffmpeg';
import type { FfprobeData } from 'fluent-ffmpeg';
import config from '../../config';
import type { FrameExtractionRequest, IFrameExtractor } from '../../domain/interfaces/IFrameExtractor';
import type { ILogger } from '../../domain/interfaces/ILogger';
import {
  ExtractionFailedError,
  ExtractionTimeoutError,
  MediaError,
  ToolUnavailableError
} from '../../domain/errors';

export interface FfmpegPaths {
  ffmpegPath?: string;
  ffprobePath?: string;
}

const STDERR_TAIL_LENGTH = 500;

/**
 * fluent-ffmpeg implementation of IFrameExtractor
 * Reads the clip duration with ffprobe, then grabs one scaled frame as JPEG
 */
export class FfmpegFrameExtractor implements IFrameExtractor {
  constructor(
    private readonly logger: ILogger,
    private readonly paths: FfmpegPaths = { ffmpegPath: config.FFMPEG_PATH, ffprobePath: config.FFPROBE_PATH }
  ) {}

  /**
   * A seek past the end yields no frame, so short clips use their midpoint
   */
  static clampSeekSeconds(target: number, durationSeconds: number | null): number {
    if (durationSeconds === null || target < durationSeconds) {
      return Math.max(target, 0);
    }
    return durationSeconds / 2;
  }

  static classifyError(error: Error, stderr = ''): MediaError {
    if (/Cannot find ffmpeg|ENOENT/i.test(error.message)) {
      return new ToolUnavailableError('ffmpeg', { cause: error });
    }
    const detail = stderr.trim().slice(-STDERR_TAIL_LENGTH);
    return new ExtractionFailedError(`ffmpeg failed: ${error.message}`, { cause: detail || error });
  }

  /**
   * One deadline covers ffprobe and the frame grab
   */
  async extract(request: FrameExtractionRequest): Promise<void> {
    const deadline = Date.now() + request.timeoutMs;
    const duration = await this.readDuration(request.inputPath, deadline, request.timeoutMs);
    const seekSeconds = FfmpegFrameExtractor.clampSeekSeconds(request.seekSeconds, duration);

    this.logger.debug(
      `[ffmpeg] Extracting frame at ${seekSeconds}s from ${request.inputPath} (duration=${duration ?? 'unknown'})`
    );

    await new Promise<void>((resolve, reject) => {
      let settled = false;
      let expired = false;
      const command = ffmpeg(request.inputPath);
      if (this.paths.ffmpegPath) {
        command.setFfmpegPath(this.paths.ffmpegPath);
      }

      const timer = setTimeout(() => {
        if (settled) {
          return;
        }
        settled = true;
        expired = true;
        // No-op until the process has spawned; the 'start' handler finishes the job
        command.kill('SIGKILL');
        reject(new ExtractionTimeoutError(request.timeoutMs));
      }, remainingMs(deadline));

      command
        .seekInput(seekSeconds)
        .frames(1)
        .videoFilters(`scale=${request.width}:-2`)
        .outputOptions(['-q:v', String(request.quality), '-update', '1'])
        .output(request.outputPath)
        .on('start', () => {
          if (expired) {
            this.logger.debug(`[ffmpeg] Killing late start for ${request.inputPath}`);
            command.kill('SIGKILL');
          }
        })
        .on('end', () => {
          if (settled) {
            return;
          }
          settled = true;
          clearTimeout(timer);
          resolve();
        })
        .on('error', (error: Error, _stdout: string | null, stderr: string | null) => {
          if (settled) {
            return;
          }
          settled = true;
          clearTimeout(timer);
          reject(FfmpegFrameExtractor.classifyError(error, stderr ?? ''));
        });

      command.run();
    });
  }

  /**
   * Duration in seconds, or null when ffprobe cannot tell.
   * Rejects once the deadline passes; fluent-ffmpeg gives no handle on the
   * ffprobe child, so a hung probe is abandoned rather than killed.
   */
  private readDuration(inputPath: string, deadline: number, timeoutMs: number): Promise<number | null> {
    return new Promise((resolve, reject) => {
      let settled = false;
      const command = ffmpeg(inputPath);
      if (this.paths.ffprobePath) {
        command.setFfprobePath(this.paths.ffprobePath);
      }

      const timer = setTimeout(() => {
        settled = true;
        this.logger.warn(`[ffmpeg] ffprobe did not answer for ${inputPath} within ${timeoutMs} ms`);
        reject(new ExtractionTimeoutError(timeoutMs));
      }, remainingMs(deadline));

      command.ffprobe((error: unknown, data: FfprobeData | undefined) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        if (error || !data) {
          this.logger.debug(`[ffmpeg] ffprobe failed for ${inputPath}, using default seek`, error);
          resolve(null);
          return;
        }
        const duration = Number(data.format.duration);
        resolve(Number.isFinite(duration) && duration > 0 ? duration : null);
      });
    });
  }
}

function remainingMs(deadline: number): number {
  return Math.max(deadline - Date.now(), 0);
}
