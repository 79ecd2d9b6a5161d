/**
 * Configuration for media shelf
 */

import path from 'path';
import { type LogLevel, isLogLevel } from './infrastructure/logging/LogLevel';

export interface Config {
  PORT: number;
  // Directory tree that /video and /thumb paths are resolved against (read-only)
  MEDIA_ROOT: string;
  // Runtime directory for logs and the thumbnail cache
  RUNTIME_DIR: string;
  LOG_DIR: string;
  LOG_LEVEL: LogLevel;
  // Thumbnail artifacts live here, one per source file; never pruned
  CACHE_DIR: string;
  // Maximum number of ffmpeg processes running at once across all keys
  THUMBNAIL_CONCURRENCY: number;
  THUMBNAIL_TIMEOUT_MS: number;
  THUMBNAIL_SEEK_SECONDS: number;
  THUMBNAIL_WIDTH: number;
  THUMBNAIL_QUALITY: number; // ffmpeg -q:v, 2 (best) to 31 (worst)
  VIDEO_CACHE_CONTROL: string;
  THUMBNAIL_CACHE_CONTROL: string;
  FFMPEG_PATH?: string;
  FFPROBE_PATH?: string;
  VIDEO_EXTENSIONS: readonly string[];
}

function numberFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

const RUNTIME_DIR = process.env.RUNTIME_DIR || path.join(process.cwd(), '.runtime');
const LOG_LEVEL = process.env.LOG_LEVEL;

const config: Config = {
  // Server configuration
  PORT: numberFromEnv('PORT', 3000),

  // Media library
  MEDIA_ROOT: path.resolve(process.env.MEDIA_ROOT || '/mnt/data/videos'),

  RUNTIME_DIR,
  LOG_DIR: process.env.LOG_DIR || path.join(RUNTIME_DIR, 'logs'),
  LOG_LEVEL: isLogLevel(LOG_LEVEL) ? LOG_LEVEL : 'info',
  CACHE_DIR: process.env.CACHE_DIR || path.join(RUNTIME_DIR, 'thumbnails'),

  // Thumbnail generation
  THUMBNAIL_CONCURRENCY: numberFromEnv('THUMBNAIL_CONCURRENCY', 2),
  THUMBNAIL_TIMEOUT_MS: numberFromEnv('THUMBNAIL_TIMEOUT_MS', 30000), // 30 seconds
  THUMBNAIL_SEEK_SECONDS: numberFromEnv('THUMBNAIL_SEEK_SECONDS', 1),
  THUMBNAIL_WIDTH: numberFromEnv('THUMBNAIL_WIDTH', 320),
  THUMBNAIL_QUALITY: numberFromEnv('THUMBNAIL_QUALITY', 5),

  // HTTP caching
  VIDEO_CACHE_CONTROL: process.env.VIDEO_CACHE_CONTROL || 'private, max-age=3600, immutable',
  THUMBNAIL_CACHE_CONTROL: process.env.THUMBNAIL_CACHE_CONTROL || 'public, max-age=86400',

  // External tools; fluent-ffmpeg looks them up on PATH when unset
  FFMPEG_PATH: process.env.FFMPEG_PATH,
  FFPROBE_PATH: process.env.FFPROBE_PATH,

  // Containers that may not map to video/* reliably
  VIDEO_EXTENSIONS: ['.mp4', '.m4v', '.mkv', '.webm', '.mov', '.avi', '.wmv'] as const
};

export default config;
