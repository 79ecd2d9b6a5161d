/**
 * Domain interfaces (ports) - exports all interfaces
 */

export * from './IMediaLibrary';
export * from './IStreamService';
export * from './IThumbnailCache';
export * from './IFrameExtractor';
export * from './ILogger';
