/**
 * Error taxonomy for media lookup and thumbnail extraction
 * Everything here is reported to HTTP clients as a plain 404;
 * the message and cause are for server-side logs only
 */

export enum MediaErrorCode {
  NOT_FOUND = 'NOT_FOUND',
  TOOL_UNAVAILABLE = 'TOOL_UNAVAILABLE',
  EXTRACTION_FAILED = 'EXTRACTION_FAILED',
  EXTRACTION_TIMEOUT = 'EXTRACTION_TIMEOUT'
}

export class MediaError extends Error {
  constructor(
    public readonly code: MediaErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ToolUnavailableError extends MediaError {
  constructor(tool: string, options?: { cause?: unknown }) {
    super(MediaErrorCode.TOOL_UNAVAILABLE, `${tool} is not available`, options);
  }
}

export class ExtractionFailedError extends MediaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(MediaErrorCode.EXTRACTION_FAILED, message, options);
  }
}

export class ExtractionTimeoutError extends MediaError {
  constructor(timeoutMs: number) {
    super(MediaErrorCode.EXTRACTION_TIMEOUT, `Frame extraction timed out after ${timeoutMs} ms`);
  }
}

export function isMediaError(error: unknown): error is MediaError {
  return error instanceof MediaError;
}
