/**
 * Immutable value object representing an inclusive byte range
 * Provides type safety and utility methods for range operations
 */
export class ByteRange {
  constructor(
    public readonly start: number,
    public readonly end: number
  ) {
    if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end)) {
      throw new Error(`ByteRange: start and end must be integers, got start=${start}, end=${end}`);
    }
    if (start < 0 || end < 0) {
      throw new Error(`ByteRange: start and end must be non-negative, got start=${start}, end=${end}`);
    }
    if (start > end) {
      throw new Error(`ByteRange: start must be <= end, got start=${start}, end=${end}`);
    }
  }

  /**
   * Returns the size of the range in bytes (inclusive)
   */
  get size(): number {
    return this.end - this.start + 1;
  }

  /**
   * Validates that the range is valid for the given file size
   */
  isValid(fileSize: number): boolean {
    return this.start < fileSize && this.end < fileSize && this.start <= this.end;
  }

  /**
   * Formats the range as Content-Range header value
   */
  toContentRange(fileSize: number): string {
    return `bytes ${this.start}-${this.end}/${fileSize}`;
  }

  /**
   * Creates a range from start-only format (bytes=START-), running to the last byte
   */
  static fromStartOnly(start: number, fileSize: number): ByteRange | null {
    if (start < 0 || start >= fileSize) {
      return null;
    }
    return new ByteRange(start, fileSize - 1);
  }

  /**
   * Creates a range from suffix format (bytes=-SUFFIX)
   */
  static fromSuffix(suffix: number, fileSize: number): ByteRange | null {
    if (suffix <= 0 || fileSize === 0) {
      return null;
    }
    const start = Math.max(fileSize - suffix, 0);
    return new ByteRange(start, fileSize - 1);
  }

  /**
   * Creates a range covering the whole file (no Range header)
   */
  static wholeFile(fileSize: number): ByteRange | null {
    return fileSize > 0 ? new ByteRange(0, fileSize - 1) : null;
  }

  /**
   * Creates a range from start and end values, clamping end to the last byte
   */
  static fromStartEnd(start: number, end: number, fileSize: number): ByteRange | null {
    if (start < 0 || start >= fileSize || end < start) {
      return null;
    }
    return new ByteRange(start, Math.min(end, fileSize - 1));
  }
}
