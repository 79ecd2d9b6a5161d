import { RangeParseResult, RangeParseError } from '../../../domain/value-objects/ParsedRange';

/**
 * Parses HTTP Range header strings
 */
export class RangeParser {
  private static readonly BYTES_UNIT = 'bytes';
  private static readonly RANGE_SEPARATOR = '-';
  private static readonly DIGITS = /^\d+$/;

  /**
   * Parses Range header value.
   * Only the first of several comma-separated ranges is considered.
   */
  static parse(range: string): RangeParseResult {
    const equalsIndex = range.indexOf('=');
    if (equalsIndex === -1) {
      return {
        success: false,
        error: RangeParseError.INVALID_FORMAT,
        message: `Missing '=' in range header '${range}'`
      };
    }

    const unit = range.slice(0, equalsIndex).trim().toLowerCase();
    if (unit !== this.BYTES_UNIT) {
      return {
        success: false,
        error: RangeParseError.UNSUPPORTED_UNIT,
        message: `Unsupported range unit '${unit}'`
      };
    }

    const rangeValue = range.slice(equalsIndex + 1).split(',')[0].trim();
    if (!rangeValue) {
      return {
        success: false,
        error: RangeParseError.INVALID_FORMAT,
        message: 'Empty range value after bytes= prefix'
      };
    }

    const separatorIndex = rangeValue.indexOf(this.RANGE_SEPARATOR);
    if (separatorIndex === -1) {
      return {
        success: false,
        error: RangeParseError.INVALID_FORMAT,
        message: `Invalid range format, expected 'start-end', got '${rangeValue}'`
      };
    }

    const startStr = rangeValue.slice(0, separatorIndex).trim();
    const endStr = rangeValue.slice(separatorIndex + 1).trim();

    if ((startStr && !this.DIGITS.test(startStr)) || (endStr && !this.DIGITS.test(endStr))) {
      return {
        success: false,
        error: RangeParseError.INVALID_NUMBER,
        message: `Invalid start or end value: start='${startStr}', end='${endStr}'`
      };
    }

    // Case 1: bytes=-SUFFIX (suffix from end)
    if (!startStr && endStr) {
      return { success: true, value: { type: 'suffix', suffix: Number(endStr) } };
    }

    // Case 2: bytes=START- (from START to end)
    if (startStr && !endStr) {
      return { success: true, value: { type: 'start-only', start: Number(startStr) } };
    }

    // Case 3: bytes=START-END (fixed range)
    if (startStr && endStr) {
      return {
        success: true,
        value: { type: 'start-end', start: Number(startStr), end: Number(endStr) }
      };
    }

    return {
      success: false,
      error: RangeParseError.INVALID_FORMAT,
      message: 'Range must have at least start or end value'
    };
  }
}
