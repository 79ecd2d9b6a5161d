import { ParsedRange } from '../../../domain/value-objects/ParsedRange';
import { ByteRange } from '../../../domain/value-objects/ByteRange';
import type { ILogger } from '../../../domain/interfaces/ILogger';

/**
 * Normalizes a parsed range against the file size
 */
export class RangeNormalizer {
  /**
   * Normalizes parsed range to ByteRange, or null when it cannot be satisfied
   */
  static normalize(
    parsed: ParsedRange,
    fileSize: number,
    logger: ILogger,
    fileName: string
  ): ByteRange | null {
    let range: ByteRange | null = null;

    switch (parsed.type) {
      case 'suffix': {
        // bytes=-SUFFIX: start = max(L - SUFFIX, 0), end = L - 1
        range = ByteRange.fromSuffix(parsed.suffix, fileSize);
        break;
      }

      case 'start-only': {
        // bytes=START-: end = L - 1
        range = ByteRange.fromStartOnly(parsed.start, fileSize);
        break;
      }

      case 'start-end': {
        // bytes=START-END: end = min(END, L - 1)
        range = ByteRange.fromStartEnd(parsed.start, parsed.end, fileSize);
        break;
      }
    }

    if (!range || !range.isValid(fileSize)) {
      logger.warn(`[${fileName}] Unsatisfiable range ${JSON.stringify(parsed)} for fileSize=${fileSize}`);
      return null;
    }

    return range;
  }
}
