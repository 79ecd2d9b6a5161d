import mime from 'mime-types';
import { HTTP_HEADERS } from '../constants/HttpConstants';

/**
 * Content-Type lookup by file extension
 */
export class MimeTypeResolver {
  static forFile(fileName: string): string {
    return mime.lookup(fileName) || HTTP_HEADERS.CONTENT_TYPE_FALLBACK;
  }
}
