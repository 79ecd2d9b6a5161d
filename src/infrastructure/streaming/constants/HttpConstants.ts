/**
 * HTTP status codes used in streaming
 */
export const HTTP_STATUS = {
  OK: 200,
  PARTIAL_CONTENT: 206,
  NOT_FOUND: 404,
  RANGE_NOT_SATISFIABLE: 416,
  INTERNAL_SERVER_ERROR: 500
} as const;

/**
 * HTTP headers used in streaming responses
 */
export const HTTP_HEADERS = {
  CONTENT_TYPE_FALLBACK: 'application/octet-stream',
  CONTENT_TYPE_THUMBNAIL: 'image/jpeg',
  ACCEPT_RANGES: 'bytes'
} as const;
