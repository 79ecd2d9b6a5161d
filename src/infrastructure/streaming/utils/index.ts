export { ByteFormatter } from './ByteFormatter';
export { StreamErrorHandler } from './StreamErrorHandler';
export { RangeResponseBuilder } from './RangeResponseBuilder';
export type { ContentHeaders } from './RangeResponseBuilder';
export { StreamEventHandler } from './StreamEventHandler';
export { RangeParser } from './RangeParser';
export { RangeNormalizer } from './RangeNormalizer';
export { MimeTypeResolver } from './MimeTypeResolver';
