export * from './ByteRange';
export * from './ParsedRange';
