export * from './MediaError';
