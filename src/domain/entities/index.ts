export * from './SourceFile';
