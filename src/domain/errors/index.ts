export * from './StreamingError';
