export * from './ByteRange';
export * from './ParsedRange';
export * from './EngineState';
export * from './StreamingThreshold';
