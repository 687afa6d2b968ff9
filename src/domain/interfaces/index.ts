/**
 * Domain interfaces (ports) - exports all interfaces
 */

export * from './IDownloadEngine';
export * from './IDiskInspector';
export * from './IStreamService';
export * from './IClock';
export * from './ILogger';
