export * from './DownloadSession';
export * from './SessionSnapshot';
