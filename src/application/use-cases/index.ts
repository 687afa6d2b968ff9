export * from './AddSourceUseCase';
export * from './GetSessionStatusUseCase';
export * from './ListSessionsUseCase';
export * from './RemoveSessionUseCase';
export * from './CleanupSessionsUseCase';
export * from './ClearSessionsUseCase';
export * from './StreamFileUseCase';
