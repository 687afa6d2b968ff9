/**
 * Failure taxonomy shared by every streaming component
 */

export enum StreamingErrorKind {
  NOT_FOUND = 'NOT_FOUND',
  INVALID_REQUEST = 'INVALID_REQUEST',
  METADATA_TIMEOUT = 'METADATA_TIMEOUT',
  ENGINE_FAILURE = 'ENGINE_FAILURE',
  TORRENT_STUCK = 'TORRENT_STUCK',
  FILE_NOT_ON_DISK = 'FILE_NOT_ON_DISK',
  NOT_READY_FOR_STREAMING = 'NOT_READY_FOR_STREAMING',
  RANGE_NOT_SATISFIABLE = 'RANGE_NOT_SATISFIABLE',
  // Internal: triggers eviction and re-creation, never returned to callers
  DUPLICATE_SOURCE_UNHEALTHY = 'DUPLICATE_SOURCE_UNHEALTHY'
}

/**
 * Result type for streaming operations
 */
export type StreamingResult<T> =
  | { success: true; value: T }
  | { success: false; error: StreamingErrorKind; message: string };

export function ok<T>(value: T): StreamingResult<T> {
  return { success: true, value };
}

export function fail<T>(error: StreamingErrorKind, message: string): StreamingResult<T> {
  return { success: false, error, message };
}

/**
 * Thrown by engine adapters when a handle is invalid or an engine call fails
 */
export class EngineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EngineError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
