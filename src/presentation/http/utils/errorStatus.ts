import { StreamingErrorKind } from '../../../domain/errors';
import { HTTP_STATUS } from '../../../infrastructure/streaming/constants/HttpConstants';

const STATUS_BY_KIND: Record<StreamingErrorKind, number> = {
  [StreamingErrorKind.INVALID_REQUEST]: HTTP_STATUS.BAD_REQUEST,
  [StreamingErrorKind.METADATA_TIMEOUT]: HTTP_STATUS.BAD_REQUEST,
  [StreamingErrorKind.ENGINE_FAILURE]: HTTP_STATUS.BAD_REQUEST,
  [StreamingErrorKind.NOT_FOUND]: HTTP_STATUS.NOT_FOUND,
  [StreamingErrorKind.TORRENT_STUCK]: HTTP_STATUS.NOT_FOUND,
  [StreamingErrorKind.FILE_NOT_ON_DISK]: HTTP_STATUS.NOT_FOUND,
  [StreamingErrorKind.NOT_READY_FOR_STREAMING]: HTTP_STATUS.TOO_EARLY,
  [StreamingErrorKind.RANGE_NOT_SATISFIABLE]: HTTP_STATUS.RANGE_NOT_SATISFIABLE,
  [StreamingErrorKind.DUPLICATE_SOURCE_UNHEALTHY]: HTTP_STATUS.INTERNAL_SERVER_ERROR
};

/**
 * HTTP status for a failed use case, 500 when the kind is missing
 */
export function statusForError(kind: StreamingErrorKind | undefined): number {
  return kind === undefined ? HTTP_STATUS.INTERNAL_SERVER_ERROR : STATUS_BY_KIND[kind];
}
