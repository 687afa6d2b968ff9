import path from 'path';

/**
 * HTTP status codes used by the API and the file server
 */
export const HTTP_STATUS = {
  OK: 200,
  PARTIAL_CONTENT: 206,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  RANGE_NOT_SATISFIABLE: 416,
  TOO_EARLY: 425,
  INTERNAL_SERVER_ERROR: 500
} as const;

/**
 * HTTP headers used in streaming responses
 */
export const HTTP_HEADERS = {
  CONTENT_TYPE_VIDEO: 'video/mp4',
  ACCEPT_RANGES: 'bytes'
} as const;

const CONTENT_TYPES: Readonly<Record<string, string>> = {
  '.mp4': 'video/mp4',
  '.mkv': 'video/x-matroska',
  '.avi': 'video/x-msvideo',
  '.webm': 'video/webm',
  '.mov': 'video/quicktime',
  '.wmv': 'video/x-ms-wmv',
  '.flv': 'video/x-flv',
  '.m4v': 'video/x-m4v'
};

/**
 * Content-Type by extension, video/mp4 for anything unknown
 */
export function contentTypeFor(filePath: string): string {
  return CONTENT_TYPES[path.extname(filePath).toLowerCase()] ?? HTTP_HEADERS.CONTENT_TYPE_VIDEO;
}
