/**
 * Native engine state codes and the closed vocabulary reported to callers
 */

export enum EngineStateCode {
  QUEUED_FOR_CHECKING = 0,
  CHECKING_FILES = 1,
  DOWNLOADING_METADATA = 2,
  DOWNLOADING = 3,
  FINISHED = 4,
  SEEDING = 5,
  ALLOCATING = 6,
  CHECKING_RESUME_DATA = 7
}

export type ReportedStatus =
  | 'queued'
  | 'checking'
  | 'metadata'
  | 'downloading'
  | 'finished'
  | 'seeding'
  | 'allocating'
  | 'unknown';

const STATUS_BY_CODE: ReadonlyMap<number, ReportedStatus> = new Map<number, ReportedStatus>([
  [EngineStateCode.QUEUED_FOR_CHECKING, 'queued'],
  [EngineStateCode.CHECKING_FILES, 'checking'],
  [EngineStateCode.DOWNLOADING_METADATA, 'metadata'],
  [EngineStateCode.DOWNLOADING, 'downloading'],
  [EngineStateCode.FINISHED, 'finished'],
  [EngineStateCode.SEEDING, 'seeding'],
  [EngineStateCode.ALLOCATING, 'allocating'],
  [EngineStateCode.CHECKING_RESUME_DATA, 'checking']
]);

/**
 * Unmapped codes report 'unknown' rather than failing
 */
export function toReportedStatus(code: number): ReportedStatus {
  return STATUS_BY_CODE.get(code) ?? 'unknown';
}
