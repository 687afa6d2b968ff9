/**
 * Parsed HTTP Range header value
 * Represents different types of range requests
 */
export type ParsedRange =
  | { type: 'start-only'; start: number }
  | { type: 'start-end'; start: number; end: number }
  | { type: 'suffix'; suffix: number };

/**
 * Range parsing error types
 */
export enum RangeParseError {
  INVALID_FORMAT = 'INVALID_FORMAT',
  MULTIPLE_RANGES = 'MULTIPLE_RANGES',
  INVALID_NUMBER = 'INVALID_NUMBER',
  UNSUPPORTED_UNIT = 'UNSUPPORTED_UNIT'
}

/**
 * Result type for range parsing
 */
export type RangeParseResult =
  | { success: true; value: ParsedRange }
  | { success: false; error: RangeParseError; message: string };

/**
 * Inclusive byte bounds a client asked for, before clamping to what is on disk
 */
export interface RequestedBounds {
  start: number;
  end: number;
}

/**
 * Resolves a parsed range against the file's expected final size.
 * An open end runs to the last byte of the finished file.
 */
export function toRequestedBounds(parsed: ParsedRange, expectedTotal: number): RequestedBounds {
  switch (parsed.type) {
    case 'start-only':
      return { start: parsed.start, end: expectedTotal - 1 };
    case 'start-end':
      return { start: parsed.start, end: parsed.end };
    case 'suffix':
      return { start: Math.max(expectedTotal - parsed.suffix, 0), end: expectedTotal - 1 };
  }
}
