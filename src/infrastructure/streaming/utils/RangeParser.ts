import { RangeParseError } from '../../../domain/value-objects/ParsedRange';
import type { RangeParseResult } from '../../../domain/value-objects/ParsedRange';

/**
 * Parses HTTP Range header strings of the form bytes=START-END
 */
export class RangeParser {
  private static readonly BYTES_PREFIX = 'bytes=';
  private static readonly SINGLE_RANGE = /^(\d*)-(\d*)$/;

  /**
   * Parses Range header value
   */
  static parse(header: string): RangeParseResult {
    const value = header.trim();
    if (!value.startsWith(this.BYTES_PREFIX)) {
      return {
        success: false,
        error: RangeParseError.UNSUPPORTED_UNIT,
        message: `Only byte ranges are supported, got '${value}'`
      };
    }

    const rangeValue = value.slice(this.BYTES_PREFIX.length).trim();
    if (!rangeValue) {
      return {
        success: false,
        error: RangeParseError.INVALID_FORMAT,
        message: 'Empty range value after bytes= prefix'
      };
    }

    // Check for multiple ranges (not supported)
    if (rangeValue.includes(',')) {
      return {
        success: false,
        error: RangeParseError.MULTIPLE_RANGES,
        message: 'Multiple ranges are not supported'
      };
    }

    const match = this.SINGLE_RANGE.exec(rangeValue);
    if (!match) {
      return {
        success: false,
        error: RangeParseError.INVALID_FORMAT,
        message: `Invalid range format, expected 'start-end', got '${rangeValue}'`
      };
    }

    const [, startStr, endStr] = match;
    if (!startStr && !endStr) {
      return {
        success: false,
        error: RangeParseError.INVALID_FORMAT,
        message: 'Range must have at least start or end value'
      };
    }

    const start = startStr ? Number(startStr) : null;
    const end = endStr ? Number(endStr) : null;
    if ((start !== null && !Number.isSafeInteger(start)) || (end !== null && !Number.isSafeInteger(end))) {
      return {
        success: false,
        error: RangeParseError.INVALID_NUMBER,
        message: `Range value out of bounds: '${rangeValue}'`
      };
    }

    if (start === null && end !== null) {
      return { success: true, value: { type: 'suffix', suffix: end } };
    }
    if (start !== null && end === null) {
      return { success: true, value: { type: 'start-only', start } };
    }
    if (start !== null && end !== null) {
      return { success: true, value: { type: 'start-end', start, end } };
    }

    return {
      success: false,
      error: RangeParseError.INVALID_FORMAT,
      message: 'Range must have at least start or end value'
    };
  }
}
