/**
 * Immutable value object representing an inclusive byte range
 */
export class ByteRange {
  constructor(
    public readonly start: number,
    public readonly end: number
  ) {
    if (start < 0 || end < 0) {
      throw new Error(`ByteRange: start and end must be non-negative, got start=${start}, end=${end}`);
    }
    if (start > end) {
      throw new Error(`ByteRange: start must be <= end, got start=${start}, end=${end}`);
    }
  }

  /**
   * Returns the size of the range in bytes (inclusive)
   */
  get size(): number {
    return this.end - this.start + 1;
  }

  /**
   * Cuts the range short at the last byte that is actually available
   */
  limitTo(availableBytes: number): ByteRange {
    return new ByteRange(this.start, Math.min(this.end, availableBytes - 1));
  }

  /**
   * Formats the range as Content-Range header value.
   * The total is the declared size, which may exceed what is on disk.
   */
  toContentRange(totalSize: number): string {
    return `bytes ${this.start}-${this.end}/${totalSize}`;
  }

  /**
   * Range covering everything currently on disk, or null for an empty file
   */
  static wholeFile(availableBytes: number): ByteRange | null {
    return availableBytes > 0 ? new ByteRange(0, availableBytes - 1) : null;
  }
}
