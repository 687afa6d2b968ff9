import path from 'path';

const MIB = 1024 * 1024;

/**
 * Fraction of a file that must be on disk before playback may start
 */
export class StreamingThreshold {
  static readonly DEFAULT_FRACTION = 0.1;
  static readonly ABSOLUTE_FLOOR_BYTES = 10 * MIB;
  static readonly FLOOR_FRACTION = 0.05;

  private static readonly FRACTION_BY_EXTENSION: ReadonlyMap<string, number> = new Map([
    ['.mkv', 0.12], // container headers need more leading data
    ['.mp4', 0.08],
    ['.webm', 0.08]
  ]);

  private constructor(
    public readonly fraction: number,
    public readonly minBytes: number
  ) {}

  static forFile(relativePath: string, sizeBytes: number): StreamingThreshold {
    return new StreamingThreshold(
      this.fractionFor(relativePath),
      Math.min(this.ABSOLUTE_FLOOR_BYTES, this.FLOOR_FRACTION * sizeBytes)
    );
  }

  static fractionFor(relativePath: string): number {
    const ext = path.extname(relativePath).toLowerCase();
    return this.FRACTION_BY_EXTENSION.get(ext) ?? this.DEFAULT_FRACTION;
  }

  /**
   * Both the fraction and the absolute floor must be met
   */
  isMetBy(downloadedBytes: number, sizeBytes: number): boolean {
    if (sizeBytes <= 0) {
      return false;
    }
    return downloadedBytes / sizeBytes >= this.fraction && downloadedBytes >= this.minBytes;
  }
}
