/**
 * Reads what the download engine has written so far
 */
export interface IDiskInspector {
  /**
   * Current size in bytes, or null when the file does not exist yet
   */
  sizeOf(filePath: string): Promise<number | null>;
}
