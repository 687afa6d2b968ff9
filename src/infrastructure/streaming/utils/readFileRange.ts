import fs from 'fs';

/**
 * Reads bytes [start, end] of a file in fixed-size chunks. The file handle is
 * closed however iteration ends, including when the consumer stops early.
 */
export async function* readFileRange(
  filePath: string,
  start: number,
  end: number,
  chunkSize: number
): AsyncGenerator<Buffer, void, undefined> {
  const handle = await fs.promises.open(filePath, 'r');
  try {
    let position = start;
    while (position <= end) {
      const length = Math.min(chunkSize, end - position + 1);
      const { bytesRead, buffer } = await handle.read(Buffer.alloc(length), 0, length, position);
      if (bytesRead === 0) {
        return;
      }
      position += bytesRead;
      yield bytesRead === length ? buffer : buffer.subarray(0, bytesRead);
    }
  } finally {
    await handle.close();
  }
}
