import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import type { Request, Response } from 'express';
import type { ILogger, IStreamService, StreamTarget } from '../../domain/interfaces';
import { ByteRange, toRequestedBounds } from '../../domain/value-objects';
import { StreamingErrorKind, describeError, fail, ok } from '../../domain/errors';
import type { StreamingResult } from '../../domain/errors';
import { HTTP_HEADERS, HTTP_STATUS, contentTypeFor } from './constants/HttpConstants';
import { RangeParser, RangeResponseBuilder, readFileRange } from './utils';
import type { ResponseHeaders } from './utils';

/**
 * What to send for one request: status, headers and the bytes to read, if any
 */
export interface StreamPlan {
  statusCode: typeof HTTP_STATUS.OK | typeof HTTP_STATUS.PARTIAL_CONTENT;
  headers: ResponseHeaders;
  range: ByteRange | null;
}

/**
 * Serves a file that is still being written by the download engine.
 * Ranges are resolved against the file's final size and cut short at what is
 * on disk right now, so players see the full duration while data arrives.
 */
export class ProgressiveStreamService implements IStreamService {
  constructor(
    private readonly logger: ILogger,
    private readonly chunkSize: number
  ) {}

  async streamFile(req: Request, res: Response, target: StreamTarget): Promise<void> {
    const fileName = target.file.relativePath;
    const rangeHeader = req.headers.range;

    this.logger.debug(
      `[${fileName}] Stream request: range=${rangeHeader ?? 'none'}, onDisk=${target.onDiskSize}, expected=${target.expectedTotal}`
    );

    const plan = ProgressiveStreamService.plan(target, rangeHeader);
    if (!plan.success) {
      this.logger.warn(`[${fileName}] ${plan.message}`);
      RangeResponseBuilder.sendRangeNotSatisfiable(res, target.onDiskSize, plan.message);
      return;
    }

    const { statusCode, headers, range } = plan.value;
    res.writeHead(statusCode, headers);
    if (!range) {
      res.end();
      return;
    }

    const source = Readable.from(readFileRange(target.filePath, range.start, range.end, this.chunkSize));
    try {
      await pipeline(source, res);
      this.logger.debug(`[${fileName}] Sent bytes ${range.start}-${range.end}`);
    } catch (error) {
      if (res.destroyed && !res.writableFinished) {
        this.logger.debug(`[${fileName}] Client disconnected at ${range.start}-${range.end}`);
        return;
      }
      this.logger.error(`[${fileName}] Stream failed: ${describeError(error)}`);
      RangeResponseBuilder.sendErrorIfHeadersNotSent(res, 'Streaming failed');
    }
  }

  /**
   * Works out the response for a Range header against the current file state
   */
  static plan(target: StreamTarget, rangeHeader: string | undefined): StreamingResult<StreamPlan> {
    const contentType = contentTypeFor(target.file.relativePath);
    const { onDiskSize, expectedTotal } = target;

    if (!rangeHeader) {
      return ok({
        statusCode: HTTP_STATUS.OK,
        headers: {
          'Content-Length': onDiskSize,
          'Content-Type': contentType,
          'Accept-Ranges': HTTP_HEADERS.ACCEPT_RANGES
        },
        range: ByteRange.wholeFile(onDiskSize)
      });
    }

    const parsed = RangeParser.parse(rangeHeader);
    if (!parsed.success) {
      return fail(StreamingErrorKind.RANGE_NOT_SATISFIABLE, parsed.message);
    }

    const bounds = toRequestedBounds(parsed.value, expectedTotal);
    if (bounds.start >= onDiskSize) {
      return fail(
        StreamingErrorKind.RANGE_NOT_SATISFIABLE,
        `Requested range not yet downloaded (start=${bounds.start}, available=${onDiskSize})`
      );
    }
    if (bounds.end < bounds.start) {
      return fail(
        StreamingErrorKind.RANGE_NOT_SATISFIABLE,
        `Invalid range: end ${bounds.end} is before start ${bounds.start}`
      );
    }

    const range = new ByteRange(bounds.start, bounds.end).limitTo(onDiskSize);
    return ok({
      statusCode: HTTP_STATUS.PARTIAL_CONTENT,
      headers: {
        'Content-Range': range.toContentRange(expectedTotal),
        'Accept-Ranges': HTTP_HEADERS.ACCEPT_RANGES,
        'Content-Length': range.size,
        'Content-Type': contentType
      },
      range
    });
  }
}
