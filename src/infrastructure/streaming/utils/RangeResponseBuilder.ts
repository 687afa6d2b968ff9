import type { Response } from 'express';
import { HTTP_STATUS } from '../constants/HttpConstants';

export type ResponseHeaders = Record<string, string | number>;

/**
 * Builds and sends HTTP range responses
 */
export class RangeResponseBuilder {
  /**
   * Sends 416 with the number of bytes that can currently be served
   */
  static sendRangeNotSatisfiable(res: Response, availableBytes: number, error: string): void {
    res
      .status(HTTP_STATUS.RANGE_NOT_SATISFIABLE)
      .set('Content-Range', `bytes */${availableBytes}`)
      .json({ error });
  }

  /**
   * Sends error response if headers not sent, otherwise cuts the connection
   */
  static sendErrorIfHeadersNotSent(
    res: Response,
    error: string,
    status: number = HTTP_STATUS.INTERNAL_SERVER_ERROR
  ): void {
    if (!res.headersSent) {
      res.status(status).json({ error });
    } else if (!res.writableEnded) {
      res.destroy();
    }
  }
}
