import type { RequestHandler } from 'express';
import { nanoid } from 'nanoid';
import type { Logger } from 'pino';

export const REQUEST_ID_HEADER = 'X-Request-Id';

/**
 * Tags every request with an id, echoed in the response and the access log
 */
export function requestLogger(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const requestId = req.get(REQUEST_ID_HEADER) ?? nanoid(12);
    res.setHeader(REQUEST_ID_HEADER, requestId);

    const startTime = Date.now();
    res.on('finish', () => {
      logger.info(
        {
          requestId,
          method: req.method,
          url: req.originalUrl,
          statusCode: res.statusCode,
          duration_ms: Date.now() - startTime,
        },
        `${req.method} ${req.originalUrl}`,
      );
    });
    next();
  };
}
