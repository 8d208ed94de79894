import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { Logger } from 'pino';
import { ZodError } from 'zod';
import { isAppError } from '../../lib/errors.js';

/**
 * Errors from express body parsing carry their own status
 */
function statusCodeOf(err: unknown): number {
  if (err instanceof ZodError) {
    return 400;
  }
  if (isAppError(err)) {
    return 502;
  }
  if (err instanceof Error && 'statusCode' in err && typeof err.statusCode === 'number') {
    return err.statusCode;
  }
  return 500;
}

function messageOf(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues.map((issue) => `${issue.path.join('.') || '(body)'}: ${issue.message}`).join('; ');
  }
  if (err instanceof Error && err.message) {
    return err.message;
  }
  return 'Internal Server Error';
}

/**
 * Express 4 does not catch rejected promises from handlers
 */
export function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export function notFoundHandler(logger: Logger): RequestHandler {
  return (req, res) => {
    logger.warn({ method: req.method, url: req.url, statusCode: 404 }, `No route matched: ${req.method} ${req.url}`);
    res.status(404).json({
      error: { message: `Route not found: ${req.method} ${req.url}`, statusCode: 404 },
    });
  };
}

export function errorHandler(logger: Logger) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const statusCode = statusCodeOf(err);
    const message = messageOf(err);

    if (statusCode >= 500) {
      logger.error({ err, method: req.method, url: req.url }, 'Request failed');
    } else {
      logger.warn({ method: req.method, url: req.url, statusCode, message }, 'Request rejected');
    }

    res.status(statusCode).json({
      error: {
        message,
        statusCode,
      },
    });
  };
}
