import { NextFunction, Request, Response } from 'express';
import { FleetError, NotFoundError, ValidationError, toErrorBody } from '../protocol/errors';
import { Logger } from './logger';

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError(`${req.method} ${req.path}`));
}

// body-parser marks unparseable JSON with this type
function isBodyParseError(error: unknown): error is Error {
  return error instanceof Error && 'type' in error && error.type === 'entity.parse.failed';
}

/**
 * Terminal error middleware: every failure leaves as `{code, message}` with
 * the mapped status. Stack traces stay in the log.
 */
export function createErrorHandler(logger: Logger) {
  return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const mapped = isBodyParseError(error)
      ? new ValidationError(`Failed to decode request: ${error.message}`)
      : error;

    const { status, body } = toErrorBody(mapped);
    if (mapped instanceof FleetError && status < 500) {
      logger.debug(`${req.method} ${req.path} -> ${status} ${body.code}`);
    } else {
      logger.error(`${req.method} ${req.path} failed:`, error);
    }

    res.status(status).json(body);
  };
}
