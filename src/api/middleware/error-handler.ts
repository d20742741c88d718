import { Request, Response, NextFunction } from 'express';
import { GenerationError, SourceFetchError } from '../../utils/errors';
import logger from '../../utils/logger';

export class ApiError extends Error {
  statusCode: number;

  constructor(message: string, statusCode: number = 500) {
    super(message);
    this.statusCode = statusCode;
    this.name = 'ApiError';
  }
}

function statusCodeFor(err: Error): number {
  if (err instanceof ApiError) {
    return err.statusCode;
  }
  if (err instanceof SourceFetchError) {
    return 502;
  }
  if (err instanceof GenerationError) {
    return 500;
  }
  // body-parser marks malformed JSON with a 4xx status
  const status: unknown = Reflect.get(err, 'status');
  return typeof status === 'number' && status >= 400 && status < 500 ? status : 500;
}

export function errorHandler(err: Error, req: Request, res: Response, next: NextFunction): void {
  // Express closes the connection itself when a response is already under way
  if (res.headersSent) {
    next(err);
    return;
  }

  const statusCode = statusCodeFor(err);

  const log = statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
  log('API error', {
    method: req.method,
    path: req.path,
    status_code: statusCode,
    error: err.message,
    stack: err.stack,
  });

  res.status(statusCode).json({
    error: err.message || 'Internal server error',
    ...(process.env.NODE_ENV === 'development' && { stack: err.stack }),
  });
}
