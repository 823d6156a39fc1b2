import type { Request, Response, NextFunction } from 'express';
import logger from '../utils/logger';
import { AppError } from '../utils/appError';
import type { ErrorResponse } from '../types/transcript';

interface BodyParserError extends Error {
  type: string;
  status: number;
}

// body-parser tags its errors with a `type` and an HTTP `status`
function isBodyParserError(err: Error): err is BodyParserError {
  return 'type' in err && typeof err.type === 'string' && 'status' in err && typeof err.status === 'number';
}

function toAppError(err: Error): AppError {
  if (err instanceof AppError) {
    return err;
  }
  if (isBodyParserError(err)) {
    if (err.type === 'entity.parse.failed') {
      return AppError.validation(`request: Malformed JSON body (${err.message})`);
    }
    if (err.status >= 400 && err.status < 500) {
      return AppError.rejectedRequest(err.status, err.message);
    }
  }
  return AppError.internal('Internal Server Error');
}

export const errorHandler = (err: Error, req: Request, res: Response, _next: NextFunction) => {
  const appError = toAppError(err);

  if (appError.statusCode >= 500) {
    logger.error('Unhandled error', { path: req.path, method: req.method, error: err.message, stack: err.stack });
  } else {
    logger.warn('Request failed', { path: req.path, method: req.method, code: appError.code, error: appError.message });
  }

  const body: ErrorResponse = { detail: appError.message };
  res.status(appError.statusCode).json(body);
};
