import type { Request, Response, NextFunction } from 'express';
import { AppError } from '../utils/appError';

export const notFoundHandler = (_req: Request, _res: Response, next: NextFunction) => {
  next(AppError.notFound('Not Found'));
};
