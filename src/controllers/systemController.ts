import type { Request, Response } from 'express';
import { env } from '../config/env';

export const getRoot = (_req: Request, res: Response) => {
  res.json({ message: 'YouTube Transcript API Server', version: env.APP_VERSION });
};

export const getHealth = (_req: Request, res: Response) => {
  res.json({ status: 'healthy' });
};
