import * as dotenv from 'dotenv';
import path from 'path';

const nodeEnv = process.env.NODE_ENV || 'development';

dotenv.config({ path: path.resolve(process.cwd(), `.env.${nodeEnv}`) });

interface Env {
  NODE_ENV: string;
  PORT: number;
  LOG_LEVEL: string;
  APP_VERSION: string;
  YOUTUBE_REQUEST_TIMEOUT_MS: number;
  TRANSCRIPT_API_URL: string | undefined;
}

function parseInteger(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export const env: Readonly<Env> = Object.freeze({
  NODE_ENV: nodeEnv,
  PORT: parseInteger(process.env.PORT, 8000),
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
  APP_VERSION: process.env.APP_VERSION || '1.0.0',
  YOUTUBE_REQUEST_TIMEOUT_MS: parseInteger(process.env.YOUTUBE_REQUEST_TIMEOUT_MS, 10000),
  TRANSCRIPT_API_URL: process.env.TRANSCRIPT_API_URL || undefined
});
