import winston from 'winston';
import { env } from '../config/env';

type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  silent: env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  defaultMeta: { service: 'transcript-api', environment: env.NODE_ENV },
  transports: [
    new winston.transports.File({ filename: 'logs/error.log', level: 'error' }),
    new winston.transports.File({ filename: 'logs/combined.log' }),
    ...(env.NODE_ENV !== 'production' ? [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.simple()
        )
      })
    ] : [])
  ]
});

export const logService = (
  service: string,
  action: string,
  level: LogLevel,
  message: string,
  meta?: Record<string, unknown>
) => {
  logger.log({
    level,
    message: `[${service}] [${action}] - ${message}`,
    ...meta
  });
};

/**
 * Writable stream for morgan. Access lines are logged at `info` so they show
 * at the default level.
 */
export const createHttpLogStream = (target: Pick<winston.Logger, 'info'>) => ({
  write: (line: string) => {
    target.info(line.trim());
  }
});

export const httpLogStream = createHttpLogStream(logger);

export default logger;
