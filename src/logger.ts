import pino, { LoggerOptions } from 'pino';
import { config } from './config/env';

export const loggerOptions: LoggerOptions = {
  level: config.LOG_LEVEL,
  transport: config.NODE_ENV === 'development' ? { target: 'pino-pretty' } : undefined,
  redact: ['req.headers.authorization', 'req.headers["x-api-key"]']
};

export const logger = pino(loggerOptions);
