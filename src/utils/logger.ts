import pino, { type LoggerOptions } from 'pino';
import { env } from '../config/env.js';

export const SERVICE_NAME = 'csv-customer-import';

/**
 * Shared pino options. Errors are logged under `error`, so that key gets the
 * standard error serializer. S3 credentials and the database connection
 * string never reach the output.
 */
export const loggerOptions: LoggerOptions = {
  level: env.LOG_LEVEL,
  base: {
    service: SERVICE_NAME,
    env: env.NODE_ENV,
  },
  serializers: {
    error: pino.stdSerializers.err,
  },
  redact: [
    'accessKeyId',
    'secretAccessKey',
    'connectionString',
    '*.accessKeyId',
    '*.secretAccessKey',
    '*.connectionString',
    'req.headers.cookie',
  ],
};

export const logger = pino({
  ...loggerOptions,
  transport:
    env.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

export type Logger = typeof logger;
