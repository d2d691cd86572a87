/**
 * @file pino-logger.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

export interface LoggerConfig {
  level: string;
  name: string;
  pretty?: boolean;
}

/**
 * Components log failures under `error`, so that key gets the same
 * serializer pino applies to `err`.
 */
export const logSerializers = {
  error: pino.stdSerializers.err,
};

const REDACTED_PATHS = [
  'token',
  'authorization',
  'headers.authorization',
  'req.headers.authorization',
  '*.token',
];

export function createLogger(config: LoggerConfig): Logger {
  const options: LoggerOptions = {
    name: config.name,
    level: config.level,
    serializers: logSerializers,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: { paths: REDACTED_PATHS, censor: '****' },
  };

  if (!config.pretty) {
    return pino(options);
  }

  return pino({
    ...options,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    },
  });
}

export type { Logger } from 'pino';
