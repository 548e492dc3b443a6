import pino from 'pino';
import type { Logger } from 'pino';
import { env } from '../config/env.js';

const isDev = env.NODE_ENV === 'development';

function resolveLevel(): string {
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  if (env.NODE_ENV === 'test') return 'silent';
  return isDev ? 'debug' : 'info';
}

export const logger: Logger = pino({
  level: resolveLevel(),
  formatters: isDev ? {} : { level: (label: string) => ({ level: label }) },
  transport: isDev
    ? {
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:HH:MM:ss', ignore: 'pid,hostname' },
      }
    : undefined,
});

export const httpLogger: Logger = logger.child({ module: 'http' });
export const smsLogger: Logger = logger.child({ module: 'sms' });
export const socketLogger: Logger = logger.child({ module: 'socket' });

/** morgan → pino bridge */
export const httpLogStream = {
  write: (line: string) => {
    httpLogger.info(line.trim());
  },
};
