/**
 * Structured Logger (Pino)
 * Layer: Core
 *
 * One JSON object per line in production; piped through pino-pretty in
 * development. Outbound calls log at debug (method, url, status, duration),
 * so LOG_LEVEL=debug traces every page a collection walks through.
 *
 * The exported `Logger` type keeps consumers decoupled from Pino itself.
 */
import pino from 'pino';
import { config } from './config';

export const logger = pino({
  level: config.log.level,
  redact: ['req.headers.authorization'],
  transport: config.isDev
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

export type Logger = pino.Logger;
