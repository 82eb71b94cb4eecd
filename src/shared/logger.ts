import pino from 'pino';

/**
 * Structured Logger using Pino
 *
 * Every module logs through this instance, so the scheduler loop, the HTTP
 * surface and the delivery adapters share one JSON stream.
 *
 * **Configuration:**
 * - LOG_LEVEL: error, warn, info, debug - defaults to 'info' ('silent' under NODE_ENV=test)
 * - NODE_ENV: 'development' pretty-prints through pino-pretty, anything else emits JSON
 *
 * **Usage:**
 * ```typescript
 * import { logger } from '../shared/logger';
 *
 * logger.error({
 *   msg: 'Reminder delivery failed',
 *   userId: 'user-123',
 *   slotKey: 'reminder:16:00',
 *   error: error.message,
 *   stack: error.stack,
 * });
 * ```
 */

const nodeEnv = process.env.NODE_ENV || 'development';
const isDevelopment = nodeEnv === 'development';
const logLevel = process.env.LOG_LEVEL || (nodeEnv === 'test' ? 'silent' : 'info');

export const logger = pino({
  level: logLevel,
  // pino-pretty runs in a worker thread; keep it out of tests and production
  transport: isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  base: {
    env: nodeEnv,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = typeof logger;
