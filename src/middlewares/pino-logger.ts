import { randomUUID } from 'node:crypto';
import type { MiddlewareHandler } from 'hono';
import { pinoLogger as honoPino } from 'hono-pino';
import { env } from '../config/env.js';
import { logger } from '../lib/logger.js';

/**
 * Request logging middleware sharing the root pino logger
 */
export function pinoLogger(): MiddlewareHandler {
  if (env.DISABLE_LOGGING) {
    // No request logging under tests
    return (_c, next) => next();
  }
  return honoPino({
    pino: logger.child({ component: 'http' }),
    http: {
      reqId: () => randomUUID(),
    },
  });
}
