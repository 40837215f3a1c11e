import { pino, type Logger } from 'pino';
import { env } from '../config/env.js';
import { CommerceError } from './errors.js';

function createRootLogger(): Logger {
  if (env.DISABLE_LOGGING) {
    return pino({ level: 'silent' });
  }

  return pino({
    level: env.LOG_LEVEL,
    base: { service: 'bookshop-order-core' },
    transport:
      env.NODE_ENV === 'production'
        ? undefined
        : { target: 'pino-pretty', options: { colorize: true } },
  });
}

export const logger = createRootLogger();

/**
 * Child logger tagged with the component name
 */
export function getLogger(component: string): Logger {
  return logger.child({ component });
}

/**
 * Log an operation that was rolled back: rejected preconditions at warn,
 * anything unexpected at error
 */
export function logRollback(
  log: Logger,
  error: unknown,
  context: Record<string, unknown>,
  op: string
): void {
  if (error instanceof CommerceError) {
    log.warn({ ...context, op, code: error.code }, `${op} rejected: ${error.message}`);
  } else {
    log.error({ ...context, op, err: error }, `${op} rolled back`);
  }
}
