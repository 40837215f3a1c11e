import type { Context } from 'hono';
import { getLogger } from './logger.js';
import { CommerceError, ForbiddenError, UnauthorizedError, ValidationError, toErrorResponse } from './errors.js';

const log = getLogger('http');

/**
 * Helper to return JSON error responses with the error's status code
 */
export function jsonError(c: Context, error: unknown) {
  if (!(error instanceof CommerceError)) {
    log.error({ err: error, method: c.req.method, path: c.req.path }, 'Unhandled error');
  }
  const response = toErrorResponse(error);
  const status = error instanceof CommerceError ? error.statusCode : 500;
  return c.json(response, status);
}

/**
 * Caller identity set by the authentication layer in front of the API
 */
export function callerId(c: Context): string {
  const userId = c.req.header('x-user-id')?.trim();
  if (!userId) {
    throw new UnauthorizedError();
  }
  return userId;
}

export function requireAdmin(c: Context): void {
  callerId(c);
  if (c.req.header('x-user-role') !== 'admin') {
    throw new ForbiddenError('Administrator role required', 'ADMIN_ONLY');
  }
}

/**
 * Parse the JSON body; a malformed body is a validation error
 */
export async function readJson(c: Context): Promise<unknown> {
  try {
    const body: unknown = await c.req.json();
    return body;
  } catch {
    throw new ValidationError('Request body must be valid JSON');
  }
}
