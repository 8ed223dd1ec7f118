/**
 * Request id middleware
 * Tags every request with an id, echoed in the X-Request-Id header
 */

import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';

export function createRequestIdMiddleware() {
  return async function requestIdMiddleware(c: Context, next: Next) {
    const requestId = c.req.header('x-request-id') ?? nanoid();
    c.set('requestId', requestId);
    c.header('X-Request-Id', requestId);
    await next();
  };
}
