import type { Handler } from 'hono';

/**
 * Creates an unauthenticated liveness handler.
 * @returns Route handler for the health endpoint
 */
export function healthRouteHandler(): Handler {
  return (c) => c.json({ status: 'ok' });
}
