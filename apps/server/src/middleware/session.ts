import type { MiddlewareHandler } from 'hono';
import { DEFAULT_SESSION_ID } from '@cartpilot/tools';

export const SESSION_HEADER = 'X-Session-Id';

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

export type AppEnv = {
  Variables: {
    sessionId: string;
  };
};

/**
 * Shopper identity from the X-Session-Id header. Requests without one share the
 * default session.
 */
export function createSessionMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const raw = c.req.header(SESSION_HEADER)?.trim();
    if (raw && !SESSION_ID_PATTERN.test(raw)) {
      return c.json({ error: `Invalid ${SESSION_HEADER} header` }, 400);
    }
    c.set('sessionId', raw || DEFAULT_SESSION_ID);
    await next();
  };
}
