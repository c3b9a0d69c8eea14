import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Hono } from 'hono';
import type { AppEnv } from '../middleware/session.js';

export const MISSING_FRONTEND_HTML = '<h1>Error: Create frontend/index.html</h1>';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

/**
 * GET /: the chat page, read from disk on every request so edits show up on reload.
 */
export function createFrontendRoute(frontendDir: string): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get('/', async (c) => {
    try {
      return c.html(await readFile(join(frontendDir, 'index.html'), 'utf8'));
    } catch (err) {
      if (isMissingFile(err)) return c.html(MISSING_FRONTEND_HTML);
      throw err;
    }
  });

  return app;
}
