import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { errorMessage, type Logger } from '@cartpilot/logging';
import type { ShoppingSessionStore } from '@cartpilot/tools';
import type { Agent } from '../agents/tool-call-agent.js';
import type { AppEnv } from '../middleware/session.js';

const executeBuySchema = z.object({
  url: z.string().default(''),
});

export function buyPrompt(url: string): string {
  return `Open browser to ${url} and add the item to the cart.`;
}

/**
 * POST /execute_buy: hand a product link to the executor. The whole run holds the
 * session's gate, so a second buy on the same session waits for the first to finish
 * and is dropped if its caller disconnects in the meantime.
 * POST /end_session: close the caller's shopping browser context.
 */
export function createBuyRoutes(
  agent: Agent,
  sessions: Pick<ShoppingSessionStore, 'close' | 'runExclusive'>,
  logger: Logger,
): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.post('/execute_buy', zValidator('json', executeBuySchema), async (c) => {
    const { url } = c.req.valid('json');
    const sessionId = c.get('sessionId');
    logger.info(`auto-buy requested for ${url} (session '${sessionId}')`);

    try {
      const response = await sessions.runExclusive(
        sessionId,
        () => agent.run(buyPrompt(url), { sessionId }),
        c.req.raw.signal,
      );
      return c.json({ response });
    } catch (err) {
      logger.error(`auto-buy failed (session '${sessionId}'): ${errorMessage(err)}`);
      return c.json({ error: errorMessage(err) }, 500);
    }
  });

  app.post('/end_session', async (c) => {
    const sessionId = c.get('sessionId');
    const closed = await sessions.close(sessionId);
    return c.json({ closed, sessionId });
  });

  return app;
}
