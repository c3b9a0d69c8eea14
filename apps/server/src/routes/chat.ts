import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { errorMessage, type Logger } from '@cartpilot/logging';
import type { Agent } from '../agents/tool-call-agent.js';
import type { AppEnv } from '../middleware/session.js';

const chatSchema = z.object({
  message: z.string().default(''),
});

/**
 * POST /chat: relay the shopper's message to the searcher.
 * Accepts { message?: string }; replies { response } or 500 { error }.
 */
export function createChatRoute(agent: Agent, logger: Logger): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.post('/', zValidator('json', chatSchema), async (c) => {
    const { message } = c.req.valid('json');
    const sessionId = c.get('sessionId');

    try {
      const response = await agent.run(message, { sessionId });
      return c.json({ response });
    } catch (err) {
      logger.error(`chat failed (session '${sessionId}'): ${errorMessage(err)}`);
      return c.json({ error: errorMessage(err) }, 500);
    }
  });

  return app;
}
