import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { HTTPException } from 'hono/http-exception';
import { errorMessage, silentLogger, type Logger } from '@cartpilot/logging';
import type { ShoppingSessionStore } from '@cartpilot/tools';
import type { Agent } from './agents/tool-call-agent.js';
import { createSessionMiddleware, SESSION_HEADER, type AppEnv } from './middleware/session.js';
import { createBuyRoutes } from './routes/buy.js';
import { createChatRoute } from './routes/chat.js';
import { createFrontendRoute } from './routes/frontend.js';

export interface AppDeps {
  searchAgent: Agent;
  actionAgent: Agent;
  sessions: Pick<ShoppingSessionStore, 'close' | 'runExclusive'>;
  frontendDir: string;
  logger?: Logger;
}

/**
 * Hono app factory.
 * CORS and the session middleware apply to every route.
 */
export function createApp(deps: AppDeps): Hono<AppEnv> {
  const logger = deps.logger ?? silentLogger;
  const app = new Hono<AppEnv>();

  app.use(
    '*',
    cors({
      origin: '*',
      allowHeaders: ['Content-Type', SESSION_HEADER],
      allowMethods: ['GET', 'POST', 'OPTIONS'],
    }),
  );
  app.use('*', createSessionMiddleware());

  app.route('/', createFrontendRoute(deps.frontendDir));
  app.route('/chat', createChatRoute(deps.searchAgent, logger.child('chat')));
  app.route('/', createBuyRoutes(deps.actionAgent, deps.sessions, logger.child('buy')));

  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }
    logger.error(`${c.req.method} ${c.req.path} failed: ${errorMessage(err)}`);
    return c.json({ error: errorMessage(err) }, 500);
  });

  return app;
}
