import 'dotenv/config';
import { isAbsolute, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { serve } from '@hono/node-server';
import { ModelRouter, OpenRouterProvider } from '@cartpilot/ai';
import { createLogger, LoggerToolLog } from '@cartpilot/logging';
import { createVisibleBrowserManager, SerpApiShoppingClient, ShoppingSessionStore } from '@cartpilot/tools';
import { createExecutorAgent, createSearchAgent } from './agents/index.js';
import { createApp } from './app.js';
import { ConfigError, loadConfig, type ServerConfig } from './config.js';
import { registerShutdownHandlers } from './shutdown.js';

/**
 * Server entry point.
 * Serves the chat page and the two agent endpoints on HOST:PORT (default 127.0.0.1:8000).
 */

const PACKAGE_ROOT = fileURLToPath(new URL('..', import.meta.url));

let config: ServerConfig;
try {
  config = loadConfig();
} catch (err) {
  if (err instanceof ConfigError) {
    process.stderr.write(`[server] error: ${err.message}\n`);
    process.exit(1);
  }
  throw err;
}

const logger = createLogger('server', { level: config.logLevel });

const router = new ModelRouter(new OpenRouterProvider(config.openRouterApiKey), config.models, logger.child('ai'));
const toolLog = new LoggerToolLog(logger.child('tools'));

const browserManager = createVisibleBrowserManager({
  headless: config.browser.headless,
  slowMo: config.browser.slowMoMs,
});
const sessions = new ShoppingSessionStore({
  manager: browserManager,
  maxSessions: config.sessions.maxSessions,
  idleTimeoutMs: config.sessions.idleTimeoutMs,
  logger: logger.child('sessions'),
});
if (config.sessions.idleTimeoutMs > 0) {
  sessions.startIdleSweep();
}

if (!config.serpApiKey) {
  logger.warn('SERPAPI_KEY is not set; product search will report a missing key.');
}
const searchClient = config.serpApiKey ? new SerpApiShoppingClient(config.serpApiKey) : null;

const app = createApp({
  searchAgent: createSearchAgent({ router, toolLog, client: searchClient, logger }),
  actionAgent: createExecutorAgent({ router, toolLog, sessions, settleMs: config.cartSettleMs, logger }),
  sessions,
  frontendDir: isAbsolute(config.frontendDir) ? config.frontendDir : resolve(PACKAGE_ROOT, config.frontendDir),
  logger,
});

const server = serve({ fetch: app.fetch, hostname: config.host, port: config.port }, (info) => {
  logger.info(`listening on http://${config.host}:${info.port}`);
});

registerShutdownHandlers({ server, sessions, browserManager, logger: logger.child('shutdown') });
