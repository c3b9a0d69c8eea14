import { Command } from 'commander';
import type { BrowserLauncher } from '@cartpilot/browser';
import { errorMessage, silentLogger, type Logger } from '@cartpilot/logging';
import {
  createAddToCartTool,
  createNavigateTool,
  createVisibleBrowserManager,
  DEFAULT_SESSION_ID,
  NAVIGATION_ERROR_PREFIX,
  ShoppingSessionStore,
} from '@cartpilot/tools';
import { cliLogger } from '../logger.js';
import { parseNonNegativeInt } from '../options.js';

export interface BuyOptions {
  launcher?: BrowserLauncher;
  resolverLauncher?: BrowserLauncher;
  headless?: boolean;
  slowMo?: number;
  settleMs?: number;
  cookieBannerTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Navigator then Clicker on a fresh browser, without a model in the loop.
 * Returns each step's status line. The browser is always closed afterwards.
 */
export async function runBuy(url: string, options: BuyOptions = {}): Promise<string[]> {
  const logger = options.logger ?? silentLogger;
  const manager = createVisibleBrowserManager({
    launcher: options.launcher,
    headless: options.headless,
    slowMo: options.slowMo,
  });
  const sessions = new ShoppingSessionStore({ manager, logger: logger.child('sessions') });
  const navigate = createNavigateTool({
    sessions,
    resolverLauncher: options.resolverLauncher,
    cookieBannerTimeoutMs: options.cookieBannerTimeoutMs,
    logger: logger.child('navigator'),
  });
  const click = createAddToCartTool({ sessions, settleMs: options.settleMs, logger: logger.child('clicker') });

  const signal = new AbortController().signal;
  const context = { sessionId: DEFAULT_SESSION_ID };
  try {
    return await sessions.runExclusive(context.sessionId, async () => {
      const navigated = await navigate.execute({ url }, signal, context);
      if (navigated.startsWith(NAVIGATION_ERROR_PREFIX)) return [navigated];
      return [navigated, await click.execute({}, signal, context)];
    });
  } finally {
    await sessions.closeAll();
    if (manager.isRunning()) {
      await manager.close().catch((err: unknown) => logger.warn(`browser close failed: ${errorMessage(err)}`));
    }
  }
}

export const buyCommand = new Command('buy')
  .argument('<url>', 'Product page or search-engine product link')
  .option('--headless', 'Run the browser without a window', false)
  .option('--slow-mo <ms>', 'Delay between browser operations', parseNonNegativeInt, 1000)
  .option('--settle-ms <ms>', 'Pause after clicking add-to-cart', parseNonNegativeInt, 5000)
  .description('Open the product in a browser and add it to the cart')
  .action(async (url: string, opts: { headless: boolean; slowMo: number; settleMs: number }) => {
    const lines = await runBuy(url, {
      headless: opts.headless,
      slowMo: opts.slowMo,
      settleMs: opts.settleMs,
      logger: cliLogger().child('buy'),
    });
    for (const line of lines) console.log(line);
  });
