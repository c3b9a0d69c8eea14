import { z } from 'zod';
import {
  COOKIE_BANNER_TIMEOUT_MS,
  DEFAULT_SEARCH_ENGINE_DOMAINS,
  RESOLVER_TIMEOUT_MS,
  describeOutcome,
  dismissCookieBanner,
  isSearchEngineUrl,
  resolveRedirect,
  type BrowserLauncher,
} from '@cartpilot/browser';
import { errorMessage, silentLogger, type Logger } from '@cartpilot/logging';
import type { ToolDefinition } from '../types.js';
import { DEFAULT_SESSION_ID } from '../types.js';
import { decodeProductLink } from '../url.js';
import type { ShoppingSessionStore } from './session-store.js';

export const NAVIGATE_TOOL_NAME = 'open_browser_to_url';
export const NAVIGATION_TIMEOUT_MS = 60_000;
/** Every failure line starts with this, so callers can stop a buy early */
export const NAVIGATION_ERROR_PREFIX = 'Navigation Error';

const inputSchema = z.object({
  url: z.string().min(1, 'url is required'),
});

type NavigateInput = z.infer<typeof inputSchema>;

export interface NavigateToolOptions {
  sessions: ShoppingSessionStore;
  /** Launcher for the throwaway headless resolver browser */
  resolverLauncher?: BrowserLauncher;
  navigationTimeoutMs?: number;
  resolverTimeoutMs?: number;
  cookieBannerTimeoutMs?: number;
  searchEngineDomains?: readonly string[];
  logger?: Logger;
}

/**
 * open_browser_to_url: load a product page in the shopper's visible browser.
 *
 * Search-engine links are first resolved to the store URL in a headless browser,
 * so the visible one never stalls on an interstitial. Waits for DOMContentLoaded
 * only, then clicks away a cookie banner if one shows up.
 *
 * Returns a status line either way; navigation failures are reported, not thrown.
 * The caller holds the session's runExclusive() gate for the whole buy, so this
 * tool does not take it again. Once the invocation is aborted it stops before
 * touching the visible page.
 */
export function createNavigateTool(options: NavigateToolOptions): ToolDefinition<NavigateInput, string> {
  const logger = options.logger ?? silentLogger;
  const domains = options.searchEngineDomains ?? DEFAULT_SEARCH_ENGINE_DOMAINS;
  const navigationTimeoutMs = options.navigationTimeoutMs ?? NAVIGATION_TIMEOUT_MS;

  return {
    name: NAVIGATE_TOOL_NAME,
    description:
      'Resolves search-engine redirect links silently, then opens the visible browser to the clean URL. ' +
      'Accepts a percent-encoded or plain URL.',
    inputSchema,
    timeoutMs: 120_000,
    execute: async ({ url }, signal, context) => {
      const sessionId = context?.sessionId ?? DEFAULT_SESSION_ID;
      const decodedUrl = decodeProductLink(url);
      logger.info(`request for ${decodedUrl.slice(0, 60)} (session '${sessionId}')`);

      let cleanUrl = decodedUrl;
      if (isSearchEngineUrl(decodedUrl, domains)) {
        logger.info('search engine link detected, resolving in background');
        cleanUrl = await resolveRedirect(decodedUrl, {
          launcher: options.resolverLauncher,
          timeoutMs: options.resolverTimeoutMs ?? RESOLVER_TIMEOUT_MS,
          searchEngineDomains: domains,
          logger: logger.child('resolver'),
        });
        logger.info(`clean URL: ${cleanUrl}`);
      }

      if (signal.aborted) {
        logger.warn(`cancelled before opening ${cleanUrl} (session '${sessionId}')`);
        return `${NAVIGATION_ERROR_PREFIX}: cancelled before opening ${cleanUrl}`;
      }

      try {
        const session = await options.sessions.open(sessionId);
        await session.page.goto(cleanUrl, { timeout: navigationTimeoutMs, waitUntil: 'domcontentloaded' });

        const banner = await dismissCookieBanner(session.page, {
          timeoutMs: options.cookieBannerTimeoutMs ?? COOKIE_BANNER_TIMEOUT_MS,
        });
        logger.debug(`cookie banner ${describeOutcome(banner)}`);

        return `Browser opened. Navigated to: ${cleanUrl}`;
      } catch (err) {
        logger.warn(`navigation to ${cleanUrl} failed: ${errorMessage(err)}`);
        return `${NAVIGATION_ERROR_PREFIX}: ${errorMessage(err)}`;
      }
    },
  };
}
