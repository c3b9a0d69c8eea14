import { errorMessage, silentLogger, type Logger } from '@cartpilot/logging';
import { stealthLauncher } from './stealth.js';
import type { BrowserLauncher, PageLike } from './types.js';
import { DEFAULT_SEARCH_ENGINE_DOMAINS, extractRedirectTarget, isSearchEngineUrl } from './url.js';

export const RESOLVER_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64)';
export const RESOLVER_TIMEOUT_MS = 30_000;

/** Anchor whose href is a search-engine `/url?q=` hop */
export const REDIRECT_ANCHOR_SELECTOR = "a[href*='url?q=']";
/** Merchant offer row on a shopping product page; opens the store in a new tab */
export const OFFER_ROW_SELECTOR = '.sh-osd__offer-row';

export interface ResolveOptions {
  launcher?: BrowserLauncher;
  timeoutMs?: number;
  userAgent?: string;
  searchEngineDomains?: readonly string[];
  logger?: Logger;
}

/**
 * Resolve a search-engine indirection link to the store URL it points at.
 *
 * Runs in a throwaway headless browser that is closed on every exit path.
 * Never throws: any failure to launch or navigate yields `dirtyUrl` unchanged.
 * URLs that are not on a search-engine domain are returned as-is without
 * launching anything.
 */
export async function resolveRedirect(dirtyUrl: string, options: ResolveOptions = {}): Promise<string> {
  const domains = options.searchEngineDomains ?? DEFAULT_SEARCH_ENGINE_DOMAINS;
  const logger = options.logger ?? silentLogger;
  if (!isSearchEngineUrl(dirtyUrl, domains)) {
    return dirtyUrl;
  }

  const launcher = options.launcher ?? stealthLauncher;
  const timeoutMs = options.timeoutMs ?? RESOLVER_TIMEOUT_MS;

  try {
    const browser = await launcher.launch({ headless: true });
    try {
      const page = await browser.newPage({ userAgent: options.userAgent ?? RESOLVER_USER_AGENT });
      await page.goto(dirtyUrl, { timeout: timeoutMs, waitUntil: 'domcontentloaded' });

      if (!isSearchEngineUrl(page.url(), domains)) {
        return page.url();
      }

      const fromHref = await readRedirectAnchor(page, logger);
      if (fromHref) {
        logger.debug(`resolved from redirect anchor: ${fromHref}`);
        return fromHref;
      }

      const offerRow = page.locator(OFFER_ROW_SELECTOR).first();
      if ((await offerRow.count()) > 0) {
        const [storePage] = await Promise.all([
          page.context().waitForEvent('page', { timeout: timeoutMs }),
          offerRow.click({ timeout: timeoutMs }),
        ]);
        await storePage.waitForLoadState('domcontentloaded', { timeout: timeoutMs });
        logger.debug(`resolved through offer row: ${storePage.url()}`);
        return storePage.url();
      }

      return page.url();
    } finally {
      await browser.close().catch((err: unknown) => {
        logger.debug(`headless browser close failed: ${errorMessage(err)}`);
      });
    }
  } catch (err) {
    logger.warn(`could not resolve ${dirtyUrl}, using it as-is: ${errorMessage(err)}`);
    return dirtyUrl;
  }
}

async function readRedirectAnchor(page: PageLike, logger: Logger): Promise<string | null> {
  try {
    const anchor = page.locator(REDIRECT_ANCHOR_SELECTOR).first();
    if ((await anchor.count()) === 0) return null;
    const href = await anchor.getAttribute('href');
    return href ? extractRedirectTarget(href, page.url()) : null;
  } catch (err) {
    logger.debug(`redirect anchor lookup failed: ${errorMessage(err)}`);
    return null;
  }
}
