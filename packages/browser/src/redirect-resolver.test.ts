import { describe, it, expect } from 'vitest';
import { FakeLauncher } from './testing/fake-browser.js';
import { OFFER_ROW_SELECTOR, REDIRECT_ANCHOR_SELECTOR, RESOLVER_USER_AGENT, resolveRedirect } from './redirect-resolver.js';

const PRODUCT_URL = 'https://www.google.com/shopping/product/123';

describe('resolveRedirect', () => {
  it('returns non-search URLs unchanged without launching a browser', async () => {
    const launcher = new FakeLauncher();

    const result = await resolveRedirect('https://shop.example/item/42', { launcher });

    expect(result).toBe('https://shop.example/item/42');
    expect(launcher.launchCount).toBe(0);
  });

  it('takes the fast path from a redirect anchor', async () => {
    const launcher = new FakeLauncher({
      pageSetup: () => ({
        elements: [
          { selector: REDIRECT_ANCHOR_SELECTOR, href: '/url?q=https://shop.example/item/42&sa=U' },
          { selector: OFFER_ROW_SELECTOR, opensUrl: 'https://other.example/never' },
        ],
      }),
    });

    const result = await resolveRedirect(PRODUCT_URL, { launcher });

    expect(result).toBe('https://shop.example/item/42');
    const browser = launcher.browsers[0];
    expect(browser?.settings.headless).toBe(true);
    expect(browser?.closed).toBe(true);
    expect(browser?.contexts[0]?.options.userAgent).toBe(RESOLVER_USER_AGENT);
    const page = launcher.requirePage();
    expect(page.gotoCalls).toEqual([{ url: PRODUCT_URL, timeout: 30_000, waitUntil: 'domcontentloaded' }]);
    expect(page.clicks).toEqual([]);
  });

  it('falls back to clicking the offer row and following the new tab', async () => {
    const launcher = new FakeLauncher({
      pageSetup: () => ({
        elements: [{ selector: OFFER_ROW_SELECTOR, opensUrl: 'https://store.example/p/9' }],
      }),
    });

    const result = await resolveRedirect(PRODUCT_URL, { launcher });

    expect(result).toBe('https://store.example/p/9');
    expect(launcher.requirePage().clicks).toEqual([{ selector: OFFER_ROW_SELECTOR, force: false }]);
    expect(launcher.browsers[0]?.closed).toBe(true);
  });

  it('returns the landed URL when the search engine already redirected away', async () => {
    const launcher = new FakeLauncher({
      pageSetup: () => ({ redirects: { [PRODUCT_URL]: 'https://store.example/landing' } }),
    });

    expect(await resolveRedirect(PRODUCT_URL, { launcher })).toBe('https://store.example/landing');
  });

  it('returns the current page URL when neither extraction path applies', async () => {
    const launcher = new FakeLauncher();

    expect(await resolveRedirect(PRODUCT_URL, { launcher })).toBe(PRODUCT_URL);
  });

  it('returns the input URL when navigation fails, and still closes the browser', async () => {
    const launcher = new FakeLauncher({ pageSetup: () => ({ gotoError: 'net::ERR_TIMED_OUT' }) });

    const result = await resolveRedirect(PRODUCT_URL, { launcher });

    expect(result).toBe(PRODUCT_URL);
    expect(launcher.browsers[0]?.closed).toBe(true);
  });

  it('returns the input URL when the browser cannot launch', async () => {
    const launcher = new FakeLauncher({ launchError: 'Executable does not exist' });

    await expect(resolveRedirect(PRODUCT_URL, { launcher })).resolves.toBe(PRODUCT_URL);
  });

  it('returns the input URL when the offer row click fails', async () => {
    const launcher = new FakeLauncher({
      pageSetup: () => ({ elements: [{ selector: OFFER_ROW_SELECTOR, clickError: 'element detached' }] }),
    });

    expect(await resolveRedirect(PRODUCT_URL, { launcher, timeoutMs: 50 })).toBe(PRODUCT_URL);
  });
});
