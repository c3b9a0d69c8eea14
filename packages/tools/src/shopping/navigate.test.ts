import { describe, it, expect } from 'vitest';
import { FakeLauncher, type FakePageSetup } from '@cartpilot/browser/testing';
import { REDIRECT_ANCHOR_SELECTOR } from '@cartpilot/browser';
import { createNavigateTool, NAVIGATION_ERROR_PREFIX } from './navigate.js';
import { createVisibleBrowserManager, ShoppingSessionStore } from './session-store.js';

function setup(options: { page?: FakePageSetup; resolverPage?: FakePageSetup; launchError?: string } = {}) {
  const launcher = new FakeLauncher({ pageSetup: () => options.page ?? {}, launchError: options.launchError });
  const resolverLauncher = new FakeLauncher({ pageSetup: () => options.resolverPage ?? {} });
  const sessions = new ShoppingSessionStore({ manager: createVisibleBrowserManager({ launcher }) });
  const tool = createNavigateTool({ sessions, resolverLauncher, cookieBannerTimeoutMs: 20 });
  const navigate = (url: string, sessionId = 'default', signal = new AbortController().signal) =>
    tool.execute({ url }, signal, { sessionId });
  return { launcher, resolverLauncher, sessions, navigate };
}

describe('open_browser_to_url', () => {
  it('opens the visible browser straight to a store URL', async () => {
    const { launcher, resolverLauncher, navigate } = setup();

    const result = await navigate('https://shop.example/item/42');

    expect(result).toBe('Browser opened. Navigated to: https://shop.example/item/42');
    expect(resolverLauncher.launchCount).toBe(0);
    expect(launcher.requirePage().gotoCalls).toEqual([
      { url: 'https://shop.example/item/42', timeout: 60_000, waitUntil: 'domcontentloaded' },
    ]);
  });

  it('decodes percent-encoded links from the product cards', async () => {
    const { launcher, navigate } = setup();

    const result = await navigate('https%3A//shop.example/item%3Fid%3D42');

    expect(result).toBe('Browser opened. Navigated to: https://shop.example/item?id=42');
    expect(launcher.requirePage().gotoCalls[0]?.url).toBe('https://shop.example/item?id=42');
  });

  it('reuses one browser and one page across navigations in a session', async () => {
    const { launcher, navigate } = setup();

    await navigate('https://shop.example/a');
    await navigate('https://shop.example/b');

    expect(launcher.launchCount).toBe(1);
    expect(launcher.browsers[0]?.contexts).toHaveLength(1);
    expect(launcher.requirePage().gotoCalls.map((c) => c.url)).toEqual([
      'https://shop.example/a',
      'https://shop.example/b',
    ]);
  });

  it('keeps separate pages for separate sessions', async () => {
    const { launcher, navigate } = setup();

    await navigate('https://shop.example/a', 'alice');
    await navigate('https://shop.example/b', 'bob');

    expect(launcher.launchCount).toBe(1);
    expect(launcher.requirePage(0, 0).gotoCalls.map((c) => c.url)).toEqual(['https://shop.example/a']);
    expect(launcher.requirePage(0, 1).gotoCalls.map((c) => c.url)).toEqual(['https://shop.example/b']);
  });

  it('resolves search-engine links in a headless browser before navigating', async () => {
    const { launcher, resolverLauncher, navigate } = setup({
      resolverPage: {
        elements: [{ selector: REDIRECT_ANCHOR_SELECTOR, href: '/url?q=https://store.example/p/7&sa=U' }],
      },
    });

    const result = await navigate('https://www.google.com/shopping/product/7');

    expect(result).toBe('Browser opened. Navigated to: https://store.example/p/7');
    expect(resolverLauncher.browsers[0]?.settings.headless).toBe(true);
    expect(resolverLauncher.browsers[0]?.closed).toBe(true);
    expect(launcher.requirePage().gotoCalls[0]?.url).toBe('https://store.example/p/7');
  });

  it('clicks away a cookie banner', async () => {
    const { launcher, navigate } = setup({ page: { elements: [{ selector: 'text=Accept' }] } });

    await navigate('https://shop.example/item/42');

    expect(launcher.requirePage().clicks).toEqual([{ selector: 'text=Accept', force: false }]);
  });

  it('reports navigation failures as text', async () => {
    const { navigate } = setup({ page: { gotoError: 'net::ERR_NAME_NOT_RESOLVED at https://nowhere.example/' } });

    expect(await navigate('https://nowhere.example/')).toBe(
      'Navigation Error: net::ERR_NAME_NOT_RESOLVED at https://nowhere.example/',
    );
  });

  it('leaves the visible browser alone once the invocation is aborted', async () => {
    const { launcher, navigate } = setup();
    const controller = new AbortController();
    controller.abort();

    const result = await navigate('https://shop.example/item/42', 'default', controller.signal);

    expect(result).toBe(`${NAVIGATION_ERROR_PREFIX}: cancelled before opening https://shop.example/item/42`);
    expect(launcher.launchCount).toBe(0);
  });

  it('reports browser launch failures as text', async () => {
    const { navigate } = setup({ launchError: 'Executable does not exist' });

    expect(await navigate('https://shop.example/item/42')).toBe('Navigation Error: Executable does not exist');
  });
});
