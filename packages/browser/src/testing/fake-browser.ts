import type {
  BrowserContextLike,
  BrowserLauncher,
  BrowserLike,
  LaunchSettings,
  LoadState,
  LocatorLike,
  PageContextLike,
  PageLike,
  Viewport,
  WaitForState,
  WaitUntil,
} from '../types.js';

/**
 * In-process stand-ins for a Playwright browser. Elements are matched by exact
 * selector string; `getByText(label)` looks up the selector `text=<label>`.
 */

export interface FakeElement {
  selector: string;
  /** Defaults to true */
  visible?: boolean;
  href?: string;
  /** Clicking opens a new tab on this URL in the same context */
  opensUrl?: string;
  /** Clicking throws an Error with this message */
  clickError?: string;
}

export interface FakePageSetup {
  elements?: FakeElement[];
  /** Requested URL → URL the page lands on after goto() */
  redirects?: Record<string, string>;
  /** goto() throws an Error with this message */
  gotoError?: string;
}

/** Same name as Playwright's TimeoutError, which is how callers recognise it. */
export class FakeTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

const WAIT_POLL_MS = 10;

export class FakeLocator implements LocatorLike {
  constructor(
    private readonly page: FakePage,
    readonly selector: string,
  ) {}

  first(): FakeLocator {
    return this;
  }

  async count(): Promise<number> {
    return this.page.elements.filter((el) => el.selector === this.selector).length;
  }

  async isVisible(): Promise<boolean> {
    const el = this.page.find(this.selector);
    return el !== undefined && el.visible !== false;
  }

  /** Polls the page's elements, so elements pushed later are picked up. */
  async waitFor(options: { state?: WaitForState; timeout?: number } = {}): Promise<void> {
    const state = options.state ?? 'visible';
    const timeout = options.timeout ?? 30_000;
    const deadline = Date.now() + timeout;
    for (;;) {
      if (this.matches(state)) return;
      if (Date.now() >= deadline) {
        throw new FakeTimeoutError(`Timeout ${timeout}ms exceeded waiting for ${this.selector} to be ${state}`);
      }
      await new Promise((resolve) => setTimeout(resolve, WAIT_POLL_MS));
    }
  }

  private matches(state: WaitForState): boolean {
    const el = this.page.find(this.selector);
    const visible = el !== undefined && el.visible !== false;
    switch (state) {
      case 'attached':
        return el !== undefined;
      case 'detached':
        return el === undefined;
      case 'visible':
        return visible;
      case 'hidden':
        return !visible;
    }
  }

  async getAttribute(name: string): Promise<string | null> {
    const el = this.page.find(this.selector);
    return name === 'href' ? (el?.href ?? null) : null;
  }

  async click(options: { force?: boolean; timeout?: number } = {}): Promise<void> {
    const el = this.page.find(this.selector);
    if (!el) {
      throw new Error(`Timeout ${options.timeout ?? 30_000}ms exceeded waiting for ${this.selector}`);
    }
    if (el.clickError) {
      throw new Error(el.clickError);
    }
    this.page.clicks.push({ selector: this.selector, force: options.force ?? false });
    if (el.opensUrl) {
      this.page.owner.openPage(el.opensUrl);
    }
  }
}

export class FakePage implements PageLike {
  readonly gotoCalls: Array<{ url: string; timeout?: number; waitUntil?: WaitUntil }> = [];
  readonly clicks: Array<{ selector: string; force: boolean }> = [];
  elements: FakeElement[];
  closed = false;
  private currentUrl: string;

  constructor(
    readonly owner: FakeContext,
    private readonly setup: FakePageSetup = {},
    initialUrl = 'about:blank',
  ) {
    this.elements = [...(setup.elements ?? [])];
    this.currentUrl = initialUrl;
  }

  async goto(url: string, options: { timeout?: number; waitUntil?: WaitUntil } = {}): Promise<null> {
    this.gotoCalls.push({ url, timeout: options.timeout, waitUntil: options.waitUntil });
    if (this.setup.gotoError) {
      throw new Error(this.setup.gotoError);
    }
    this.currentUrl = this.setup.redirects?.[url] ?? url;
    return null;
  }

  url(): string {
    return this.currentUrl;
  }

  locator(selector: string): FakeLocator {
    return new FakeLocator(this, selector);
  }

  getByText(text: string, _options?: { exact?: boolean }): FakeLocator {
    return new FakeLocator(this, `text=${text}`);
  }

  context(): PageContextLike {
    return this.owner;
  }

  async waitForLoadState(_state?: LoadState, _options?: { timeout?: number }): Promise<void> {}

  async close(): Promise<void> {
    this.closed = true;
  }

  find(selector: string): FakeElement | undefined {
    return this.elements.find((el) => el.selector === selector);
  }
}

export class FakeContext implements BrowserContextLike, PageContextLike {
  readonly pages: FakePage[] = [];
  closed = false;
  private waiters: Array<(page: FakePage) => void> = [];

  constructor(
    private readonly pageSetup: FakePageSetup,
    readonly options: { viewport?: Viewport; userAgent?: string } = {},
  ) {}

  async newPage(): Promise<FakePage> {
    const page = new FakePage(this, this.pageSetup);
    this.pages.push(page);
    return page;
  }

  waitForEvent(_event: 'page', options: { timeout?: number } = {}): Promise<FakePage> {
    return new Promise((resolve, reject) => {
      const timer =
        options.timeout === undefined
          ? undefined
          : setTimeout(() => {
              this.waiters = this.waiters.filter((w) => w !== waiter);
              reject(new Error(`Timeout ${options.timeout}ms exceeded while waiting for event "page"`));
            }, options.timeout);
      const waiter = (page: FakePage): void => {
        clearTimeout(timer);
        resolve(page);
      };
      this.waiters.push(waiter);
    });
  }

  /** Simulate a new tab opening in this context. */
  openPage(url: string): FakePage {
    const page = new FakePage(this, {}, url);
    this.pages.push(page);
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter(page);
    return page;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export class FakeBrowser implements BrowserLike {
  readonly contexts: FakeContext[] = [];
  closed = false;

  constructor(
    readonly settings: LaunchSettings,
    private readonly pageSetup: FakePageSetup,
  ) {}

  async newContext(options: { viewport?: Viewport; userAgent?: string } = {}): Promise<FakeContext> {
    const context = new FakeContext(this.pageSetup, options);
    this.contexts.push(context);
    return context;
  }

  async newPage(options: { userAgent?: string } = {}): Promise<FakePage> {
    const context = await this.newContext({ userAgent: options.userAgent });
    return context.newPage();
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export interface FakeLauncherOptions {
  /** Page contents for every page opened by a browser launched with these settings */
  pageSetup?: (settings: LaunchSettings) => FakePageSetup;
  /** launch() rejects with this message */
  launchError?: string;
}

export class FakeLauncher implements BrowserLauncher {
  readonly browsers: FakeBrowser[] = [];

  constructor(private readonly options: FakeLauncherOptions = {}) {}

  async launch(settings: LaunchSettings): Promise<FakeBrowser> {
    if (this.options.launchError) {
      throw new Error(this.options.launchError);
    }
    const browser = new FakeBrowser(settings, this.options.pageSetup?.(settings) ?? {});
    this.browsers.push(browser);
    return browser;
  }

  get launchCount(): number {
    return this.browsers.length;
  }

  /** First page of the first context of the given browser; throws if absent. */
  requirePage(browserIndex = 0, contextIndex = 0): FakePage {
    const page = this.browsers[browserIndex]?.contexts[contextIndex]?.pages[0];
    if (!page) {
      throw new Error(`no page for browser ${browserIndex}, context ${contextIndex}`);
    }
    return page;
  }
}
