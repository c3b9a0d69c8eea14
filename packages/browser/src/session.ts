import type { BrowserManager } from './manager.js';
import type { BrowserContextLike, PageLike, Viewport } from './types.js';

export interface BrowserSessionOptions {
  /** BrowserManager instance managing the underlying browser lifecycle */
  manager: BrowserManager;
  /** Identity of the shopper this session belongs to */
  sessionId: string;
  /** Browser viewport dimensions, defaults to 1280x720 */
  viewport?: Viewport;
  userAgent?: string;
}

export const DEFAULT_VIEWPORT: Viewport = { width: 1280, height: 720 };

/**
 * BrowserSession wraps one browsing context and its single page.
 *
 * Each shopper gets an isolated context (separate cookies, separate cart) on the
 * shared browser process.
 *
 * Usage:
 *   const session = await new BrowserSession({ manager, sessionId }).open();
 *   await session.page.goto(url);
 *   await session.close();
 */
export class BrowserSession {
  readonly sessionId: string;
  readonly createdAt = new Date();
  private readonly options: BrowserSessionOptions;
  private context: BrowserContextLike | null = null;
  private currentPage: PageLike | null = null;

  constructor(options: BrowserSessionOptions) {
    this.options = options;
    this.sessionId = options.sessionId;
  }

  /**
   * Create the context and its page. Must be called before `page` is read.
   */
  async open(): Promise<this> {
    const browser = await this.options.manager.getBrowser();
    const context = await browser.newContext({
      viewport: this.options.viewport ?? DEFAULT_VIEWPORT,
      userAgent: this.options.userAgent,
    });
    try {
      this.currentPage = await context.newPage();
    } catch (err) {
      await context.close();
      throw err;
    }
    this.context = context;
    return this;
  }

  get isOpen(): boolean {
    return this.currentPage !== null;
  }

  get page(): PageLike {
    if (!this.currentPage) {
      throw new Error(`BrowserSession '${this.sessionId}' not opened; call open() first`);
    }
    return this.currentPage;
  }

  /**
   * Close the context (and with it the page).
   */
  async close(): Promise<void> {
    const context = this.context;
    this.context = null;
    this.currentPage = null;
    await context?.close();
  }
}
