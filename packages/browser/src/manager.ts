import type { BrowserLauncher, BrowserLike, LaunchSettings } from './types.js';

/**
 * BrowserManager owns one browser process.
 *
 * Provides lazy initialization and explicit close. Not a singleton: the server
 * creates one for the visible shopping browser and closes it from its shutdown hook.
 *
 * Usage:
 *   const manager = new BrowserManager(stealthLauncher, { headless: false, slowMo: 1000 });
 *   const browser = await manager.getBrowser(); // lazy launch
 *   // ... use browser ...
 *   await manager.close();
 */
export class BrowserManager {
  private browser: BrowserLike | null = null;
  /** In-flight launch, shared by concurrent getBrowser() callers */
  private launching: Promise<BrowserLike> | null = null;

  constructor(
    private readonly launcher: BrowserLauncher,
    private readonly settings: LaunchSettings,
  ) {}

  /**
   * Returns the existing browser, launching one if not yet started.
   * Concurrent callers during the first launch all receive the same browser.
   */
  async getBrowser(): Promise<BrowserLike> {
    if (this.browser) return this.browser;
    if (!this.launching) {
      this.launching = this.launcher.launch(this.settings).then(
        (browser) => {
          this.browser = browser;
          this.launching = null;
          return browser;
        },
        (err: unknown) => {
          this.launching = null;
          throw err;
        },
      );
    }
    return this.launching;
  }

  /**
   * Close the browser and release the reference.
   */
  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    await browser?.close();
  }

  /**
   * Returns true if a browser instance is currently open.
   */
  isRunning(): boolean {
    return this.browser !== null;
  }
}
