/**
 * Structural slices of the Playwright API that the shopping flow depends on.
 *
 * Playwright's Browser, BrowserContext, Page and Locator satisfy these as-is, so
 * production code passes real handles straight through while tests substitute the
 * in-process fakes from `@cartpilot/browser/testing`.
 */

export type LoadState = 'load' | 'domcontentloaded' | 'networkidle';
export type WaitUntil = LoadState | 'commit';

export interface Viewport {
  width: number;
  height: number;
}

export type WaitForState = 'attached' | 'detached' | 'visible' | 'hidden';

export interface LocatorLike {
  first(): LocatorLike;
  count(): Promise<number>;
  isVisible(): Promise<boolean>;
  waitFor(options?: { state?: WaitForState; timeout?: number }): Promise<void>;
  getAttribute(name: string): Promise<string | null>;
  click(options?: { force?: boolean; timeout?: number }): Promise<void>;
}

/** The part of a BrowserContext reachable from a page. */
export interface PageContextLike {
  waitForEvent(event: 'page', options?: { timeout?: number }): Promise<PageLike>;
}

export interface PageLike {
  goto(url: string, options?: { timeout?: number; waitUntil?: WaitUntil }): Promise<unknown>;
  url(): string;
  locator(selector: string): LocatorLike;
  getByText(text: string, options?: { exact?: boolean }): LocatorLike;
  context(): PageContextLike;
  waitForLoadState(state?: LoadState, options?: { timeout?: number }): Promise<void>;
  close(): Promise<void>;
}

export interface BrowserContextLike {
  newPage(): Promise<PageLike>;
  close(): Promise<void>;
}

export interface BrowserLike {
  newContext(options?: { viewport?: Viewport; userAgent?: string }): Promise<BrowserContextLike>;
  newPage(options?: { userAgent?: string }): Promise<PageLike>;
  close(): Promise<void>;
}

export interface LaunchSettings {
  headless: boolean;
  /** Slows every Playwright operation down by this many milliseconds */
  slowMo?: number;
  args?: string[];
}

export interface BrowserLauncher {
  launch(settings: LaunchSettings): Promise<BrowserLike>;
}
