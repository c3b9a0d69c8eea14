export type {
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
} from './types.js';
export { BrowserManager } from './manager.js';
export { BrowserSession, DEFAULT_VIEWPORT, type BrowserSessionOptions } from './session.js';
export { getStealthChromium, stealthLauncher, AUTOMATION_CONTROLLED_FLAG } from './stealth.js';
export { describeOutcome, failed, skipped, succeeded, type StepOutcome } from './outcome.js';
export { DEFAULT_SEARCH_ENGINE_DOMAINS, extractRedirectTarget, isSearchEngineUrl } from './url.js';
export {
  resolveRedirect,
  OFFER_ROW_SELECTOR,
  REDIRECT_ANCHOR_SELECTOR,
  RESOLVER_TIMEOUT_MS,
  RESOLVER_USER_AGENT,
  type ResolveOptions,
} from './redirect-resolver.js';
export { dismissCookieBanner, isTimeoutError, COOKIE_BANNER_TIMEOUT_MS } from './cookie-banner.js';
export {
  ADD_TO_CART_SELECTORS,
  clickFirstVisible,
  type SelectorEntry,
  type SelectorMatch,
} from './add-to-cart.js';
