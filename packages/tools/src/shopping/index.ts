import type { ToolDefinition } from '../types.js';
import { createAddToCartTool, type AddToCartToolOptions } from './add-to-cart.js';
import { createNavigateTool, type NavigateToolOptions } from './navigate.js';

export {
  createVisibleBrowserManager,
  DEFAULT_IDLE_TIMEOUT_MS,
  DEFAULT_MAX_SESSIONS,
  SessionTaskCancelledError,
  ShoppingSessionStore,
  type ShoppingSessionStoreOptions,
  type VisibleBrowserOptions,
} from './session-store.js';
export {
  createNavigateTool,
  NAVIGATE_TOOL_NAME,
  NAVIGATION_ERROR_PREFIX,
  NAVIGATION_TIMEOUT_MS,
  type NavigateToolOptions,
} from './navigate.js';
export {
  createAddToCartTool,
  ADD_TO_CART_TOOL_NAME,
  CLICK_CANCELLED_MESSAGE,
  NO_BROWSER_MESSAGE,
  NOT_FOUND_MESSAGE,
  type AddToCartToolOptions,
} from './add-to-cart.js';

export type ShoppingToolsOptions = NavigateToolOptions & Omit<AddToCartToolOptions, 'sessions' | 'logger'>;

/**
 * The executor's tool set: open_browser_to_url and click_add_to_cart, both bound
 * to the same session store. Run them inside `sessions.runExclusive()`.
 */
export function createShoppingTools(options: ShoppingToolsOptions): ToolDefinition[] {
  const logger = options.logger;
  return [
    createNavigateTool({ ...options, logger: logger?.child('navigator') }),
    createAddToCartTool({
      sessions: options.sessions,
      selectors: options.selectors,
      settleMs: options.settleMs,
      logger: logger?.child('clicker'),
    }),
  ];
}
