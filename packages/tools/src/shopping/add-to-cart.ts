import { z } from 'zod';
import { ADD_TO_CART_SELECTORS, clickFirstVisible, type SelectorEntry } from '@cartpilot/browser';
import { silentLogger, type Logger } from '@cartpilot/logging';
import type { ToolDefinition } from '../types.js';
import { DEFAULT_SESSION_ID } from '../types.js';
import type { ShoppingSessionStore } from './session-store.js';

export const ADD_TO_CART_TOOL_NAME = 'click_add_to_cart';
export const NO_BROWSER_MESSAGE = 'Error: No browser open.';
export const NOT_FOUND_MESSAGE = "FAILED: Could not find 'Add to Cart' button.";
export const CLICK_CANCELLED_MESSAGE = 'Click Error: cancelled before clicking.';

const inputSchema = z.object({});

type AddToCartInput = z.infer<typeof inputSchema>;

export interface AddToCartToolOptions {
  sessions: ShoppingSessionStore;
  selectors?: readonly SelectorEntry[];
  /** Pause after a successful click so the cart can update; defaults to 5000ms */
  settleMs?: number;
  logger?: Logger;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * click_add_to_cart: press the store's add-to-cart button on the page that
 * open_browser_to_url loaded for this shopper. Like the navigator, it expects the
 * caller to hold the session's gate.
 */
export function createAddToCartTool(options: AddToCartToolOptions): ToolDefinition<AddToCartInput, string> {
  const logger = options.logger ?? silentLogger;
  const selectors = options.selectors ?? ADD_TO_CART_SELECTORS;
  const settleMs = options.settleMs ?? 5_000;

  return {
    name: ADD_TO_CART_TOOL_NAME,
    description: "Clicks 'Add to Cart' on the page opened by open_browser_to_url.",
    inputSchema,
    timeoutMs: 30_000 + settleMs,
    execute: async (_input, signal, context) => {
      const sessionId = context?.sessionId ?? DEFAULT_SESSION_ID;
      const session = options.sessions.get(sessionId);
      if (!session?.isOpen) return NO_BROWSER_MESSAGE;

      logger.info(`hunting for an add-to-cart button (session '${sessionId}')`);
      const outcome = await clickFirstVisible(session.page, selectors, signal);

      switch (outcome.status) {
        case 'succeeded': {
          const { entry, position } = outcome.value;
          logger.info(`clicked ${entry.selector} (entry ${position} of ${selectors.length})`);
          await sleep(settleMs);
          return `Success: Item added to cart (matched ${entry.description}).`;
        }
        case 'skipped':
          if (signal.aborted) {
            logger.warn(`cancelled before clicking (session '${sessionId}')`);
            return CLICK_CANCELLED_MESSAGE;
          }
          logger.warn(`no add-to-cart button on ${session.page.url()}`);
          return NOT_FOUND_MESSAGE;
        case 'failed':
          logger.warn(`add-to-cart click failed: ${outcome.error}`);
          return `Click Error: ${outcome.error}`;
      }
    },
  };
}
