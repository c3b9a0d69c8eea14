import { failed, skipped, succeeded, type StepOutcome } from './outcome.js';
import type { PageLike } from './types.js';

export interface SelectorEntry {
  selector: string;
  description: string;
}

/**
 * Add-to-cart buttons, most reliable first. Stores share no markup for this, so the
 * clicker walks the table and takes the first visible hit.
 */
export const ADD_TO_CART_SELECTORS: readonly SelectorEntry[] = [
  { selector: '#add-to-cart-button', description: 'add-to-cart button id' },
  { selector: '#add-to-cart-button-ubb', description: 'add-to-cart button id (buy box variant)' },
  { selector: "[data-automation-id='add-to-cart']", description: 'add-to-cart automation id' },
  { selector: "button[name='add']", description: "button named 'add'" },
  { selector: "button:has-text('Add to Cart')", description: "button labelled 'Add to Cart'" },
  { selector: "button:has-text('Add to Bag')", description: "button labelled 'Add to Bag'" },
  { selector: "form[action*='/cart/add'] button", description: 'cart form submit button' },
  { selector: '.add-to-cart', description: 'add-to-cart class' },
];

export interface SelectorMatch {
  entry: SelectorEntry;
  /** 1-based position of the entry in the table */
  position: number;
}

/**
 * Force-click the first visible element matched by `table`, in order.
 * `skipped` when nothing in the table is visible or signal is aborted first;
 * `failed` when the page throws.
 */
export async function clickFirstVisible(
  page: PageLike,
  table: readonly SelectorEntry[] = ADD_TO_CART_SELECTORS,
  signal?: AbortSignal,
): Promise<StepOutcome<SelectorMatch>> {
  try {
    for (const [index, entry] of table.entries()) {
      if (signal?.aborted) return skipped('cancelled');
      const target = page.locator(entry.selector).first();
      if (await target.isVisible()) {
        await target.click({ force: true });
        return succeeded({ entry, position: index + 1 });
      }
    }
    return skipped('no selector matched a visible element');
  } catch (err) {
    return failed(err);
  }
}
