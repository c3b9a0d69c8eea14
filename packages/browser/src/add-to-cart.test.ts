import { describe, it, expect } from 'vitest';
import { ADD_TO_CART_SELECTORS, clickFirstVisible } from './add-to-cart.js';
import { FakeLauncher, type FakeElement } from './testing/fake-browser.js';

async function pageWith(elements: FakeElement[]) {
  const launcher = new FakeLauncher({ pageSetup: () => ({ elements }) });
  const browser = await launcher.launch({ headless: true });
  return browser.newPage();
}

describe('ADD_TO_CART_SELECTORS', () => {
  it('keeps the priority order', () => {
    expect(ADD_TO_CART_SELECTORS.map((e) => e.selector)).toEqual([
      '#add-to-cart-button',
      '#add-to-cart-button-ubb',
      "[data-automation-id='add-to-cart']",
      "button[name='add']",
      "button:has-text('Add to Cart')",
      "button:has-text('Add to Bag')",
      "form[action*='/cart/add'] button",
      '.add-to-cart',
    ]);
  });
});

describe('clickFirstVisible', () => {
  it("matches 'Add to Bag' as the sixth entry and force-clicks it", async () => {
    const page = await pageWith([{ selector: "button:has-text('Add to Bag')" }]);

    const outcome = await clickFirstVisible(page);

    expect(outcome.status).toBe('succeeded');
    if (outcome.status === 'succeeded') {
      expect(outcome.value.position).toBe(6);
      expect(outcome.value.entry.description).toBe("button labelled 'Add to Bag'");
    }
    expect(page.clicks).toEqual([{ selector: "button:has-text('Add to Bag')", force: true }]);
  });

  it('prefers the earlier entry when several are visible', async () => {
    const page = await pageWith([{ selector: '.add-to-cart' }, { selector: "button[name='add']" }]);

    await clickFirstVisible(page);

    expect(page.clicks).toEqual([{ selector: "button[name='add']", force: true }]);
  });

  it('ignores hidden matches', async () => {
    const page = await pageWith([
      { selector: '#add-to-cart-button', visible: false },
      { selector: '.add-to-cart' },
    ]);

    const outcome = await clickFirstVisible(page);

    expect(outcome.status === 'succeeded' && outcome.value.position).toBe(8);
  });

  it('reports skipped when nothing is visible', async () => {
    const page = await pageWith([{ selector: '#add-to-cart-button', visible: false }]);

    expect(await clickFirstVisible(page)).toEqual({
      status: 'skipped',
      reason: 'no selector matched a visible element',
    });
    expect(page.clicks).toEqual([]);
  });

  it('stops without clicking once the signal is aborted', async () => {
    const page = await pageWith([{ selector: '#add-to-cart-button' }]);
    const controller = new AbortController();
    controller.abort();

    expect(await clickFirstVisible(page, ADD_TO_CART_SELECTORS, controller.signal)).toEqual({
      status: 'skipped',
      reason: 'cancelled',
    });
    expect(page.clicks).toEqual([]);
  });

  it('reports failed when the click throws', async () => {
    const page = await pageWith([{ selector: '#add-to-cart-button', clickError: 'page crashed' }]);

    expect(await clickFirstVisible(page)).toEqual({ status: 'failed', error: 'page crashed' });
  });

  it('walks a custom table', async () => {
    const page = await pageWith([{ selector: '#buy' }]);

    const outcome = await clickFirstVisible(page, [{ selector: '#buy', description: 'buy button' }]);

    expect(outcome.status).toBe('succeeded');
  });
});
