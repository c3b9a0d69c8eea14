import { failed, skipped, succeeded, type StepOutcome } from './outcome.js';
import type { PageLike } from './types.js';

export const COOKIE_BANNER_TIMEOUT_MS = 2_000;

/** Playwright's TimeoutError, matched by name so fakes and real errors both qualify. */
export function isTimeoutError(err: unknown): boolean {
  return err instanceof Error && err.name === 'TimeoutError';
}

/**
 * Click a cookie-consent control if one shows up within the timeout. Banners are
 * usually injected after DOMContentLoaded, so this waits for the control to become
 * visible rather than checking once. Never throws.
 */
export async function dismissCookieBanner(
  page: PageLike,
  options: { timeoutMs?: number; label?: string } = {},
): Promise<StepOutcome> {
  const label = options.label ?? 'Accept';
  const timeout = options.timeoutMs ?? COOKIE_BANNER_TIMEOUT_MS;
  const control = page.getByText(label, { exact: true }).first();

  try {
    await control.waitFor({ state: 'visible', timeout });
  } catch (err) {
    if (isTimeoutError(err)) {
      return skipped(`no '${label}' control within ${timeout}ms`);
    }
    return failed(err);
  }

  try {
    await control.click({ timeout });
    return succeeded(undefined);
  } catch (err) {
    return failed(err);
  }
}
