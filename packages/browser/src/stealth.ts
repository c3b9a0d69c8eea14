import { chromium } from 'playwright-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import type { BrowserLauncher } from './types.js';

/**
 * Guard flag to prevent double-plugin registration.
 * playwright-extra throws if chromium.use() is called twice with the same plugin.
 */
let stealthRegistered = false;

/**
 * Returns a playwright-extra chromium instance with the stealth plugin applied.
 * Safe to call multiple times; the plugin is only registered once.
 */
export function getStealthChromium(): typeof chromium {
  if (!stealthRegistered) {
    chromium.use(StealthPlugin());
    stealthRegistered = true;
  }
  return chromium;
}

/** Chromium flag that hides `navigator.webdriver` from page scripts. */
export const AUTOMATION_CONTROLLED_FLAG = '--disable-blink-features=AutomationControlled';

/**
 * Launcher backed by stealth Chromium. Used for both the visible shopping browser
 * and the throwaway headless browser of the redirect resolver.
 */
export const stealthLauncher: BrowserLauncher = {
  launch: (settings) =>
    getStealthChromium().launch({
      headless: settings.headless,
      slowMo: settings.slowMo,
      args: settings.args,
    }),
};
