/**
 * Playwright session lifecycle and in-page helpers.
 *
 * `withBrowserPage` owns the browser → context → page chain: whatever the
 * callback does, the context and browser are closed before it returns.
 */

import { chromium } from 'playwright';
import type { BrowserContextOptions } from 'playwright';
import { errorMessage } from '@pageclip/core';
import type { FetchSettings } from './config.js';
import { logger } from './logger.js';

const log = logger.child({ module: 'browser' });

// Hides navigator.webdriver, the most common automation fingerprint
export const STEALTH_ARGS = ['--disable-blink-features=AutomationControlled'];

/*
 * The slices of Playwright's Browser, BrowserContext, Page and Locator this
 * tool drives. The real classes satisfy them structurally.
 */

export interface ConsentLocator {
  filter(options: { visible: boolean }): ConsentLocator;
  first(): ConsentLocator;
  click(options: { timeout: number }): Promise<void>;
}

export interface RenderPage {
  goto(url: string, options: { waitUntil: 'domcontentloaded'; timeout: number }): Promise<{ status(): number } | null>;
  locator(selector: string): ConsentLocator;
  evaluate<R>(fn: () => R): Promise<R>;
  mouse: { wheel(deltaX: number, deltaY: number): Promise<void> };
  waitForTimeout(ms: number): Promise<void>;
  content(): Promise<string>;
  url(): string;
}

export interface SessionContext {
  newPage(): Promise<RenderPage>;
  storageState(options: { path: string }): Promise<unknown>;
  close(): Promise<void>;
}

export interface SessionBrowser {
  newContext(options: BrowserContextOptions): Promise<SessionContext>;
  close(): Promise<void>;
}

export type BrowserLauncher = (headless: boolean) => Promise<SessionBrowser>;

export const launchChromium: BrowserLauncher = (headless) =>
  chromium.launch({ headless, args: STEALTH_ARGS });

export interface BrowserSessionOptions {
  settings: FetchSettings;
  /** Validated storage-state file to restore, if any. */
  storageStatePath?: string | null;
  headless?: boolean;
  launch?: BrowserLauncher;
}

function anonymousContextOptions(settings: FetchSettings): BrowserContextOptions {
  return {
    userAgent: settings.userAgent,
    viewport: settings.viewport,
    locale: settings.locale,
  };
}

/**
 * Restore the snapshot when one is given; if the browser rejects it,
 * continue with an anonymous context.
 */
async function createContext(browser: SessionBrowser, options: BrowserSessionOptions): Promise<SessionContext> {
  const base = anonymousContextOptions(options.settings);
  if (options.storageStatePath) {
    try {
      const context = await browser.newContext({ ...base, storageState: options.storageStatePath });
      log.debug({ path: options.storageStatePath }, 'Context restored from session snapshot');
      return context;
    } catch (err) {
      log.warn({ path: options.storageStatePath, err: errorMessage(err) }, 'Session snapshot rejected, browsing anonymously');
    }
  }
  return browser.newContext(base);
}

async function closeQuietly(label: string, close: () => Promise<void>): Promise<void> {
  try {
    await close();
  } catch (err) {
    log.warn({ err: errorMessage(err) }, `Error closing ${label}`);
  }
}

export async function withBrowserPage<T>(
  options: BrowserSessionOptions,
  fn: (page: RenderPage) => Promise<T>,
): Promise<T> {
  const launch = options.launch ?? launchChromium;
  const headless = options.headless ?? options.settings.headless;
  const browser = await launch(headless);
  try {
    const context = await createContext(browser, options);
    try {
      const page = await context.newPage();
      return await fn(page);
    } finally {
      await closeQuietly('context', () => context.close());
    }
  } finally {
    await closeQuietly('browser', () => browser.close());
  }
}

/* ── Consent dialogs ── */

/**
 * Click the first visible consent button matching any selector. Hidden
 * matches are skipped.
 * Returns false when none shows up within the timeout; the page may simply
 * not have one.
 */
export async function dismissConsent(
  page: RenderPage,
  selectors: readonly string[],
  timeoutMs: number,
): Promise<boolean> {
  if (selectors.length === 0 || timeoutMs <= 0) return false;
  try {
    await page.locator(selectors.join(', ')).filter({ visible: true }).first().click({ timeout: timeoutMs });
    log.debug('Consent dialog dismissed');
    return true;
  } catch (err) {
    log.debug({ err: errorMessage(err) }, 'No consent dialog dismissed');
    return false;
  }
}

/* ── Lazy-load scrolling ── */

export interface ScrollDriver {
  scrollBy(dy: number): Promise<void>;
  pause(ms: number): Promise<void>;
  /** Current vertical scroll offset. */
  offset(): Promise<number>;
}

export interface ScrollOptions {
  maxScrolls: number;
  /** Consecutive scrolls with an unchanged offset before giving up. */
  stallLimit: number;
  stepPx: number;
  pauseMs: number;
}

export interface ScrollReport {
  scrolls: number;
  reason: 'stalled' | 'max-scrolls';
}

export function pageScrollDriver(page: RenderPage): ScrollDriver {
  return {
    scrollBy: (dy) => page.mouse.wheel(0, dy),
    pause: (ms) => page.waitForTimeout(ms),
    offset: () => page.evaluate(() => window.scrollY),
  };
}

/**
 * Scroll towards the bottom so lazy content loads. Stops after `maxScrolls`
 * steps or once the offset has not moved `stallLimit` times in a row,
 * whichever comes first.
 */
export async function autoScroll(driver: ScrollDriver, options: ScrollOptions): Promise<ScrollReport> {
  let lastOffset: number | null = null;
  let stalls = 0;

  for (let i = 1; i <= options.maxScrolls; i++) {
    await driver.scrollBy(options.stepPx);
    await driver.pause(options.pauseMs);
    const offset = await driver.offset();

    if (offset === lastOffset) {
      stalls++;
      if (stalls >= options.stallLimit) return { scrolls: i, reason: 'stalled' };
    } else {
      stalls = 0;
      lastOffset = offset;
    }
  }

  return { scrolls: options.maxScrolls, reason: 'max-scrolls' };
}
