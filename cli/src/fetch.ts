/**
 * Render a URL in Chromium and return its final HTML.
 *
 * Steps: restore session (if the URL's profile has one) → navigate →
 * dismiss consent → scroll for lazy content → dwell → read HTML.
 */

import { errorMessage, FetchError } from '@pageclip/core';
import type { AppConfig } from './config.js';
import { autoScroll, dismissConsent, pageScrollDriver, withBrowserPage, type BrowserLauncher } from './browser.js';
import { logger } from './logger.js';
import { findProfileForUrl, loadSessionSnapshot } from './profiles.js';
import { randomBetween } from './timing.js';

const log = logger.child({ module: 'fetch' });

export type FetchResult = { ok: true; html: string; finalUrl: string } | { ok: false; error: FetchError };

export type Fetcher = (url: string) => Promise<FetchResult>;

export interface FetchOptions {
  headless?: boolean;
  launch?: BrowserLauncher;
}

export async function fetchPage(url: string, config: AppConfig, options: FetchOptions = {}): Promise<FetchResult> {
  const settings = config.fetch;
  const profile = findProfileForUrl(config, url);
  const storageStatePath = profile ? loadSessionSnapshot(profile) : null;
  if (profile) log.info({ url, profile: profile.name, authenticated: !!storageStatePath }, '[fetch] Site profile matched');

  try {
    const result = await withBrowserPage(
      { settings, storageStatePath, headless: options.headless, launch: options.launch },
      async (page) => {
        let response: { status(): number } | null;
        try {
          response = await page.goto(url, { waitUntil: 'domcontentloaded', timeout: settings.navigationTimeoutMs });
        } catch (err) {
          throw new FetchError(url, `Navigation failed: ${errorMessage(err)}`, { cause: err });
        }
        const status = response?.status() ?? 0;
        if (status >= 400) throw new FetchError(url, `HTTP ${status}`);

        await dismissConsent(page, config.consentSelectors, settings.consentTimeoutMs);

        const scroll = await autoScroll(pageScrollDriver(page), {
          maxScrolls: settings.maxScrolls,
          stallLimit: settings.scrollStallLimit,
          stepPx: settings.scrollStepPx,
          pauseMs: settings.scrollPauseMs,
        });
        log.debug({ url, ...scroll }, '[fetch] Scrolled');

        await page.waitForTimeout(randomBetween(settings.dwellMinMs, settings.dwellMaxMs));

        return { html: await page.content(), finalUrl: page.url() };
      },
    );
    log.info({ url, chars: result.html.length }, '[fetch] OK');
    return { ok: true, ...result };
  } catch (err) {
    const error = err instanceof FetchError ? err : new FetchError(url, errorMessage(err), { cause: err });
    log.error({ url, err: error.message }, '[fetch] Failed');
    return { ok: false, error };
  }
}

/** Bind a config so the batch runner sees a plain `url → result` function. */
export function createFetcher(config: AppConfig, options: FetchOptions = {}): Fetcher {
  return (url) => fetchPage(url, config, options);
}
