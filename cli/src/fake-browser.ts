/**
 * In-process stand-ins for the Playwright surface in browser.ts, for tests.
 */

import type { BrowserContextOptions } from 'playwright';
import { vi } from 'vitest';
import type { BrowserLauncher, ConsentLocator, RenderPage, SessionBrowser, SessionContext } from './browser.js';

export interface FakePageInit {
  goto?: RenderPage['goto'];
  html?: string;
  finalUrl?: string;
  click?: ConsentLocator['click'];
}

export function fakePage(init: FakePageInit = {}) {
  const click = vi.fn<ConsentLocator['click']>(init.click ?? (async () => {}));
  const filter = vi.fn((_options: { visible: boolean }): ConsentLocator => locator);
  const locator: ConsentLocator = { filter, first: () => locator, click };

  const page = {
    goto: vi.fn<RenderPage['goto']>(init.goto ?? (async () => ({ status: () => 200 }))),
    locator: vi.fn((_selector: string) => locator),
    evaluate: <R>(_fn: () => R): Promise<R> => Promise.reject(new Error('no page scripts in tests')),
    mouse: { wheel: vi.fn(async (_dx: number, _dy: number) => {}) },
    waitForTimeout: vi.fn(async (_ms: number) => {}),
    content: async () => init.html ?? '<html><body></body></html>',
    url: () => init.finalUrl ?? 'about:blank',
  } satisfies RenderPage;

  return { page, locator: { filter, click } };
}

export interface FakeBrowserInit {
  /** Reject contexts created with a storage state, as Playwright does for a bad snapshot. */
  rejectStorageState?: boolean;
}

export function fakeBrowser(page: RenderPage, init: FakeBrowserInit = {}) {
  const context = {
    newPage: vi.fn(async () => page),
    storageState: vi.fn(async (_options: { path: string }) => ({ cookies: [], origins: [] })),
    close: vi.fn(async () => {}),
  } satisfies SessionContext;

  const browser = {
    newContext: vi.fn(async (options: BrowserContextOptions) => {
      if (init.rejectStorageState && options.storageState) throw new Error('invalid storage state');
      return context;
    }),
    close: vi.fn(async () => {}),
  } satisfies SessionBrowser;

  const launch = vi.fn<BrowserLauncher>(async () => browser);
  return { browser, context, launch };
}
