import fs from 'node:fs';
import path from 'node:path';
import { createInterface } from 'node:readline/promises';
import type { FetchSettings, SiteProfile } from './config.js';
import { launchChromium, type BrowserLauncher } from './browser.js';
import { logger } from './logger.js';
import { requireSessionPath } from './profiles.js';

const log = logger.child({ module: 'login' });

export type ConfirmFn = (prompt: string) => Promise<void>;

/** Block until the operator presses Enter. */
export const confirmOnStdin: ConfirmFn = async (prompt) => {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    await rl.question(prompt);
  } finally {
    rl.close();
  }
};

export interface CaptureOptions {
  confirm?: ConfirmFn;
  launch?: BrowserLauncher;
}

/**
 * Interactive login: open a visible browser at the profile's login page,
 * wait for the operator to finish signing in, then write the context's
 * storage state to the profile's session path.
 * Returns the path written.
 */
export async function captureLogin(
  profile: SiteProfile,
  settings: FetchSettings,
  options: CaptureOptions = {},
): Promise<string> {
  // Fails before any browser starts when the output path is not configured
  const sessionPath = requireSessionPath(profile);
  const confirm = options.confirm ?? confirmOnStdin;
  const launch = options.launch ?? launchChromium;

  log.info({ profile: profile.name, loginUrl: profile.loginUrl }, 'Opening login page');
  const browser = await launch(false);
  try {
    const context = await browser.newContext({ userAgent: settings.userAgent, locale: settings.locale, viewport: null });
    const page = await context.newPage();
    await page.goto(profile.loginUrl, { waitUntil: 'domcontentloaded', timeout: settings.navigationTimeoutMs });

    await confirm(`\nLog in to ${profile.name} in the browser window, then press Enter to save the session... `);

    fs.mkdirSync(path.dirname(path.resolve(sessionPath)), { recursive: true });
    await context.storageState({ path: sessionPath });
    log.info({ profile: profile.name, path: sessionPath }, 'Session snapshot saved');
    return sessionPath;
  } finally {
    await browser.close();
  }
}
