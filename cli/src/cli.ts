#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { ConfigError, errorMessage } from '@pageclip/core';
import { loadConfig } from './config.js';
import { logger } from './logger.js';

const program = new Command();

program.name('pageclip').description('Clip web articles to Markdown through a real browser').version('0.1.0');

program
  .command('extract')
  .description('Clip a URL, or every URL found in a text file')
  .argument('<input>', 'URL or path to a file containing URLs')
  .option('-o, --output <path>', 'output directory, or a .md file for a single URL')
  .option('-s, --selector <css>', 'CSS selector for the content root (skips auto-detection)')
  .option('--headed', 'show the browser window')
  .option('--no-delay', 'skip the pause between URLs')
  .action(async (input: string, opts: { output?: string; selector?: string; headed?: boolean; delay: boolean }) => {
    const { runBatch } = await import('./batch.js');
    const { createFetcher } = await import('./fetch.js');

    const config = loadConfig();
    const outcomes = await runBatch(
      input,
      {
        output: opts.output,
        selector: opts.selector,
        delay: opts.delay ? { minMs: config.batch.delayMinMs, maxMs: config.batch.delayMaxMs } : false,
      },
      { fetch: createFetcher(config, { headless: opts.headed ? false : undefined }) },
    );

    if (outcomes.length > 0 && outcomes.every((o) => o.status === 'failed')) process.exitCode = 2;
  });

program
  .command('login')
  .description('Log in to a site interactively and save the session for later fetches')
  .argument('<profile>', 'site profile name, e.g. wsj')
  .action(async (profileName: string) => {
    const { captureLogin } = await import('./login.js');
    const { requireProfile } = await import('./profiles.js');

    const config = loadConfig();
    const profile = requireProfile(config, profileName);
    const savedTo = await captureLogin(profile, config.fetch);
    console.log(`Session saved to ${savedTo}`);
  });

program
  .command('logout')
  .description('Delete the saved session of a site profile')
  .argument('<profile>', 'site profile name')
  .action(async (profileName: string) => {
    const { requireProfile, removeSessionSnapshot } = await import('./profiles.js');

    const config = loadConfig();
    const profile = requireProfile(config, profileName);
    if (removeSessionSnapshot(profile)) {
      console.log(`Removed session for ${profile.name}.`);
    } else {
      console.log(`No saved session for ${profile.name}.`);
    }
  });

program
  .command('profiles')
  .description('List site profiles and their session status')
  .action(async () => {
    const { hasSessionSnapshot } = await import('./profiles.js');

    const config = loadConfig();
    for (const profile of Object.values(config.profiles)) {
      const state = !profile.sessionPath ? 'no session path' : hasSessionSnapshot(profile) ? 'logged in' : 'not logged in';
      console.log(`${profile.name}\t${profile.domains.join(',')}\t${profile.sessionPath ?? '-'}\t${state}`);
    }
  });

program.parseAsync().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    logger.fatal(err.message);
  } else {
    logger.fatal({ err: errorMessage(err) }, 'Unexpected failure');
  }
  process.exit(1);
});
