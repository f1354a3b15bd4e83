/**
 * Site profiles and their authenticated-session snapshots.
 *
 * A snapshot is Playwright's storage state (cookies + localStorage) written by
 * `login` and only ever read by fetches.
 */

import fs from 'node:fs';
import { ConfigError, errorMessage, matchesDomain } from '@pageclip/core';
import type { AppConfig, SiteProfile } from './config.js';
import { sessionEnvVar } from './config.js';
import { logger } from './logger.js';

const log = logger.child({ module: 'profiles' });

export interface StorageStateSnapshot {
  cookies: unknown[];
  origins: unknown[];
}

export function findProfileForUrl(config: AppConfig, url: string): SiteProfile | undefined {
  return Object.values(config.profiles).find((profile) => matchesDomain(url, profile.domains));
}

export function requireProfile(config: AppConfig, name: string): SiteProfile {
  const profile = config.profiles[name];
  if (!profile) {
    const known = Object.keys(config.profiles).join(', ') || '(none)';
    throw new ConfigError(`Unknown site profile "${name}". Known profiles: ${known}`);
  }
  return profile;
}

/** Where `login` should write the snapshot. Missing configuration is fatal. */
export function requireSessionPath(profile: SiteProfile): string {
  if (!profile.sessionPath) {
    throw new ConfigError(
      `No session path configured for profile "${profile.name}". ` +
        `Set ${sessionEnvVar(profile.name)} or profiles.${profile.name}.sessionPath in the config file.`,
    );
  }
  return profile.sessionPath;
}

function isSnapshot(value: unknown): value is StorageStateSnapshot {
  if (typeof value !== 'object' || value === null) return false;
  return 'cookies' in value && Array.isArray(value.cookies) && 'origins' in value && Array.isArray(value.origins);
}

/**
 * Validate a profile's snapshot and return its path for the browser context.
 * Returns null (anonymous browsing) when the profile has no path, the file
 * is missing, or its contents are unusable.
 */
export function loadSessionSnapshot(profile: SiteProfile): string | null {
  const sessionPath = profile.sessionPath;
  if (!sessionPath) return null;

  if (!fs.existsSync(sessionPath)) {
    log.warn({ profile: profile.name, path: sessionPath }, 'Session snapshot missing, browsing anonymously');
    return null;
  }

  try {
    const data: unknown = JSON.parse(fs.readFileSync(sessionPath, 'utf-8'));
    if (!isSnapshot(data)) {
      log.warn({ profile: profile.name, path: sessionPath }, 'Session snapshot malformed, browsing anonymously');
      return null;
    }
    return sessionPath;
  } catch (err) {
    log.warn({ profile: profile.name, path: sessionPath, err: errorMessage(err) }, 'Session snapshot unreadable, browsing anonymously');
    return null;
  }
}

/** Delete a profile's snapshot. Returns false when there was nothing to delete. */
export function removeSessionSnapshot(profile: SiteProfile): boolean {
  const sessionPath = requireSessionPath(profile);
  if (!fs.existsSync(sessionPath)) return false;
  fs.unlinkSync(sessionPath);
  return true;
}

export function hasSessionSnapshot(profile: SiteProfile): boolean {
  return !!profile.sessionPath && fs.existsSync(profile.sessionPath);
}
