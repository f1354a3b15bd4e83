import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError } from '@pageclip/core';
import { DEFAULT_CONSENT_SELECTORS, loadConfig, sessionEnvVar } from './config.js';

let tmp: string;

beforeEach(() => {
  tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'pageclip-config-'));
});

afterEach(() => {
  fs.rmSync(tmp, { recursive: true, force: true });
});

function configFile(contents: string): string {
  const file = path.join(tmp, 'config.json');
  fs.writeFileSync(file, contents);
  return file;
}

describe('loadConfig', () => {
  it('falls back to defaults when the file does not exist', () => {
    const config = loadConfig({ PAGECLIP_CONFIG: path.join(tmp, 'absent.json') });

    expect(config.fetch).toMatchObject({
      navigationTimeoutMs: 60_000,
      maxScrolls: 30,
      scrollStallLimit: 3,
      dwellMinMs: 2_000,
      dwellMaxMs: 5_000,
      headless: true,
    });
    expect(config.batch).toEqual({ delayMinMs: 10_000, delayMaxMs: 30_000 });
    expect(config.consentSelectors).toEqual(DEFAULT_CONSENT_SELECTORS);
    expect(config.profiles.wsj).toMatchObject({ name: 'wsj', domains: ['wsj.com'], sessionPath: undefined });
  });

  it('merges file profiles and lets the environment set session paths', () => {
    const file = configFile(
      JSON.stringify({
        profiles: {
          'ft-com': { domains: ['ft.com'], loginUrl: 'https://ft.com/login', sessionPath: '/from/file.json' },
        },
        batch: { delayMinMs: 0, delayMaxMs: 0 },
      }),
    );

    const config = loadConfig({ PAGECLIP_CONFIG: file, PAGECLIP_SESSION_FT_COM: '/from/env.json' });

    expect(Object.keys(config.profiles).sort()).toEqual(['ft-com', 'wsj']);
    expect(config.profiles['ft-com']?.sessionPath).toBe('/from/env.json');
    expect(config.batch).toEqual({ delayMinMs: 0, delayMaxMs: 0 });
  });

  it('rejects a file that is not JSON', () => {
    const file = configFile('{ profiles: ');
    expect(() => loadConfig({ PAGECLIP_CONFIG: file })).toThrow(ConfigError);
  });

  it('names the offending field when validation fails', () => {
    const file = configFile(JSON.stringify({ profiles: { bad: { domains: [], loginUrl: 'not a url' } } }));
    expect(() => loadConfig({ PAGECLIP_CONFIG: file })).toThrow(/profiles\.bad\.domains/);
  });

  it('rejects an inverted delay range', () => {
    const file = configFile(JSON.stringify({ batch: { delayMinMs: 5000, delayMaxMs: 1000 } }));
    expect(() => loadConfig({ PAGECLIP_CONFIG: file })).toThrow(/delayMaxMs must be >= delayMinMs/);
  });
});

describe('sessionEnvVar', () => {
  it('upper-cases the profile name and replaces other characters', () => {
    expect(sessionEnvVar('wsj')).toBe('PAGECLIP_SESSION_WSJ');
    expect(sessionEnvVar('ft.com')).toBe('PAGECLIP_SESSION_FT_COM');
  });
});
