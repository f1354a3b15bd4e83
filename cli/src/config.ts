import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from '@pageclip/core';

const STATE_DIR = path.join(os.homedir(), '.pageclip');
const DEFAULT_CONFIG_PATH = path.join(STATE_DIR, 'config.json');

export { STATE_DIR, DEFAULT_CONFIG_PATH };

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36';

export const DEFAULT_CONSENT_SELECTORS = [
  '#onetrust-accept-btn-handler',
  '#CybotCookiebotDialogBodyLevelButtonLevelOptinAllowAll',
  '.cc-btn.cc-dismiss',
  '[class*="cookie"] button[class*="accept"]',
  '[class*="consent"] button[class*="accept"]',
  'button[aria-label*="accept" i]',
  'button:has-text("Accept all")',
  'button:has-text("Accept")',
  'button:has-text("I agree")',
];

const profileSchema = z.object({
  domains: z.array(z.string().min(1)).min(1),
  loginUrl: z.string().url(),
  sessionPath: z.string().min(1).optional(),
});

const fetchSchema = z
  .object({
    navigationTimeoutMs: z.number().int().positive().default(60_000),
    consentTimeoutMs: z.number().int().nonnegative().default(5_000),
    maxScrolls: z.number().int().nonnegative().default(30),
    scrollStallLimit: z.number().int().positive().default(3),
    scrollStepPx: z.number().int().positive().default(800),
    scrollPauseMs: z.number().int().nonnegative().default(500),
    dwellMinMs: z.number().int().nonnegative().default(2_000),
    dwellMaxMs: z.number().int().nonnegative().default(5_000),
    userAgent: z.string().default(DEFAULT_USER_AGENT),
    viewport: z
      .object({ width: z.number().int().positive(), height: z.number().int().positive() })
      .default({ width: 1920, height: 1080 }),
    locale: z.string().default('en-US'),
    headless: z.boolean().default(true),
  })
  .refine((f) => f.dwellMaxMs >= f.dwellMinMs, { message: 'dwellMaxMs must be >= dwellMinMs' });

const batchSchema = z
  .object({
    delayMinMs: z.number().int().nonnegative().default(10_000),
    delayMaxMs: z.number().int().nonnegative().default(30_000),
  })
  .refine((b) => b.delayMaxMs >= b.delayMinMs, { message: 'delayMaxMs must be >= delayMinMs' });

const configFileSchema = z.object({
  profiles: z.record(profileSchema).default({}),
  fetch: fetchSchema.default({}),
  batch: batchSchema.default({}),
  consentSelectors: z.array(z.string().min(1)).default(DEFAULT_CONSENT_SELECTORS),
});

export type SiteProfile = z.infer<typeof profileSchema> & { name: string };
export type FetchSettings = z.infer<typeof fetchSchema>;
export type BatchSettings = z.infer<typeof batchSchema>;

export interface AppConfig {
  configPath: string;
  profiles: Record<string, SiteProfile>;
  fetch: FetchSettings;
  batch: BatchSettings;
  consentSelectors: string[];
}

const BUILTIN_PROFILES: Record<string, z.infer<typeof profileSchema>> = {
  wsj: {
    domains: ['wsj.com'],
    loginUrl: 'https://www.wsj.com/client/login',
  },
};

/** `wsj` → `PAGECLIP_SESSION_WSJ` */
export function sessionEnvVar(profileName: string): string {
  return `PAGECLIP_SESSION_${profileName.toUpperCase().replace(/[^A-Z0-9]/g, '_')}`;
}

function readConfigFile(configPath: string): unknown {
  if (!fs.existsSync(configPath)) return {};
  const raw = fs.readFileSync(configPath, 'utf-8');
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON`, { cause: err });
  }
}

/**
 * Load the config once at startup: config file (optional) validated with zod,
 * built-in profiles underneath, session paths from the environment on top.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const configPath = env.PAGECLIP_CONFIG || DEFAULT_CONFIG_PATH;
  const parsed = configFileSchema.safeParse(readConfigFile(configPath));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid config ${configPath}: ${issues}`);
  }

  const profiles: Record<string, SiteProfile> = {};
  for (const [name, profile] of Object.entries({ ...BUILTIN_PROFILES, ...parsed.data.profiles })) {
    const sessionPath = env[sessionEnvVar(name)] || profile.sessionPath;
    profiles[name] = { ...profile, name, sessionPath };
  }

  return {
    configPath,
    profiles,
    fetch: parsed.data.fetch,
    batch: parsed.data.batch,
    consentSelectors: parsed.data.consentSelectors,
  };
}
