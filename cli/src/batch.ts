/**
 * Batch runner: input → URL list → (fetch → convert → write) per URL.
 *
 * URLs run one at a time. A failure at any stage is logged and recorded,
 * and the batch moves on. Between URLs the runner waits a random interval.
 */

import fs from 'node:fs';
import path from 'node:path';
import {
  convertPage,
  errorMessage,
  ExtractionError,
  extractUrls,
  isHttpUrl,
  OutputWriteError,
  sanitizeFilename,
  type ConvertedPage,
  type ExtractionStrategy,
  type PipelineStage,
} from '@pageclip/core';
import type { Fetcher } from './fetch.js';
import { logger } from './logger.js';
import { randomBetween, sleep as defaultSleep } from './timing.js';

const log = logger.child({ module: 'batch' });

export type UrlOutcome =
  | { url: string; status: 'written'; path: string; title: string; strategy: ExtractionStrategy }
  | { url: string; status: 'failed'; stage: PipelineStage; error: string; suggestions?: string[] };

export interface BatchOptions {
  /** Directory, or a `.md` file path for single-URL runs. */
  output?: string;
  selector?: string;
  /** Politeness delay between URLs. Disabled with `false`. */
  delay?: false | { minMs: number; maxMs: number };
  cwd?: string;
}

export interface BatchDeps {
  fetch: Fetcher;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  now?: () => Date;
}

/**
 * A regular file is scanned for URLs; anything else is taken as a single URL.
 */
export function resolveInput(input: string): string[] {
  let isFile = false;
  try {
    isFile = fs.statSync(input).isFile();
  } catch {
    isFile = false;
  }
  if (!isFile) return [input.trim()];

  const urls = extractUrls(fs.readFileSync(input, 'utf-8'));
  log.info({ file: input, count: urls.length }, 'URLs read from file');
  return urls;
}

/**
 * `.md` output → used verbatim (single URL). Other output → directory holding
 * `<title>.md`. No output → `<title>.md` in the working directory.
 */
export function resolveOutputPath(title: string, output: string | undefined, multi: boolean, cwd: string): string {
  const filename = `${sanitizeFilename(title)}.md`;
  if (!output) return path.resolve(cwd, filename);

  if (output.toLowerCase().endsWith('.md')) {
    if (!multi) return path.resolve(cwd, output);
    return path.resolve(cwd, path.dirname(output), filename);
  }
  return path.resolve(cwd, output, filename);
}

/**
 * First of `name.md`, `name (2).md`, `name (3).md`... not already written in
 * this run. Files left by earlier runs are overwritten.
 */
export function uniqueOutputPath(filePath: string, taken: ReadonlySet<string>): string {
  if (!taken.has(filePath)) return filePath;
  const { dir, name, ext } = path.parse(filePath);
  for (let n = 2; ; n++) {
    const candidate = path.join(dir, `${name} (${n})${ext}`);
    if (!taken.has(candidate)) return candidate;
  }
}

function writeOutput(filePath: string, content: string): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, 'utf-8');
  } catch (err) {
    throw new OutputWriteError(filePath, `Could not write ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
}

async function processUrl(
  url: string,
  multi: boolean,
  writtenPaths: Set<string>,
  options: BatchOptions,
  deps: BatchDeps,
): Promise<UrlOutcome> {
  if (!isHttpUrl(url)) {
    return { url, status: 'failed', stage: 'input', error: 'not an http(s) URL or readable file' };
  }

  const fetched = await deps.fetch(url);
  if (!fetched.ok) {
    return { url, status: 'failed', stage: 'fetch', error: fetched.error.message };
  }

  let page: ConvertedPage;
  try {
    page = await convertPage(fetched.html, url, {
      selector: options.selector,
      baseUrl: fetched.finalUrl,
      generatedAt: (deps.now ?? (() => new Date()))(),
    });
  } catch (err) {
    if (err instanceof ExtractionError) {
      return { url, status: 'failed', stage: 'extract', error: err.message, suggestions: err.suggestions };
    }
    return { url, status: 'failed', stage: 'extract', error: errorMessage(err) };
  }
  log.info({ url, strategy: page.strategy, selector: page.selector }, '[extract] OK');

  const title = page.metadata.title;
  const target = resolveOutputPath(title, options.output, multi, options.cwd ?? process.cwd());
  const filePath = uniqueOutputPath(target, writtenPaths);
  try {
    writeOutput(filePath, page.markdown);
  } catch (err) {
    return { url, status: 'failed', stage: 'write', error: errorMessage(err) };
  }
  writtenPaths.add(filePath);

  return { url, status: 'written', path: filePath, title, strategy: page.strategy };
}

function logOutcome(outcome: UrlOutcome): void {
  if (outcome.status === 'written') {
    log.info({ url: outcome.url, path: outcome.path }, '[write] Saved');
    return;
  }
  log.error({ url: outcome.url, stage: outcome.stage, err: outcome.error }, 'URL failed, skipping');
  if (outcome.suggestions && outcome.suggestions.length > 0) {
    log.info({ suggestions: outcome.suggestions.slice(0, 20) }, 'Try again with --selector and one of these');
  }
}

export async function runBatch(input: string, options: BatchOptions, deps: BatchDeps): Promise<UrlOutcome[]> {
  const urls = resolveInput(input);
  const multi = urls.length > 1;
  const sleep = deps.sleep ?? defaultSleep;

  if (multi && options.output?.toLowerCase().endsWith('.md')) {
    log.warn({ output: options.output }, 'Output file ignored for a multi-URL batch; writing into its directory');
  }

  const outcomes: UrlOutcome[] = [];
  const writtenPaths = new Set<string>();
  for (const [i, url] of urls.entries()) {
    log.info({ url, n: i + 1, total: urls.length }, 'Processing');

    let outcome: UrlOutcome;
    try {
      outcome = await processUrl(url, multi, writtenPaths, options, deps);
    } catch (err) {
      outcome = { url, status: 'failed', stage: 'fetch', error: errorMessage(err) };
    }
    logOutcome(outcome);
    outcomes.push(outcome);

    const remaining = urls.length - i - 1;
    if (remaining > 0 && options.delay) {
      const ms = randomBetween(options.delay.minMs, options.delay.maxMs, deps.random);
      log.info({ delayMs: ms, remaining }, 'Waiting before next URL');
      await sleep(ms);
    }
  }

  const written = outcomes.filter((o) => o.status === 'written').length;
  log.info({ processed: outcomes.length, written, failed: outcomes.length - written }, 'Batch complete');
  return outcomes;
}
