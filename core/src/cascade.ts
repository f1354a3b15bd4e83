/**
 * Content-root cascade.
 *
 * Strategies run in a fixed order and the first one to produce a root wins:
 *   1. site rule      (known platform, fixed selector)
 *   2. candidate      (generic article/main/CMS selectors)
 *   3. readability    (Defuddle text-density scoring)
 *
 * A manual selector replaces the whole cascade: it either matches or the
 * extraction fails.
 */

import { Defuddle } from 'defuddle/node';
import { parseHtml, textOf } from './dom.js';
import { findSiteRule, SITE_RULES, siteRuleMetadata } from './site-rules.js';
import type { ContentMatch, ExtractionResult, PartialMetadata, SiteRule } from './types.js';

export const CANDIDATE_SELECTORS: readonly string[] = [
  'article',
  'main',
  '[role="main"]',
  '#content',
  '#main-content',
  '#main',
  '.post-body',
  '.entry-content',
  '.article-body',
  '.post-content',
];

/** Minimum text a heuristic result (or a suggested container) must hold. */
export const MIN_CONTENT_TEXT_LENGTH = 200;

export interface CascadeContext {
  document: Document;
  html: string;
  url: string;
  siteRule?: SiteRule;
}

export type ContentStrategy = (ctx: CascadeContext) => Promise<ContentMatch | null>;

export interface ExtractOptions {
  /** Manual CSS selector. When set, no other strategy is tried. */
  selector?: string;
  siteRules?: readonly SiteRule[];
}

function selectFirst(document: Document, selector: string): Element | null {
  try {
    return document.querySelector(selector);
  } catch {
    // invalid selector syntax
    return null;
  }
}

export function manualSelectorStrategy(selector: string): ContentStrategy {
  return async ({ document }) => {
    const el = selectFirst(document, selector);
    return el ? { rootElement: el, strategyUsed: 'selector', selector } : null;
  };
}

export const siteRuleStrategy: ContentStrategy = async ({ document, siteRule }) => {
  if (!siteRule) return null;
  const el = selectFirst(document, siteRule.contentSelector);
  return el ? { rootElement: el, strategyUsed: 'site-rule', selector: siteRule.contentSelector } : null;
};

export const candidateSelectorStrategy: ContentStrategy = async ({ document }) => {
  for (const selector of CANDIDATE_SELECTORS) {
    const el = selectFirst(document, selector);
    if (el) return { rootElement: el, strategyUsed: 'candidate', selector };
  }
  return null;
};

/**
 * Defuddle scores DOM subtrees by text density and link ratio. Its cleaned
 * HTML is re-parented into the working document so later passes mutate the
 * same tree.
 */
export const readabilityStrategy: ContentStrategy = async ({ document, html, url }) => {
  const origLog = console.log;
  console.log = (msg: unknown, ...args: unknown[]) => {
    if (typeof msg === 'string' && msg.includes('Initial parse returned very little content')) return;
    origLog(msg, ...args);
  };
  let content: string;
  try {
    content = (await Defuddle(html, url)).content;
  } finally {
    console.log = origLog;
  }
  if (!content) return null;

  const root = document.createElement('div');
  root.innerHTML = content;
  if (textOf(root).length < MIN_CONTENT_TEXT_LENGTH) return null;

  return { rootElement: root, strategyUsed: 'readability' };
};

export const DEFAULT_STRATEGIES: readonly ContentStrategy[] = [
  siteRuleStrategy,
  candidateSelectorStrategy,
  readabilityStrategy,
];

/** Evaluate strategies in order, stopping at the first match. */
export async function runCascade(
  ctx: CascadeContext,
  strategies: readonly ContentStrategy[],
): Promise<ContentMatch | null> {
  for (const strategy of strategies) {
    const match = await strategy(ctx);
    if (match) return match;
  }
  return null;
}

/**
 * Locate the content root of a rendered page.
 * Returns null when every strategy came up empty.
 */
export async function extractContent(
  html: string,
  url: string,
  options: ExtractOptions = {},
): Promise<ExtractionResult | null> {
  const document = parseHtml(html, url);
  const siteRule = findSiteRule(url, options.siteRules ?? SITE_RULES);
  const ctx: CascadeContext = { document, html, url, siteRule };

  const strategies = options.selector ? [manualSelectorStrategy(options.selector)] : DEFAULT_STRATEGIES;
  const match = await runCascade(ctx, strategies);
  if (!match) return null;

  const metadata: PartialMetadata = siteRule ? siteRuleMetadata(document, siteRule) : {};
  return { match, metadata, document };
}

/**
 * Selectors for text-heavy containers, offered when the cascade fails.
 * Shorter selectors first.
 */
export function suggestSelectors(document: Document): string[] {
  const found = new Set<string>();
  for (const el of Array.from(document.body?.querySelectorAll('*') ?? [])) {
    if ((el.textContent ?? '').replace(/\s+/g, '').length <= MIN_CONTENT_TEXT_LENGTH) continue;
    if (el.id) found.add(`#${el.id}`);
    for (const cls of Array.from(el.classList)) {
      if (cls.length > 4 && !/^\d+$/.test(cls)) found.add(`.${cls}`);
    }
  }
  return [...found].sort((a, b) => a.length - b.length || a.localeCompare(b));
}
