import { attrOf, textOf } from './dom.js';
import type { PartialMetadata, SiteRule } from './types.js';
import { matchesDomain } from './url-utils.js';

export const SITE_RULES: readonly SiteRule[] = [
  {
    name: 'wechat',
    domains: ['mp.weixin.qq.com'],
    contentSelector: '#js_content',
    titleSelector: '#activity-name',
    authorSelector: '#js_name',
    publishedSelector: '#publish_time',
    siteName: 'WeChat',
  },
];

export function findSiteRule(url: string, rules: readonly SiteRule[] = SITE_RULES): SiteRule | undefined {
  return rules.find((rule) => matchesDomain(url, rule.domains));
}

/**
 * Read a rule's metadata landmarks. Fields whose landmark is absent or
 * empty are left out so lower-priority sources can fill them.
 */
export function siteRuleMetadata(document: Document, rule: SiteRule): PartialMetadata {
  const meta: PartialMetadata = {};

  const pick = (selector: string | undefined): string => {
    if (!selector) return '';
    const el = document.querySelector(selector);
    // <time datetime> is more precise than its display text
    return attrOf(el, 'datetime') || textOf(el);
  };

  const title = pick(rule.titleSelector);
  if (title) meta.title = title;
  const author = pick(rule.authorSelector);
  if (author) meta.author = author;
  const published = pick(rule.publishedSelector);
  if (published) meta.published = published;
  if (rule.siteName) meta.site_name = rule.siteName;

  return meta;
}
