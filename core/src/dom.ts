import { JSDOM } from 'jsdom';
import { isHttpUrl } from './url-utils.js';

/**
 * Parse rendered HTML into a detached document. Scripts never run;
 * the URL only sets `document.URL` for relative lookups.
 */
export function parseHtml(html: string, url?: string): Document {
  const dom = new JSDOM(html, url && isHttpUrl(url) ? { url } : {});
  return dom.window.document;
}

/** Trimmed, whitespace-collapsed text of an element. */
export function textOf(el: Element | null | undefined): string {
  if (!el) return '';
  return (el.textContent ?? '').replace(/\s+/g, ' ').trim();
}

export function attrOf(el: Element | null | undefined, name: string): string {
  if (!el) return '';
  return (el.getAttribute(name) ?? '').trim();
}
