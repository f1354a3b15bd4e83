import { isHttpUrl, resolveUrl } from './url-utils.js';

/** Attributes lazy loaders park the real image URL in, most specific first. */
export const LAZY_SRC_ATTRIBUTES: readonly string[] = ['data-src', 'data-original', 'data-lazy-src', 'data-actualsrc'];

const LAZY_SRCSET_ATTRIBUTE = 'data-srcset';

/**
 * Rewrite every <img> under `root` in place so its `src` is an absolute
 * http(s) URL: promote lazy-load attributes, then resolve against `baseUrl`.
 * Inline `data:` images are left as they are.
 */
export function normalizeImages(root: Element, baseUrl: string): void {
  for (const img of Array.from(root.querySelectorAll('img'))) {
    for (const attr of LAZY_SRC_ATTRIBUTES) {
      const value = img.getAttribute(attr)?.trim();
      if (value) {
        img.setAttribute('src', value);
        break;
      }
    }
    for (const attr of LAZY_SRC_ATTRIBUTES) img.removeAttribute(attr);

    const lazySrcset = img.getAttribute(LAZY_SRCSET_ATTRIBUTE)?.trim();
    if (lazySrcset) img.setAttribute('srcset', lazySrcset);
    img.removeAttribute(LAZY_SRCSET_ATTRIBUTE);

    const src = img.getAttribute('src')?.trim();
    if (!src || isHttpUrl(src) || src.startsWith('data:')) continue;

    const resolved = resolveUrl(src, baseUrl);
    if (resolved) img.setAttribute('src', resolved);
  }
}
