// Full-width CJK punctuation also ends a URL
const URL_REGEX = /https?:\/\/[^\s<>"{}|\\^`\[\]，。；：！？）」》、\u3000]+/g;
const TRAILING_PUNCTUATION = /[.,;:!?']$/;

/**
 * Check if a URL's host is one of the given domains or a subdomain of one.
 */
export function matchesDomain(url: string, domains: readonly string[]): boolean {
  let hostname: string;
  try {
    hostname = new URL(url).hostname.toLowerCase();
  } catch {
    return false;
  }
  return domains.some((domain) => {
    const d = domain.toLowerCase();
    return hostname === d || hostname.endsWith(`.${d}`);
  });
}

export function isHttpUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

/**
 * Resolve a possibly relative reference against a base URL.
 * Returns null when the pair cannot form a URL.
 */
export function resolveUrl(ref: string, baseUrl: string): string | null {
  try {
    return new URL(ref, baseUrl).href;
  } catch {
    return null;
  }
}

/**
 * Pull every URL-shaped substring out of free-form text.
 * Duplicates collapse; trailing sentence punctuation is dropped.
 */
export function extractUrls(text: string): string[] {
  const found = new Set<string>();
  for (const raw of text.match(URL_REGEX) ?? []) {
    const url = trimTrailingPunctuation(raw);
    if (url) found.add(url);
  }
  return [...found];
}

function count(text: string, ch: string): number {
  return text.split(ch).length - 1;
}

/** A closing paren stays when it balances one inside the URL. */
function trimTrailingPunctuation(raw: string): string {
  let url = raw;
  for (;;) {
    if (TRAILING_PUNCTUATION.test(url)) {
      url = url.slice(0, -1);
    } else if (url.endsWith(')') && count(url, '(') < count(url, ')')) {
      url = url.slice(0, -1);
    } else {
      return url;
    }
  }
}
