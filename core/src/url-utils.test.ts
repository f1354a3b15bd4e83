import { describe, it, expect } from 'vitest';
import { extractUrls, matchesDomain } from './url-utils.js';

describe('extractUrls', () => {
  it('finds URLs in free-form text and collapses duplicates', () => {
    const text = [
      'Reading list:',
      '- https://ex.com/a (great)',
      'see also https://ex.com/b, and https://ex.com/a.',
      '<https://ex.com/c>',
    ].join('\n');

    expect(extractUrls(text)).toEqual(['https://ex.com/a', 'https://ex.com/b', 'https://ex.com/c']);
  });

  it('keeps a closing parenthesis that belongs to the URL', () => {
    expect(extractUrls('see https://en.wikipedia.org/wiki/Mercury_(planet) today')).toEqual([
      'https://en.wikipedia.org/wiki/Mercury_(planet)',
    ]);
    expect(extractUrls('(details at https://ex.com/x).')).toEqual(['https://ex.com/x']);
  });

  it('stops at full-width punctuation', () => {
    expect(extractUrls('文章：https://ex.com/post，很好。')).toEqual(['https://ex.com/post']);
    expect(extractUrls('「https://ex.com/a」と《https://ex.com/b》、https://ex.com/c。')).toEqual([
      'https://ex.com/a',
      'https://ex.com/b',
      'https://ex.com/c',
    ]);
  });

  it('returns an empty list when there are no URLs', () => {
    expect(extractUrls('nothing to see here')).toEqual([]);
  });
});

describe('matchesDomain', () => {
  it('matches the domain and its subdomains only', () => {
    expect(matchesDomain('https://www.wsj.com/articles/x', ['wsj.com'])).toBe(true);
    expect(matchesDomain('https://wsj.com/', ['wsj.com'])).toBe(true);
    expect(matchesDomain('https://notwsj.com/', ['wsj.com'])).toBe(false);
    expect(matchesDomain('not a url', ['wsj.com'])).toBe(false);
  });
});
