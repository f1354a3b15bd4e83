import { describe, it, expect, vi } from 'vitest';
import { extractContent, runCascade, suggestSelectors, type CascadeContext, type ContentStrategy } from './cascade.js';
import { parseHtml, textOf } from './dom.js';

const LONG_PARAGRAPH =
  'The harbour authority confirmed on Tuesday that the new tidal barrier will open next spring, ' +
  'after three years of construction and several delays caused by winter storms along the coast. ' +
  'Engineers say the structure can hold back surges two metres higher than the old sea wall.';

describe('extractContent', () => {
  it('prefers the site rule over generic selectors', async () => {
    const html = `<html><head><title>Ignored</title></head><body>
      <h1 id="activity-name"> Site Headline </h1>
      <a id="js_name">Official Account</a>
      <article><p>Generic article wrapper</p></article>
      <div id="js_content"><p>Platform body</p></div>
    </body></html>`;

    const result = await extractContent(html, 'https://mp.weixin.qq.com/s/abc123');

    expect(result?.match.strategyUsed).toBe('site-rule');
    expect(result?.match.rootElement.id).toBe('js_content');
    expect(result?.metadata).toEqual({ title: 'Site Headline', author: 'Official Account', site_name: 'WeChat' });
  });

  it('falls through to candidates when the site rule selector is missing', async () => {
    const html = '<html><body><article><p>Only a generic wrapper</p></article></body></html>';
    const result = await extractContent(html, 'https://mp.weixin.qq.com/s/abc123');

    expect(result?.match.strategyUsed).toBe('candidate');
    expect(result?.match.selector).toBe('article');
  });

  it('tries candidate selectors in their fixed order', async () => {
    const html = `<html><body>
      <div id="content"><p>content div</p></div>
      <main><p>main landmark</p></main>
    </body></html>`;
    const result = await extractContent(html, 'https://ex.com/post');

    expect(result?.match).toMatchObject({ strategyUsed: 'candidate', selector: 'main' });
    expect(result?.match.rootElement.tagName).toBe('MAIN');
    expect(result?.metadata).toEqual({});
  });

  it('uses only the manual selector when one is given', async () => {
    const html = '<html><body><article><p>article</p></article><section class="story"><p>story</p></section></body></html>';

    const hit = await extractContent(html, 'https://ex.com/post', { selector: 'section.story' });
    expect(hit?.match.strategyUsed).toBe('selector');
    expect(textOf(hit?.match.rootElement)).toBe('story');

    const miss = await extractContent(html, 'https://ex.com/post', { selector: '.does-not-exist' });
    expect(miss).toBeNull();
  });

  it('treats an invalid manual selector as a miss', async () => {
    const html = '<html><body><article><p>article</p></article></body></html>';
    expect(await extractContent(html, 'https://ex.com/post', { selector: 'div[' })).toBeNull();
  });

  it('falls back to readability scoring when no selector matches', async () => {
    const html = `<html><head><title>Tidal barrier</title></head><body>
      <div class="shell">
        <div class="story">
          <h1>Tidal barrier to open in spring</h1>
          <p>${LONG_PARAGRAPH}</p>
          <p>${LONG_PARAGRAPH}</p>
          <p>${LONG_PARAGRAPH}</p>
        </div>
      </div>
    </body></html>`;

    const result = await extractContent(html, 'https://ex.com/news/barrier');

    expect(result?.match.strategyUsed).toBe('readability');
    expect(textOf(result?.match.rootElement)).toContain('Engineers say the structure can hold back surges');
  });

  it('returns null when nothing qualifies', async () => {
    const html = '<html><body><div>hi</div></body></html>';
    expect(await extractContent(html, 'https://ex.com/empty')).toBeNull();
  });
});

describe('runCascade', () => {
  it('stops at the first strategy that matches', async () => {
    const document = parseHtml('<html><body><p>x</p></body></html>');
    const ctx: CascadeContext = { document, html: '', url: 'https://ex.com/' };
    const root = document.createElement('div');

    const first = vi.fn<ContentStrategy>(async () => null);
    const second = vi.fn<ContentStrategy>(async () => ({ rootElement: root, strategyUsed: 'candidate' }));
    const third = vi.fn<ContentStrategy>(async () => ({ rootElement: root, strategyUsed: 'readability' }));

    const match = await runCascade(ctx, [first, second, third]);

    expect(match?.strategyUsed).toBe('candidate');
    expect(first).toHaveBeenCalledOnce();
    expect(second).toHaveBeenCalledOnce();
    expect(third).not.toHaveBeenCalled();
  });
});

describe('suggestSelectors', () => {
  it('lists ids and meaningful classes of text-heavy containers, shortest first', () => {
    const words = 'word '.repeat(60);
    const document = parseHtml(
      `<html><body><div id="wrap" class="story-container x1 12345"><p>${words}</p></div><aside class="sidebar">short</aside></body></html>`,
    );
    expect(suggestSelectors(document)).toEqual(['#wrap', '.story-container']);
  });
});
