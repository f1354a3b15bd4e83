import { describe, it, expect } from 'vitest';
import { parseHtml } from './dom.js';
import { assembleMarkdown, buildFrontMatter, htmlToMarkdown, renderMarkdown, sanitizeFilename } from './markdown.js';
import type { MetadataRecord } from './types.js';

const EMPTY_META: MetadataRecord = { title: '', author: '', published: '', description: '', site_name: '' };

function rootOf(html: string): Element {
  const el = parseHtml(`<html><body>${html}</body></html>`).body.firstElementChild;
  if (!el) throw new Error('fixture has no root element');
  return el;
}

describe('htmlToMarkdown', () => {
  it('uses ATX headings and keeps link text without the href', () => {
    const root = rootOf(
      '<article><h2>Heading</h2><p>Some <a href="/x">linked</a> text.</p><img src="https://ex.com/a.png" alt="A"></article>',
    );
    expect(htmlToMarkdown(root)).toBe('## Heading\n\nSome linked text.\n\n![A](https://ex.com/a.png)');
  });

  it('drops scripts and styles inside the content root', () => {
    const root = rootOf('<div><script>track()</script><style>p{}</style><p>Body</p></div>');
    expect(htmlToMarkdown(root)).toBe('Body');
    expect(root.querySelector('script')).toBeNull();
  });
});

describe('buildFrontMatter', () => {
  it('writes every key in a fixed order, empty values included', () => {
    const fm = buildFrontMatter(
      { ...EMPTY_META, author: 'Ada "The Countess"', site_name: 'Example' },
      'https://ex.com/post',
      new Date('2024-05-01T08:00:00.000Z'),
    );
    expect(fm).toBe(
      [
        '---',
        'note_type: clipping',
        'content_type: article',
        'created: "2024-05-01T08:00:00.000Z"',
        'published: ""',
        'source: "https://ex.com/post"',
        'author: "Ada \\"The Countess\\""',
        'description: ""',
        'site_name: "Example"',
        '---',
      ].join('\n'),
    );
  });

  it('escapes backslashes and newlines', () => {
    const fm = buildFrontMatter({ ...EMPTY_META, description: 'line one\nC:\\path' }, 'https://ex.com/', new Date(0));
    expect(fm.split('\n')).toContain('description: "line one\\nC:\\\\path"');
  });

  it('escapes other control characters as hex', () => {
    const fm = buildFrontMatter({ ...EMPTY_META, author: 'bell\u0007 and\rreturn' }, 'https://ex.com/', new Date(0));
    expect(fm.split('\n')).toContain('author: "bell\\x07 and\\x0dreturn"');
  });
});

describe('renderMarkdown', () => {
  it('places the summary placeholder between front matter and body', () => {
    const doc = assembleMarkdown(rootOf('<p>Body text</p>'), EMPTY_META, 'https://ex.com/', new Date(0));
    const text = renderMarkdown(doc);

    expect(text.startsWith(`${doc.frontMatter}\n\n# Summary\n\n---\n\nBody text`)).toBe(true);
    expect(text.endsWith('Body text\n')).toBe(true);
  });
});

describe('sanitizeFilename', () => {
  it('strips characters illegal in filenames', () => {
    expect(sanitizeFilename('What? A "great" <day>: part 1/2 | notes*')).toBe('What A great day part 12 notes');
  });

  it('falls back to Untitled', () => {
    expect(sanitizeFilename('  ??  ')).toBe('Untitled');
  });
});
