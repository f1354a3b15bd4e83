/**
 * Markdown assembly: content root → Markdown body, metadata → YAML front
 * matter, joined around a fixed summary placeholder.
 */

import TurndownService from 'turndown';
import type { MarkdownDocument, MetadataRecord } from './types.js';

/** Heading a later summarization pass looks for. Must stay stable. */
export const SUMMARY_HEADING = '# Summary';
export const SUMMARY_PLACEHOLDER = `${SUMMARY_HEADING}\n\n---`;

export const NOTE_TYPE = 'clipping';
export const CONTENT_TYPE = 'article';

const STRIPPED_TAGS = ['script', 'style', 'noscript', 'iframe', 'template'] as const;

function createTurndown(): TurndownService {
  const service = new TurndownService({
    headingStyle: 'atx',
    codeBlockStyle: 'fenced',
    bulletListMarker: '-',
    hr: '---',
  });
  service.remove([...STRIPPED_TAGS]);
  // Offline readability over link fidelity: keep the text, drop the href
  service.addRule('stripLinks', {
    filter: 'a',
    replacement: (content) => content,
  });
  return service;
}

const turndown = createTurndown();

/** Convert a content root to Markdown. Removes non-content nodes from it first. */
export function htmlToMarkdown(root: Element): string {
  for (const el of Array.from(root.querySelectorAll(STRIPPED_TAGS.join(',')))) el.remove();
  return turndown.turndown(root.outerHTML).trim();
}

function quoteYaml(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\r?\n/g, '\\n')
    .replace(/[\u0000-\u001f\u007f]/g, (c) => `\\x${c.charCodeAt(0).toString(16).padStart(2, '0')}`);
  return `"${escaped}"`;
}

/**
 * Front matter with a fixed key order. Missing fields are written as ""
 * so every clipping carries the same keys.
 */
export function buildFrontMatter(metadata: MetadataRecord, url: string, generatedAt: Date): string {
  const lines = [
    '---',
    `note_type: ${NOTE_TYPE}`,
    `content_type: ${CONTENT_TYPE}`,
    `created: ${quoteYaml(generatedAt.toISOString())}`,
    `published: ${quoteYaml(metadata.published)}`,
    `source: ${quoteYaml(url)}`,
    `author: ${quoteYaml(metadata.author)}`,
    `description: ${quoteYaml(metadata.description)}`,
    `site_name: ${quoteYaml(metadata.site_name)}`,
    '---',
  ];
  return lines.join('\n');
}

export function assembleMarkdown(
  root: Element,
  metadata: MetadataRecord,
  url: string,
  generatedAt: Date = new Date(),
): MarkdownDocument {
  return {
    frontMatter: buildFrontMatter(metadata, url, generatedAt),
    summaryPlaceholder: SUMMARY_PLACEHOLDER,
    body: htmlToMarkdown(root),
  };
}

export function renderMarkdown(doc: MarkdownDocument): string {
  return `${doc.frontMatter}\n\n${doc.summaryPlaceholder}\n\n${doc.body}\n`;
}

const MAX_FILENAME_LENGTH = 150;

/**
 * Strip characters that are illegal in common filesystems from a page title.
 */
export function sanitizeFilename(title: string): string {
  const cleaned = title
    .replace(/[\\/*?:"<>|]/g, '')
    .replace(/[\u0000-\u001f\u007f]/g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .slice(0, MAX_FILENAME_LENGTH)
    .trim();
  return cleaned || 'Untitled';
}
