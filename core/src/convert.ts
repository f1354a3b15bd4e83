import { extractContent, suggestSelectors, type ExtractOptions } from './cascade.js';
import { parseHtml } from './dom.js';
import { ExtractionError } from './errors.js';
import { normalizeImages } from './images.js';
import { assembleMarkdown, renderMarkdown } from './markdown.js';
import { harvestMetadata } from './metadata.js';
import type { ExtractionStrategy, MarkdownDocument, MetadataRecord } from './types.js';

export interface ConvertOptions extends ExtractOptions {
  /** Timestamp written to `created`. Defaults to now. */
  generatedAt?: Date;
  /**
   * URL the HTML was actually served from (after redirects). Relative
   * references resolve against it. Defaults to `url`.
   */
  baseUrl?: string;
}

export interface ConvertedPage {
  url: string;
  metadata: MetadataRecord;
  strategy: ExtractionStrategy;
  selector?: string;
  document: MarkdownDocument;
  /** Full file contents. */
  markdown: string;
}

/**
 * Rendered HTML → Markdown document: cascade, metadata, image
 * normalization and assembly. Throws ExtractionError when no content
 * root is found.
 */
export async function convertPage(html: string, url: string, options: ConvertOptions = {}): Promise<ConvertedPage> {
  const baseUrl = options.baseUrl ?? url;
  const extraction = await extractContent(html, baseUrl, options);
  if (!extraction) {
    const suggestions = suggestSelectors(parseHtml(html, baseUrl));
    const reason = options.selector
      ? `selector "${options.selector}" matched nothing`
      : 'no extraction strategy found a content root';
    throw new ExtractionError(url, reason, suggestions);
  }

  const { match, document } = extraction;
  const metadata = harvestMetadata(document, extraction.metadata);

  normalizeImages(match.rootElement, baseUrl);
  const doc = assembleMarkdown(match.rootElement, metadata, url, options.generatedAt);

  return {
    url,
    metadata,
    strategy: match.strategyUsed,
    selector: match.selector,
    document: doc,
    markdown: renderMarkdown(doc),
  };
}
