/** How the content root of a page was located. Order matches the cascade. */
export type ExtractionStrategy = 'selector' | 'site-rule' | 'candidate' | 'readability';

/** Metadata fields written to the front matter. Field names match the YAML keys. */
export interface MetadataRecord {
  title: string;
  author: string;
  published: string;
  description: string;
  site_name: string;
}

export type MetadataField = keyof MetadataRecord;

export type PartialMetadata = Partial<MetadataRecord>;

/** The subtree judged to hold the article, plus which cascade stage found it. */
export interface ContentMatch {
  rootElement: Element;
  strategyUsed: ExtractionStrategy;
  /** Selector that matched, when the strategy is selector based. */
  selector?: string;
}

export interface ExtractionResult {
  match: ContentMatch;
  /** High-confidence fields from a site rule. Empty unless a site rule applied. */
  metadata: PartialMetadata;
  document: Document;
}

export interface MarkdownDocument {
  frontMatter: string;
  summaryPlaceholder: string;
  body: string;
}

/** Per-platform selectors for the content root and metadata landmarks. */
export interface SiteRule {
  name: string;
  domains: string[];
  contentSelector: string;
  titleSelector?: string;
  authorSelector?: string;
  publishedSelector?: string;
  siteName?: string;
}
