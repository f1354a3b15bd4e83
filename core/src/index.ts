export * from './types.js';
export * from './errors.js';
export { parseHtml, textOf, attrOf } from './dom.js';
export { matchesDomain, isHttpUrl, resolveUrl, extractUrls } from './url-utils.js';
export {
  mergeMetadata,
  finalizeMetadata,
  harvestJsonLd,
  harvestHeadMeta,
  harvestTitleTag,
  harvestMetadata,
  METADATA_FIELDS,
} from './metadata.js';
export { SITE_RULES, findSiteRule, siteRuleMetadata } from './site-rules.js';
export {
  CANDIDATE_SELECTORS,
  MIN_CONTENT_TEXT_LENGTH,
  DEFAULT_STRATEGIES,
  extractContent,
  runCascade,
  suggestSelectors,
  type ContentStrategy,
  type CascadeContext,
  type ExtractOptions,
} from './cascade.js';
export { normalizeImages, LAZY_SRC_ATTRIBUTES } from './images.js';
export {
  SUMMARY_HEADING,
  SUMMARY_PLACEHOLDER,
  NOTE_TYPE,
  CONTENT_TYPE,
  htmlToMarkdown,
  buildFrontMatter,
  assembleMarkdown,
  renderMarkdown,
  sanitizeFilename,
} from './markdown.js';
export { convertPage, type ConvertOptions, type ConvertedPage } from './convert.js';
