/**
 * Metadata harvesting.
 *
 * Sources, highest priority first:
 *   site rule landmarks > JSON-LD blocks > <head> meta tags > <title>
 *
 * Each source yields a partial record; `mergeMetadata` folds them so a field
 * set by an earlier (higher-priority) record is never replaced by a later one.
 */

import { attrOf, textOf } from './dom.js';
import type { MetadataField, MetadataRecord, PartialMetadata } from './types.js';

export const METADATA_FIELDS: readonly MetadataField[] = ['title', 'author', 'published', 'description', 'site_name'];

type JsonObject = { [key: string]: unknown };

/**
 * Merge partial records given in priority order (highest first).
 * Empty strings count as unset.
 */
export function mergeMetadata(...sources: PartialMetadata[]): PartialMetadata {
  const merged: PartialMetadata = {};
  for (const source of sources) {
    for (const field of METADATA_FIELDS) {
      const value = source[field];
      if (!merged[field] && value) merged[field] = value;
    }
  }
  return merged;
}

/** Fill every missing field with an empty string. */
export function finalizeMetadata(partial: PartialMetadata): MetadataRecord {
  return {
    title: partial.title ?? '',
    author: partial.author ?? '',
    published: partial.published ?? '',
    description: partial.description ?? '',
    site_name: partial.site_name ?? '',
  };
}

/* ── JSON-LD ── */

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asText(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number') return String(value);
  return '';
}

/** Name of a person/organization given as a string, an object, or a list of either. */
function entityName(value: unknown): string {
  if (Array.isArray(value)) return value.length > 0 ? entityName(value[0]) : '';
  if (isObject(value)) return asText(value.name);
  return asText(value);
}

/** Flatten top-level arrays and `@graph` containers into a list of nodes. */
function jsonLdNodes(data: unknown): JsonObject[] {
  if (Array.isArray(data)) return data.flatMap(jsonLdNodes);
  if (!isObject(data)) return [];
  const graph = data['@graph'];
  if (Array.isArray(graph)) return [data, ...graph.flatMap(jsonLdNodes)];
  return [data];
}

// Their `name` is an entity name, not the page title
const NON_TITLE_TYPES = new Set(['Person', 'Organization', 'WebSite', 'ImageObject', 'BreadcrumbList', 'ListItem']);

function nodeTypes(node: JsonObject): string[] {
  const type = node['@type'];
  if (Array.isArray(type)) return type.map(asText).filter(Boolean);
  const single = asText(type);
  return single ? [single] : [];
}

function nodeMetadata(node: JsonObject): PartialMetadata {
  const meta: PartialMetadata = {};
  const types = nodeTypes(node);
  const namesEntity = types.some((t) => NON_TITLE_TYPES.has(t));

  const title = asText(node.headline) || (namesEntity ? '' : asText(node.name));
  if (title) meta.title = title;
  const author = entityName(node.author);
  if (author) meta.author = author;
  const published = asText(node.datePublished);
  if (published) meta.published = published;
  if (!namesEntity) {
    const description = asText(node.description);
    if (description) meta.description = description;
  }
  const siteName = entityName(node.publisher) || (types.includes('WebSite') ? asText(node.name) : '');
  if (siteName) meta.site_name = siteName;
  return meta;
}

/**
 * Harvest `<script type="application/ld+json">` blocks in document order.
 * Blocks that are not valid JSON are skipped.
 */
export function harvestJsonLd(document: Document): PartialMetadata {
  const records: PartialMetadata[] = [];
  for (const script of Array.from(document.querySelectorAll('script[type="application/ld+json"]'))) {
    const text = script.textContent?.trim();
    if (!text) continue;
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      continue;
    }
    for (const node of jsonLdNodes(data)) records.push(nodeMetadata(node));
  }
  return mergeMetadata(...records);
}

/* ── <head> meta tags ── */

const META_KEYS: Record<MetadataField, readonly string[]> = {
  title: ['og:title', 'twitter:title'],
  author: ['author', 'article:author', 'twitter:creator'],
  published: ['article:published_time', 'og:article:published_time', 'date', 'pubdate', 'publish-date'],
  description: ['og:description', 'description', 'twitter:description'],
  site_name: ['og:site_name', 'application-name'],
};

function metaContent(document: Document, key: string): string {
  for (const attr of ['property', 'name', 'itemprop']) {
    const value = attrOf(document.querySelector(`meta[${attr}="${key}"]`), 'content');
    if (value) return value;
  }
  return '';
}

export function harvestHeadMeta(document: Document): PartialMetadata {
  const meta: PartialMetadata = {};
  for (const field of METADATA_FIELDS) {
    for (const key of META_KEYS[field]) {
      const value = metaContent(document, key);
      if (value) {
        meta[field] = value;
        break;
      }
    }
  }
  return meta;
}

export function harvestTitleTag(document: Document): PartialMetadata {
  const title = textOf(document.querySelector('title'));
  return title ? { title } : {};
}

/**
 * Harvest the generic sources of a document. `siteFields` are the
 * high-confidence fields from a site rule, if one applied.
 */
export function harvestMetadata(document: Document, siteFields: PartialMetadata = {}): MetadataRecord {
  return finalizeMetadata(
    mergeMetadata(siteFields, harvestJsonLd(document), harvestHeadMeta(document), harvestTitleTag(document)),
  );
}
