import { JSDOM } from 'jsdom';
import type { ExtractionRule, SiteDescriptor } from '../descriptor/schema.js';
import { generateDedupKey } from '../store/dedup.js';
import { logger } from '../shared/logger.js';
import { readableText } from './content.js';

export type RawValue = string | string[];

/**
 * Best-effort field values straight from the page. `null` marks a field whose selector is
 * missing or matched nothing; the validator decides whether that is acceptable.
 */
export type RawRecord = Record<string, RawValue | null>;

export interface ListingItem {
  /** Absolute article URL. */
  url: string;
  externalId: string;
  /** Zero-based position on its listing page. */
  position: number;
  raw: RawRecord;
}

interface ParsedRule {
  selector: string;
  mode: 'text' | 'html' | 'attr';
  attr?: string;
  all: boolean;
}

const RULE_SUFFIX = /^(.*?)::(text|html|attr\(([^)]+)\))$/;

export function parseRule(rule: ExtractionRule): ParsedRule {
  if (typeof rule !== 'string') {
    if (rule.attr) return { selector: rule.selector.trim(), mode: 'attr', attr: rule.attr, all: rule.all };
    return { selector: rule.selector.trim(), mode: rule.html ? 'html' : 'text', all: rule.all };
  }

  const match = RULE_SUFFIX.exec(rule.trim());
  if (!match) return { selector: rule.trim(), mode: 'text', all: false };

  const selector = (match[1] ?? '').trim();
  if (match[3]) return { selector, mode: 'attr', attr: match[3].trim(), all: false };
  return { selector, mode: match[2] === 'html' ? 'html' : 'text', all: false };
}

export function parseDocument(html: string, url: string): Document {
  return new JSDOM(html, { url }).window.document;
}

/**
 * Apply one extraction rule within `scope`. An empty selector or `:scope` targets the scope
 * element itself.
 */
export function applyRule(scope: Document | Element, rule: ExtractionRule, forceAll = false): RawValue | null {
  const parsed = parseRule(rule);
  const all = forceAll || parsed.all;

  let elements: Element[];
  if (parsed.selector === '' || parsed.selector === ':scope') {
    const self = 'documentElement' in scope ? scope.documentElement : scope;
    elements = [self];
  } else if (all) {
    elements = Array.from(scope.querySelectorAll(parsed.selector));
  } else {
    const first = scope.querySelector(parsed.selector);
    elements = first ? [first] : [];
  }

  const values: string[] = [];
  for (const el of elements) {
    const value = readElement(el, parsed);
    if (value !== null) values.push(value);
  }

  if (all) {
    const nonEmpty = values.filter((v) => v.length > 0);
    return nonEmpty.length > 0 ? nonEmpty : null;
  }
  return values[0] ?? null;
}

function readElement(el: Element, rule: ParsedRule): string | null {
  switch (rule.mode) {
    case 'attr':
      return rule.attr ? el.getAttribute(rule.attr) : null;
    case 'html':
      return el.innerHTML;
    case 'text':
      return (el.textContent ?? '').replace(/\s+/g, ' ').trim();
  }
}

/**
 * Resolve a possibly relative reference against the page it was found on.
 */
export function absoluteUrl(href: string, pageUrl: string): string | null {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith('javascript:') || trimmed.startsWith('#')) return null;
  try {
    return new URL(trimmed, pageUrl).href;
  } catch {
    return null;
  }
}

function firstString(value: RawValue | null): string | null {
  if (value === null) return null;
  return typeof value === 'string' ? value : (value[0] ?? null);
}

/**
 * Item references on a listing page, in page order. Entries without a resolvable link are
 * skipped: there is no detail page to fetch for them.
 */
export function extractListing(
  descriptor: Readonly<SiteDescriptor>,
  document: Document,
  pageUrl: string,
): ListingItem[] {
  const { selectors } = descriptor;
  const items: ListingItem[] = [];
  const elements = Array.from(document.querySelectorAll(selectors.item));

  elements.forEach((el, position) => {
    const href = firstString(applyRule(el, selectors.url));
    const url = href ? absoluteUrl(href, pageUrl) : null;
    if (!url) {
      logger.debug({ pageUrl, position }, 'Listing entry without a usable link');
      return;
    }

    const image = selectors.image ? firstString(applyRule(el, selectors.image)) : null;
    const raw = {
      url,
      title: applyRule(el, selectors.title),
      date: selectors.date ? applyRule(el, selectors.date) : null,
      guid: selectors.guid ? applyRule(el, selectors.guid) : null,
      image: image ? absoluteUrl(image, pageUrl) : null,
    } satisfies RawRecord;

    const title = firstString(raw['title']) ?? '';
    items.push({
      url,
      position,
      raw,
      externalId: generateDedupKey({
        guid: firstString(raw['guid']) ?? undefined,
        title,
        url,
        canonical_url: url,
        published_at: firstString(raw['date']) ?? undefined,
        domain: new URL(url).hostname,
      }),
    });
  });

  return items;
}

/**
 * Detail-page fields for one article. Pure: reads the document, never fetches.
 */
export function extract(descriptor: Readonly<SiteDescriptor>, document: Document, pageUrl: string): RawRecord {
  const { selectors } = descriptor;

  const canonical = firstString(applyRule(document, 'link[rel="canonical"]::attr(href)'));
  const image = selectors.image ? firstString(applyRule(document, selectors.image)) : null;

  const raw: RawRecord = {
    title: selectors.article_title ? applyRule(document, selectors.article_title) : null,
    date: selectors.article_date ? applyRule(document, selectors.article_date) : null,
    body: selectors.article_body ? applyRule(document, selectors.article_body, true) : null,
    tags: selectors.tags ? applyRule(document, selectors.tags, true) : null,
    image: image ? absoluteUrl(image, pageUrl) : null,
    canonical_url: canonical ? absoluteUrl(canonical, pageUrl) : null,
  };

  for (const [field, rule] of Object.entries(descriptor.fields)) {
    raw[field] = applyRule(document, rule);
  }

  if (!selectors.article_body) {
    raw['body'] = readableText(document);
  }

  return raw;
}
