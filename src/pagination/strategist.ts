import { listingTemplates, type SiteDescriptor } from '../descriptor/schema.js';
import { absoluteUrl, applyRule, type ListingItem } from '../extract/extractor.js';
import { normalizeUrl } from '../store/dedup.js';
import { PaginationCycleError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface PageReference {
  url: string;
  /** Template strategy only. */
  pageNumber?: number;
  /** Template strategy only: index of the url template, omitted for the first. */
  template?: number;
  /** Token strategy only: the token this page was requested with. */
  token?: string;
  /** Archive strategy only: the period this page covers, as YYYY-MM-DD. */
  date?: string;
}

export interface ListingPage {
  ref: PageReference;
  items: ListingItem[];
  document: Document;
  headers: Record<string, string>;
  nextPage: PageReference | null;
  /** Set by the Paginator when the page only repeats the one before it. */
  repeated?: boolean;
}

export type HaltReason = 'end_of_history' | 'cycle' | 'max_pages' | 'cancelled' | 'listing_failed';

type ArchiveRule = Extract<SiteDescriptor['pagination'], { type: 'archive' }>;

const DAY_MS = 86_400_000;

function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (whole, key: string) => values[key] ?? whole);
}

function templateRef(descriptor: Readonly<SiteDescriptor>, index: number, num: number): PageReference | null {
  const template = listingTemplates(descriptor)[index];
  if (template === undefined) return null;
  return {
    url: fillTemplate(template, { num: String(num) }),
    pageNumber: num,
    ...(index > 0 ? { template: index } : {}),
  };
}

/** First page of the url template after the one `ref` belongs to. */
function nextTemplate(descriptor: Readonly<SiteDescriptor>, ref: PageReference): PageReference | null {
  return templateRef(descriptor, (ref.template ?? 0) + 1, descriptor.listing.start_page);
}

function periodOf(date: Date, rule: ArchiveRule): Date {
  const day = rule.date_format === 'monthly' ? 1 : date.getUTCDate();
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), day));
}

function shiftPeriod(date: Date, rule: ArchiveRule, n: number): Date {
  return rule.date_format === 'monthly'
    ? new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + n, 1))
    : new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate() + n));
}

function periodsBetween(from: Date, to: Date, rule: ArchiveRule): number {
  return rule.date_format === 'monthly'
    ? (to.getUTCFullYear() - from.getUTCFullYear()) * 12 + to.getUTCMonth() - from.getUTCMonth()
    : Math.round((to.getTime() - from.getTime()) / DAY_MS);
}

function parseDay(day: string): Date {
  return new Date(`${day}T00:00:00Z`);
}

function archiveBounds(rule: ArchiveRule, now: Date): { start: Date; end: Date } {
  return {
    start: periodOf(parseDay(rule.start_date), rule),
    end: periodOf(rule.end_date ? parseDay(rule.end_date) : now, rule),
  };
}

function archiveRef(descriptor: Readonly<SiteDescriptor>, rule: ArchiveRule, period: Date): PageReference {
  const two = (n: number): string => (rule.pad ? String(n).padStart(2, '0') : String(n));
  return {
    url: fillTemplate(listingTemplates(descriptor)[0], {
      year: String(period.getUTCFullYear()),
      month: two(period.getUTCMonth() + 1),
      day: two(period.getUTCDate()),
    }),
    date: period.toISOString().slice(0, 10),
  };
}

/**
 * The first listing page of a run. An archive bounded by `maxPages` starts at the most recent
 * `maxPages` periods.
 */
export function firstPage(
  descriptor: Readonly<SiteDescriptor>,
  maxPages = Number.POSITIVE_INFINITY,
  now: Date = new Date(),
): PageReference {
  const { listing, pagination } = descriptor;
  const [template] = listingTemplates(descriptor);

  switch (pagination.type) {
    case 'template':
      if (listing.start_url) {
        return { url: listing.start_url, pageNumber: listing.start_page - listing.step };
      }
      return {
        url: fillTemplate(template, { num: String(listing.start_page) }),
        pageNumber: listing.start_page,
      };
    case 'link':
      return {
        url: listing.start_url ?? fillTemplate(template, { num: String(listing.start_page) }),
      };
    case 'token':
      return { url: listing.start_url ?? template };
    case 'archive': {
      const { start, end } = archiveBounds(pagination, now);
      const skip = Math.max(0, periodsBetween(start, end, pagination) + 1 - maxPages);
      return archiveRef(descriptor, pagination, shiftPeriod(start, pagination, skip));
    }
  }
}

function readToken(descriptor: Readonly<SiteDescriptor>, page: ListingPage): string | null {
  const { pagination } = descriptor;
  if (pagination.type !== 'token') return null;

  if (pagination.token_selector) {
    const value = applyRule(page.document, pagination.token_selector);
    const token = (typeof value === 'string' ? value : value?.[0])?.trim();
    if (token) return token;
  }
  if (pagination.token_header) {
    const token = page.headers[pagination.token_header.toLowerCase()]?.trim();
    if (token) return token;
  }
  return null;
}

/**
 * Infer the next listing page, or null at end of history. Stateless: cycle detection across
 * a run is the Paginator's job.
 */
export function nextPage(
  descriptor: Readonly<SiteDescriptor>,
  page: ListingPage,
  now: Date = new Date(),
): PageReference | null {
  const { listing, pagination } = descriptor;

  switch (pagination.type) {
    case 'template': {
      if (page.items.length === 0) return nextTemplate(descriptor, page.ref);
      const current = page.ref.pageNumber ?? listing.start_page;
      return templateRef(descriptor, page.ref.template ?? 0, current + listing.step);
    }

    case 'link': {
      const value = applyRule(page.document, pagination.next_selector);
      const href = typeof value === 'string' ? value : value?.[0];
      const url = href ? absoluteUrl(href, page.ref.url) : null;
      return url ? { url } : null;
    }

    case 'token': {
      const token = readToken(descriptor, page);
      if (!token || token === pagination.token_sentinel) return null;
      const [template] = listingTemplates(descriptor);
      if (template.includes('{token}')) {
        return { url: fillTemplate(template, { token: encodeURIComponent(token) }), token };
      }
      const url = new URL(template);
      url.searchParams.set(pagination.token_param, token);
      return { url: url.href, token };
    }

    case 'archive':
      // Archive periods are independent: an empty period does not end the walk.
      return nextArchive(descriptor, pagination, page.ref, now);
  }
}

function nextArchive(
  descriptor: Readonly<SiteDescriptor>,
  rule: ArchiveRule,
  ref: PageReference,
  now: Date,
): PageReference | null {
  if (!ref.date) return null;
  const { end } = archiveBounds(rule, now);
  const next = shiftPeriod(parseDay(ref.date), rule, 1);
  return next.getTime() > end.getTime() ? null : archiveRef(descriptor, rule, next);
}

/**
 * Per-run pagination cursor. Halts on end of history, on the max-pages bound, and on a cycle:
 * a reference already visited in this run, or a page whose first item repeats the previous
 * page's first item. With several url templates, the end of one moves on to the next.
 */
export class Paginator {
  private readonly visited = new Set<string>();
  private previousFirstItem: string | null = null;
  private fetched = 0;
  private halt: HaltReason | null = null;
  private deferred: PageReference | null = null;

  constructor(
    private readonly descriptor: Readonly<SiteDescriptor>,
    private readonly maxPages: number,
  ) {}

  get pagesVisited(): number {
    return this.fetched;
  }

  get haltReason(): HaltReason | null {
    return this.halt;
  }

  /** The reference the max-pages bound stopped short of, for a later resumed run. */
  get remaining(): PageReference | null {
    return this.deferred;
  }

  start(from?: PageReference): PageReference {
    const ref = from ?? firstPage(this.descriptor, this.maxPages);
    this.visited.add(normalizeUrl(ref.url));
    return ref;
  }

  /**
   * Record `page` as fetched and return the reference to fetch next, or null to stop.
   * Throws PaginationCycleError when the strategy leads back into this run's history.
   */
  advance(page: ListingPage): PageReference | null {
    this.fetched++;
    page.nextPage = null;

    const first = page.items[0]?.externalId;
    const marker = first === undefined ? null : `${page.ref.template ?? 0}|${first}`;
    if (this.descriptor.pagination.type === 'template' && marker !== null && marker === this.previousFirstItem) {
      page.repeated = true;
      const following = nextTemplate(this.descriptor, page.ref);
      if (!following) {
        this.halt = 'cycle';
        throw new PaginationCycleError(`Listing page repeats the previous page: ${page.ref.url}`, {
          url: page.ref.url,
          firstItem: first,
        });
      }
      page.nextPage = this.proceed(page.ref, following);
      return page.nextPage;
    }
    this.previousFirstItem = marker;

    page.nextPage = this.proceed(page.ref, nextPage(this.descriptor, page));
    return page.nextPage;
  }

  /**
   * Step past a listing page the site reports as gone. A numbered listing ends there once a
   * page of the run was read, moving on to its next url template if any; an archive period
   * without a page is skipped. Returns undefined when the gap cannot be stepped over.
   */
  skipMissing(ref: PageReference): PageReference | null | undefined {
    const rule = this.descriptor.pagination;
    switch (rule.type) {
      case 'archive':
        this.fetched++;
        return this.proceed(ref, nextArchive(this.descriptor, rule, ref, new Date()));
      case 'template':
        if (this.fetched === 0) return undefined;
        return this.proceed(ref, nextTemplate(this.descriptor, ref));
      default:
        return undefined;
    }
  }

  private proceed(from: PageReference, next: PageReference | null): PageReference | null {
    if (!next) {
      this.halt = 'end_of_history';
      return null;
    }

    const key = normalizeUrl(next.url);
    if (this.visited.has(key)) {
      this.halt = 'cycle';
      throw new PaginationCycleError(`Pagination leads back to a visited page: ${next.url}`, {
        from: from.url,
        to: next.url,
      });
    }

    if (this.fetched >= this.maxPages) {
      this.halt = 'max_pages';
      this.deferred = next;
      logger.info({ source: this.descriptor.source_id, maxPages: this.maxPages }, 'Reached max pages');
      return null;
    }

    this.visited.add(key);
    return next;
  }
}
