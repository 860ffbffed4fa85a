import { sha1 } from '../shared/utils.js';

/**
 * Normalize a URL for dedup comparison:
 * - Strip trailing slashes
 * - Remove www. prefix
 * - Remove common tracking params (utm_*, fbclid, etc.)
 * - Sort remaining query params
 * - Lowercase scheme + host
 */
export function normalizeUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    return raw.trim();
  }

  url.protocol = url.protocol.toLowerCase();
  url.hostname = url.hostname.toLowerCase();

  if (url.hostname.startsWith('www.')) {
    url.hostname = url.hostname.slice(4);
  }

  const trackingPrefixes = ['utm_', 'fbclid', 'gclid', 'mc_', 'mkt_', '_ga'];
  const keysToRemove: string[] = [];
  for (const key of url.searchParams.keys()) {
    if (trackingPrefixes.some((p) => key.toLowerCase().startsWith(p))) {
      keysToRemove.push(key);
    }
  }
  for (const key of keysToRemove) {
    url.searchParams.delete(key);
  }

  url.searchParams.sort();

  let pathname = url.pathname;
  while (pathname.length > 1 && pathname.endsWith('/')) {
    pathname = pathname.slice(0, -1);
  }
  if (pathname === '/') {
    pathname = '';
  }

  const search = url.searchParams.toString();
  return `${url.protocol}//${url.hostname}${url.port ? ':' + url.port : ''}${pathname}${search ? '?' + search : ''}`;
}

export interface DedupInput {
  guid?: string;
  title: string;
  url?: string;
  canonical_url?: string;
  published_at?: string;
  domain?: string;
}

/**
 * Dedup key with priority: guid > canonical_url > hash(title+date+domain).
 * Content-derived only, so a rerun computes the same key for the same article.
 */
export function generateDedupKey(item: DedupInput): string {
  if (item.guid && item.guid.trim()) {
    return `guid:${item.guid.trim()}`;
  }
  if (item.canonical_url) {
    return `url:${normalizeUrl(item.canonical_url)}`;
  }
  return `hash:${sha1(item.title + (item.published_at ?? '') + (item.domain ?? ''))}`;
}

export interface Keyed {
  external_id: string;
}

/**
 * The set of external ids already persisted for one source, plus ids claimed by workers of
 * the current run. Every check-and-update runs synchronously, so two workers can never both
 * claim one id.
 */
export class DedupTracker {
  private readonly seen: Set<string>;
  private readonly pending = new Set<string>();

  constructor(
    public readonly sourceId: string,
    initial: Iterable<string> = [],
  ) {
    this.seen = new Set(initial);
  }

  get size(): number {
    return this.seen.size;
  }

  has(externalId: string): boolean {
    return this.seen.has(externalId) || this.pending.has(externalId);
  }

  isNew(record: Keyed): boolean {
    return !this.has(record.external_id);
  }

  /**
   * Reserve an id for processing. Returns false when it is already seen or claimed.
   */
  claim(externalId: string): boolean {
    if (this.has(externalId)) return false;
    this.pending.add(externalId);
    return true;
  }

  release(externalId: string): void {
    this.pending.delete(externalId);
  }

  markSeen(record: Keyed): void {
    this.pending.delete(record.external_id);
    this.seen.add(record.external_id);
  }
}
