import type { Logger } from 'pino';
import type { Config } from '../shared/config.js';
import type { SiteDescriptor } from '../descriptor/schema.js';
import type { FetchClient } from '../fetch/client.js';
import { extract, extractListing, parseDocument, type ListingItem, type RawRecord } from '../extract/extractor.js';
import { Paginator, type HaltReason, type ListingPage, type PageReference } from '../pagination/strategist.js';
import { validate, validateThumbnail, type ArticleRecord, type ThumbnailRecord, type ValidationContext } from '../validate/record.js';
import { DedupTracker } from '../store/dedup.js';
import { emptyCounts, latestManifest, loadSeenIds, type RunCounts, type RunError, type RunManifest } from '../store/manifest.js';
import { StorageWriter } from '../store/writer.js';
import {
  PaginationCycleError,
  PermanentFetchError,
  RunCancelledError,
  ValidationError,
  errorCode,
  errorMessage,
} from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { generateId, nowISO } from '../shared/utils.js';
import { withConcurrency } from './pool.js';

export type RunState = 'INIT' | 'LISTING' | 'DETAIL_FETCH' | 'PERSIST' | 'DONE' | 'FAILED';

export interface SourceRunOptions {
  storageRoot: string;
  dryRun?: boolean;
  /** Lowers the descriptor/config page bound for this run only. */
  maxPages?: number;
  /** Continue from the cursor of a prior run that did not finish. */
  resume?: boolean;
  signal?: AbortSignal;
  runId?: string;
}

export interface RunContext {
  config: Config;
  client: FetchClient;
}

/**
 * Listing fields fill the gaps the detail page leaves. The listing's external id and URL
 * always win so that a rerun derives the same id before any detail fetch.
 */
export function mergeRaw(item: ListingItem, detail: RawRecord): RawRecord {
  const merged: RawRecord = { ...item.raw };
  for (const [key, value] of Object.entries(detail)) {
    if (value !== null) merged[key] = value;
    else if (!(key in merged)) merged[key] = null;
  }
  merged['external_id'] = item.externalId;
  merged['url'] = item.url;
  return merged;
}

/**
 * The descriptor's request headers, with its cookies folded into one Cookie header.
 */
export function requestHeaders(descriptor: Readonly<SiteDescriptor>): Record<string, string> {
  const headers: Record<string, string> = { ...descriptor.headers };
  const cookies = Object.entries(descriptor.cookies).map(([name, value]) => `${name}=${value}`);
  if (cookies.length > 0) headers['Cookie'] = cookies.join('; ');
  return headers;
}

export function effectiveMaxPages(descriptor: Readonly<SiteDescriptor>, config: Config, override?: number): number {
  const bound = descriptor.max_pages ?? config.crawl.max_pages;
  return override !== undefined ? Math.min(override, bound) : bound;
}

/**
 * One crawl of one source: INIT, LISTING and DETAIL_FETCH alternating page by page, PERSIST,
 * then DONE or FAILED. Always resolves with the run's manifest; only per-source failures are
 * reported through it.
 */
export class SourceRun {
  readonly runId: string;
  private state: RunState = 'INIT';
  private readonly log: Logger;
  private readonly counts: RunCounts = emptyCounts();
  private readonly errors: RunError[] = [];
  private readonly articles: ArticleRecord[] = [];
  private readonly thumbnails: ThumbnailRecord[] = [];
  private tracker: DedupTracker;
  private lastSeenExternalId: string | null = null;
  private lastPage: PageReference | null = null;
  private cursor: PageReference | null = null;
  private haltReason: HaltReason | null = null;
  private failure: string | undefined;
  private readonly outputs: RunManifest['outputs'] = { article: null, thumbnail: null, metadata: null };
  private readonly startedAt = new Date();
  private readonly headers: Record<string, string>;

  constructor(
    private readonly descriptor: Readonly<SiteDescriptor>,
    private readonly ctx: RunContext,
    private readonly options: SourceRunOptions,
  ) {
    this.runId = options.runId ?? generateId(12);
    this.log = logger.child({ source_id: descriptor.source_id, run_id: this.runId });
    this.tracker = new DedupTracker(descriptor.source_id);
    this.headers = requestHeaders(descriptor);
  }

  get currentState(): RunState {
    return this.state;
  }

  async execute(): Promise<RunManifest> {
    const { descriptor, options } = this;
    const writer = new StorageWriter(options.storageRoot, descriptor.source_id, this.runId, this.startedAt);

    let start: PageReference | undefined;
    try {
      start = await this.init();
    } catch (err) {
      this.fail('init', descriptor.base_url, err);
      return this.finish(writer);
    }

    await this.crawl(start);
    await this.persist(writer);
    return this.finish(writer);
  }

  private transition(next: RunState): void {
    this.log.debug({ from: this.state, to: next }, 'State transition');
    this.state = next;
  }

  private async init(): Promise<PageReference | undefined> {
    const { descriptor, options, ctx } = this;

    const host = new URL(descriptor.base_url).hostname;
    const { min_delay_ms, max_concurrent } = descriptor.rate_limit;
    if (min_delay_ms !== undefined || max_concurrent !== undefined) {
      ctx.client.configureHost(host, {
        ...(min_delay_ms !== undefined ? { minDelayMs: min_delay_ms } : {}),
        ...(max_concurrent !== undefined ? { maxConcurrent: max_concurrent } : {}),
      });
    }

    const [prior, seen] = await Promise.all([
      latestManifest(options.storageRoot, descriptor.source_id),
      loadSeenIds(options.storageRoot, descriptor.source_id),
    ]);
    this.tracker = new DedupTracker(descriptor.source_id, seen);

    if (options.resume && prior?.cursor && isUnfinished(prior)) {
      this.log.info({ priorRun: prior.run_id, from: prior.cursor.url }, 'Resuming unfinished run');
      return prior.cursor;
    }
    return undefined;
  }

  private async crawl(start: PageReference | undefined): Promise<void> {
    const { descriptor, ctx, options } = this;
    const signal = options.signal;
    const paginator = new Paginator(descriptor, effectiveMaxPages(descriptor, ctx.config, options.maxPages));
    let ref: PageReference | null = paginator.start(start);

    while (ref) {
      this.transition('LISTING');
      this.cursor = ref;
      if (signal?.aborted) {
        this.haltReason = 'cancelled';
        return;
      }

      let page: ListingPage;
      try {
        const result = await ctx.client.fetch({ url: ref.url, headers: this.headers }, signal);
        const document = parseDocument(result.body, result.finalUrl);
        page = {
          ref,
          items: extractListing(descriptor, document, result.finalUrl),
          document,
          headers: result.headers,
          nextPage: null,
        };
      } catch (err) {
        if (err instanceof RunCancelledError) {
          this.haltReason = 'cancelled';
          return;
        }
        const following: PageReference | null | undefined = isGone(err) ? this.stepOverMissing(paginator, ref) : undefined;
        if (following === undefined) {
          this.haltReason = 'listing_failed';
          this.fail('listing', ref.url, err);
          return;
        }
        this.log.info({ url: ref.url, err: errorMessage(err) }, 'Listing page gone, moving on');
        this.cursor = following ?? paginator.remaining;
        this.haltReason = paginator.haltReason;
        ref = following;
        continue;
      }

      this.counts.pages++;
      this.lastPage = ref;
      this.log.info({ url: ref.url, items: page.items.length }, 'Listing page');

      let next: PageReference | null = null;
      try {
        next = paginator.advance(page);
      } catch (err) {
        if (!(err instanceof PaginationCycleError)) {
          this.haltReason = 'listing_failed';
          this.fail('listing', ref.url, err);
          return;
        }
        this.log.warn({ url: ref.url, err: err.message }, 'Pagination cycle, halting traversal');
      }
      const items = page.repeated ? [] : page.items;

      if (items.length > 0) {
        this.transition('DETAIL_FETCH');
        const listingUrl = ref.url;
        await withConcurrency(
          items,
          ctx.config.crawl.detail_concurrency,
          (item) => this.processItem(item, listingUrl),
          signal,
        );
      }

      if (signal?.aborted) {
        this.haltReason = 'cancelled';
        this.cursor = ref;
        return;
      }

      this.cursor = next ?? paginator.remaining;
      this.haltReason = paginator.haltReason;
      ref = next;
    }
  }

  private stepOverMissing(paginator: Paginator, ref: PageReference): PageReference | null | undefined {
    try {
      return paginator.skipMissing(ref);
    } catch (err) {
      if (!(err instanceof PaginationCycleError)) return undefined;
      this.log.warn({ url: ref.url, err: err.message }, 'Pagination cycle, halting traversal');
      return null;
    }
  }

  private validationContext(fetchedAt: string): ValidationContext {
    return {
      descriptor: this.descriptor,
      fetchedAt,
      minDate: this.ctx.config.validation.min_date,
      maxFutureDays: this.ctx.config.validation.max_future_days,
    };
  }

  private async processItem(item: ListingItem, listingUrl: string): Promise<void> {
    if (!this.tracker.claim(item.externalId)) {
      this.counts.duplicate++;
      return;
    }

    let thumbnail: ThumbnailRecord | null = null;
    try {
      thumbnail = validateThumbnail(item, listingUrl, this.validationContext(nowISO()));
    } catch (err) {
      this.log.debug({ url: item.url, err: errorMessage(err) }, 'Listing entry not kept as thumbnail');
    }

    try {
      const result = await this.ctx.client.fetch({ url: item.url, headers: this.headers }, this.options.signal);
      this.counts.fetched++;

      const document = parseDocument(result.body, result.finalUrl);
      const raw = mergeRaw(item, extract(this.descriptor, document, result.finalUrl));
      const record = validate(raw, this.validationContext(result.fetchedAt));

      this.counts.validated++;
      this.articles.push(record);
      if (thumbnail) this.thumbnails.push(thumbnail);
      this.lastSeenExternalId = record.external_id;
    } catch (err) {
      this.tracker.release(item.externalId);
      if (err instanceof RunCancelledError) return;

      if (err instanceof ValidationError) {
        this.counts.rejected++;
        this.errors.push({ url: item.url, stage: 'validate', code: err.code, message: err.message });
        this.log.warn({ url: item.url, field: err.field, reason: err.reason }, 'Record rejected');
        return;
      }

      this.counts.failed++;
      this.errors.push({ url: item.url, stage: 'detail', code: errorCode(err), message: errorMessage(err) });
      this.log.warn({ url: item.url, err: errorMessage(err) }, 'Detail fetch failed');
    }
  }

  private async persist(writer: StorageWriter): Promise<void> {
    this.transition('PERSIST');
    const records = this.articles;

    if (this.options.dryRun) {
      this.counts.new = records.length;
      this.log.info({ articles: records.length, thumbnails: this.thumbnails.length }, 'Dry run, nothing written');
      return;
    }

    try {
      const unit = await writer.write(records, 'article');
      this.outputs.article = unit?.path ?? null;
    } catch (err) {
      for (const record of records) this.tracker.release(record.external_id);
      this.fail('persist', writer.unitPath('article'), err);
      return;
    }
    for (const record of records) this.tracker.markSeen(record);
    this.counts.new = records.length;

    try {
      const unit = await writer.write(this.thumbnails, 'thumbnail');
      this.outputs.thumbnail = unit?.path ?? null;
    } catch (err) {
      this.fail('persist', writer.unitPath('thumbnail'), err);
    }
  }

  private fail(stage: RunError['stage'], url: string, err: unknown): void {
    this.failure = errorMessage(err);
    this.errors.push({ url, stage, code: errorCode(err), message: this.failure });
    this.log.error({ stage, url, err: this.failure }, 'Run failed');
    this.transition('FAILED');
  }

  private async finish(writer: StorageWriter): Promise<RunManifest> {
    const failed = this.failure !== undefined;
    const cancelled = this.haltReason === 'cancelled';
    const dryRun = this.options.dryRun ?? false;
    const written = !dryRun;

    const manifest: RunManifest = {
      run_id: this.runId,
      source_id: this.descriptor.source_id,
      status: failed ? 'failed' : 'done',
      cancelled,
      dry_run: dryRun,
      started_at: this.startedAt.toISOString(),
      ended_at: nowISO(),
      halt_reason: this.haltReason,
      counts: { ...this.counts },
      last_seen_external_id: this.lastSeenExternalId,
      last_seen_page_token: this.lastPage ? (this.lastPage.token ?? this.lastPage.url) : null,
      cursor: cancelled || failed || this.haltReason === 'max_pages' ? this.cursor : null,
      outputs: { ...this.outputs, metadata: written ? writer.unitPath('metadata') : null },
      errors: [...this.errors],
      ...(failed ? { error: this.failure } : {}),
    };

    if (written) {
      try {
        await writer.writeManifest(manifest);
      } catch (err) {
        this.log.error({ err: errorMessage(err) }, 'Manifest write failed');
        manifest.outputs.metadata = null;
      }
    }

    this.transition(failed ? 'FAILED' : 'DONE');
    this.log.info(
      { status: manifest.status, halt: manifest.halt_reason, cancelled, ...manifest.counts },
      'Run complete',
    );
    return manifest;
  }
}

function isGone(err: unknown): boolean {
  return err instanceof PermanentFetchError && (err.status === 404 || err.status === 410);
}

function isUnfinished(manifest: RunManifest): boolean {
  return manifest.status === 'failed' || manifest.cancelled || manifest.halt_reason === 'max_pages';
}

export function runSource(
  descriptor: Readonly<SiteDescriptor>,
  ctx: RunContext,
  options: SourceRunOptions,
): Promise<RunManifest> {
  return new SourceRun(descriptor, ctx, options).execute();
}
