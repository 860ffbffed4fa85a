import { z } from 'zod';
import type { SiteDescriptor } from '../descriptor/schema.js';
import type { ListingItem, RawRecord, RawValue } from '../extract/extractor.js';
import { contentStats } from '../extract/content.js';
import { ValidationError } from '../shared/errors.js';
import { applyCleaning, cleanTitle, joinBody, normalizeDate, normalizeTags } from './cleaning.js';

export interface ValidationContext {
  descriptor: Readonly<SiteDescriptor>;
  fetchedAt: string;
  /** Earliest acceptable publication date, YYYY-MM-DD. */
  minDate: string;
  maxFutureDays: number;
  now?: Date;
}

const absoluteHttpUrl = z
  .string()
  .url('must be a well-formed absolute URL')
  .refine((u) => /^https?:\/\//i.test(u), 'must be an http(s) URL');

function publishedAtSchema(ctx: ValidationContext) {
  const now = ctx.now ?? new Date();
  const latest = new Date(now.getTime() + ctx.maxFutureDays * 86_400_000).toISOString().slice(0, 10);
  return z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'must be a calendar date')
    .refine((d) => d >= ctx.minDate, `must not be earlier than ${ctx.minDate}`)
    .refine((d) => d <= latest, `must not be later than ${latest}`)
    .nullable();
}

function articleSchema(ctx: ValidationContext) {
  return z
    .object({
      source_id: z.string().min(1),
      external_id: z.string().trim().min(1, 'is required'),
      url: absoluteHttpUrl,
      title: z.string().trim().min(1, 'is required'),
      body: z.string(),
      tags: z.array(z.string()),
      published_at: publishedAtSchema(ctx),
      fetched_at: z.string().datetime({ offset: true }),
      image: absoluteHttpUrl.nullable(),
      country: z.string().length(2),
      word_count: z.number().int().min(0),
      lang: z.string().nullable(),
      content_hash: z.string().nullable(),
      raw_fields: z.record(z.union([z.string(), z.array(z.string())])),
    })
    .strict();
}

function thumbnailSchema(ctx: ValidationContext) {
  return z.object({
    source_id: z.string().min(1),
    external_id: z.string().trim().min(1, 'is required'),
    url: absoluteHttpUrl,
    title: z.string().trim().min(1, 'is required'),
    date: publishedAtSchema(ctx),
    image: absoluteHttpUrl.nullable(),
    listing_url: absoluteHttpUrl,
    discovered_at: z.string().datetime({ offset: true }),
  });
}

export type ArticleRecord = z.infer<ReturnType<typeof articleSchema>>;
export type ThumbnailRecord = z.infer<ReturnType<typeof thumbnailSchema>>;

const CORE_FIELDS = new Set(['external_id', 'url', 'title', 'date', 'body', 'tags', 'image']);

function text(value: RawValue | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  return typeof value === 'string' ? value : value.join(' ');
}

function coerceDate(value: RawValue | null | undefined): string | null {
  const raw = text(value)?.trim();
  if (!raw) return null;
  const normalized = normalizeDate(raw);
  if (!normalized) {
    throw new ValidationError('published_at', `unparseable date "${raw}"`);
  }
  return normalized;
}

function raise(error: z.ZodError): never {
  const issue = error.issues[0];
  const field = issue ? String(issue.path[0] ?? 'record') : 'record';
  throw new ValidationError(field, issue?.message ?? 'invalid record', {
    issues: error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
  });
}

/**
 * Turn a candidate record into an ArticleRecord, or throw ValidationError naming the first
 * field that fails. Descriptor cleaners run first, then the standard coercions.
 */
export function validate(raw: RawRecord, ctx: ValidationContext): ArticleRecord {
  const { descriptor } = ctx;
  const cleaned = applyCleaning(raw, descriptor.cleaning, { baseUrl: descriptor.base_url });

  const raw_fields: Record<string, RawValue> = {};
  for (const [key, value] of Object.entries(cleaned)) {
    if (!CORE_FIELDS.has(key) && value !== null) raw_fields[key] = value;
  }

  const body = joinBody(cleaned['body'] ?? null);
  const stats = contentStats(body);

  const candidate = {
    source_id: descriptor.source_id,
    external_id: text(cleaned['external_id']) ?? '',
    url: text(cleaned['url']) ?? '',
    title: cleanTitle(text(cleaned['title']) ?? ''),
    body,
    tags: normalizeTags(cleaned['tags'] ?? null),
    published_at: coerceDate(cleaned['date']),
    fetched_at: ctx.fetchedAt,
    image: text(cleaned['image']),
    country: descriptor.country,
    word_count: stats.word_count,
    lang: stats.lang,
    content_hash: stats.content_hash,
    raw_fields,
  };

  const result = articleSchema(ctx).safeParse(candidate);
  if (!result.success) raise(result.error);
  return result.data;
}

export function validateThumbnail(
  item: ListingItem,
  listingUrl: string,
  ctx: ValidationContext,
): ThumbnailRecord {
  const { descriptor } = ctx;
  const cleaned = applyCleaning(item.raw, descriptor.cleaning, { baseUrl: descriptor.base_url });

  const result = thumbnailSchema(ctx).safeParse({
    source_id: descriptor.source_id,
    external_id: item.externalId,
    url: item.url,
    title: cleanTitle(text(cleaned['title']) ?? ''),
    date: coerceDate(cleaned['date']),
    image: text(cleaned['image']),
    listing_url: listingUrl,
    discovered_at: ctx.fetchedAt,
  });
  if (!result.success) raise(result.error);
  return result.data;
}
