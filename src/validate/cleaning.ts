/**
 * Named cleaners a descriptor can attach to fields, plus the date normalization the
 * validator relies on.
 */

import type { CleanerName } from '../descriptor/schema.js';
import type { RawValue } from '../extract/extractor.js';
import { decodeEntities, stripHtml } from '../extract/content.js';

export interface CleaningContext {
  baseUrl: string;
}

type Cleaner = (value: RawValue | null, ctx: CleaningContext) => RawValue | null;

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

function monthNumber(name: string): number | null {
  const key = name.toLowerCase().slice(0, 3);
  return MONTHS[key] ?? null;
}

function isoDate(year: number, month: number, day: number): string | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  const d = new Date(Date.UTC(year, month - 1, day));
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    return null;
  }
  return d.toISOString().slice(0, 10);
}

/**
 * Strip the decorations news sites put around dates ("Posted: ", "By Jane Doe, ", bullets).
 */
function stripDateNoise(input: string): string {
  let s = decodeEntities(input).replace(/\s+/g, ' ').trim();
  s = s.replace(/^[-•*+|\s]+/, '').replace(/[-•*+|\s]+$/, '').trim();
  s = s.replace(/^(published|posted|date|on|updated|last\s+modified|modified)\s*:?\s+/i, '').trim();
  s = s.replace(/^by\s+[^,]+,\s*/i, '').trim();
  return s;
}

/**
 * Normalize a scraped date string to YYYY-MM-DD. Returns null when no calendar date can be
 * read. All-numeric dates are read day-first unless that is impossible.
 */
export function normalizeDate(input: string): string | null {
  const s = stripDateNoise(input);
  if (!s) return null;

  let m = /^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})(?:[T\s].*)?$/.exec(s);
  if (m) return isoDate(Number(m[1]), Number(m[2]), Number(m[3]));

  m = /^(\d{1,2})[-/.](\d{1,2})[-/.](\d{4})$/.exec(s);
  if (m) {
    const a = Number(m[1]);
    const b = Number(m[2]);
    const year = Number(m[3]);
    if (a > 12) return isoDate(year, b, a);
    if (b > 12) return isoDate(year, a, b);
    return isoDate(year, b, a);
  }

  m = /(\d{1,2})(?:st|nd|rd|th)?[\s-]+([A-Za-z]{3,9})\.?,?[\s-]+(\d{4})/.exec(s);
  if (m) {
    const month = monthNumber(m[2] ?? '');
    if (month) return isoDate(Number(m[3]), month, Number(m[1]));
  }

  m = /([A-Za-z]{3,9})\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})/.exec(s);
  if (m) {
    const month = monthNumber(m[1] ?? '');
    if (month) return isoDate(Number(m[3]), month, Number(m[2]));
  }

  m = /(\d{4})[-/](\d{1,2})[-/](\d{1,2})/.exec(s);
  if (m) return isoDate(Number(m[1]), Number(m[2]), Number(m[3]));

  return null;
}

export function cleanText(text: string): string {
  return decodeEntities(text).replace(/\s+/g, ' ').trim();
}

export function cleanTitle(title: string): string {
  return cleanText(title).replace(/^[\s\-|•]+|[\s\-|•]+$/g, '');
}

export function normalizeTags(value: RawValue | null): string[] {
  if (value === null) return [];
  const parts = (typeof value === 'string' ? [value] : value).flatMap((v) => v.split(/[,;|\n]/));
  const tags: string[] = [];
  for (const part of parts) {
    const tag = cleanText(part);
    if (tag && !tags.includes(tag)) tags.push(tag);
  }
  return tags;
}

export function joinBody(value: RawValue | null): string {
  if (value === null) return '';
  const paragraphs = typeof value === 'string' ? [value] : value;
  return paragraphs
    .map((p) => cleanText(p))
    .filter((p) => p.length > 0)
    .join('\n\n');
}

function mapText(value: RawValue | null, fn: (s: string) => string): RawValue | null {
  if (value === null) return null;
  return typeof value === 'string' ? fn(value) : value.map(fn);
}

const CLEANERS: Record<CleanerName, Cleaner> = {
  clean_title: (v) => mapText(v, cleanTitle),
  clean_html_text: (v) => mapText(v, stripHtml),
  normalize_date: (v) => mapText(v, (s) => normalizeDate(s) ?? s),
  normalize_tags: (v) => normalizeTags(v),
  clean_url: (v, ctx) =>
    mapText(v, (s) => {
      try {
        return new URL(s.trim(), ctx.baseUrl).href;
      } catch {
        return s.trim();
      }
    }),
  join_body: (v) => joinBody(v),
};

export function applyCleaning(
  raw: Record<string, RawValue | null>,
  cleaning: Readonly<Record<string, CleanerName>>,
  ctx: CleaningContext,
): Record<string, RawValue | null> {
  const cleaned = { ...raw };
  for (const [field, name] of Object.entries(cleaning)) {
    if (field in cleaned) {
      cleaned[field] = CLEANERS[name](cleaned[field] ?? null, ctx);
    }
  }
  return cleaned;
}
