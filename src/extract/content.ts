import { Readability } from '@mozilla/readability';
import { franc } from 'franc-min';
import { sha1 } from '../shared/utils.js';

export interface ContentStats {
  word_count: number;
  lang: string | null;
  content_hash: string | null;
}

/**
 * Strip HTML tags and decode common entities.
 */
export function stripHtml(html: string): string {
  let text = html.replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, '');
  text = text.replace(/<[^>]+>/g, ' ');
  text = decodeEntities(text);
  return text.replace(/\s+/g, ' ').trim();
}

export function decodeEntities(text: string): string {
  return text
    .replace(/&nbsp;/g, ' ')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;|&#039;|&apos;/g, "'")
    .replace(/&#(\d+);/g, (_, code: string) => String.fromCodePoint(Number(code)))
    .replace(/&amp;/g, '&');
}

/**
 * Detect language from text. Maps ISO 639-3 to short codes.
 */
export function detectLanguage(text: string): string | null {
  if (!text || text.length < 20) return null;

  const iso3 = franc(text);
  if (iso3 === 'und') return null;

  const map: Record<string, string> = {
    eng: 'en',
    fra: 'fr',
    deu: 'de',
    spa: 'es',
    por: 'pt',
    cmn: 'zh',
    zho: 'zh',
    jpn: 'ja',
    smo: 'sm',
    ton: 'to',
    fij: 'fj',
    bis: 'bi',
    tpi: 'tpi',
  };

  return map[iso3] ?? iso3;
}

const CJK_REGEX = /[\u4e00-\u9fff\u3400-\u4dbf\uf900-\ufaff]/;

/**
 * Count words. Uses whitespace split for Latin, character count for CJK.
 */
export function countWords(text: string): number {
  if (!text) return 0;

  if (CJK_REGEX.test(text)) {
    const cjkChars = text.match(/[\u4e00-\u9fff\u3400-\u4dbf\uf900-\ufaff]/g) ?? [];
    const latinWords = text
      .replace(/[\u4e00-\u9fff\u3400-\u4dbf\uf900-\ufaff]/g, ' ')
      .split(/\s+/)
      .filter((w) => w.length > 0);
    return cjkChars.length + latinWords.length;
  }

  return text.split(/\s+/).filter((w) => w.length > 0).length;
}

export function contentStats(text: string): ContentStats {
  const word_count = countWords(text);
  return {
    word_count,
    lang: detectLanguage(text),
    content_hash: text ? sha1(text) : null,
  };
}

/**
 * Main article text via Readability. Readability rewrites the DOM it is given, so call this
 * after every selector has run on the document.
 */
export function readableText(document: Document): string | null {
  const article = new Readability(document).parse();
  const text = article?.textContent?.replace(/\s+/g, ' ').trim();
  return text ? text : null;
}
