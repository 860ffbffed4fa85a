import { describe, it, expect } from 'vitest';
import { stripHtml, decodeEntities, detectLanguage, countWords, contentStats } from '../content.js';
import { sha1 } from '../../shared/utils.js';

describe('stripHtml', () => {
  it('removes HTML tags', () => {
    expect(stripHtml('<p>Hello <b>world</b></p>')).toBe('Hello world');
  });

  it('removes script and style blocks', () => {
    expect(stripHtml('<script>alert(1)</script><style>.x{}</style><p>text</p>')).toBe('text');
  });

  it('collapses whitespace', () => {
    expect(stripHtml('<p>a</p>\n\n<p>b</p>')).toBe('a b');
  });

  it('handles empty string', () => {
    expect(stripHtml('')).toBe('');
  });
});

describe('decodeEntities', () => {
  it('decodes named and numeric entities', () => {
    expect(decodeEntities('Tom &amp; Jerry &#8211; &quot;live&quot;')).toBe('Tom & Jerry – "live"');
  });

  it('does not double-decode', () => {
    expect(decodeEntities('&amp;lt;')).toBe('&lt;');
  });
});

describe('detectLanguage', () => {
  it('detects English text', () => {
    const text =
      'This is a long English text about technology and innovation in the modern world of computing.';
    expect(detectLanguage(text)).toBe('en');
  });

  it('returns null for very short text', () => {
    expect(detectLanguage('hi')).toBeNull();
  });

  it('returns null for empty text', () => {
    expect(detectLanguage('')).toBeNull();
  });
});

describe('countWords', () => {
  it('counts English words', () => {
    expect(countWords('Hello world foo bar')).toBe(4);
  });

  it('handles empty string', () => {
    expect(countWords('')).toBe(0);
  });

  it('handles multiple whitespace', () => {
    expect(countWords('  a   b   c  ')).toBe(3);
  });
});

describe('contentStats', () => {
  it('derives word count and hash from the text', () => {
    const text = Array.from({ length: 300 }, () => 'word').join(' ');
    const stats = contentStats(text);
    expect(stats.word_count).toBe(300);
    expect(stats.content_hash).toBe(sha1(text));
  });

  it('has no hash for an empty body', () => {
    expect(contentStats('')).toEqual({ word_count: 0, lang: null, content_hash: null });
  });
});
