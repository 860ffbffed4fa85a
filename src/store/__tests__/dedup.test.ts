import { describe, it, expect } from 'vitest';
import { normalizeUrl, generateDedupKey, DedupTracker } from '../dedup.js';

describe('normalizeUrl', () => {
  it('strips trailing slashes', () => {
    expect(normalizeUrl('https://example.com/')).toBe('https://example.com');
    expect(normalizeUrl('https://example.com/path/')).toBe('https://example.com/path');
  });

  it('removes www. prefix', () => {
    expect(normalizeUrl('https://www.example.com/path')).toBe('https://example.com/path');
  });

  it('lowercases scheme and host', () => {
    expect(normalizeUrl('HTTPS://Example.COM/Path')).toBe('https://example.com/Path');
  });

  it('removes tracking params', () => {
    expect(normalizeUrl('https://example.com/p?utm_source=twitter&utm_medium=cpc&id=1')).toBe(
      'https://example.com/p?id=1',
    );
    expect(normalizeUrl('https://example.com/?fbclid=abc&gclid=def')).toBe('https://example.com');
  });

  it('sorts remaining query params', () => {
    expect(normalizeUrl('https://example.com?z=1&a=2')).toBe('https://example.com?a=2&z=1');
  });

  it('strips hash', () => {
    expect(normalizeUrl('https://example.com/page#section')).toBe('https://example.com/page');
  });

  it('returns unparseable input trimmed', () => {
    expect(normalizeUrl(' not a url ')).toBe('not a url');
  });

  it('preserves port numbers', () => {
    expect(normalizeUrl('https://example.com:8080/path/')).toBe('https://example.com:8080/path');
  });
});

describe('generateDedupKey', () => {
  it('uses guid when present', () => {
    expect(generateDedupKey({ guid: ' abc-123 ', title: 'Test', url: 'https://example.com' })).toBe('guid:abc-123');
  });

  it('falls back to canonical_url when no guid', () => {
    const key = generateDedupKey({
      guid: '  ',
      title: 'Test',
      canonical_url: 'https://www.example.com/page/',
    });
    expect(key).toBe('url:https://example.com/page');
  });

  it('falls back to a content hash', () => {
    const key = generateDedupKey({ title: 'Test Article', published_at: '2024-01-01', domain: 'example.com' });
    expect(key).toMatch(/^hash:[a-f0-9]{40}$/);
    expect(generateDedupKey({ title: 'Test Article', published_at: '2024-01-01', domain: 'example.com' })).toBe(key);
    expect(generateDedupKey({ title: 'Other Article', published_at: '2024-01-01', domain: 'example.com' })).not.toBe(
      key,
    );
  });
});

describe('DedupTracker', () => {
  it('starts from the persisted ids', () => {
    const tracker = new DedupTracker('reef_gazette', ['url:a', 'url:b']);
    expect(tracker.size).toBe(2);
    expect(tracker.isNew({ external_id: 'url:a' })).toBe(false);
    expect(tracker.isNew({ external_id: 'url:c' })).toBe(true);
  });

  it('lets exactly one of many racing workers claim an id', async () => {
    const tracker = new DedupTracker('reef_gazette');
    const winners: number[] = [];

    await Promise.all(
      Array.from({ length: 20 }, async (_, worker) => {
        await new Promise((r) => setTimeout(r, worker % 3));
        if (tracker.claim('url:same')) {
          winners.push(worker);
          await new Promise((r) => setTimeout(r, 5));
          tracker.markSeen({ external_id: 'url:same' });
        }
      }),
    );

    expect(winners).toHaveLength(1);
    expect(tracker.has('url:same')).toBe(true);
  });

  it('frees a released claim', () => {
    const tracker = new DedupTracker('reef_gazette');
    expect(tracker.claim('url:x')).toBe(true);
    expect(tracker.claim('url:x')).toBe(false);
    tracker.release('url:x');
    expect(tracker.claim('url:x')).toBe(true);
  });

  it('moves a claim into the seen set', () => {
    const tracker = new DedupTracker('reef_gazette');
    tracker.claim('url:x');
    expect(tracker.size).toBe(0);
    tracker.markSeen({ external_id: 'url:x' });
    expect(tracker.size).toBe(1);
    tracker.release('url:x');
    expect(tracker.isNew({ external_id: 'url:x' })).toBe(false);
  });
});
