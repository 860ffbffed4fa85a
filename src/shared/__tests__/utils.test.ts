import { describe, it, expect } from 'vitest';
import fs from 'node:fs';
import { homedir } from 'node:os';
import path from 'node:path';
import { resolvePath, sha1, generateId, nowISO, fileStamp, getPackageRoot, sleep } from '../utils.js';
import { RunCancelledError } from '../errors.js';

describe('resolvePath', () => {
  it('expands ~ to home directory', () => {
    const result = resolvePath('~/test');
    expect(result).toBe(path.join(homedir(), 'test'));
  });

  it('expands bare ~ to home directory', () => {
    const result = resolvePath('~');
    expect(result).toBe(path.join(homedir(), ''));
  });

  it('resolves relative paths', () => {
    const result = resolvePath('./foo/bar');
    expect(path.isAbsolute(result)).toBe(true);
  });

  it('returns absolute paths as-is', () => {
    const result = resolvePath('/absolute/path');
    expect(result).toBe('/absolute/path');
  });
});

describe('sha1', () => {
  it('produces consistent 40-char hex', () => {
    const hash = sha1('hello');
    expect(hash).toHaveLength(40);
    expect(hash).toMatch(/^[a-f0-9]+$/);
  });

  it('produces same hash for same input', () => {
    expect(sha1('test')).toBe(sha1('test'));
  });

  it('produces different hash for different input', () => {
    expect(sha1('a')).not.toBe(sha1('b'));
  });
});

describe('generateId', () => {
  it('generates string of default length', () => {
    expect(generateId()).toHaveLength(21);
  });

  it('generates string of custom length', () => {
    expect(generateId(10)).toHaveLength(10);
  });

  it('generates unique IDs', () => {
    expect(generateId()).not.toBe(generateId());
  });
});

describe('nowISO', () => {
  it('returns an ISO 8601 UTC timestamp', () => {
    expect(nowISO()).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });
});

describe('fileStamp', () => {
  it('drops separators from the ISO form', () => {
    expect(fileStamp(new Date('2024-01-31T08:15:02.123Z'))).toBe('20240131T081502123Z');
  });
});

describe('getPackageRoot', () => {
  it('returns a directory containing package.json', () => {
    const root = getPackageRoot();
    expect(fs.existsSync(path.join(root, 'package.json'))).toBe(true);
  });
});

describe('sleep', () => {
  it('resolves immediately for zero', async () => {
    await expect(sleep(0)).resolves.toBeUndefined();
  });

  it('rejects with RunCancelledError when aborted', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(RunCancelledError);
  });

  it('rejects at once for an already aborted signal', async () => {
    await expect(sleep(10, AbortSignal.abort())).rejects.toBeInstanceOf(RunCancelledError);
  });
});
