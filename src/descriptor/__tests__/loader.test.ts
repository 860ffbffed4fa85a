import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  discoverDescriptors,
  findDescriptor,
  parseDescriptorYaml,
} from '../loader.js';
import { ConfigurationError } from '../../shared/errors.js';

const MINIMAL = `
source_id: island_times
name: Island Times
country: fj
base_url: https://islandtimes.example
listing:
  url_template: https://islandtimes.example/news?page={num}
selectors:
  item: article
  title: h2
  url: a::attr(href)
`;

describe('parseDescriptorYaml', () => {
  it('applies defaults and upper-cases the country', () => {
    const d = parseDescriptorYaml(MINIMAL);
    expect(d.country).toBe('FJ');
    expect(d.listing.start_page).toBe(1);
    expect(d.listing.step).toBe(1);
    expect(d.pagination).toEqual({ type: 'template' });
    expect(d.fields).toEqual({});
    expect(d.cleaning).toEqual({});
  });

  it('returns a frozen descriptor', () => {
    const d = parseDescriptorYaml(MINIMAL);
    expect(Object.isFrozen(d)).toBe(true);
    expect(Object.isFrozen(d.selectors)).toBe(true);
  });

  it('rejects a template listing without {num}', () => {
    const yaml = MINIMAL.replace('?page={num}', '');
    expect(() => parseDescriptorYaml(yaml)).toThrow(ConfigurationError);
  });

  it('rejects a three-letter country code', () => {
    expect(() => parseDescriptorYaml(MINIMAL.replace('country: fj', 'country: fji'))).toThrow('Invalid descriptor');
  });

  it('rejects an unknown cleaner name', () => {
    expect(() => parseDescriptorYaml(`${MINIMAL}cleaning:\n  title: shout\n`)).toThrow(ConfigurationError);
  });

  it('accepts link pagination with an object rule', () => {
    const yaml = `${MINIMAL.replace('?page={num}', '')}pagination:\n  type: link\n  next_selector:\n    selector: a.next\n    attr: href\n`;
    const d = parseDescriptorYaml(yaml);
    expect(d.pagination).toEqual({
      type: 'link',
      next_selector: { selector: 'a.next', attr: 'href', html: false, all: false },
    });
  });

  it('requires a token source for token pagination', () => {
    const yaml = `${MINIMAL}pagination:\n  type: token\n`;
    expect(() => parseDescriptorYaml(yaml)).toThrow(ConfigurationError);
  });

  it('accepts several url templates for template pagination', () => {
    const yaml = MINIMAL.replace(
      'url_template: https://islandtimes.example/news?page={num}',
      'url_template:\n    - https://islandtimes.example/news?page={num}\n    - https://islandtimes.example/sport?page={num}',
    );
    expect(parseDescriptorYaml(yaml).listing.url_template).toEqual([
      'https://islandtimes.example/news?page={num}',
      'https://islandtimes.example/sport?page={num}',
    ]);
    expect(() => parseDescriptorYaml(yaml.replace('sport?page={num}', 'sport'))).toThrow(ConfigurationError);
  });

  it('checks archive placeholders and dates', () => {
    const archive = MINIMAL.replace('news?page={num}', '{year}/{month}/');
    const d = parseDescriptorYaml(`${archive}pagination:\n  type: archive\n  start_date: '2024-01-01'\n`);
    expect(d.pagination).toEqual({ type: 'archive', date_format: 'monthly', start_date: '2024-01-01', pad: false });

    expect(() =>
      parseDescriptorYaml(`${archive}pagination:\n  type: archive\n  date_format: daily\n  start_date: '2024-01-01'\n`),
    ).toThrow(ConfigurationError);
    expect(() =>
      parseDescriptorYaml(
        `${archive}pagination:\n  type: archive\n  start_date: '2024-05-01'\n  end_date: '2024-01-01'\n`,
      ),
    ).toThrow(ConfigurationError);
  });

  it('reads request headers and cookies', () => {
    const d = parseDescriptorYaml(`${MINIMAL}headers:\n  Accept-Language: en-FJ\ncookies:\n  consent: 'yes'\n`);
    expect(d.headers).toEqual({ 'Accept-Language': 'en-FJ' });
    expect(d.cookies).toEqual({ consent: 'yes' });
    expect(parseDescriptorYaml(MINIMAL).headers).toEqual({});
  });

  it('rejects malformed YAML', () => {
    expect(() => parseDescriptorYaml('source_id: [unclosed', 'broken.yaml')).toThrow(
      'Descriptor is not valid YAML: broken.yaml',
    );
  });
});

describe('descriptor discovery', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'newsharvest-descriptors-'));
    fs.mkdirSync(path.join(dir, 'fj'));
    fs.mkdirSync(path.join(dir, 'ws'));
    fs.writeFileSync(path.join(dir, 'template.yaml'), MINIMAL);
    fs.writeFileSync(path.join(dir, 'fj', 'template.yaml'), MINIMAL);
    fs.writeFileSync(path.join(dir, 'fj', 'island_times.yaml'), MINIMAL);
    fs.writeFileSync(path.join(dir, 'ws', 'renamed.yaml'), MINIMAL.replace('island_times', 'apia_post'));
    fs.writeFileSync(path.join(dir, 'ws', 'broken.yaml'), 'name: no source id\n');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('walks country directories and skips templates', () => {
    const found = discoverDescriptors(dir);
    expect(found.map((f) => `${f.country}/${f.sourceId}`)).toEqual(['fj/island_times', 'ws/broken', 'ws/renamed']);
  });

  it('returns nothing for a missing directory', () => {
    expect(discoverDescriptors(path.join(dir, 'missing'))).toEqual([]);
  });

  it('finds a descriptor by its parsed source_id', () => {
    expect(findDescriptor(dir, 'island_times').name).toBe('Island Times');
    expect(findDescriptor(dir, 'apia_post').source_id).toBe('apia_post');
  });

  it('throws ConfigurationError for an unknown source', () => {
    expect(() => findDescriptor(dir, 'nowhere')).toThrow('Descriptor not found for source: nowhere');
  });
});
