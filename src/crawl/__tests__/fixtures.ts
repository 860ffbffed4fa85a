import { vi, type Mock } from 'vitest';
import { SiteDescriptorSchema, type SiteDescriptor } from '../../descriptor/schema.js';
import { ConfigSchema, type Config } from '../../shared/config.js';
import { FetchClient, fetchOptionsFromConfig } from '../../fetch/client.js';

export const GAZETTE_YAML = `
source_id: gazette
name: Harbour Gazette
country: FJ
base_url: https://gazette.example
listing:
  url_template: https://gazette.example/news?page={num}
selectors:
  item: article
  title: h2
  url: h2 a::attr(href)
  article_title: h1
  article_date: time::attr(datetime)
  article_body: { selector: .story p, all: true }
  tags: .tags a
cleaning:
  title: clean_title
`;

export function gazette(overrides: Record<string, unknown> = {}): Readonly<SiteDescriptor> {
  return SiteDescriptorSchema.parse({
    source_id: 'gazette',
    name: 'Harbour Gazette',
    country: 'FJ',
    base_url: 'https://gazette.example',
    listing: { url_template: 'https://gazette.example/news?page={num}' },
    selectors: {
      item: 'article',
      title: 'h2',
      url: 'h2 a::attr(href)',
      article_title: 'h1',
      article_date: 'time::attr(datetime)',
      article_body: { selector: '.story p', all: true },
      tags: '.tags a',
    },
    cleaning: { title: 'clean_title' },
    ...overrides,
  });
}

export function testConfig(overrides: { detail_concurrency?: number; max_pages?: number } = {}): Config {
  return ConfigSchema.parse({
    fetch: {
      min_host_delay_ms: 0,
      base_backoff_ms: 1,
      max_backoff_ms: 5,
      timeout_ms: 2000,
      user_agent: 'test-agent',
    },
    crawl: { ...overrides },
  });
}

export function testClient(config: Config): FetchClient {
  return new FetchClient(fetchOptionsFromConfig(config));
}

export function listingHtml(ids: string[]): string {
  const cards = ids
    .map((id) => `<article><h2><a href="/story/${id}">Story ${id}</a></h2></article>`)
    .join('\n');
  return `<html><body>${cards}</body></html>`;
}

export function detailHtml(id: string, date = '2024-03-01'): string {
  return `<html><body>
    <h1>Story ${id} in full</h1>
    <time datetime="${date}">${date}</time>
    <div class="story"><p>Paragraph one of story ${id}.</p><p>Paragraph two.</p></div>
    <div class="tags"><a>Local</a></div>
  </body></html>`;
}

export const html = (body: string, status = 200): Response =>
  new Response(body, { status, headers: { 'content-type': 'text/html' } });

export type Routes = Record<string, () => Response>;

/**
 * The standard three-page site: two listing pages of two stories, then an empty page.
 */
export function siteRoutes(): Routes {
  const routes: Routes = {
    'https://gazette.example/news?page=1': () => html(listingHtml(['1', '2'])),
    'https://gazette.example/news?page=2': () => html(listingHtml(['3', '4'])),
    'https://gazette.example/news?page=3': () => html(listingHtml([])),
  };
  for (const id of ['1', '2', '3', '4']) {
    routes[`https://gazette.example/story/${id}`] = () => html(detailHtml(id));
  }
  return routes;
}

export function serve(fetchMock: Mock<typeof fetch>, routes: Routes): void {
  fetchMock.mockImplementation((input) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const route = routes[url];
    return Promise.resolve(route ? route() : new Response('not found', { status: 404 }));
  });
}

export function callsTo(fetchMock: Mock<typeof fetch>, url: string): number {
  return fetchMock.mock.calls.filter(([input]) => input === url).length;
}

export function installFetchMock(): Mock<typeof fetch> {
  const fetchMock = vi.fn<typeof fetch>();
  globalThis.fetch = fetchMock;
  return fetchMock;
}
