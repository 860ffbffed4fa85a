import type { Config } from '../shared/config.js';
import {
  PermanentFetchError,
  RunCancelledError,
  TransientFetchError,
  errorMessage,
} from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { nowISO } from '../shared/utils.js';
import { HostGate, Semaphore, type HostPolicy } from './gate.js';
import { withRetry, type RetryPolicy } from './retry.js';

export interface FetchRequest {
  url: string;
  method?: 'GET' | 'HEAD';
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export interface FetchResult {
  status: number;
  body: string;
  headers: Record<string, string>;
  fetchedAt: string;
  /** URL after redirects. */
  finalUrl: string;
}

export interface FetchClientOptions {
  maxConcurrent: number;
  perHostConcurrent: number;
  minHostDelayMs: number;
  timeoutMs: number;
  userAgent: string;
  retry: Partial<RetryPolicy>;
}

export function fetchOptionsFromConfig(config: Config): FetchClientOptions {
  return {
    maxConcurrent: config.fetch.max_concurrent,
    perHostConcurrent: config.fetch.per_host_concurrent,
    minHostDelayMs: config.fetch.min_host_delay_ms,
    timeoutMs: config.fetch.timeout_ms,
    userAgent: config.fetch.user_agent,
    retry: {
      maxAttempts: config.fetch.max_attempts,
      baseDelayMs: config.fetch.base_backoff_ms,
      maxDelayMs: config.fetch.max_backoff_ms,
    },
  };
}

/**
 * Rate-limited, retrying HTTP client. One instance is shared by every source in a process so
 * that host gates see all traffic to a host.
 */
export class FetchClient {
  private readonly global: Semaphore;
  private readonly hosts = new Map<string, HostGate>();
  private readonly hostOverrides = new Map<string, Partial<HostPolicy>>();

  constructor(private readonly options: FetchClientOptions) {
    this.global = new Semaphore(options.maxConcurrent);
  }

  /**
   * Override politeness for one host, e.g. from a descriptor's `rate_limit`.
   */
  configureHost(host: string, policy: Partial<HostPolicy>): void {
    const key = host.toLowerCase();
    const merged = { ...this.hostOverrides.get(key), ...policy };
    this.hostOverrides.set(key, merged);
    this.hosts.get(key)?.update(merged);
  }

  async fetch(request: FetchRequest, signal?: AbortSignal): Promise<FetchResult> {
    const url = parseRequestUrl(request.url);
    const gate = this.gateFor(url.hostname);

    return withRetry(
      async (attempt) => {
        if (signal?.aborted) throw new RunCancelledError();

        // Host first: a request waiting on its host's limit or delay holds no global slot.
        await gate.enter(signal);
        try {
          await this.global.acquire(signal);
          try {
            return await this.attempt(url, request, attempt);
          } finally {
            this.global.release();
          }
        } finally {
          gate.leave();
        }
      },
      this.options.retry,
      signal,
    );
  }

  private gateFor(host: string): HostGate {
    const key = host.toLowerCase();
    let gate = this.hosts.get(key);
    if (!gate) {
      gate = new HostGate({
        minDelayMs: this.options.minHostDelayMs,
        maxConcurrent: this.options.perHostConcurrent,
        ...this.hostOverrides.get(key),
      });
      this.hosts.set(key, gate);
    }
    return gate;
  }

  private async attempt(url: URL, request: FetchRequest, attempt: number): Promise<FetchResult> {
    const timeoutMs = request.timeoutMs ?? this.options.timeoutMs;
    // Only the per-request timeout aborts the wire call; a run cancellation lets it finish.
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url.href, {
        method: request.method ?? 'GET',
        headers: {
          'User-Agent': this.options.userAgent,
          Accept: 'text/html,application/xhtml+xml,*/*;q=0.8',
          ...request.headers,
        },
        signal: controller.signal,
        redirect: 'follow',
      });

      if (response.status >= 400) {
        await response.body?.cancel();
      }
      if (response.status === 429 || response.status >= 500) {
        throw new TransientFetchError(`HTTP ${response.status} from ${url.hostname}`, url.href, response.status, {
          attempt,
          retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
        });
      }
      if (response.status >= 400) {
        throw new PermanentFetchError(`HTTP ${response.status} from ${url.hostname}`, url.href, response.status, {
          attempt,
        });
      }

      const body = request.method === 'HEAD' ? '' : await response.text();
      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key] = value;
      });

      logger.debug({ url: url.href, status: response.status, attempt }, 'Fetched');
      return {
        status: response.status,
        body,
        headers,
        fetchedAt: nowISO(),
        finalUrl: response.url || url.href,
      };
    } catch (err) {
      if (err instanceof TransientFetchError || err instanceof PermanentFetchError) throw err;
      if (err instanceof Error && err.name === 'AbortError') {
        throw new TransientFetchError(`Request timed out after ${timeoutMs}ms: ${url.href}`, url.href, undefined, {
          attempt,
          timeoutMs,
        });
      }
      throw new TransientFetchError(`Request failed: ${errorMessage(err)}`, url.href, undefined, { attempt });
    } finally {
      clearTimeout(timer);
    }
  }
}

function parseRequestUrl(raw: string): URL {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new PermanentFetchError(`Malformed URL: ${raw}`, raw);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new PermanentFetchError(`Unsupported URL scheme: ${url.protocol}`, raw);
  }
  return url;
}

/**
 * Retry-After is either delta-seconds or an HTTP date.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return Number(trimmed) * 1000;
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - now);
}
