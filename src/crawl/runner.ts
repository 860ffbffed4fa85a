import { loadConfig, type Config } from '../shared/config.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { resolvePath } from '../shared/utils.js';
import { findDescriptor } from '../descriptor/loader.js';
import { FetchClient, fetchOptionsFromConfig } from '../fetch/client.js';
import type { RunManifest } from '../store/manifest.js';
import { runSource } from './orchestrator.js';
import { withConcurrency } from './pool.js';

export interface RunOptions {
  dryRun?: boolean;
  storageRoot?: string;
  descriptorsDir?: string;
  maxPages?: number;
  resume?: boolean;
  signal?: AbortSignal;
  /** Defaults to the loaded configuration. */
  config?: Config;
  /** Share one client, and so one set of host gates, across runs. */
  client?: FetchClient;
}

export interface SourceOutcome {
  sourceId: string;
  manifest: RunManifest | null;
  /** Set when the source could not start, e.g. a missing or invalid descriptor. */
  error?: string;
}

/**
 * Crawl one source by id. A missing or invalid descriptor throws ConfigurationError before
 * any request is made; everything after that is reported in the returned manifest.
 */
export async function run(sourceId: string, options: RunOptions = {}): Promise<RunManifest> {
  const config = options.config ?? (await loadConfig());
  const descriptor = findDescriptor(resolvePath(options.descriptorsDir ?? config.descriptors_dir), sourceId);
  const client = options.client ?? new FetchClient(fetchOptionsFromConfig(config));

  return runSource(
    descriptor,
    { config, client },
    {
      storageRoot: resolvePath(options.storageRoot ?? config.storage.root),
      dryRun: options.dryRun,
      maxPages: options.maxPages,
      resume: options.resume,
      signal: options.signal,
    },
  );
}

/**
 * Crawl several sources concurrently. A failing source never aborts its siblings. Outcomes
 * come back in the order the ids were given; sources not started before cancellation are
 * left out.
 */
export async function runMany(sourceIds: readonly string[], options: RunOptions = {}): Promise<SourceOutcome[]> {
  const config = options.config ?? (await loadConfig());
  const client = options.client ?? new FetchClient(fetchOptionsFromConfig(config));
  const outcomes = new Map<string, SourceOutcome>();
  const unique = [...new Set(sourceIds)];

  await withConcurrency(
    unique,
    config.crawl.source_concurrency,
    async (sourceId) => {
      try {
        const manifest = await run(sourceId, { ...options, config, client });
        outcomes.set(sourceId, { sourceId, manifest });
      } catch (err) {
        logger.error({ sourceId, err: errorMessage(err) }, 'Source could not start');
        outcomes.set(sourceId, { sourceId, manifest: null, error: errorMessage(err) });
      }
    },
    options.signal,
  );

  return unique.flatMap((id) => {
    const outcome = outcomes.get(id);
    return outcome ? [outcome] : [];
  });
}
