import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { StorageError, errorMessage } from '../shared/errors.js';

const PageReferenceSchema = z.object({
  url: z.string(),
  pageNumber: z.number().int().optional(),
  template: z.number().int().min(0).optional(),
  token: z.string().optional(),
  date: z.string().optional(),
});

const CountsSchema = z.object({
  pages: z.number().int().min(0),
  fetched: z.number().int().min(0),
  validated: z.number().int().min(0),
  rejected: z.number().int().min(0),
  duplicate: z.number().int().min(0),
  new: z.number().int().min(0),
  failed: z.number().int().min(0),
});

const RunErrorSchema = z.object({
  url: z.string(),
  stage: z.enum(['init', 'listing', 'detail', 'validate', 'persist']),
  code: z.string(),
  message: z.string(),
});

export const RunManifestSchema = z.object({
  run_id: z.string(),
  source_id: z.string(),
  status: z.enum(['done', 'failed']),
  cancelled: z.boolean(),
  dry_run: z.boolean(),
  started_at: z.string(),
  ended_at: z.string(),
  halt_reason: z.enum(['end_of_history', 'cycle', 'max_pages', 'cancelled', 'listing_failed']).nullable(),
  counts: CountsSchema,
  last_seen_external_id: z.string().nullable(),
  last_seen_page_token: z.string().nullable(),
  /** Where a resumed run picks up: the next listing page this run did not fetch. */
  cursor: PageReferenceSchema.nullable(),
  outputs: z.object({
    article: z.string().nullable(),
    thumbnail: z.string().nullable(),
    metadata: z.string().nullable(),
  }),
  errors: z.array(RunErrorSchema),
  error: z.string().optional(),
});

export type RunManifest = z.infer<typeof RunManifestSchema>;
export type RunCounts = z.infer<typeof CountsSchema>;
export type RunError = z.infer<typeof RunErrorSchema>;

export function emptyCounts(): RunCounts {
  return { pages: 0, fetched: 0, validated: 0, rejected: 0, duplicate: 0, new: 0, failed: 0 };
}

export function unitDir(root: string, sourceId: string, kind: string): string {
  return path.join(root, sourceId, kind);
}

/**
 * Committed unit files of one kind, oldest first. Temp files start with a dot and are skipped.
 */
async function committedUnits(dir: string, ext: string): Promise<string[]> {
  let names: string[];
  try {
    names = await fs.readdir(dir);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
    throw new StorageError(`Cannot list ${dir}: ${errorMessage(err)}`, { dir });
  }
  return names
    .filter((name) => !name.startsWith('.') && name.endsWith(ext))
    .sort()
    .map((name) => path.join(dir, name));
}

/**
 * External ids of every article already committed for a source.
 */
export async function loadSeenIds(root: string, sourceId: string): Promise<Set<string>> {
  const seen = new Set<string>();
  const files = await committedUnits(unitDir(root, sourceId, 'article'), '.jsonl');

  for (const file of files) {
    const content = await fs.readFile(file, 'utf-8');
    content.split('\n').forEach((line, index) => {
      if (!line.trim()) return;
      try {
        const parsed: unknown = JSON.parse(line);
        if (parsed !== null && typeof parsed === 'object' && 'external_id' in parsed) {
          const id = parsed.external_id;
          if (typeof id === 'string' && id) seen.add(id);
        }
      } catch (err) {
        logger.warn({ file, line: index + 1, err: errorMessage(err) }, 'Skipping malformed article line');
      }
    });
  }

  logger.debug({ sourceId, units: files.length, seen: seen.size }, 'Loaded seen ids');
  return seen;
}

/**
 * The newest readable manifest for a source, or null when it has never run.
 */
export async function latestManifest(root: string, sourceId: string): Promise<RunManifest | null> {
  const files = await committedUnits(unitDir(root, sourceId, 'metadata'), '.json');

  for (const file of files.reverse()) {
    try {
      const parsed = RunManifestSchema.safeParse(JSON.parse(await fs.readFile(file, 'utf-8')));
      if (parsed.success) return parsed.data;
      logger.warn({ file, issues: parsed.error.issues.length }, 'Ignoring manifest that does not match schema');
    } catch (err) {
      logger.warn({ file, err: errorMessage(err) }, 'Ignoring unreadable manifest');
    }
  }
  return null;
}
