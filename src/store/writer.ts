import fs from 'node:fs/promises';
import path from 'node:path';
import { StorageError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { fileStamp, generateId } from '../shared/utils.js';
import { unitDir, type RunManifest } from './manifest.js';

export type RecordKind = 'article' | 'thumbnail';
export type UnitKind = RecordKind | 'metadata';

export interface WrittenUnit {
  kind: UnitKind;
  path: string;
  count: number;
}

/**
 * Append-only writer for one run of one source. Every unit is written to a hidden temp file
 * and then linked into place, so a reader sees either the whole unit or nothing, and an
 * existing unit is never replaced.
 */
export class StorageWriter {
  private readonly stamp: string;

  constructor(
    private readonly root: string,
    private readonly sourceId: string,
    private readonly runId: string,
    startedAt: Date = new Date(),
  ) {
    this.stamp = fileStamp(startedAt);
  }

  unitPath(kind: UnitKind): string {
    const ext = kind === 'metadata' ? 'json' : 'jsonl';
    return path.join(unitDir(this.root, this.sourceId, kind), `${kind}_${this.stamp}_${this.runId}.${ext}`);
  }

  /**
   * Persist one batch as a new unit. Returns null for an empty batch, which writes nothing.
   */
  async write(records: readonly object[], kind: RecordKind): Promise<WrittenUnit | null> {
    if (records.length === 0) return null;
    const content = records.map((r) => JSON.stringify(r)).join('\n') + '\n';
    const target = await this.commit(kind, content);
    logger.info({ sourceId: this.sourceId, kind, count: records.length, path: target }, 'Unit written');
    return { kind, path: target, count: records.length };
  }

  async writeManifest(manifest: RunManifest): Promise<WrittenUnit> {
    const target = await this.commit('metadata', JSON.stringify(manifest, null, 2) + '\n');
    return { kind: 'metadata', path: target, count: 1 };
  }

  private async commit(kind: UnitKind, content: string): Promise<string> {
    const target = this.unitPath(kind);
    const dir = path.dirname(target);
    const temp = path.join(dir, `.${path.basename(target)}.${generateId(8)}.tmp`);

    try {
      await fs.mkdir(dir, { recursive: true });
      const handle = await fs.open(temp, 'wx');
      try {
        await handle.writeFile(content, 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      // link() fails with EEXIST instead of replacing an existing unit.
      await fs.link(temp, target);
    } catch (err) {
      await fs.rm(temp, { force: true });
      const exists = err instanceof Error && 'code' in err && err.code === 'EEXIST';
      throw new StorageError(
        exists ? `Unit already exists: ${target}` : `Failed to write ${kind} unit: ${errorMessage(err)}`,
        { path: target, kind },
      );
    }
    await fs.rm(temp, { force: true });
    return target;
  }
}
