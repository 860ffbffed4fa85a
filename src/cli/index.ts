#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, writeDefaultConfig } from '../shared/config.js';
import { getPackageRoot, resolvePath } from '../shared/utils.js';
import { errorMessage } from '../shared/errors.js';
import { discoverDescriptors, loadDescriptorFile } from '../descriptor/loader.js';
import { runMany, type SourceOutcome } from '../crawl/runner.js';

const program = new Command();

program
  .name('newsharvest')
  .description('Config-driven newspaper crawler and extractor')
  .version('0.1.0');

// === init ===
program
  .command('init')
  .description('Create newsharvest.config.yaml and a descriptors directory with a template')
  .option('-d, --dir <path>', 'Project directory', '.')
  .action((opts: { dir: string }) => {
    const dir = resolvePath(opts.dir);
    const configPath = path.join(dir, 'newsharvest.config.yaml');

    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log(`✓ ${configPath} created`);
    } else {
      log(`✓ ${configPath} already exists`);
    }

    const templateSrc = path.join(getPackageRoot(), 'descriptors', 'template.yaml');
    const templateDest = path.join(dir, 'descriptors', 'template.yaml');
    if (fs.existsSync(templateSrc) && !fs.existsSync(templateDest)) {
      fs.mkdirSync(path.dirname(templateDest), { recursive: true });
      fs.copyFileSync(templateSrc, templateDest);
      log(`✓ ${templateDest} created`);
    }
  });

// === list ===
program
  .command('list')
  .description('List discovered site descriptors')
  .action(async () => {
    const config = await loadConfig();
    const dir = resolvePath(config.descriptors_dir);
    const entries = discoverDescriptors(dir);

    if (entries.length === 0) {
      log(`No descriptors found under ${dir}`);
      return;
    }

    log(`\n  ${'SOURCE'.padEnd(28)} ${'COUNTRY'.padEnd(8)} FILE`);
    log(`  ${'─'.repeat(70)}`);
    for (const entry of entries) {
      log(`  ${entry.sourceId.padEnd(28)} ${entry.country.padEnd(8)} ${path.relative(dir, entry.configPath)}`);
    }
    log(`\n  ${entries.length} descriptor(s)`);
  });

// === validate ===
program
  .command('validate <file>')
  .description('Check a descriptor file against the schema')
  .action((file: string) => {
    try {
      const descriptor = loadDescriptorFile(resolvePath(file));
      log(`✓ ${descriptor.source_id} (${descriptor.country}, ${descriptor.pagination.type} pagination)`);
    } catch (err) {
      log(`✗ ${errorMessage(err)}`);
      process.exitCode = 1;
    }
  });

// === run ===
program
  .command('run [sources...]')
  .description('Crawl one or more sources')
  .option('-a, --all', 'Crawl every discovered source', false)
  .option('--dry-run', 'Fetch, extract and validate without writing anything', false)
  .option('--max-pages <n>', 'Lower the listing page bound for this run')
  .option('--resume', 'Continue from the last unfinished run of each source', false)
  .option('-o, --out <dir>', 'Storage root (overrides config)')
  .action(
    async (
      sources: string[],
      opts: { all: boolean; dryRun: boolean; maxPages?: string; resume: boolean; out?: string },
    ) => {
      const config = await loadConfig();
      const ids = opts.all
        ? discoverDescriptors(resolvePath(config.descriptors_dir)).map((e) => e.sourceId)
        : sources;

      if (ids.length === 0) {
        log('No sources given. Pass source ids or --all.');
        process.exitCode = 1;
        return;
      }

      let maxPages: number | undefined;
      if (opts.maxPages !== undefined) {
        maxPages = parseInt(opts.maxPages, 10);
        if (!Number.isInteger(maxPages) || maxPages < 1) {
          log(`Invalid --max-pages: ${opts.maxPages}`);
          process.exitCode = 1;
          return;
        }
      }

      const controller = new AbortController();
      const onSignal = (): void => {
        log('\nCancelling: finishing in-flight requests...');
        controller.abort();
      };
      process.once('SIGINT', onSignal);

      try {
        const outcomes = await runMany(ids, {
          config,
          dryRun: opts.dryRun,
          maxPages,
          resume: opts.resume,
          storageRoot: opts.out,
          signal: controller.signal,
        });
        report(outcomes);
        if (outcomes.some((o) => o.manifest === null || o.manifest.status === 'failed')) {
          process.exitCode = 1;
        }
      } finally {
        process.removeListener('SIGINT', onSignal);
      }
    },
  );

function report(outcomes: SourceOutcome[]): void {
  log(
    `\n  ${'SOURCE'.padEnd(28)} ${'STATUS'.padEnd(10)} ${'PAGES'.padStart(5)} ${'NEW'.padStart(5)} ${'DUP'.padStart(5)} ${'REJ'.padStart(5)} ${'FAIL'.padStart(5)}`,
  );
  log(`  ${'─'.repeat(70)}`);

  let rejected = 0;
  for (const { sourceId, manifest, error } of outcomes) {
    if (!manifest) {
      log(`  ${sourceId.padEnd(28)} ${'error'.padEnd(10)} ${error ?? ''}`);
      continue;
    }
    const { counts } = manifest;
    const status = manifest.cancelled ? 'cancelled' : manifest.status;
    rejected += counts.rejected;
    log(
      `  ${sourceId.padEnd(28)} ${status.padEnd(10)} ${String(counts.pages).padStart(5)} ${String(counts.new).padStart(5)} ${String(counts.duplicate).padStart(5)} ${String(counts.rejected).padStart(5)} ${String(counts.failed).padStart(5)}`,
    );
    if (manifest.error) log(`    ✗ ${manifest.error}`);
  }

  if (rejected > 0) {
    log(`\n  ⚠ ${rejected} record(s) rejected by validation; see the run manifests for details`);
  }
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  log(`✗ ${errorMessage(err)}`);
  process.exitCode = 1;
});
