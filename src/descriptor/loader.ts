import fs from 'node:fs';
import path from 'node:path';
import { parse as yamlParse } from 'yaml';
import { SiteDescriptorSchema, type SiteDescriptor } from './schema.js';
import { ConfigurationError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface DiscoveredDescriptor {
  country: string;
  sourceId: string;
  configPath: string;
}

export function parseDescriptorYaml(yamlContent: string, origin = '<inline>'): Readonly<SiteDescriptor> {
  let raw: unknown;
  try {
    raw = yamlParse(yamlContent);
  } catch (err) {
    throw new ConfigurationError(`Descriptor is not valid YAML: ${origin}`, {
      origin,
      cause: errorMessage(err),
    });
  }

  const result = SiteDescriptorSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid descriptor: ${origin}`, {
      origin,
      errors: result.error.flatten().fieldErrors,
      issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return deepFreeze(result.data);
}

export function loadDescriptorFile(filePath: string): Readonly<SiteDescriptor> {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`Descriptor file not found: ${filePath}`);
  }
  const content = fs.readFileSync(filePath, 'utf-8');
  return parseDescriptorYaml(content, filePath);
}

/**
 * Find `<dir>/<country>/<source>.yaml` files. `template.yaml` is documentation, not a source.
 */
export function discoverDescriptors(dir: string): DiscoveredDescriptor[] {
  if (!fs.existsSync(dir)) return [];

  const found: DiscoveredDescriptor[] = [];
  for (const country of fs.readdirSync(dir).sort()) {
    const countryDir = path.join(dir, country);
    if (!fs.statSync(countryDir).isDirectory()) continue;

    const files = fs
      .readdirSync(countryDir)
      .filter((f) => (f.endsWith('.yaml') || f.endsWith('.yml')) && !f.startsWith('template.'))
      .sort();
    for (const file of files) {
      found.push({
        country,
        sourceId: path.basename(file, path.extname(file)),
        configPath: path.join(countryDir, file),
      });
    }
  }
  return found;
}

/**
 * Resolve a source id to its descriptor. Matches on the parsed `source_id`, so the file name
 * does not have to agree with it.
 */
export function findDescriptor(dir: string, sourceId: string): Readonly<SiteDescriptor> {
  const entries = discoverDescriptors(dir);
  const byName = entries.find((e) => e.sourceId === sourceId);
  if (byName) {
    const descriptor = loadDescriptorFile(byName.configPath);
    if (descriptor.source_id === sourceId) return descriptor;
  }

  for (const entry of entries) {
    if (entry === byName) continue;
    try {
      const descriptor = loadDescriptorFile(entry.configPath);
      if (descriptor.source_id === sourceId) return descriptor;
    } catch (err) {
      // A broken sibling descriptor must not hide the one asked for.
      logger.debug({ file: entry.configPath, error: errorMessage(err) }, 'Skipping unreadable descriptor');
    }
  }

  throw new ConfigurationError(`Descriptor not found for source: ${sourceId}`, {
    dir,
    available: entries.map((e) => e.sourceId),
  });
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
