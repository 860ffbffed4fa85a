import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getAppDir } from './utils.js';
import { ConfigurationError } from './errors.js';
import { logger } from './logger.js';

export const ConfigSchema = z.object({
  fetch: z
    .object({
      max_concurrent: z.number().int().positive().default(8),
      per_host_concurrent: z.number().int().positive().default(2),
      min_host_delay_ms: z.number().min(0).default(500),
      timeout_ms: z.number().positive().default(30000),
      max_attempts: z.number().int().positive().default(3),
      base_backoff_ms: z.number().min(0).default(1000),
      max_backoff_ms: z.number().min(0).default(30000),
      user_agent: z
        .string()
        .default('Mozilla/5.0 (compatible; newsharvest/0.1)'),
    })
    .default({}),

  crawl: z
    .object({
      max_pages: z.number().int().positive().default(500),
      detail_concurrency: z.number().int().positive().default(5),
      source_concurrency: z.number().int().positive().default(3),
    })
    .default({}),

  validation: z
    .object({
      min_date: z
        .string()
        .regex(/^\d{4}-\d{2}-\d{2}$/)
        .default('1990-01-01'),
      max_future_days: z.number().int().min(0).default(7),
    })
    .default({}),

  storage: z
    .object({
      root: z.string().default('./data/text'),
    })
    .default({}),

  descriptors_dir: z.string().default('./descriptors'),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('newsharvest', {
    searchPlaces: [
      'newsharvest.config.yaml',
      'newsharvest.config.yml',
      '.newsharvestrc.yaml',
      '.newsharvestrc.yml',
    ],
  });

  const envConfigPath = process.env['NEWSHARVEST_CONFIG'];
  const homeConfigPath = path.join(getAppDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigurationError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = asRecord(result?.config);
  } else {
    const result = await explorer.search();
    if (result) {
      rawConfig = asRecord(result.config);
    } else if (fs.existsSync(homeConfigPath)) {
      const home = await explorer.load(homeConfigPath);
      rawConfig = asRecord(home?.config);
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  const envStorageRoot = process.env['NEWSHARVEST_STORAGE_ROOT'];
  if (envStorageRoot) {
    rawConfig['storage'] = { ...asRecord(rawConfig['storage']), root: envStorageRoot };
  }
  const envDescriptorsDir = process.env['NEWSHARVEST_DESCRIPTORS_DIR'];
  if (envDescriptorsDir) {
    rawConfig['descriptors_dir'] = envDescriptorsDir;
  }

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

function asRecord(value: unknown): Record<string, unknown> {
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    return { ...(value as Record<string, unknown>) };
  }
  return {};
}
