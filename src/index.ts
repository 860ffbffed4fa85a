export { run, runMany, type RunOptions, type SourceOutcome } from './crawl/runner.js';
export { runSource, SourceRun, type RunState, type SourceRunOptions, type RunContext } from './crawl/orchestrator.js';
export { FetchClient, fetchOptionsFromConfig, type FetchRequest, type FetchResult } from './fetch/client.js';
export { nextPage, firstPage, Paginator, type PageReference, type ListingPage, type HaltReason } from './pagination/strategist.js';
export { extract, extractListing, parseDocument, type RawRecord, type ListingItem } from './extract/extractor.js';
export { validate, validateThumbnail, type ArticleRecord, type ThumbnailRecord, type ValidationContext } from './validate/record.js';
export { DedupTracker, generateDedupKey, normalizeUrl } from './store/dedup.js';
export { StorageWriter, type RecordKind, type UnitKind, type WrittenUnit } from './store/writer.js';
export { latestManifest, loadSeenIds, type RunManifest, type RunCounts } from './store/manifest.js';
export { parseDescriptorYaml, loadDescriptorFile, discoverDescriptors, findDescriptor } from './descriptor/loader.js';
export { SiteDescriptorSchema, type SiteDescriptor } from './descriptor/schema.js';
export { loadConfig, type Config } from './shared/config.js';
export * from './shared/errors.js';
