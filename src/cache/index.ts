import { join } from 'node:path';
import type { Logger } from '../logger.js';
import type { CategoryHits, DiffStat, ScoreEntry } from '../types.js';
import { diffStatSchema, enrichmentEntrySchema, scoreEntrySchema } from './schemas.js';
import { VersionedCache } from './versioned-cache.js';

export const DIFFSTAT_CACHE_VERSION = 1;
export const ENRICH_CACHE_VERSION = 1;

export const CACHE_FILES = {
  score: 'score_cache.json',
  diffstat: 'diffstat_cache.json',
  enrich: 'enrich_cache.json',
} as const;

export type ScoreCache = VersionedCache<ScoreEntry>;
export type DiffstatCache = VersionedCache<DiffStat>;
export type EnrichCache = VersionedCache<CategoryHits>;

export function loadScoreCache(dataDir: string, version: number, logger?: Logger): ScoreCache {
  return VersionedCache.load({
    name: 'score cache',
    filePath: join(dataDir, CACHE_FILES.score),
    version,
    schema: scoreEntrySchema,
    logger,
  });
}

export function loadDiffstatCache(dataDir: string, logger?: Logger): DiffstatCache {
  return VersionedCache.load({
    name: 'diffstat cache',
    filePath: join(dataDir, CACHE_FILES.diffstat),
    version: DIFFSTAT_CACHE_VERSION,
    schema: diffStatSchema,
    logger,
  });
}

export function loadEnrichCache(dataDir: string, logger?: Logger): EnrichCache {
  return VersionedCache.load({
    name: 'enrich cache',
    filePath: join(dataDir, CACHE_FILES.enrich),
    version: ENRICH_CACHE_VERSION,
    schema: enrichmentEntrySchema,
    logger,
  });
}

export { VersionedCache, VERSION_KEY, spotCheck } from './versioned-cache.js';
export { writeJsonAtomic } from './atomic.js';
