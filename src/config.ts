import { existsSync, readFileSync, realpathSync } from 'node:fs';
import { homedir } from 'node:os';
import { isAbsolute, join, relative, resolve } from 'node:path';
import merge from 'lodash.merge';
import { z } from 'zod';
import { parseDayNumber } from './analysis/dates.js';
import { writeJsonAtomic } from './cache/atomic.js';
import { ConfigError } from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { rubricCategoriesSchema } from './scoring/rubric.js';
import { DEFAULT_CONFIG, type ClockConfig } from './types.js';

export const CONFIG_FILE = 'clock.config.json';
/** Stands in for the API key wherever the config is shown. */
export const REDACTED = '***';

const CREDENTIAL_KEYS = ['apiUrl', 'apiKey'] as const;

// --- Paths ---

export function expandHome(p: string): string {
  if (p === '~') return homedir();
  if (p.startsWith('~/')) return join(homedir(), p.slice(2));
  return p;
}

/** `--dir`, then `CLOCK_HOME`, then the working directory. */
export function resolveDataDir(dir?: string): string {
  const raw = dir || process.env.CLOCK_HOME || process.cwd();
  return resolve(expandHome(raw));
}

// --- Schema ---

const isoDate = z.string().refine(d => parseDayNumber(d) !== null, 'expected a YYYY-MM-DD calendar date');

const nonNegative = z.number().nonnegative();

const configSchema = z.object({
  inceptionDate: isoDate,
  repos: z.object({
    scanDirs: z.array(z.string().min(1)),
    broadScan: z.object({
      root: z.string().min(1).nullable(),
      maxDepth: z.number().int().min(1).max(12),
    }),
    skipPatterns: z.array(z.string().min(1)),
  }),
  scoring: z.object({
    cacheVersion: z.number().int().positive(),
    largeSourceThreshold: nonNegative,
    mediumSourceThreshold: nonNegative,
    largeSourceBonus: z.number(),
    mediumSourceBonus: z.number(),
    majorNewFilesThreshold: nonNegative,
    minorNewFilesThreshold: nonNegative,
    majorNewFilesBonus: z.number(),
    minorNewFilesBonus: z.number(),
    configOnlyMultiplier: z.number().positive(),
    deletionHeavyThreshold: nonNegative,
    deletionHeavyMultiplier: z.number().positive(),
    multiplierFloor: z.number().positive(),
    multiplierCeiling: z.number().positive(),
    testLinesThreshold: nonNegative,
    testSafetyBonus: nonNegative,
  }).refine(s => s.multiplierFloor <= s.multiplierCeiling, 'multiplierFloor must not exceed multiplierCeiling'),
  rubric: z.object({
    categories: rubricCategoriesSchema.optional(),
    highLevelCategories: z.array(z.string()),
    lowLevelCategories: z.array(z.string()),
  }),
  sophistication: z.object({
    smoothingAlpha: z.number().gt(0).max(1),
    ratioWeight: z.number().min(0).max(1),
  }),
  enrich: z.object({
    enabled: z.boolean(),
    model: z.enum(['haiku', 'sonnet']),
    batchSize: z.number().int().min(1).max(200),
    maxRetries: z.number().int().min(1).max(10),
    timeoutMs: z.number().int().positive(),
    apiUrl: z.string().url(),
    apiKey: z.string().min(1).optional(),
  }),
});

// --- Building ---

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** lodash.merge merges arrays by index; user-supplied arrays replace instead. */
function replaceArrays(target: Record<string, unknown>, source: Record<string, unknown>): void {
  for (const [key, value] of Object.entries(source)) {
    if (Array.isArray(value)) {
      target[key] = [...value];
    } else if (isPlainObject(value)) {
      const child = target[key];
      if (isPlainObject(child)) replaceArrays(child, value);
    }
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Merges a user config over the defaults and validates the result.
 * `rubric.categories`, when present, replaces the built-in rubric wholesale;
 * level lists the user left out are narrowed to the categories that exist.
 */
export function buildConfig(user: Record<string, unknown> = {}): ClockConfig {
  const merged: Record<string, unknown> = merge({}, structuredClone(DEFAULT_CONFIG), user);
  replaceArrays(merged, user);

  const userRubric = isPlainObject(user.rubric) ? user.rubric : {};
  const mergedRubric = merged.rubric;
  if (isPlainObject(userRubric.categories) && isPlainObject(mergedRubric)) {
    const names = new Set(Object.keys(userRubric.categories));
    mergedRubric.categories = userRubric.categories;
    if (!Array.isArray(userRubric.highLevelCategories)) {
      mergedRubric.highLevelCategories = DEFAULT_CONFIG.rubric.highLevelCategories.filter(n => names.has(n));
    }
    if (!Array.isArray(userRubric.lowLevelCategories)) {
      mergedRubric.lowLevelCategories = DEFAULT_CONFIG.rubric.lowLevelCategories.filter(n => names.has(n));
    }
  }

  const parsed = configSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`));
  }
  return deepFreeze(parsed.data);
}

/** The raw user config, or `{}` when the file is missing or unusable. */
export function readUserConfig(dataDir: string, logger: Logger = silentLogger): Record<string, unknown> {
  const configPath = join(dataDir, CONFIG_FILE);
  if (!existsSync(configPath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch {
    logger.warn(`Failed to parse ${configPath}, using defaults`);
    return {};
  }
  if (!isPlainObject(raw)) {
    logger.warn(`${configPath} is not a JSON object, using defaults`);
    return {};
  }
  logger.detail(`Loaded config from ${configPath}`);
  return raw;
}

export function loadConfig(dataDir: string, logger: Logger = silentLogger): ClockConfig {
  return buildConfig(readUserConfig(dataDir, logger));
}

// --- Path safety ---

function canonical(p: string): string {
  const abs = resolve(expandHome(p));
  return existsSync(abs) ? realpathSync(abs) : abs;
}

export function isWithin(root: string, candidate: string): boolean {
  const rel = relative(canonical(root), canonical(candidate));
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}

export function trustedRoot(): string {
  return process.env.CLOCK_TRUSTED_ROOT || homedir();
}

/** Rejects scan locations outside `root`. */
export function validateScanRoots(config: ClockConfig, root: string = trustedRoot()): void {
  const issues: string[] = [];
  config.repos.scanDirs.forEach((dir, i) => {
    if (!isWithin(root, dir)) issues.push(`repos.scanDirs.${i}: ${dir} is outside ${root}`);
  });
  const broad = config.repos.broadScan.root;
  if (broad && !isWithin(root, broad)) {
    issues.push(`repos.broadScan.root: ${broad} is outside ${root}`);
  }
  if (issues.length > 0) {
    throw new ConfigError('Scan locations must stay inside the trusted root', issues);
  }
}

// --- Writing ---

export function createDefaultConfigFile(dataDir: string): string {
  const configPath = join(dataDir, CONFIG_FILE);
  if (existsSync(configPath)) {
    throw new ConfigError(`${configPath} already exists`);
  }
  writeJsonAtomic(configPath, DEFAULT_CONFIG, 2);
  return configPath;
}

export interface UpdateConfigOptions {
  /** Refuse patches that change where the classifier is called or with which key. */
  lockCredentials?: boolean;
}

/** A redacted key sent back unchanged means "keep the stored key". */
function withoutRedactedKey(patch: Record<string, unknown>): Record<string, unknown> {
  if (!isPlainObject(patch.enrich) || patch.enrich.apiKey !== REDACTED) return patch;
  const enrich = { ...patch.enrich };
  delete enrich.apiKey;
  return { ...patch, enrich };
}

function credentialChanges(current: Record<string, unknown>, patch: Record<string, unknown>): string[] {
  const before = isPlainObject(current.enrich) ? current.enrich : {};
  const after = isPlainObject(patch.enrich) ? patch.enrich : {};
  return CREDENTIAL_KEYS
    .filter(key => key in after && after[key] !== (before[key] ?? DEFAULT_CONFIG.enrich[key]))
    .map(key => `enrich.${key} cannot be changed from this client`);
}

/**
 * Merges `patch` into the stored user config, validates the result
 * (including path safety) and writes it back. Returns the effective config.
 */
export function updateConfigFile(
  dataDir: string,
  rawPatch: Record<string, unknown>,
  root: string = trustedRoot(),
  logger: Logger = silentLogger,
  opts: UpdateConfigOptions = {},
): ClockConfig {
  const current = readUserConfig(dataDir, logger);
  const patch = withoutRedactedKey(rawPatch);

  if (opts.lockCredentials) {
    const issues = credentialChanges(current, patch);
    if (issues.length > 0) {
      throw new ConfigError('Classifier credentials are read-only here', issues);
    }
  }

  const next: Record<string, unknown> = merge({}, current, patch);
  replaceArrays(next, patch);

  // A new category set replaces the old one rather than merging into it
  const patchRubric = isPlainObject(patch.rubric) ? patch.rubric : {};
  const nextRubric = next.rubric;
  if (isPlainObject(patchRubric.categories) && isPlainObject(nextRubric)) {
    nextRubric.categories = patchRubric.categories;
  }

  const config = buildConfig(next);
  validateScanRoots(config, root);
  writeJsonAtomic(join(dataDir, CONFIG_FILE), next, 2);
  return config;
}
