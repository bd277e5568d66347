import { existsSync, readFileSync } from 'node:fs';
import type { z } from 'zod';
import { formatError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { writeJsonAtomic } from './atomic.js';

export const VERSION_KEY = '_v';
const DEFAULT_SAMPLE_SIZE = 10;

export interface VersionedCacheOptions<T> {
  /** Used in log lines, e.g. "score cache". */
  name: string;
  filePath: string;
  version: number;
  schema: z.ZodType<T>;
  logger?: Logger;
  /** How many entries to validate eagerly on load. */
  sampleSize?: number;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isReservedKey(key: string): boolean {
  return key.startsWith('_');
}

/**
 * Returns the keys among the first `maxChecks` entries that fail `isValid`.
 * Reserved keys are not counted.
 */
export function spotCheck(
  entries: Map<string, unknown>,
  isValid: (entry: unknown) => boolean,
  maxChecks: number = DEFAULT_SAMPLE_SIZE,
): string[] {
  const bad: string[] = [];
  let checked = 0;
  for (const [key, entry] of entries) {
    if (checked >= maxChecks) break;
    checked++;
    if (!isValid(entry)) bad.push(key);
  }
  return bad;
}

/**
 * Hash-keyed JSON store stamped with a format version. A version mismatch or
 * an unreadable file starts an empty cache; malformed entries are dropped one
 * at a time.
 */
export class VersionedCache<T> {
  private readonly entries: Map<string, unknown>;
  private readonly opts: VersionedCacheOptions<T>;
  private readonly logger: Logger;

  private constructor(opts: VersionedCacheOptions<T>, entries: Map<string, unknown>) {
    this.opts = opts;
    this.entries = entries;
    this.logger = opts.logger ?? silentLogger;
  }

  static empty<T>(opts: VersionedCacheOptions<T>): VersionedCache<T> {
    return new VersionedCache(opts, new Map());
  }

  static load<T>(opts: VersionedCacheOptions<T>): VersionedCache<T> {
    const logger = opts.logger ?? silentLogger;
    if (!existsSync(opts.filePath)) return VersionedCache.empty(opts);

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(opts.filePath, 'utf-8'));
    } catch (err) {
      logger.warn(`${opts.name} corrupted (${formatError(err)}), starting fresh`);
      return VersionedCache.empty(opts);
    }

    if (!isPlainObject(raw)) {
      logger.warn(`${opts.name} is not a JSON object, starting fresh`);
      return VersionedCache.empty(opts);
    }

    if (raw[VERSION_KEY] !== opts.version) {
      logger.detail(`${opts.name} version ${String(raw[VERSION_KEY])} != ${opts.version}, starting fresh`);
      return VersionedCache.empty(opts);
    }

    const entries = new Map<string, unknown>();
    for (const [key, value] of Object.entries(raw)) {
      if (!isReservedKey(key)) entries.set(key, value);
    }

    const bad = spotCheck(
      entries,
      entry => opts.schema.safeParse(entry).success,
      opts.sampleSize ?? DEFAULT_SAMPLE_SIZE,
    );
    if (bad.length > 0) {
      for (const key of bad) entries.delete(key);
      logger.warn(`${opts.name}: dropped ${bad.length} malformed entr${bad.length === 1 ? 'y' : 'ies'}`);
    }

    return new VersionedCache(opts, entries);
  }

  get version(): number {
    return this.opts.version;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Returns the entry when present and well-formed; a malformed entry is evicted. */
  get(hash: string): T | undefined {
    if (!this.entries.has(hash)) return undefined;
    const parsed = this.opts.schema.safeParse(this.entries.get(hash));
    if (!parsed.success) {
      this.entries.delete(hash);
      return undefined;
    }
    return parsed.data;
  }

  has(hash: string): boolean {
    return this.get(hash) !== undefined;
  }

  set(hash: string, entry: T): void {
    if (isReservedKey(hash)) {
      throw new Error(`Cache key "${hash}" is reserved`);
    }
    this.entries.set(hash, entry);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  /** Serializes the cache; entries that fail the schema are evicted rather than written. */
  toJSON(): Record<string, unknown> {
    const out: Record<string, unknown> = { [VERSION_KEY]: this.opts.version };
    let dropped = 0;
    for (const [hash, entry] of this.entries) {
      if (this.opts.schema.safeParse(entry).success) {
        out[hash] = entry;
      } else {
        this.entries.delete(hash);
        dropped++;
      }
    }
    if (dropped > 0) {
      this.logger.warn(`${this.opts.name}: dropped ${dropped} malformed entr${dropped === 1 ? 'y' : 'ies'} on save`);
    }
    return out;
  }

  /** Writes the whole mapping through a temp file and a rename. Returns false on failure. */
  save(): boolean {
    try {
      writeJsonAtomic(this.opts.filePath, this.toJSON());
      return true;
    } catch (err) {
      this.logger.warn(`could not write ${this.opts.name}: ${formatError(err)}`);
      return false;
    }
  }
}
