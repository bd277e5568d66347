import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';
import { writeJsonAtomic } from '../cache/atomic.js';
import { formatError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { CurrentState, FittedModels, HistoryEntry, ScoringMethod } from '../types.js';
import { dayNumber, toIsoDate } from './dates.js';

export const HISTORY_FILE = 'history.json';

const nullableDate = z.string().nullable();
const nullableNumber = z.number().nullable();

const historyEntrySchema: z.ZodType<HistoryEntry> = z.object({
  scan_time: z.string(),
  convergence_date: nullableDate,
  component_dates: z.object({
    commit_zero: nullableDate,
    capability_95: nullableDate,
    capability_99: nullableDate,
    sophistication_100: nullableDate,
  }),
  days_until_convergence: nullableNumber,
  total_commits: z.number(),
  total_capability: z.number(),
  pct_of_asymptote: z.number(),
  capability_L: nullableNumber,
  capability_r2: nullableNumber,
  commit_rate_r2: nullableNumber,
  scoring_method: z.enum(['pattern', 'classifier_haiku', 'classifier_sonnet']),
});

export interface RecordHistoryOptions {
  models: FittedModels;
  current: CurrentState;
  scoringMethod: ScoringMethod;
  logger?: Logger;
  now?: Date;
}

/**
 * Reads the history array. A missing file is an empty history; an
 * unreadable one is reported and treated as empty.
 */
export function loadHistory(historyPath: string, logger: Logger = silentLogger): HistoryEntry[] {
  if (!existsSync(historyPath)) return [];

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(historyPath, 'utf-8'));
  } catch (err) {
    logger.warn(`history.json corrupted (${formatError(err)}), starting fresh`);
    return [];
  }

  if (!Array.isArray(data)) {
    logger.warn('history.json is not an array, starting fresh');
    return [];
  }

  const entries: HistoryEntry[] = [];
  for (const item of data) {
    const parsed = historyEntrySchema.safeParse(item);
    if (parsed.success) entries.push(parsed.data);
  }
  if (entries.length < data.length) {
    const dropped = data.length - entries.length;
    logger.warn(`history.json: dropped ${dropped} malformed entr${dropped === 1 ? 'y' : 'ies'}`);
  }
  return entries;
}

export function buildHistoryEntry(opts: RecordHistoryOptions): HistoryEntry {
  const { models, current, scoringMethod } = opts;
  const now = opts.now ?? new Date();
  const convergence = models.convergence_date ?? null;

  return {
    scan_time: now.toISOString().slice(0, 19),
    convergence_date: convergence,
    component_dates: {
      commit_zero: models.commit_rate?.zero_date ?? null,
      capability_95: models.capability?.pct_95_date ?? null,
      capability_99: models.capability?.pct_99_date ?? null,
      sophistication_100: models.sophistication?.pct_100_date ?? null,
    },
    days_until_convergence: convergence === null ? null : dayNumber(convergence) - dayNumber(toIsoDate(now)),
    total_commits: current.total_commits,
    total_capability: current.total_capability,
    pct_of_asymptote: current.pct_of_asymptote,
    capability_L: models.capability?.L ?? null,
    capability_r2: models.capability?.r_squared ?? null,
    commit_rate_r2: models.commit_rate?.r_squared ?? null,
    scoring_method: scoringMethod,
  };
}

/**
 * Appends a snapshot unless it repeats the last entry's convergence date
 * and commit count, then rewrites the file. Returns the full history.
 */
export function recordHistory(historyPath: string, opts: RecordHistoryOptions): HistoryEntry[] {
  const logger = opts.logger ?? silentLogger;
  const history = loadHistory(historyPath, logger);
  const entry = buildHistoryEntry(opts);

  const last = history.length > 0 ? history[history.length - 1] : undefined;
  if (last && last.convergence_date === entry.convergence_date && last.total_commits === entry.total_commits) {
    logger.detail(`  History unchanged (${history.length} entries)`);
    return history;
  }

  history.push(entry);
  try {
    writeJsonAtomic(historyPath, history, 2);
    logger.detail(`  History recorded (${history.length} entries)`);
  } catch (err) {
    logger.warn(`could not write history.json: ${formatError(err)}`);
  }
  return history;
}
