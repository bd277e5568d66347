import type { Rubric } from '../scoring/rubric.js';
import type {
  CategoryMonthly,
  CategoryScores,
  MonthlyBucket,
  ScoredCommit,
  SophisticationConfig,
  WeeklyBucket,
} from '../types.js';
import { addDays, dayNumber, monthOf, monthRange } from './dates.js';
import { round } from './math.js';

export interface AggregateOptions {
  epoch: string; // YYYY-MM-DD
  today: string; // YYYY-MM-DD
  rubric: Rubric;
  sophistication: SophisticationConfig;
}

export interface Aggregates {
  monthly: MonthlyBucket[];
  weekly: WeeklyBucket[];
  categoryMonthly: CategoryMonthly;
}

interface MonthAccumulator {
  commits: number;
  capability: number;
  categories: CategoryScores;
}

// --- Sophistication ---

/**
 * Blend of how much score mass sits in high-level categories and how many
 * distinct categories were touched. Names outside the rubric are ignored.
 */
export function sophisticationRatio(categories: CategoryScores, rubric: Rubric, ratioWeight: number): number {
  let known = 0;
  let high = 0;
  let touched = 0;
  for (const [name, score] of Object.entries(categories)) {
    if (!rubric.has(name) || score <= 0) continue;
    known += score;
    touched++;
    if (rubric.highLevel.has(name)) high += score;
  }
  if (known === 0 || rubric.size === 0) return 0;
  return ratioWeight * (high / known) + (1 - ratioWeight) * (touched / rubric.size);
}

/** Exponential moving average seeded with the first value. */
export function smoothEma(values: number[], alpha: number): number[] {
  const out: number[] = [];
  values.forEach((x, i) => {
    out.push(i === 0 ? x : alpha * x + (1 - alpha) * out[i - 1]);
  });
  return out;
}

// --- Buckets ---

function accumulateMonths(scored: ScoredCommit[], months: string[]): Map<string, MonthAccumulator> {
  const byMonth = new Map<string, MonthAccumulator>();
  for (const month of months) {
    byMonth.set(month, { commits: 0, capability: 0, categories: {} });
  }
  for (const commit of scored) {
    const acc = byMonth.get(monthOf(commit.date));
    if (!acc) continue;
    acc.commits++;
    acc.capability += commit.total;
    for (const [name, score] of Object.entries(commit.categories)) {
      acc.categories[name] = (acc.categories[name] ?? 0) + score;
    }
  }
  return byMonth;
}

export function aggregateMonthly(scored: ScoredCommit[], opts: AggregateOptions): MonthlyBucket[] {
  const months = monthRange(monthOf(opts.epoch), monthOf(opts.today));
  const byMonth = accumulateMonths(scored, months);
  const { smoothingAlpha, ratioWeight } = opts.sophistication;

  const raw = months.map(month => {
    const acc = byMonth.get(month);
    return acc ? sophisticationRatio(acc.categories, opts.rubric, ratioWeight) : 0;
  });
  const smoothed = smoothEma(raw, smoothingAlpha);

  let cumCommits = 0;
  let cumCapability = 0;
  return months.map((month, i) => {
    const acc = byMonth.get(month);
    const commits = acc?.commits ?? 0;
    const capability = acc?.capability ?? 0;
    cumCommits += commits;
    cumCapability += capability;
    return {
      month,
      commits,
      capability: Math.round(capability),
      sophistication: round(smoothed[i], 3),
      cumulative_commits: cumCommits,
      cumulative_capability: Math.round(cumCapability),
    };
  });
}

export function aggregateWeekly(scored: ScoredCommit[], opts: AggregateOptions): WeeklyBucket[] {
  const epochDay = dayNumber(opts.epoch);
  const weekOf = (date: string) => Math.floor((dayNumber(date) - epochDay) / 7);
  const totalWeeks = weekOf(opts.today) + 1;

  const commits = new Array<number>(Math.max(0, totalWeeks)).fill(0);
  const capability = new Array<number>(Math.max(0, totalWeeks)).fill(0);
  for (const commit of scored) {
    const w = weekOf(commit.date);
    if (w < 0 || w >= totalWeeks) continue;
    commits[w]++;
    capability[w] += commit.total;
  }

  return commits.map((count, w) => ({
    week: w,
    start: addDays(opts.epoch, w * 7),
    commits: count,
    capability: Math.round(capability[w]),
  }));
}

/** Every rubric category for every month, zero when untouched. */
export function aggregateCategoryMonthly(scored: ScoredCommit[], opts: AggregateOptions): CategoryMonthly {
  const months = monthRange(monthOf(opts.epoch), monthOf(opts.today));
  const byMonth = accumulateMonths(scored, months);
  const names = opts.rubric.names();

  const out: CategoryMonthly = {};
  for (const month of months) {
    const cats = byMonth.get(month)?.categories ?? {};
    const row: Record<string, number> = {};
    for (const name of names) {
      row[name] = Math.round(cats[name] ?? 0);
    }
    out[month] = row;
  }
  return out;
}

export function aggregate(scored: ScoredCommit[], opts: AggregateOptions): Aggregates {
  return {
    monthly: aggregateMonthly(scored, opts),
    weekly: aggregateWeekly(scored, opts),
    categoryMonthly: aggregateCategoryMonthly(scored, opts),
  };
}
