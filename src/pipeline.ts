import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { aggregate, aggregateMonthly, type AggregateOptions } from './analysis/aggregator.js';
import { dayNumber, toIsoDate } from './analysis/dates.js';
import { HISTORY_FILE, recordHistory } from './analysis/history.js';
import { fitModels } from './analysis/model-fitter.js';
import { loadDiffstatCache, loadEnrichCache, loadScoreCache, writeJsonAtomic, type DiffstatCache } from './cache/index.js';
import { ClassifierClient } from './classifier/client.js';
import { loadConfig } from './config.js';
import { formatError, NoCommitsError } from './errors.js';
import { findRepos } from './git/discovery.js';
import { extractCommits, extractDiffstats } from './git/extractor.js';
import { silentLogger, type Logger } from './logger.js';
import { buildRubric } from './scoring/rubric.js';
import { selectScoringStrategy } from './scoring/strategy.js';
import {
  ENRICH_MODELS,
  type ClockConfig,
  type Commit,
  type CurrentState,
  type EnrichModel,
  type FittedModels,
  type MonthlyBucket,
  type RepoScanConfig,
  type ScanReport,
} from './types.js';

export const REPORT_FILE = 'data.json';

/** Where commits and diffstats come from. Swapped out in tests. */
export interface CommitSource {
  findRepos(config: RepoScanConfig, logger: Logger): string[];
  extractCommits(repos: string[], logger: Logger): Promise<Commit[]>;
  extractDiffstats(repos: string[], cache: DiffstatCache, logger: Logger): Promise<number>;
}

export const gitCommitSource: CommitSource = {
  findRepos,
  extractCommits,
  extractDiffstats,
};

export interface ScanOptions {
  dataDir: string;
  /** Overrides `enrich.enabled`. */
  enrich?: boolean;
  /** Overrides `enrich.model`. */
  model?: EnrichModel;
  logger?: Logger;
  now?: Date;
  config?: ClockConfig;
  source?: CommitSource;
}

export function buildCurrentState(
  commits: Commit[],
  monthly: MonthlyBucket[],
  models: FittedModels,
  epoch: string,
  today: string,
): CurrentState {
  const last = monthly.length > 0 ? monthly[monthly.length - 1] : undefined;
  return {
    total_commits: commits.length,
    total_capability: last?.cumulative_capability ?? 0,
    pct_of_asymptote: models.capability?.pct_now ?? 0,
    latest_commit_date: commits.length > 0 ? commits[commits.length - 1].date : today,
    current_sophistication: last?.sophistication ?? 0,
    days_since_inception: dayNumber(today) - dayNumber(epoch),
  };
}

/**
 * Runs one full scan: discovery, extraction, scoring, aggregation, model
 * fitting and history, then writes the report to `data.json`.
 */
export async function runScan(options: ScanOptions): Promise<ScanReport> {
  const { dataDir } = options;
  const logger = options.logger ?? silentLogger;
  const source = options.source ?? gitCommitSource;
  const now = options.now ?? new Date();
  const today = toIsoDate(now);

  const config = options.config ?? loadConfig(dataDir, logger);
  const rubric = buildRubric(config.rubric);
  const epoch = config.inceptionDate;

  logger.step('Finding repositories...');
  const repos = source.findRepos(config.repos, logger);
  logger.info(`  Found ${repos.length} repositories`);

  logger.step('Extracting commits...');
  const commits = await source.extractCommits(repos, logger);
  if (commits.length === 0) {
    throw new NoCommitsError(repos.length);
  }
  logger.info(`  ${commits.length} unique commits`);

  logger.step('Extracting diffstats...');
  const diffstats = loadDiffstatCache(dataDir, logger);
  const added = await source.extractDiffstats(repos, diffstats, logger);
  if (added > 0) diffstats.save();
  logger.info(`  ${added} new, ${diffstats.size} cached`);

  logger.step('Scoring commits...');
  const enrichRequested = options.enrich ?? config.enrich.enabled;
  const model = options.model ?? config.enrich.model;
  const scoreCache = loadScoreCache(dataDir, config.scoring.cacheVersion, logger);
  const strategy = selectScoringStrategy(
    { rubric, policy: config.scoring, scoreCache, diffstats, logger },
    {
      enrichRequested,
      apiKey: config.enrich.apiKey ?? process.env.ANTHROPIC_API_KEY,
      createClassifier: apiKey => ({
        client: new ClassifierClient({
          apiKey,
          model: ENRICH_MODELS[model],
          apiUrl: config.enrich.apiUrl,
          maxRetries: config.enrich.maxRetries,
          timeoutMs: config.enrich.timeoutMs,
          logger,
        }),
        enrichCache: loadEnrichCache(dataDir, logger),
        opts: { model, batchSize: config.enrich.batchSize },
      }),
    },
  );
  const { scored, baseline, summary } = await strategy.score(commits);
  scoreCache.save();
  logger.info(`  ${summary.cache_hits} cached, ${commits.length - summary.cache_hits} scored fresh (${summary.method})`);
  if (summary.fallback > 0) {
    logger.warn(`${summary.fallback} commits fell back to pattern scoring`);
  }

  logger.step('Aggregating...');
  const aggregateOpts: AggregateOptions = { epoch, today, rubric, sophistication: config.sophistication };
  const { monthly, weekly, categoryMonthly } = aggregate(scored, aggregateOpts);
  const monthlyBaseline = baseline ? aggregateMonthly(baseline, aggregateOpts) : [];

  logger.step('Fitting models...');
  const models = fitModels(monthly, epoch, logger);
  const current = buildCurrentState(commits, monthly, models, epoch, today);

  logger.step('Recording convergence history...');
  const history = recordHistory(join(dataDir, HISTORY_FILE), {
    models,
    current,
    scoringMethod: summary.method,
    logger,
    now,
  });

  const report: ScanReport = {
    generated: now.toISOString().slice(0, 19),
    inception_date: epoch,
    repos_scanned: repos.length,
    total_commits: commits.length,
    monthly,
    monthly_baseline: monthlyBaseline,
    weekly,
    models,
    current,
    category_monthly: categoryMonthly,
    convergence_history: history,
    scoring: summary,
  };

  const reportPath = join(dataDir, REPORT_FILE);
  writeJsonAtomic(reportPath, report, 2);
  logger.success(`Report written to ${reportPath}`);
  return report;
}

// --- Reading back ---

const reportSummarySchema = z.object({
  generated: z.string(),
  repos_scanned: z.number(),
  total_commits: z.number(),
  models: z.object({ convergence_date: z.string().optional() }),
  current: z.object({
    total_capability: z.number(),
    pct_of_asymptote: z.number(),
    latest_commit_date: z.string(),
    current_sophistication: z.number(),
  }),
  scoring: z.object({ method: z.string(), fallback: z.number() }),
});

export type ReportSummary = z.infer<typeof reportSummarySchema>;

/** Headline figures of the last report, or null when none was written. */
export function readReportSummary(dataDir: string): ReportSummary | null {
  const reportPath = join(dataDir, REPORT_FILE);
  if (!existsSync(reportPath)) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(reportPath, 'utf-8'));
  } catch (err) {
    throw new Error(`Could not read ${reportPath}: ${formatError(err)}`);
  }
  const parsed = reportSummarySchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`${reportPath} is not a scan report`);
  }
  return parsed.data;
}

export function summaryLines(summary: ReportSummary, today: string): string[] {
  const lines = [
    `  Repos scanned:      ${summary.repos_scanned}`,
    `  Total commits:      ${summary.total_commits.toLocaleString('en-US')}`,
    `  Capability score:   ${summary.current.total_capability.toLocaleString('en-US')}`,
    `  % of asymptote:     ${summary.current.pct_of_asymptote.toFixed(1)}%`,
    `  Sophistication:     ${(summary.current.current_sophistication * 100).toFixed(1)}%`,
    `  Scoring:            ${summary.scoring.method}`,
  ];
  const convergence = summary.models.convergence_date;
  if (convergence) {
    lines.push(`  Convergence date:   ${convergence} (${dayNumber(convergence) - dayNumber(today)} days)`);
  }
  return lines;
}
