import type { DiffstatCache, EnrichCache, ScoreCache } from '../cache/index.js';
import type { ClassifierClient } from '../classifier/client.js';
import { buildBatchMessage, buildSystemPrompt } from '../classifier/prompt.js';
import { formatError } from '../errors.js';
import type { Logger } from '../logger.js';
import type {
  Commit,
  DiffstatPolicy,
  EnrichModel,
  Score,
  ScoredCommit,
  ScoringMethod,
  ScoringSummary,
} from '../types.js';
import { scoreCommit } from './commit-scorer.js';
import { applyDiffstatWeight } from './diffstat-weighter.js';
import { enrichScore, sanitizeHits } from './enrichment-scorer.js';
import type { Rubric } from './rubric.js';

export interface ScoringContext {
  rubric: Rubric;
  policy: DiffstatPolicy;
  scoreCache: ScoreCache;
  diffstats: DiffstatCache;
  logger: Logger;
}

export interface ScoringResult {
  scored: ScoredCommit[];
  /** Pattern-only scores, present when a classifier contributed to `scored`. */
  baseline: ScoredCommit[] | null;
  summary: ScoringSummary;
}

export interface ScoringStrategy {
  readonly method: ScoringMethod;
  score(commits: Commit[]): Promise<ScoringResult>;
}

function toScored(commit: Commit, score: Score): ScoredCommit {
  return {
    hash: commit.hash,
    date: commit.date,
    repo: commit.repo,
    total: score.total,
    categories: score.categories,
  };
}

export class PatternScorer implements ScoringStrategy {
  readonly method = 'pattern' as const;
  private readonly ctx: ScoringContext;
  private readonly countAllAsFallback: boolean;

  /**
   * @param countAllAsFallback set when classification was requested but is
   *   unavailable, so every commit is reported as a fallback.
   */
  constructor(ctx: ScoringContext, countAllAsFallback: boolean = false) {
    this.ctx = ctx;
    this.countAllAsFallback = countAllAsFallback;
  }

  /** Cached score when its version is current, otherwise a fresh weighted score written back to the cache. */
  baselineScore(commit: Commit): { score: Score; cached: boolean } {
    const { scoreCache, diffstats, rubric, policy, logger } = this.ctx;
    const entry = scoreCache.get(commit.hash);
    if (entry && entry.version === scoreCache.version) {
      return { score: { total: entry.total, categories: entry.categories }, cached: true };
    }

    const weighted = applyDiffstatWeight(scoreCommit(commit.message, rubric), diffstats.get(commit.hash), policy);
    if (weighted.clamped) {
      logger.warn(
        `diffstat multiplier clamped ${weighted.clamped.raw.toFixed(2)} -> ${weighted.clamped.applied.toFixed(2)} (${commit.hash.slice(0, 8)})`,
      );
    }
    const score: Score = { total: weighted.total, categories: weighted.categories };
    scoreCache.set(commit.hash, { version: scoreCache.version, ...score });
    return { score, cached: false };
  }

  scoreBaseline(commits: Commit[]): { scored: ScoredCommit[]; cacheHits: number } {
    let cacheHits = 0;
    const scored = commits.map(commit => {
      const { score, cached } = this.baselineScore(commit);
      if (cached) cacheHits++;
      return toScored(commit, score);
    });
    return { scored, cacheHits };
  }

  async score(commits: Commit[]): Promise<ScoringResult> {
    const { scored, cacheHits } = this.scoreBaseline(commits);
    return {
      scored,
      baseline: null,
      summary: {
        method: this.method,
        enriched: 0,
        fallback: this.countAllAsFallback ? commits.length : 0,
        cache_hits: cacheHits,
      },
    };
  }
}

export interface ClassifierScorerOptions {
  model: EnrichModel;
  batchSize: number;
}

export class ClassifierScorer implements ScoringStrategy {
  readonly method: ScoringMethod;
  private readonly ctx: ScoringContext;
  private readonly pattern: PatternScorer;
  private readonly client: ClassifierClient;
  private readonly enrichCache: EnrichCache;
  private readonly batchSize: number;

  constructor(
    ctx: ScoringContext,
    client: ClassifierClient,
    enrichCache: EnrichCache,
    opts: ClassifierScorerOptions,
  ) {
    this.ctx = ctx;
    this.pattern = new PatternScorer(ctx);
    this.client = client;
    this.enrichCache = enrichCache;
    this.batchSize = Math.max(1, opts.batchSize);
    this.method = `classifier_${opts.model}`;
  }

  /**
   * Classifies every commit missing from the enrichment cache. Commits the
   * classifier could not handle stay uncached and are counted as fallbacks.
   */
  async enrich(commits: Commit[]): Promise<{ enriched: number; fallback: number }> {
    const { rubric, logger } = this.ctx;
    const uncached = commits.filter(c => !this.enrichCache.has(c.hash));
    if (uncached.length === 0) {
      logger.detail('  All commits already classified.');
      return { enriched: 0, fallback: 0 };
    }

    logger.info(`  ${uncached.length} commits need classification (${commits.length - uncached.length} cached)`);

    const systemPrompt = buildSystemPrompt(rubric);
    const totalBatches = Math.ceil(uncached.length / this.batchSize);
    let enriched = 0;
    let fallback = 0;

    for (let start = 0; start < uncached.length; start += this.batchSize) {
      const batch = uncached.slice(start, start + this.batchSize);
      const batchNum = start / this.batchSize + 1;

      try {
        const verdicts = await this.client.classifyBatch(systemPrompt, buildBatchMessage(batch), batch.length);
        let batchEnriched = 0;
        batch.forEach((commit, j) => {
          const verdict = verdicts[j];
          if (verdict) {
            this.enrichCache.set(commit.hash, sanitizeHits(verdict, rubric));
            batchEnriched++;
          }
        });
        enriched += batchEnriched;
        fallback += batch.length - batchEnriched;
        logger.detail(`  Batch ${batchNum}/${totalBatches}: ${batchEnriched} classified, ${batch.length - batchEnriched} fallback`);
      } catch (err) {
        fallback += batch.length;
        logger.warn(`batch ${batchNum}/${totalBatches} failed (${formatError(err)}), using pattern fallback`);
      }

      // Checkpoint after every batch
      this.enrichCache.save();
    }

    return { enriched, fallback };
  }

  async score(commits: Commit[]): Promise<ScoringResult> {
    const { enriched, fallback } = await this.enrich(commits);
    const { scored: baseline, cacheHits } = this.pattern.scoreBaseline(commits);
    const { rubric, policy, diffstats } = this.ctx;

    const scored = commits.map((commit, i) => {
      const hits = this.enrichCache.get(commit.hash);
      if (!hits) return baseline[i];
      const weighted = applyDiffstatWeight(enrichScore(hits, rubric), diffstats.get(commit.hash), policy);
      return toScored(commit, weighted);
    });

    return {
      scored,
      baseline,
      summary: { method: this.method, enriched, fallback, cache_hits: cacheHits },
    };
  }
}

export interface StrategySelection {
  enrichRequested: boolean;
  apiKey: string | undefined;
  createClassifier: (apiKey: string) => { client: ClassifierClient; enrichCache: EnrichCache; opts: ClassifierScorerOptions };
}

/** Picks the scoring variant once per run. */
export function selectScoringStrategy(ctx: ScoringContext, selection: StrategySelection): ScoringStrategy {
  if (!selection.enrichRequested) {
    return new PatternScorer(ctx);
  }
  if (!selection.apiKey) {
    ctx.logger.warn('ANTHROPIC_API_KEY not set; falling back to pattern scoring for all commits');
    return new PatternScorer(ctx, true);
  }
  const { client, enrichCache, opts } = selection.createClassifier(selection.apiKey);
  return new ClassifierScorer(ctx, client, enrichCache, opts);
}
