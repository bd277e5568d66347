import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { VersionedCache, type DiffstatCache, type EnrichCache, type ScoreCache } from '../../src/cache/index.js';
import { diffStatSchema, enrichmentEntrySchema, scoreEntrySchema } from '../../src/cache/schemas.js';
import { ClassifierClient, type BatchVerdicts } from '../../src/classifier/client.js';
import { createCaptureLogger } from '../../src/logger.js';
import { buildRubric } from '../../src/scoring/rubric.js';
import {
  ClassifierScorer,
  PatternScorer,
  selectScoringStrategy,
  type ScoringContext,
} from '../../src/scoring/strategy.js';
import { DEFAULT_CONFIG, type Commit, type DiffStat } from '../../src/types.js';

const HASH_A = 'a'.repeat(40);
const HASH_B = 'b'.repeat(40);

const commits: Commit[] = [
  { hash: HASH_A, date: '2025-01-05', message: 'feat: add agent', repo: 'alpha' },
  { hash: HASH_B, date: '2025-01-06', message: 'bump version', repo: 'alpha' },
];

interface BatchCall {
  userMessage: string;
  expectedLength: number;
}

/** Answers from a script instead of the network. */
class ScriptedClient extends ClassifierClient {
  readonly calls: BatchCall[] = [];
  private readonly answer: (call: BatchCall) => BatchVerdicts;

  constructor(answer: (call: BatchCall) => BatchVerdicts) {
    super({ apiKey: 'test-secret', model: 'test-model', apiUrl: 'http://127.0.0.1:9/v1/messages', maxRetries: 1 });
    this.answer = answer;
  }

  override async classifyBatch(_systemPrompt: string, userMessage: string, expectedLength: number): Promise<BatchVerdicts> {
    const call = { userMessage, expectedLength };
    this.calls.push(call);
    return this.answer(call);
  }
}

let dir: string;
let lines: string[];
let scoreCache: ScoreCache;
let diffstats: DiffstatCache;
let enrichCache: EnrichCache;

function makeContext(overrides: Partial<ScoringContext> = {}): ScoringContext {
  return {
    rubric: buildRubric(DEFAULT_CONFIG.rubric),
    policy: DEFAULT_CONFIG.scoring,
    scoreCache,
    diffstats,
    logger: createCaptureLogger(lines),
    ...overrides,
  };
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'clock-strategy-'));
  lines = [];
  scoreCache = VersionedCache.empty({ name: 'score cache', filePath: join(dir, 'score_cache.json'), version: 3, schema: scoreEntrySchema });
  diffstats = VersionedCache.empty({ name: 'diffstat cache', filePath: join(dir, 'diffstat_cache.json'), version: 1, schema: diffStatSchema });
  enrichCache = VersionedCache.empty({ name: 'enrich cache', filePath: join(dir, 'enrich_cache.json'), version: 1, schema: enrichmentEntrySchema });
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('PatternScorer', () => {
  it('scores from commit messages and fills the score cache', async () => {
    const result = await new PatternScorer(makeContext()).score(commits);
    expect(result.scored.map(s => s.total)).toEqual([3, 0.5]);
    expect(result.scored[0].categories).toEqual({ agents: 3 });
    expect(result.baseline).toBeNull();
    expect(result.summary).toEqual({ method: 'pattern', enriched: 0, fallback: 0, cache_hits: 0 });
    expect(scoreCache.get(HASH_A)).toEqual({ version: 3, total: 3, categories: { agents: 3 } });
  });

  it('reuses cached scores on the next run', async () => {
    await new PatternScorer(makeContext()).score(commits);
    const second = await new PatternScorer(makeContext()).score(commits);
    expect(second.summary.cache_hits).toBe(2);
  });

  it('rescores an entry stamped with another version', async () => {
    scoreCache.set(HASH_A, { version: 2, total: 99, categories: {} });
    const result = await new PatternScorer(makeContext()).score(commits);
    expect(result.scored[0].total).toBe(3);
    expect(result.summary.cache_hits).toBe(0);
  });

  it('warns when the diffstat multiplier is clamped', async () => {
    const big: DiffStat = {
      lines_added: 500,
      lines_deleted: 0,
      files_changed: 4,
      source_lines_added: 500,
      test_lines_added: 0,
      config_lines_added: 0,
      new_files_count: 0,
    };
    diffstats.set(HASH_A, big);
    const ctx = makeContext({ policy: { ...DEFAULT_CONFIG.scoring, multiplierCeiling: 1.2 } });
    const result = await new PatternScorer(ctx).score(commits);
    expect(result.scored[0].total).toBeCloseTo(3.6, 10);
    expect(lines).toContain('Warning: diffstat multiplier clamped 1.30 -> 1.20 (aaaaaaaa)');
  });
});

describe('ClassifierScorer', () => {
  it('uses classifier verdicts and falls back per commit', async () => {
    const client = new ScriptedClient(() => [{ agents: 2, bogus: 1 }, null]);
    const scorer = new ClassifierScorer(makeContext(), client, enrichCache, { model: 'haiku', batchSize: 50 });
    const result = await scorer.score(commits);

    expect(scorer.method).toBe('classifier_haiku');
    expect(result.scored.map(s => s.total)).toEqual([6, 0.5]);
    expect(result.scored[0].categories).toEqual({ agents: 6 });
    expect(result.baseline?.map(s => s.total)).toEqual([3, 0.5]);
    expect(result.summary).toEqual({ method: 'classifier_haiku', enriched: 1, fallback: 1, cache_hits: 0 });
  });

  it('caches verdicts but not fallbacks', async () => {
    const client = new ScriptedClient(() => [{ agents: 2 }, null]);
    await new ClassifierScorer(makeContext(), client, enrichCache, { model: 'haiku', batchSize: 50 }).score(commits);

    expect(enrichCache.get(HASH_A)).toEqual({ agents: 2 });
    expect(enrichCache.has(HASH_B)).toBe(false);
    const onDisk = JSON.parse(readFileSync(join(dir, 'enrich_cache.json'), 'utf-8'));
    expect(onDisk).toEqual({ _v: 1, [HASH_A]: { agents: 2 } });
  });

  it('only sends uncached commits', async () => {
    enrichCache.set(HASH_A, { agents: 1 });
    const client = new ScriptedClient(() => [{ meta: 1 }]);
    const result = await new ClassifierScorer(makeContext(), client, enrichCache, { model: 'sonnet', batchSize: 50 }).score(commits);

    expect(client.calls).toEqual([{ userMessage: '1. [alpha] bump version', expectedLength: 1 }]);
    expect(result.scored.map(s => s.total)).toEqual([3, 5]);
    expect(result.summary.method).toBe('classifier_sonnet');
  });

  it('splits work into batches', async () => {
    const client = new ScriptedClient(call => Array.from({ length: call.expectedLength }, () => ({})));
    const result = await new ClassifierScorer(makeContext(), client, enrichCache, { model: 'haiku', batchSize: 1 }).score(commits);

    expect(client.calls.map(c => c.expectedLength)).toEqual([1, 1]);
    expect(result.summary.enriched).toBe(2);
    // An empty verdict scores the floor
    expect(result.scored.map(s => s.total)).toEqual([0.5, 0.5]);
  });

  it('falls back for a whole batch when the classifier fails', async () => {
    const client = new ScriptedClient(() => {
      throw new Error('boom');
    });
    const result = await new ClassifierScorer(makeContext(), client, enrichCache, { model: 'haiku', batchSize: 50 }).score(commits);

    expect(result.scored.map(s => s.total)).toEqual([3, 0.5]);
    expect(result.summary).toEqual({ method: 'classifier_haiku', enriched: 0, fallback: 2, cache_hits: 0 });
    expect(lines).toContain('Warning: batch 1/1 failed (boom), using pattern fallback');
    expect(enrichCache.size).toBe(0);
  });
});

describe('selectScoringStrategy', () => {
  it('picks pattern scoring when classification is off', () => {
    const strategy = selectScoringStrategy(makeContext(), {
      enrichRequested: false,
      apiKey: 'test-secret',
      createClassifier: () => {
        throw new Error('should not be called');
      },
    });
    expect(strategy.method).toBe('pattern');
  });

  it('warns and reports every commit as a fallback without an API key', async () => {
    const strategy = selectScoringStrategy(makeContext(), {
      enrichRequested: true,
      apiKey: undefined,
      createClassifier: () => {
        throw new Error('should not be called');
      },
    });
    const result = await strategy.score(commits);

    expect(strategy.method).toBe('pattern');
    expect(result.summary.fallback).toBe(2);
    expect(lines).toEqual(['Warning: ANTHROPIC_API_KEY not set; falling back to pattern scoring for all commits']);
    expect(existsSync(join(dir, 'enrich_cache.json'))).toBe(false);
  });

  it('builds a classifier scorer when a key is present', () => {
    const client = new ScriptedClient(() => []);
    const strategy = selectScoringStrategy(makeContext(), {
      enrichRequested: true,
      apiKey: 'test-secret',
      createClassifier: () => ({ client, enrichCache, opts: { model: 'sonnet', batchSize: 10 } }),
    });
    expect(strategy.method).toBe('classifier_sonnet');
  });
});
