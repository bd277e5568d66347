import { describe, it, expect } from 'vitest';
import { logistic } from '../../src/analysis/math.js';
import { convergenceDate, fitModels } from '../../src/analysis/model-fitter.js';
import type { CapabilityModel, FittedModels, MonthlyBucket } from '../../src/types.js';

const EPOCH = '2025-01-01';

function makeMonthly(n: number, fill: (t: number) => Partial<MonthlyBucket>): MonthlyBucket[] {
  return Array.from({ length: n }, (_, t) => ({
    month: `m${t}`,
    commits: 0,
    capability: 0,
    sophistication: 0,
    cumulative_commits: 0,
    cumulative_capability: 0,
    ...fill(t),
  }));
}

function makeCapability(overrides: Partial<CapabilityModel> = {}): CapabilityModel {
  return {
    L: 1000,
    r: 0.8,
    t_mid: 4,
    r_squared: 0.99,
    pct_95_date: EPOCH,
    pct_99_date: EPOCH,
    pct_now: 50,
    projection: [],
    ...overrides,
  };
}

const synthetic = makeMonthly(12, t => ({
  cumulative_commits: Math.round(logistic(t, 100, 0.8, 4)),
  cumulative_capability: Math.round(logistic(t, 1000, 0.8, 4)),
}));

describe('fitModels', () => {
  it('returns {} for empty input', () => {
    expect(fitModels([], EPOCH)).toEqual({});
  });

  it('omits every component for an all-zero series', () => {
    expect(fitModels(makeMonthly(6, () => ({})), EPOCH)).toEqual({});
  });

  it('recovers a logistic commit curve', () => {
    const models = fitModels(synthetic, EPOCH);
    const commitRate = models.commit_rate;
    expect(commitRate).toBeDefined();
    expect(Math.abs((commitRate?.L ?? 0) - 100) / 100).toBeLessThanOrEqual(0.3);
    expect(commitRate?.r_squared).toBeGreaterThan(0.9);
  });

  it('recovers a logistic capability curve', () => {
    const capability = fitModels(synthetic, EPOCH).capability;
    if (!capability) throw new Error('capability model missing');
    expect(Math.abs(capability.L - 1000) / 1000).toBeLessThanOrEqual(0.3);
    expect(capability.r_squared).toBeGreaterThan(0.9);
    expect(capability.pct_95_date < capability.pct_99_date).toBe(true);
  });

  it('searches L above the observed total', () => {
    const models = fitModels(synthetic, EPOCH);
    // totals are 100 and 996
    expect(models.commit_rate?.L).toBeGreaterThanOrEqual(101);
    expect(models.commit_rate?.L).toBeLessThan(150);
    expect(models.capability?.L).toBeGreaterThanOrEqual(1005);
  });

  it('projects 12 months past the data', () => {
    const models = fitModels(synthetic, EPOCH);
    expect(models.commit_rate?.projection).toHaveLength(12);
    expect(models.commit_rate?.projection[0].month).toBe('2026-01');
    expect(models.capability?.projection).toHaveLength(12);
    for (const p of models.capability?.projection ?? []) {
      expect(p.pct_of_L).toBeLessThanOrEqual(100);
    }
  });

  it('computes pct_now from the final total', () => {
    const capability = fitModels(synthetic, EPOCH).capability;
    const expected = Math.round((996 / (capability?.L ?? 1)) * 1000) / 10;
    expect(capability?.pct_now).toBeCloseTo(expected, 1);
  });

  it('is deterministic for identical input', () => {
    expect(fitModels(synthetic, EPOCH)).toEqual(fitModels(synthetic, EPOCH));
  });

  it('rounds emitted parameters', () => {
    const { commit_rate } = fitModels(synthetic, EPOCH);
    expect(commit_rate?.r).toBe(Number(commit_rate?.r.toFixed(2)));
    expect(commit_rate?.r_squared).toBe(Number(commit_rate?.r_squared.toFixed(4)));
  });

  it('fits a linear sophistication trend and its 100% date', () => {
    const monthly = makeMonthly(12, t => ({ sophistication: 0.1 + 0.05 * t }));
    const sophistication = fitModels(monthly, EPOCH).sophistication;
    expect(sophistication?.slope).toBe(0.05);
    expect(sophistication?.intercept).toBe(0.1);
    expect(sophistication?.r_squared).toBe(1);
    expect(sophistication?.pct_100_date).toBe('2026-07-02');
  });

  it('ignores zero sophistication months', () => {
    const monthly = makeMonthly(4, t => ({ sophistication: t === 3 ? 0.5 : 0 }));
    expect(fitModels(monthly, EPOCH).sophistication).toBeUndefined();
  });

  it('uses the far-future sentinel for a flat or falling trend', () => {
    const monthly = makeMonthly(6, t => ({ sophistication: 0.6 - 0.05 * t }));
    expect(fitModels(monthly, EPOCH).sophistication?.pct_100_date).toBe('2033-04-02');
  });

  it('averages the milestone dates into a convergence date', () => {
    const models = fitModels(synthetic, EPOCH);
    expect(models.convergence_date).toBe(convergenceDate(models));
    expect(models.convergence_date).toBeDefined();
  });
});

describe('convergenceDate', () => {
  it('floors the mean day number', () => {
    const models: FittedModels = {
      capability: makeCapability({ pct_95_date: '2025-01-01', pct_99_date: '2025-01-04' }),
    };
    expect(convergenceDate(models)).toBe('2025-01-02');
  });

  it('skips a missing commit zero date', () => {
    const models: FittedModels = {
      commit_rate: { L: 10, r: 1, t_mid: 1, r_squared: 1, zero_date: null, projection: [] },
      sophistication: { slope: 0.1, intercept: 0, r_squared: 1, pct_100_date: '2025-03-01' },
    };
    expect(convergenceDate(models)).toBe('2025-03-01');
  });

  it('is undefined without milestones', () => {
    expect(convergenceDate({})).toBeUndefined();
  });
});
