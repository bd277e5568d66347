import { describe, bench } from 'vitest';
import { logistic } from '../../src/analysis/math.js';
import { fitModels } from '../../src/analysis/model-fitter.js';
import type { MonthlyBucket } from '../../src/types.js';

const EPOCH = '2025-01-01';

function series(months: number, scale: number): MonthlyBucket[] {
  return Array.from({ length: months }, (_, t) => ({
    month: `m${t}`,
    commits: 0,
    capability: 0,
    sophistication: Math.min(1, 0.1 + t * 0.05),
    cumulative_commits: Math.round(logistic(t, scale, 0.6, months / 2)),
    cumulative_capability: Math.round(logistic(t, scale * 8, 0.5, months / 2 + 1)),
  }));
}

const SIZES = [6, 12, 24] as const;

describe('fitModels', () => {
  for (const months of SIZES) {
    const small = series(months, 200);
    const large = series(months, 20_000);

    bench(`${months} months, ~200 commits`, () => {
      fitModels(small, EPOCH);
    });

    bench(`${months} months, ~20k commits`, () => {
      fitModels(large, EPOCH);
    });
  }
});
