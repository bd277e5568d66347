import type { DiffStat, DiffstatPolicy, Score } from '../types.js';
import { SCORE_FLOOR } from './commit-scorer.js';

export interface WeightedScore extends Score {
  /** Present when the raw multiplier fell outside [floor, ceiling]. */
  clamped?: { raw: number; applied: number };
}

const SAFETY_CATEGORY = 'safety';

export function computeMultiplier(diffstat: DiffStat, policy: DiffstatPolicy): number {
  const {
    source_lines_added: sourceAdds,
    test_lines_added: testAdds,
    config_lines_added: configAdds,
    lines_added: adds,
    lines_deleted: dels,
    new_files_count: newFiles,
  } = diffstat;

  let multiplier = 1.0;

  if (sourceAdds >= policy.largeSourceThreshold) {
    multiplier += policy.largeSourceBonus;
  } else if (sourceAdds >= policy.mediumSourceThreshold) {
    multiplier += policy.mediumSourceBonus;
  }

  // Only config files touched
  if (sourceAdds === 0 && testAdds === 0 && configAdds > 0) {
    multiplier *= policy.configOnlyMultiplier;
  }

  if (newFiles >= policy.majorNewFilesThreshold) {
    multiplier += policy.majorNewFilesBonus;
  } else if (newFiles >= policy.minorNewFilesThreshold) {
    multiplier += policy.minorNewFilesBonus;
  }

  if (dels > adds && dels > policy.deletionHeavyThreshold) {
    multiplier *= policy.deletionHeavyMultiplier;
  }

  return multiplier;
}

/**
 * Scales a base score by the commit's diff shape. Returns a new category map;
 * the input score is left untouched.
 */
export function applyDiffstatWeight(
  score: Score,
  diffstat: DiffStat | undefined,
  policy: DiffstatPolicy,
): WeightedScore {
  const categories = { ...score.categories };
  if (!diffstat) return { total: score.total, categories };

  const raw = computeMultiplier(diffstat, policy);
  const applied = Math.max(policy.multiplierFloor, Math.min(policy.multiplierCeiling, raw));

  const total = Math.max(SCORE_FLOOR, score.total * applied);

  if (diffstat.test_lines_added >= policy.testLinesThreshold) {
    categories[SAFETY_CATEGORY] = (categories[SAFETY_CATEGORY] ?? 0) + policy.testSafetyBonus;
  }

  const result: WeightedScore = { total, categories };
  if (applied !== raw) result.clamped = { raw, applied };
  return result;
}
