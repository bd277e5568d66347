import type { CategoryHits, CategoryScores, Score } from '../types.js';
import { MAX_HITS, SCORE_FLOOR } from './commit-scorer.js';
import type { Rubric } from './rubric.js';

/**
 * Keeps known categories with numeric hit counts, truncated and clamped into
 * [1, MAX_HITS].
 */
export function sanitizeHits(raw: Record<string, unknown>, rubric: Rubric): CategoryHits {
  const clean: CategoryHits = {};
  for (const [name, value] of Object.entries(raw)) {
    if (!rubric.has(name)) continue;
    if (typeof value !== 'number' || !Number.isFinite(value)) continue;
    clean[name] = Math.max(1, Math.min(MAX_HITS, Math.trunc(value)));
  }
  return clean;
}

/** Same weight × hits formula as pattern scoring, applied to a classifier verdict. */
export function enrichScore(raw: Record<string, unknown>, rubric: Rubric): Score {
  const categories: CategoryScores = {};
  let total = 0;

  for (const [name, hits] of Object.entries(sanitizeHits(raw, rubric))) {
    const category = rubric.get(name);
    if (!category) continue;
    const score = category.weight * hits;
    categories[name] = score;
    total += score;
  }

  return { total: total || SCORE_FLOOR, categories };
}
