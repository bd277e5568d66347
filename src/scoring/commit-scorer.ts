import type { CategoryHits, CategoryScores, Score } from '../types.js';
import type { Rubric } from './rubric.js';

export const MAX_HITS = 3;
export const SCORE_FLOOR = 0.5;
const MERGE_FEATURE_MULTIPLIER = 1.5;
const MERGE_FEATURE_FLAT_BONUS = 2;

/** Number of patterns per category that match, capped at MAX_HITS. Zero-hit categories are omitted. */
export function countHits(message: string, rubric: Rubric): CategoryHits {
  const lower = message.toLowerCase();
  const hits: CategoryHits = {};

  for (const category of rubric.categories.values()) {
    let count = 0;
    for (const re of category.matchers) {
      if (re.test(lower)) count++;
    }
    if (count > 0) hits[category.name] = Math.min(count, MAX_HITS);
  }

  return hits;
}

function isMergedFeature(lower: string): boolean {
  return lower.includes('merge pull request') && (lower.includes('feat') || lower.includes('feature'));
}

export function scoreCommit(message: string, rubric: Rubric): Score {
  const categories: CategoryScores = {};
  let total = 0;

  for (const [name, hits] of Object.entries(countHits(message, rubric))) {
    const category = rubric.get(name);
    if (!category) continue;
    const score = category.weight * hits;
    categories[name] = score;
    total += score;
  }

  if (isMergedFeature(message.toLowerCase())) {
    total = total > 0 ? Math.trunc(total * MERGE_FEATURE_MULTIPLIER) : MERGE_FEATURE_FLAT_BONUS;
  }

  if (total === 0) total = SCORE_FLOOR;

  return { total, categories };
}
