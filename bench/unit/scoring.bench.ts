import { describe, bench } from 'vitest';
import { aggregate } from '../../src/analysis/aggregator.js';
import { scoreCommit } from '../../src/scoring/commit-scorer.js';
import { buildRubric } from '../../src/scoring/rubric.js';
import { DEFAULT_CONFIG, type ScoredCommit } from '../../src/types.js';

const rubric = buildRubric(DEFAULT_CONFIG.rubric);

const MESSAGES = [
  'feat: add agent execution loop',
  'Merge pull request #42 from feature/self-modify',
  'fix typo in README',
  'chore: bump version',
  'refactor memory element system',
] as const;

const scored: ScoredCommit[] = Array.from({ length: 5000 }, (_, i) => {
  const message = MESSAGES[i % MESSAGES.length];
  const day = String((i % 28) + 1).padStart(2, '0');
  const month = String((i % 12) + 1).padStart(2, '0');
  return { hash: String(i), date: `2025-${month}-${day}`, repo: 'alpha', ...scoreCommit(message, rubric) };
});

describe('scoring', () => {
  bench('scoreCommit x5 messages', () => {
    for (const message of MESSAGES) scoreCommit(message, rubric);
  });

  bench('aggregate 5k commits over a year', () => {
    aggregate(scored, {
      epoch: '2025-01-01',
      today: '2025-12-31',
      rubric,
      sophistication: DEFAULT_CONFIG.sophistication,
    });
  });
});
