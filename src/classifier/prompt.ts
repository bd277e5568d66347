import type { Rubric } from '../scoring/rubric.js';
import type { Commit } from '../types.js';

const KEYWORDS_PER_CATEGORY = 6;
const REGEX_SYNTAX_RE = /[\\.*?+[\](){}|^$]/g;

/** Turns a pattern like `self.?modif` into a readable keyword ("self modif"). */
export function patternToKeyword(pattern: string): string {
  return pattern.replace(REGEX_SYNTAX_RE, ' ').trim().replace(/\s+/g, ' ');
}

export function buildCategoryDescriptions(rubric: Rubric): string {
  const lines: string[] = [];
  for (const category of rubric.categories.values()) {
    const keywords = category.patterns
      .map(patternToKeyword)
      .filter(k => k.length > 0)
      .slice(0, KEYWORDS_PER_CATEGORY);
    lines.push(`- **${category.name}** (weight ${category.weight}): ${keywords.join(', ')}`);
  }
  return lines.join('\n');
}

export function buildSystemPrompt(rubric: Rubric): string {
  return `You classify git commits against a software capability rubric.

Categories:
${buildCategoryDescriptions(rubric)}

For each commit, output a JSON object with key "c" mapping category names to hit_count (1-3).
- 1 = minor/tangential relevance
- 2 = directly relevant
- 3 = deeply relevant, core implementation
- Omit categories with 0 relevance (empty object for no matches)

Output a JSON array with one object per commit, in the exact input order.
Example for 3 commits: [{"c": {"agents": 2, "self_modify": 1}}, {"c": {}}, {"c": {"foundation": 1}}]

Output ONLY the JSON array, no other text.`;
}

export function buildBatchMessage(commits: Commit[]): string {
  return commits.map((c, i) => `${i + 1}. [${c.repo}] ${c.message}`).join('\n');
}
