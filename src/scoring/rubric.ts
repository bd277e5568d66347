import { readFileSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError, formatError } from '../errors.js';
import type { RubricCategoryConfig, RubricConfig } from '../types.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const TOOL_ROOT = dirname(dirname(__dirname));
const DEFAULT_RUBRIC_PATH = join(TOOL_ROOT, 'data', 'default-rubric.json');

export const rubricCategorySchema = z.object({
  weight: z.number().positive(),
  patterns: z.array(z.string().min(1)),
});

export const rubricCategoriesSchema = z
  .record(rubricCategorySchema)
  .refine(cats => Object.keys(cats).length > 0, 'at least one category is required');

export interface Category {
  readonly name: string;
  readonly weight: number;
  readonly patterns: readonly string[];
  readonly matchers: readonly RegExp[];
}

export class Rubric {
  readonly categories: ReadonlyMap<string, Category>;
  readonly highLevel: ReadonlySet<string>;
  readonly lowLevel: ReadonlySet<string>;

  private constructor(categories: Map<string, Category>, highLevel: Set<string>, lowLevel: Set<string>) {
    this.categories = categories;
    this.highLevel = highLevel;
    this.lowLevel = lowLevel;
    Object.freeze(this);
  }

  /**
   * Compiles a full category set. Every pattern must compile and every
   * high/low-level name must refer to a defined category.
   */
  static fromDefinitions(
    definitions: Record<string, RubricCategoryConfig>,
    highLevel: string[],
    lowLevel: string[],
  ): Rubric {
    const issues: string[] = [];
    const categories = new Map<string, Category>();

    for (const [name, def] of Object.entries(definitions)) {
      if (!(def.weight > 0)) {
        issues.push(`category "${name}": weight must be positive, got ${def.weight}`);
      }
      const matchers: RegExp[] = [];
      for (const pattern of def.patterns) {
        try {
          matchers.push(new RegExp(pattern, 'i'));
        } catch (err) {
          issues.push(`category "${name}": invalid pattern "${pattern}" (${formatError(err)})`);
        }
      }
      categories.set(name, Object.freeze({
        name,
        weight: def.weight,
        patterns: Object.freeze([...def.patterns]),
        matchers: Object.freeze(matchers),
      }));
    }

    for (const name of [...highLevel, ...lowLevel]) {
      if (!categories.has(name)) {
        issues.push(`level list refers to unknown category "${name}"`);
      }
    }

    if (issues.length > 0) {
      throw new ConfigError('Invalid rubric', issues);
    }

    return new Rubric(categories, new Set(highLevel), new Set(lowLevel));
  }

  get size(): number {
    return this.categories.size;
  }

  has(name: string): boolean {
    return this.categories.has(name);
  }

  get(name: string): Category | undefined {
    return this.categories.get(name);
  }

  names(): string[] {
    return [...this.categories.keys()];
  }
}

export function loadDefaultCategories(): Record<string, RubricCategoryConfig> {
  const raw: unknown = JSON.parse(readFileSync(DEFAULT_RUBRIC_PATH, 'utf-8'));
  const parsed = z.object({ categories: rubricCategoriesSchema }).safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Built-in rubric at ${DEFAULT_RUBRIC_PATH} is malformed`,
      parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }
  return parsed.data.categories;
}

export function buildRubric(config: RubricConfig): Rubric {
  const definitions = config.categories ?? loadDefaultCategories();
  return Rubric.fromDefinitions(definitions, config.highLevelCategories, config.lowLevelCategories);
}
