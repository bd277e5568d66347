import { z } from 'zod';
import type { CategoryHits, DiffStat, ScoreEntry } from '../types.js';

export const diffStatSchema: z.ZodType<DiffStat> = z.object({
  lines_added: z.number(),
  lines_deleted: z.number(),
  files_changed: z.number(),
  source_lines_added: z.number(),
  test_lines_added: z.number(),
  config_lines_added: z.number(),
  new_files_count: z.number(),
});

export const scoreEntrySchema: z.ZodType<ScoreEntry> = z.object({
  version: z.number().int(),
  total: z.number().nonnegative(),
  categories: z.record(z.number()),
});

export const enrichmentEntrySchema: z.ZodType<CategoryHits> = z.record(z.number().int().min(1).max(3));
