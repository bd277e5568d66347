import { extname } from 'node:path';
import type { FileKind } from '../types.js';

const SOURCE_EXTS = new Set(['.ts', '.js', '.py', '.sh', '.mjs', '.cjs', '.go', '.rs', '.tsx', '.jsx']);
const CONFIG_EXTS = new Set(['.json', '.yml', '.yaml', '.toml', '.ini', '.cfg', '.env']);
const DOC_EXTS = new Set(['.md', '.txt', '.rst']);
const TEST_MARKERS = ['.test.', '.spec.', '__tests__/', 'test_', '_test.'];

const BRACE_RENAME_RE = /\{[^}]*?=>\s*([^}]*?)\}/;

/**
 * Resolves numstat rename notation to the new path:
 * `old.ts => new.ts`, `src/{old.ts => new.ts}` and `{a => b}/file.ts`.
 */
export function resolveRename(filePath: string): string {
  if (!filePath.includes('=>')) return filePath;

  let resolved = filePath;
  let match = BRACE_RENAME_RE.exec(resolved);
  while (match) {
    resolved = resolved.slice(0, match.index) + match[1].trim() + resolved.slice(match.index + match[0].length);
    match = BRACE_RENAME_RE.exec(resolved);
  }

  if (resolved.includes('=>')) {
    const parts = resolved.split('=>');
    resolved = parts[parts.length - 1].trim();
  }
  return resolved;
}

export function classifyFile(filePath: string): FileKind {
  const resolved = resolveRename(filePath);
  const lower = resolved.toLowerCase();

  // Test markers win over source extensions
  if (TEST_MARKERS.some(marker => lower.includes(marker))) return 'test';

  const ext = extname(resolved).toLowerCase();
  if (SOURCE_EXTS.has(ext)) return 'source';
  if (CONFIG_EXTS.has(ext)) return 'config';
  if (DOC_EXTS.has(ext)) return 'doc';
  return 'other';
}
