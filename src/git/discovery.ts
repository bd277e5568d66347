import { existsSync, readdirSync, statSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { glob } from 'glob';
import { minimatch } from 'minimatch';
import { expandHome } from '../config.js';
import { formatError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { RepoScanConfig } from '../types.js';

function isRepo(dir: string): boolean {
  return existsSync(join(dir, '.git'));
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

export function shouldSkip(repoPath: string, skipPatterns: string[]): boolean {
  // Match absolute paths as relative ones so leading ** patterns apply
  const candidate = repoPath.replace(/^\/+/, '');
  return skipPatterns.some(pattern => minimatch(candidate, pattern, { dot: true }));
}

function reposInScanDir(dir: string, logger: Logger): string[] {
  if (!isDirectory(dir)) {
    logger.detail(`  scan dir not found: ${dir}`);
    return [];
  }
  if (isRepo(dir)) return [dir];

  return readdirSync(dir, { withFileTypes: true })
    .filter(entry => entry.isDirectory())
    .map(entry => join(dir, entry.name))
    .filter(isRepo);
}

function reposUnderRoot(root: string, maxDepth: number, skipPatterns: string[]): string[] {
  if (!isDirectory(root)) return [];
  const matches = glob.sync('**/.git/', {
    cwd: root,
    absolute: true,
    dot: true,
    maxDepth,
    ignore: skipPatterns,
  });
  return matches.map(gitDir => dirname(gitDir));
}

/**
 * Collects repositories from `scanDirs` (each one a repository or a parent of
 * repositories) and from a depth-limited search under `broadScan.root`.
 * Sorted, deduplicated and filtered by `skipPatterns`.
 */
export function findRepos(config: RepoScanConfig, logger: Logger = silentLogger): string[] {
  const repos = new Set<string>();

  for (const scanDir of config.scanDirs) {
    for (const repo of reposInScanDir(resolve(expandHome(scanDir)), logger)) {
      repos.add(repo);
    }
  }

  if (config.broadScan.root) {
    const root = resolve(expandHome(config.broadScan.root));
    try {
      for (const repo of reposUnderRoot(root, config.broadScan.maxDepth, config.skipPatterns)) {
        repos.add(repo);
      }
    } catch (err) {
      logger.warn(`broad scan of ${root} failed: ${formatError(err)}`);
    }
  }

  return [...repos].filter(repo => !shouldSkip(repo, config.skipPatterns)).sort();
}
