import { spawn } from 'node:child_process';
import { basename } from 'node:path';
import { createInterface } from 'node:readline';
import type { DiffstatCache } from '../cache/index.js';
import { parseDayNumber } from '../analysis/dates.js';
import { formatError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { Commit, DiffStat } from '../types.js';
import { classifyFile } from './file-classifier.js';

const COMMIT_PREFIX = 'COMMIT:';
const HASH_RE = /^[0-9a-f]{40}$/;
const LOG_TIMEOUT_MS = 30_000;
const DIFFSTAT_TIMEOUT_MS = 60_000;

type ExitResult = { code: number | null; signal: NodeJS.Signals | null } | { error: Error };

/**
 * Streams stdout of `git <args>` in `repoPath` line by line. git is killed
 * after `timeoutMs`. Rejects once the output is drained if git could not
 * start, was killed or exited non-zero.
 */
async function* streamGitLines(repoPath: string, args: string[], timeoutMs: number): AsyncGenerator<string> {
  const proc = spawn('git', args, {
    cwd: repoPath,
    stdio: ['ignore', 'pipe', 'pipe'],
    timeout: timeoutMs,
  });

  // Listen before reading so an early exit is not missed
  const exited = new Promise<ExitResult>(resolve => {
    proc.on('close', (code: number | null, signal: NodeJS.Signals | null) => resolve({ code, signal }));
    proc.on('error', (error: Error) => resolve({ error }));
  });

  const rl = createInterface({ input: proc.stdout });
  for await (const line of rl) {
    // Drop U+FFFD left by invalid UTF-8
    yield line.replace(/\uFFFD/g, '');
  }

  const result = await exited;
  if ('error' in result) {
    throw result.error;
  }
  if (result.signal) {
    throw new Error(`git ${args[0]} killed by ${result.signal} (timeout ${timeoutMs / 1000}s)`);
  }
  if (result.code !== 0 && result.code !== null) {
    throw new Error(`git ${args[0]} exited with code ${result.code}`);
  }
}

// --- Commits ---

/** Parses one `%H%x00%aI%x00%s` line; null when malformed or undated. */
export function parseLogLine(line: string, repo: string): Commit | null {
  const fields = line.split('\x00');
  if (fields.length < 3) return null;

  const [hash, isoDate, ...rest] = fields;
  const date = isoDate.trim().slice(0, 10);
  if (!hash.trim() || parseDayNumber(date) === null) return null;

  return {
    hash: hash.trim(),
    date,
    message: rest.join(' ').trim(),
    repo,
  };
}

/**
 * Reads every commit on every ref of each repository. Commits reachable from
 * several repositories keep their first occurrence. Sorted by date.
 */
export async function extractCommits(repos: string[], logger: Logger = silentLogger): Promise<Commit[]> {
  const byHash = new Map<string, Commit>();

  for (const repoPath of repos) {
    const repo = basename(repoPath);
    let added = 0;
    try {
      for await (const line of streamGitLines(repoPath, ['log', '--all', '--format=%H%x00%aI%x00%s'], LOG_TIMEOUT_MS)) {
        const commit = parseLogLine(line, repo);
        if (commit && !byHash.has(commit.hash)) {
          byHash.set(commit.hash, commit);
          added++;
        }
      }
      logger.detail(`  ${repo}: ${added} new commits`);
    } catch (err) {
      logger.warn(`${repo}: ${formatError(err)}`);
    }
  }

  return [...byHash.values()].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

// --- Diffstats ---

function emptyDiffStat(): DiffStat {
  return {
    lines_added: 0,
    lines_deleted: 0,
    files_changed: 0,
    source_lines_added: 0,
    test_lines_added: 0,
    config_lines_added: 0,
    new_files_count: 0,
  };
}

/** Adds one numstat line to `stat`. Binary and unparseable lines are ignored. */
export function applyNumstatLine(stat: DiffStat, line: string): void {
  const parts = line.split('\t');
  if (parts.length < 3) return;

  const [addStr, delStr, ...pathParts] = parts;
  if (addStr === '-' || delStr === '-') return;

  const adds = Number(addStr);
  const dels = Number(delStr);
  if (!Number.isInteger(adds) || !Number.isInteger(dels)) return;

  stat.lines_added += adds;
  stat.lines_deleted += dels;
  stat.files_changed++;

  switch (classifyFile(pathParts.join('\t'))) {
    case 'source':
      stat.source_lines_added += adds;
      break;
    case 'test':
      stat.test_lines_added += adds;
      break;
    case 'config':
      stat.config_lines_added += adds;
      break;
    default:
      break;
  }
}

async function collectLineStats(repoPath: string, cache: DiffstatCache): Promise<Map<string, DiffStat>> {
  const pending = new Map<string, DiffStat>();
  let current: DiffStat | null = null;

  for await (const raw of streamGitLines(repoPath, ['log', '--all', '--numstat', '--format=%H'], DIFFSTAT_TIMEOUT_MS)) {
    const line = raw.trim();
    if (!line) continue;
    if (HASH_RE.test(line)) {
      current = null;
      if (!cache.has(line) && !pending.has(line)) {
        current = emptyDiffStat();
        pending.set(line, current);
      }
      continue;
    }
    if (current) applyNumstatLine(current, line);
  }

  return pending;
}

async function countNewFiles(repoPath: string, pending: Map<string, DiffStat>): Promise<void> {
  let current: DiffStat | undefined;

  for await (const raw of streamGitLines(repoPath, ['log', '--all', '--diff-filter=A', '--name-only', `--format=${COMMIT_PREFIX}%H`], DIFFSTAT_TIMEOUT_MS)) {
    const line = raw.trim();
    if (!line) continue;
    if (line.startsWith(COMMIT_PREFIX)) {
      current = pending.get(line.slice(COMMIT_PREFIX.length));
      continue;
    }
    if (current) current.new_files_count++;
  }
}

/**
 * Computes diffstats for every commit not yet in `cache` and stores them
 * there. Returns how many were added. Repositories that fail are skipped.
 */
export async function extractDiffstats(
  repos: string[],
  cache: DiffstatCache,
  logger: Logger = silentLogger,
): Promise<number> {
  let added = 0;

  for (const repoPath of repos) {
    const repo = basename(repoPath);
    try {
      const pending = await collectLineStats(repoPath, cache);
      if (pending.size === 0) continue;

      await countNewFiles(repoPath, pending);
      for (const [hash, stat] of pending) {
        cache.set(hash, stat);
      }
      added += pending.size;
      logger.detail(`  ${repo}: ${pending.size} new diffstats`);
    } catch (err) {
      logger.warn(`${repo}: diffstat extraction failed (${formatError(err)})`);
    }
  }

  return added;
}
