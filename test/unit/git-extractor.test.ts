import { describe, it, expect, vi, beforeEach } from 'vitest';
import { VersionedCache } from '../../src/cache/versioned-cache.js';
import { diffStatSchema } from '../../src/cache/schemas.js';
import { createCaptureLogger } from '../../src/logger.js';
import type { DiffStat } from '../../src/types.js';

vi.mock('node:child_process', () => ({
  spawn: vi.fn(),
}));

vi.mock('node:readline', () => ({
  createInterface: vi.fn(),
}));

const { applyNumstatLine, extractCommits, extractDiffstats, parseLogLine } =
  await import('../../src/git/extractor.js');
const { spawn } = await import('node:child_process');
const { createInterface } = await import('node:readline');

const HASH_1 = '1'.repeat(40);
const HASH_2 = '2'.repeat(40);
const HASH_3 = '3'.repeat(40);

function logLine(hash: string, date: string, subject: string): string {
  return `${hash}\x00${date}\x00${subject}`;
}

function mockSpawnWithLines(lines: string[], exitCode: number | null = 0, signal: string | null = null) {
  const stdout = {
    [Symbol.asyncIterator]: async function* () {
      for (const line of lines) yield line;
    },
  };
  const proc = {
    stdout,
    stderr: { on: vi.fn() },
    kill: vi.fn(),
    on: vi.fn((event: string, cb: (code: number | null, signal: string | null) => void) => {
      if (event === 'close') setTimeout(() => cb(exitCode, signal), 0);
      return proc;
    }),
  };
  return proc;
}

function emptyStat(): DiffStat {
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

function makeCache() {
  return VersionedCache.empty({
    name: 'diffstat cache',
    filePath: '/nonexistent/diffstat_cache.json',
    version: 1,
    schema: diffStatSchema,
  });
}

beforeEach(() => {
  vi.clearAllMocks();
  // createInterface passes through the async iterator from stdout
  vi.mocked(createInterface).mockImplementation(({ input }: any) => input as any);
});

describe('parseLogLine', () => {
  it('takes the calendar date from the author timestamp', () => {
    expect(parseLogLine(logLine(HASH_1, '2025-03-04T23:30:00-05:00', 'feat: add agent'), 'alpha')).toEqual({
      hash: HASH_1,
      date: '2025-03-04',
      message: 'feat: add agent',
      repo: 'alpha',
    });
  });

  it('keeps NUL bytes inside the subject as spaces', () => {
    expect(parseLogLine(`${HASH_1}\x002025-03-04T10:00:00Z\x00part one\x00part two`, 'alpha')?.message)
      .toBe('part one part two');
  });

  it('returns null for malformed lines', () => {
    expect(parseLogLine('not a log line', 'alpha')).toBeNull();
    expect(parseLogLine(logLine(HASH_1, 'yesterday', 'x'), 'alpha')).toBeNull();
    expect(parseLogLine(logLine('', '2025-03-04T10:00:00Z', 'x'), 'alpha')).toBeNull();
  });
});

describe('extractCommits', () => {
  it('merges repositories, keeps the first copy of a shared commit and sorts by date', async () => {
    vi.mocked(spawn)
      .mockReturnValueOnce(mockSpawnWithLines([
        logLine(HASH_2, '2025-02-01T09:00:00Z', 'feat: second'),
        logLine(HASH_1, '2025-01-01T09:00:00Z', 'feat: first'),
      ]) as any)
      .mockReturnValueOnce(mockSpawnWithLines([
        logLine(HASH_1, '2025-01-01T09:00:00Z', 'feat: first'),
        logLine(HASH_3, '2025-01-15T09:00:00Z', 'fix: third'),
      ]) as any);

    const commits = await extractCommits(['/work/one', '/work/two']);

    expect(commits.map(c => c.hash)).toEqual([HASH_1, HASH_3, HASH_2]);
    expect(commits[0].repo).toBe('one');
    expect(commits[1].repo).toBe('two');
    expect(spawn).toHaveBeenCalledWith(
      'git',
      ['log', '--all', '--format=%H%x00%aI%x00%s'],
      expect.objectContaining({ cwd: '/work/one' }),
    );
  });

  it('strips U+FFFD from subjects', async () => {
    vi.mocked(spawn).mockReturnValue(mockSpawnWithLines([
      logLine(HASH_1, '2025-01-01T09:00:00Z', 'fix: bad\uFFFD chars'),
    ]) as any);

    const commits = await extractCommits(['/work/one']);
    expect(commits[0].message).toBe('fix: bad chars');
  });

  it('warns about a failing repository and keeps the others', async () => {
    vi.mocked(spawn)
      .mockReturnValueOnce(mockSpawnWithLines([], 128) as any)
      .mockReturnValueOnce(mockSpawnWithLines([logLine(HASH_1, '2025-01-01T09:00:00Z', 'init')]) as any);

    const lines: string[] = [];
    const commits = await extractCommits(['/work/broken', '/work/one'], createCaptureLogger(lines));

    expect(commits).toHaveLength(1);
    expect(lines).toContain('Warning: broken: git log exited with code 128');
  });

  it('gives git log a deadline and fails the repository when git is killed', async () => {
    vi.mocked(spawn).mockReturnValueOnce(mockSpawnWithLines([], null, 'SIGTERM') as any);

    const lines: string[] = [];
    expect(await extractCommits(['/work/stalled'], createCaptureLogger(lines))).toEqual([]);

    expect(spawn).toHaveBeenCalledWith(
      'git',
      ['log', '--all', '--format=%H%x00%aI%x00%s'],
      expect.objectContaining({ cwd: '/work/stalled', timeout: 30_000 }),
    );
    expect(lines).toEqual(['Warning: stalled: git log killed by SIGTERM (timeout 30s)']);
  });
});

describe('applyNumstatLine', () => {
  it('adds lines by file kind', () => {
    const stat = emptyStat();
    applyNumstatLine(stat, '10\t2\tsrc/agent.ts');
    applyNumstatLine(stat, '7\t0\tsrc/agent.test.ts');
    applyNumstatLine(stat, '3\t1\tpackage.json');
    applyNumstatLine(stat, '4\t4\tREADME.md');
    expect(stat).toEqual({
      lines_added: 24,
      lines_deleted: 7,
      files_changed: 4,
      source_lines_added: 10,
      test_lines_added: 7,
      config_lines_added: 3,
      new_files_count: 0,
    });
  });

  it('classifies renames by their new path', () => {
    const stat = emptyStat();
    applyNumstatLine(stat, '5\t0\tsrc/{old.md => new.ts}');
    expect(stat.source_lines_added).toBe(5);
  });

  it('ignores binary and malformed lines', () => {
    const stat = emptyStat();
    applyNumstatLine(stat, '-\t-\timage.png');
    applyNumstatLine(stat, 'garbage');
    applyNumstatLine(stat, 'x\t1\tsrc/a.ts');
    expect(stat).toEqual(emptyStat());
  });
});

describe('extractDiffstats', () => {
  it('computes stats for uncached commits only', async () => {
    vi.mocked(spawn)
      .mockReturnValueOnce(mockSpawnWithLines([
        HASH_1,
        '',
        '10\t2\tsrc/a.ts',
        '3\t0\tpackage.json',
        HASH_2,
        '',
        '1\t1\tREADME.md',
      ]) as any)
      .mockReturnValueOnce(mockSpawnWithLines([
        `COMMIT:${HASH_1}`,
        '',
        'src/a.ts',
        `COMMIT:${HASH_2}`,
        '',
        'README.md',
      ]) as any);

    const cache = makeCache();
    cache.set(HASH_2, emptyStat());

    const added = await extractDiffstats(['/work/one'], cache);

    expect(added).toBe(1);
    expect(cache.get(HASH_1)).toEqual({
      lines_added: 13,
      lines_deleted: 2,
      files_changed: 2,
      source_lines_added: 10,
      test_lines_added: 0,
      config_lines_added: 3,
      new_files_count: 1,
    });
    expect(cache.get(HASH_2)).toEqual(emptyStat());
    expect(spawn).toHaveBeenLastCalledWith(
      'git',
      ['log', '--all', '--diff-filter=A', '--name-only', '--format=COMMIT:%H'],
      expect.objectContaining({ cwd: '/work/one' }),
    );
  });

  it('skips the new-file pass when everything is cached', async () => {
    vi.mocked(spawn).mockReturnValueOnce(mockSpawnWithLines([HASH_1, '', '1\t0\tsrc/a.ts']) as any);

    const cache = makeCache();
    cache.set(HASH_1, emptyStat());

    expect(await extractDiffstats(['/work/one'], cache)).toBe(0);
    expect(spawn).toHaveBeenCalledTimes(1);
  });

  it('warns and continues when git fails', async () => {
    vi.mocked(spawn).mockReturnValueOnce(mockSpawnWithLines([], 1) as any);

    const lines: string[] = [];
    expect(await extractDiffstats(['/work/one'], makeCache(), createCaptureLogger(lines))).toBe(0);
    expect(lines).toEqual(['Warning: one: diffstat extraction failed (git log exited with code 1)']);
  });

  it('stops a stalled diffstat pass at its deadline', async () => {
    vi.mocked(spawn).mockReturnValueOnce(mockSpawnWithLines([HASH_1, '', '1\t0\tsrc/a.ts'], null, 'SIGTERM') as any);

    const lines: string[] = [];
    const cache = makeCache();
    expect(await extractDiffstats(['/work/one'], cache, createCaptureLogger(lines))).toBe(0);

    expect(cache.size).toBe(0);
    expect(spawn).toHaveBeenCalledWith('git', expect.any(Array), expect.objectContaining({ timeout: 60_000 }));
    expect(lines).toEqual(['Warning: one: diffstat extraction failed (git log killed by SIGTERM (timeout 60s))']);
  });
});
