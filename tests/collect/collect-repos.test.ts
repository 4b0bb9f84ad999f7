import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { subDays, subHours } from 'date-fns';
import {
  collectRepoStats,
  languageOf,
  parseLog,
  summarizeHistory,
} from '../../scripts/collect-repos';
import { CollectionError, CollectionWarning } from '../../scripts/errors';
import { NOW, captureLogger, fakeGit, logLine } from '../helpers';

async function makeRepo(root: string, name: string): Promise<string> {
  const repoPath = join(root, name);
  await mkdir(join(repoPath, '.git'), { recursive: true });
  return repoPath;
}

describe('parseLog', () => {
  it('should parse one commit per line', () => {
    const date = subHours(NOW, 2);
    const commits = parseLog(logLine('abc123', date, 'Ada', 'Add parser'));

    expect(commits).toEqual([{ hash: 'abc123', date, author: 'Ada', subject: 'Add parser' }]);
  });

  it('should keep separators inside the subject', () => {
    const log = ['abc123', NOW.toISOString(), 'Ada', 'fix: a | b', 'tail'].join('\x1f');

    expect(parseLog(log)[0]?.subject).toBe('fix: a | b\x1ftail');
  });

  it('should skip blank and malformed lines', () => {
    const log = ['', 'garbage', ['abc', 'not-a-date', 'Ada', 'x'].join('\x1f')].join('\n');

    expect(parseLog(log)).toEqual([]);
  });
});

describe('languageOf', () => {
  it('should map extensions to languages', () => {
    expect(languageOf('src/main.py')).toBe('Python');
    expect(languageOf('boot.asm')).toBe('Assembly');
    expect(languageOf('start.s')).toBe('Assembly');
    expect(languageOf('lib.rs')).toBe('Rust');
    expect(languageOf('util.cc')).toBe('C++');
    expect(languageOf('util.c')).toBe('C');
    expect(languageOf('INSTALL.SH')).toBe('Bash');
  });

  it('should ignore unsupported files', () => {
    expect(languageOf('README.md')).toBeNull();
    expect(languageOf('index.ts')).toBeNull();
  });
});

describe('summarizeHistory', () => {
  const commits = [
    { hash: 'c3', date: subDays(NOW, 3), author: 'Ada', subject: 'Initial commit' },
    { hash: 'c1', date: subHours(NOW, 1), author: 'Ada', subject: 'Add parser' },
    { hash: 'c2', date: subHours(NOW, 5), author: 'Linus', subject: 'Fix tests' },
    { hash: 'c0', date: subDays(NOW, 30), author: 'Grace', subject: 'Scaffold' },
  ];

  it('should count commits inside the window and the week', () => {
    const summary = summarizeHistory(commits, NOW, 24);

    expect(summary.commitCount).toBe(2);
    expect(summary.weeklyCommitCount).toBe(3);
    expect(summary.lastCommitTime).toEqual(subHours(NOW, 1));
    expect(Array.from(summary.contributors).sort()).toEqual(['Ada', 'Linus']);
  });

  it('should list recent commits newest first', () => {
    const summary = summarizeHistory(commits, NOW, 24);

    expect(summary.recentCommits.map(c => c.hash)).toEqual(['c1', 'c2', 'c3']);
  });

  it('should list distinct commit days newest first', () => {
    const summary = summarizeHistory(commits, NOW, 24);

    expect(summary.commitDays).toEqual(['2026-10-18', '2026-10-15', '2026-09-18']);
  });

  it('should honour a wider window', () => {
    expect(summarizeHistory(commits, NOW, 96).commitCount).toBe(3);
  });

  it('should report an empty history', () => {
    const summary = summarizeHistory([], NOW, 24);

    expect(summary.commitCount).toBe(0);
    expect(summary.lastCommitTime).toBeNull();
    expect(summary.contributors.size).toBe(0);
    expect(summary.commitDays).toEqual([]);
  });
});

describe('collectRepoStats', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'home-report-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should produce one stat per repository in alphabetical order', async () => {
    await makeRepo(root, 'zeta');
    await makeRepo(root, 'alpha');
    const git = fakeGit({
      zeta: {
        log: [
          logLine('c1', subHours(NOW, 1), 'Ada', 'Add parser'),
          logLine('c2', subHours(NOW, 5), 'Linus', 'Fix tests'),
          logLine('c3', subDays(NOW, 3), 'Ada', 'Initial commit'),
        ].join('\n'),
      },
      alpha: { log: '' },
    });

    const result = await collectRepoStats(root, { now: NOW, git, countLines: false });

    expect(result.items.map(stat => stat.name)).toEqual(['alpha', 'zeta']);
    expect(result.warnings).toEqual([]);
    const [alpha, zeta] = result.items;
    expect(alpha?.commitCount).toBe(0);
    expect(alpha?.lastCommitTime).toBeNull();
    expect(zeta?.commitCount).toBe(2);
    expect(zeta?.weeklyCommitCount).toBe(3);
    expect(zeta?.path).toBe(join(root, 'zeta'));
  });

  it('should skip a non-repository directory with one logged warning', async () => {
    await makeRepo(root, 'alpha');
    await makeRepo(root, 'beta');
    await mkdir(join(root, 'notes'));
    const { logger, entries } = captureLogger();

    const result = await collectRepoStats(root, { now: NOW, git: fakeGit({}), countLines: false, logger });

    expect(result.items).toHaveLength(2);
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0]).toBeInstanceOf(CollectionWarning);
    expect(result.warnings[0]?.source).toBe('notes');
    expect(result.warnings[0]?.message).toBe('notes is not a git repository');
    expect(entries.filter(entry => entry.level === 'warn')).toHaveLength(1);
  });

  it('should ignore hidden directories and plain files', async () => {
    await makeRepo(root, 'alpha');
    await makeRepo(root, '.cache');
    await writeFile(join(root, 'README'), 'repos live here\n');

    const result = await collectRepoStats(root, { now: NOW, git: fakeGit({}), countLines: false });

    expect(result.items.map(stat => stat.name)).toEqual(['alpha']);
    expect(result.warnings).toEqual([]);
  });

  it('should warn when git resolves a directory to another checkout', async () => {
    await makeRepo(root, 'alpha');
    await makeRepo(root, 'nested');
    const git = fakeGit({ nested: { toplevel: root, log: logLine('p1', subHours(NOW, 1), 'Ada', 'Parent commit') } });

    const result = await collectRepoStats(root, { now: NOW, git, countLines: false });

    expect(result.items.map(stat => stat.name)).toEqual(['alpha']);
    expect(result.warnings.map(w => w.message)).toEqual(['nested is not a git repository']);
  });

  it('should treat a repository without commits as empty', async () => {
    await makeRepo(root, 'fresh');
    const git = fakeGit({
      fresh: { error: new Error("fatal: your current branch 'main' does not have any commits yet") },
    });

    const result = await collectRepoStats(root, { now: NOW, git, countLines: false });

    expect(result.warnings).toEqual([]);
    expect(result.items[0]?.commitCount).toBe(0);
    expect(result.items[0]?.lastCommitTime).toBeNull();
  });

  it('should skip a repository git cannot read', async () => {
    await makeRepo(root, 'alpha');
    await makeRepo(root, 'broken');
    const git = fakeGit({ broken: { error: new Error('fatal: bad object HEAD') } });

    const result = await collectRepoStats(root, { now: NOW, git, countLines: false });

    expect(result.items.map(stat => stat.name)).toEqual(['alpha']);
    expect(result.warnings.map(w => w.message)).toEqual(['Skipped broken: fatal: bad object HEAD']);
  });

  it('should count lines of tracked source files', async () => {
    const repoPath = await makeRepo(root, 'alpha');
    await writeFile(join(repoPath, 'main.py'), 'a = 1\nb = 2\nprint(a + b)\n');
    await writeFile(join(repoPath, 'lib.rs'), 'fn main() {}\n');
    await writeFile(join(repoPath, 'README.md'), '# alpha\n');
    const git = fakeGit({ alpha: { files: 'main.py\0lib.rs\0README.md\0gone.go\0' } });

    const result = await collectRepoStats(root, { now: NOW, git });

    expect(result.items[0]?.lineCounts).toEqual({
      Python: 3,
      Golang: 0,
      Bash: 0,
      C: 0,
      Rust: 1,
      'C++': 0,
      Assembly: 0,
    });
  });

  it('should fail when the repositories directory cannot be read', async () => {
    await expect(collectRepoStats(join(root, 'missing'), { now: NOW })).rejects.toBeInstanceOf(CollectionError);
  });
});
