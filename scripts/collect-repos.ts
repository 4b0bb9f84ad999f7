import { simpleGit } from 'simple-git';
import { format, subDays, subHours } from 'date-fns';
import { readdir, readFile, realpath, stat } from 'fs/promises';
import { join } from 'path';
import type { Logger } from 'pino';
import { CollectionError, CollectionWarning, errorMessage } from './errors';
import { silentLogger } from './logger';
import { LANGUAGES } from './types';
import type { CollectionResult, CommitRecord, Language, LineCounts, RepoStat } from './types';

const LANGUAGE_EXTENSIONS: Record<Language, string[]> = {
  Python: ['.py'],
  Golang: ['.go'],
  Bash: ['.sh'],
  C: ['.c'],
  Rust: ['.rs'],
  'C++': ['.cc'],
  Assembly: ['.s', '.asm'],
};

const FIELD_SEPARATOR = '\x1f';
const LOG_FORMAT = ['%H', '%aI', '%an', '%s'].join('%x1f');
const NO_COMMITS_PATTERN = /does not have any commits yet/;

/** The part of simple-git the collector uses. */
export interface GitReader {
  raw(args: string[]): Promise<string>;
}

export type GitReaderFactory = (repoPath: string) => GitReader;

export interface RepoCollectorOptions {
  /** Reference time of the run. */
  now: Date;
  windowHours?: number;
  countLines?: boolean;
  git?: GitReaderFactory;
  logger?: Logger;
}

const defaultGit: GitReaderFactory = repoPath => simpleGit(repoPath);

export function emptyLineCounts(): LineCounts {
  return { Python: 0, Golang: 0, Bash: 0, C: 0, Rust: 0, 'C++': 0, Assembly: 0 };
}

export function languageOf(filename: string): Language | null {
  const lower = filename.toLowerCase();
  for (const language of LANGUAGES) {
    if (LANGUAGE_EXTENSIONS[language].some(ext => lower.endsWith(ext))) {
      return language;
    }
  }
  return null;
}

export function parseLog(log: string): CommitRecord[] {
  const commits: CommitRecord[] = [];

  for (const line of log.split('\n')) {
    if (!line.trim()) continue;

    const [hash, dateStr, author, ...subject] = line.split(FIELD_SEPARATOR);
    const date = new Date(dateStr ?? '');
    if (!hash || !author || isNaN(date.getTime())) continue;

    commits.push({
      hash,
      date,
      author,
      subject: subject.join(FIELD_SEPARATOR),
    });
  }

  return commits;
}

async function hasGitDir(repoPath: string): Promise<boolean> {
  return stat(join(repoPath, '.git')).then(() => true).catch(() => false);
}

/**
 * A broken `.git` makes git search upward, so a directory nested in another
 * checkout would otherwise report the parent's history.
 */
async function isRepositoryRoot(repoPath: string, git: GitReader): Promise<boolean> {
  try {
    const toplevel = (await git.raw(['rev-parse', '--show-toplevel'])).trim();
    const [actual, expected] = await Promise.all([realpath(toplevel), realpath(repoPath)]);
    return actual === expected;
  } catch {
    return false;
  }
}

async function readHistory(git: GitReader): Promise<CommitRecord[]> {
  try {
    const log = await git.raw(['log', `--pretty=format:${LOG_FORMAT}`]);
    return parseLog(log);
  } catch (error) {
    if (NO_COMMITS_PATTERN.test(errorMessage(error))) {
      return [];
    }
    throw error;
  }
}

async function countLines(repoPath: string, git: GitReader): Promise<LineCounts> {
  const counts = emptyLineCounts();
  // NUL-separated output keeps non-ASCII paths unquoted.
  const files = await git.raw(['ls-files', '-z']);

  for (const file of files.split('\0')) {
    const language = file ? languageOf(file) : null;
    if (!language) continue;

    // Tracked but deleted in the work tree.
    const content = await readFile(join(repoPath, file), 'utf-8').catch(() => null);
    if (content === null) continue;

    counts[language] += content.split('\n').length - 1;
  }

  return counts;
}

export function summarizeHistory(
  commits: CommitRecord[],
  now: Date,
  windowHours: number,
): Pick<RepoStat, 'commitCount' | 'weeklyCommitCount' | 'lastCommitTime' | 'contributors' | 'recentCommits' | 'commitDays'> {
  const windowStart = subHours(now, windowHours);
  const weekStart = subDays(now, 7);

  const sorted = [...commits].sort((a, b) => b.date.getTime() - a.date.getTime());
  const inWindow = sorted.filter(c => c.date > windowStart && c.date <= now);
  const recentCommits = sorted.filter(c => c.date > weekStart && c.date <= now);
  const commitDays = Array.from(new Set(sorted.map(c => format(c.date, 'yyyy-MM-dd'))));

  return {
    commitCount: inWindow.length,
    weeklyCommitCount: recentCommits.length,
    lastCommitTime: sorted[0]?.date ?? null,
    contributors: new Set(inWindow.map(c => c.author)),
    recentCommits,
    commitDays,
  };
}

async function readRepoStat(
  repoPath: string,
  name: string,
  git: GitReader,
  options: RepoCollectorOptions,
): Promise<RepoStat> {
  const commits = await readHistory(git);
  const lineCounts = options.countLines === false ? emptyLineCounts() : await countLines(repoPath, git);

  return {
    name,
    path: repoPath,
    ...summarizeHistory(commits, options.now, options.windowHours ?? 24),
    lineCounts,
  };
}

export async function collectRepoStat(
  repoPath: string,
  name: string,
  options: RepoCollectorOptions,
): Promise<RepoStat> {
  return readRepoStat(repoPath, name, (options.git ?? defaultGit)(repoPath), options);
}

/**
 * Reads every immediate subdirectory of `reposDir`. A subdirectory that is
 * not a readable repository is skipped with a warning.
 */
export async function collectRepoStats(
  reposDir: string,
  options: RepoCollectorOptions,
): Promise<CollectionResult<RepoStat>> {
  const logger = options.logger ?? silentLogger;

  const entries = await readdir(reposDir, { withFileTypes: true }).catch((error: unknown) => {
    throw new CollectionError(`Cannot read repositories directory ${reposDir}`, { cause: error });
  });

  const names = entries
    .filter(entry => entry.isDirectory() && !entry.name.startsWith('.'))
    .map(entry => entry.name)
    .sort((a, b) => a.localeCompare(b, 'en'));

  const items: RepoStat[] = [];
  const warnings: CollectionWarning[] = [];

  for (const name of names) {
    const repoPath = join(reposDir, name);
    const git = (options.git ?? defaultGit)(repoPath);

    if (!(await hasGitDir(repoPath)) || !(await isRepositoryRoot(repoPath, git))) {
      const warning = new CollectionWarning(name, `${name} is not a git repository`);
      logger.warn({ repo: name }, warning.message);
      warnings.push(warning);
      continue;
    }

    try {
      const repoStat = await readRepoStat(repoPath, name, git, options);
      logger.debug(
        { repo: name, commits: repoStat.commitCount, weekly: repoStat.weeklyCommitCount },
        'Collected repository',
      );
      items.push(repoStat);
    } catch (error) {
      const warning = new CollectionWarning(name, `Skipped ${name}: ${errorMessage(error)}`, { cause: error });
      logger.warn({ repo: name, err: error }, warning.message);
      warnings.push(warning);
    }
  }

  return { items, warnings };
}
