import type { Logger } from 'pino';
import { basename } from 'path';
import type { GitReaderFactory } from '../scripts/collect-repos';
import type { TelemetrySource } from '../scripts/collect-telemetry';
import { emptyLineCounts } from '../scripts/collect-repos';
import { createLogger } from '../scripts/logger';
import type { RepoStat } from '../scripts/types';

export const NOW = new Date(2026, 9, 18, 12, 0, 0);

export interface FakeRepo {
  log?: string;
  files?: string;
  /** What `rev-parse --show-toplevel` prints; defaults to the repository itself. */
  toplevel?: string;
  error?: Error;
}

export function logLine(hash: string, date: Date, author: string, subject: string): string {
  return [hash, date.toISOString(), author, subject].join('\x1f');
}

/** Git reader keyed by the repository directory name. */
export function fakeGit(repos: Record<string, FakeRepo>): GitReaderFactory {
  return repoPath => ({
    async raw(args: string[]) {
      const repo = repos[basename(repoPath)] ?? {};
      if (args[0] === 'rev-parse') return `${repo.toplevel ?? repoPath}\n`;
      if (repo.error) throw repo.error;
      if (args[0] === 'log') return repo.log ?? '';
      if (args[0] === 'ls-files') return repo.files ?? '';
      throw new Error(`unexpected git ${args.join(' ')}`);
    },
  });
}

export function fakeTelemetry(overrides: Partial<TelemetrySource> = {}): TelemetrySource {
  return {
    statfs: async () => ({ blocks: 1000, bfree: 580, bavail: 580, bsize: 4096 }),
    totalmem: () => 8 * 1024 ** 3,
    freemem: () => 2 * 1024 ** 3,
    uptime: () => 619385.7,
    loadavg: () => [0.08, 0.03, 0.01],
    ...overrides,
  };
}

export function makeRepoStat(overrides: Partial<RepoStat> & Pick<RepoStat, 'name'>): RepoStat {
  return {
    path: `/srv/repos/${overrides.name}`,
    commitCount: 0,
    weeklyCommitCount: 0,
    lastCommitTime: null,
    contributors: new Set<string>(),
    recentCommits: [],
    commitDays: [],
    lineCounts: emptyLineCounts(),
    ...overrides,
  };
}

export interface CapturedLogger {
  logger: Logger;
  entries: Array<{ level: string; msg: string } & Record<string, unknown>>;
}

/** A pino logger whose JSON lines are kept in memory. */
export function captureLogger(): CapturedLogger {
  const entries: CapturedLogger['entries'] = [];
  const logger = createLogger({ level: 'debug' }, {
    write(line: string) {
      entries.push(JSON.parse(line));
    },
  });
  return { logger, entries };
}
