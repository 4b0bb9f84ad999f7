import type { CollectionWarning } from './errors';

export const LANGUAGES = ['Python', 'Golang', 'Bash', 'C', 'Rust', 'C++', 'Assembly'] as const;

export type Language = (typeof LANGUAGES)[number];

export type LineCounts = Record<Language, number>;

export interface CommitRecord {
  hash: string;
  date: Date;
  author: string;
  subject: string;
}

export interface RepoStat {
  name: string;
  path: string;
  /** Commits inside the report window. */
  commitCount: number;
  weeklyCommitCount: number;
  lastCommitTime: Date | null;
  /** Authors of the commits inside the report window. */
  contributors: ReadonlySet<string>;
  /** Last seven days, newest first. */
  recentCommits: CommitRecord[];
  /** Distinct local days (yyyy-MM-dd) with a commit, newest first. */
  commitDays: string[];
  lineCounts: LineCounts;
}

export type TelemetryUnit = 'percent' | 'bytes' | 'seconds' | 'load';

export interface TelemetrySample {
  metricName: string;
  value: number;
  unit: TelemetryUnit;
  timestamp: Date;
  /** Qualifier such as the mount point of a disk metric. */
  subject?: string;
}

export interface ReportSection {
  title: string;
  body: string;
}

export interface Report {
  title: string;
  generatedAt: Date;
  sections: ReportSection[];
}

export interface RenderedMessage {
  subject: string;
  text: string;
  html?: string;
}

export interface EmailCredential {
  username: string;
  appPassword: string;
}

export interface CollectionResult<T> {
  items: T[];
  warnings: CollectionWarning[];
}

export type ReportKind = 'commits' | 'server' | 'daily';
