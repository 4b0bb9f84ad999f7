import { format, formatDuration, subDays } from 'date-fns';
import { TELEMETRY_METRICS } from './collect-telemetry';
import { RenderError } from './errors';
import { LANGUAGES } from './types';
import type { RenderedMessage, RepoStat, Report, ReportSection, TelemetrySample } from './types';

const TIME_FORMAT = 'yyyy-MM-dd HH:mm';
const SUMMARY_TITLE = 'Summary';
const TELEMETRY_TITLE = 'Telemetry';
const BYTE_UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB', 'PiB'];

export interface CommitReportOptions {
  windowHours?: number;
}

function assertCount(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RenderError(`${label} must be a non-negative integer, got ${value}`);
  }
}

function assertDate(value: Date, label: string): void {
  if (isNaN(value.getTime())) {
    throw new RenderError(`${label} is not a valid date`);
  }
}

function validateRepoStat(stat: RepoStat): void {
  if (!stat.name) {
    throw new RenderError('Repository name is empty');
  }
  assertCount(stat.commitCount, `${stat.name} commit count`);
  assertCount(stat.weeklyCommitCount, `${stat.name} weekly commit count`);
  if (stat.lastCommitTime) {
    assertDate(stat.lastCommitTime, `${stat.name} last commit time`);
  }
  for (const commit of stat.recentCommits) {
    assertDate(commit.date, `${stat.name} commit ${commit.hash}`);
  }
  for (const language of LANGUAGES) {
    assertCount(stat.lineCounts[language], `${stat.name} ${language} line count`);
  }
}

function validateSample(sample: TelemetrySample): void {
  if (!Number.isFinite(sample.value)) {
    throw new RenderError(`${sample.metricName} has a non-finite value`);
  }
  assertDate(sample.timestamp, `${sample.metricName} timestamp`);
}

function byName(a: RepoStat, b: RepoStat): number {
  return a.name.localeCompare(b.name, 'en');
}

/** Consecutive days with a commit in any repository, counting back from the day before `generatedAt`. */
export function streak(stats: RepoStat[], generatedAt: Date): number {
  const days = new Set(stats.flatMap(stat => stat.commitDays));
  let count = 0;
  let day = subDays(generatedAt, 1);

  while (days.has(format(day, 'yyyy-MM-dd'))) {
    count++;
    day = subDays(day, 1);
  }

  return count;
}

function formatDecimal(value: number): string {
  return Number(value.toFixed(1)).toString();
}

export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${bytes} B` : `${value.toFixed(1)} ${BYTE_UNITS[unit]}`;
}

export function formatSeconds(seconds: number): string {
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const text = seconds < 60
    ? formatDuration({ seconds })
    : formatDuration({ days, hours, minutes });
  return text || '0 seconds';
}

export function formatSampleValue(sample: TelemetrySample): string {
  switch (sample.unit) {
    case 'percent':
      return `${formatDecimal(sample.value)}%`;
    case 'bytes':
      return formatBytes(sample.value);
    case 'seconds':
      return formatSeconds(sample.value);
    case 'load':
      return sample.value.toFixed(2);
  }
}

function metricRank(metricName: string): number {
  const index = TELEMETRY_METRICS.findIndex(metric => metric === metricName);
  return index === -1 ? TELEMETRY_METRICS.length : index;
}

export function orderSamples(samples: TelemetrySample[]): TelemetrySample[] {
  return [...samples].sort((a, b) =>
    metricRank(a.metricName) - metricRank(b.metricName)
    || a.metricName.localeCompare(b.metricName, 'en')
    || (a.subject ?? '').localeCompare(b.subject ?? '', 'en'));
}

function summarySection(stats: RepoStat[], generatedAt: Date, windowHours: number): ReportSection {
  const inWindow = stats.reduce((sum, stat) => sum + stat.commitCount, 0);
  const inWeek = stats.reduce((sum, stat) => sum + stat.weeklyCommitCount, 0);

  const lines = [
    `Commits in the last ${windowHours} hours (across all repos): ${inWindow}`,
    `Commits in the last week (across all repos): ${inWeek}`,
    `Consecutive previous days with a commit: ${streak(stats, generatedAt)}`,
    'Total current lines (across all repos) of...',
  ];

  for (const language of LANGUAGES) {
    const total = stats.reduce((sum, stat) => sum + stat.lineCounts[language], 0);
    lines.push(`${language}: ${total}`);
  }

  return { title: SUMMARY_TITLE, body: lines.join('\n') };
}

function repoSection(stat: RepoStat, windowHours: number): ReportSection {
  const contributors = Array.from(stat.contributors).sort((a, b) => a.localeCompare(b, 'en'));

  const lines = [
    `Commits in the last ${windowHours} hours: ${stat.commitCount}`,
    `Contributors: ${contributors.length > 0 ? contributors.join(', ') : 'none'}`,
    `Last commit: ${stat.lastCommitTime ? format(stat.lastCommitTime, TIME_FORMAT) : 'never'}`,
    'Activity from the last week:',
  ];

  if (stat.recentCommits.length === 0) {
    lines.push('No activity');
  } else {
    for (const commit of stat.recentCommits) {
      lines.push(`${commit.hash.slice(0, 7)} ${commit.subject}`);
    }
  }

  return { title: stat.name, body: lines.join('\n') };
}

function telemetrySection(samples: TelemetrySample[]): ReportSection {
  samples.forEach(validateSample);

  const lines = orderSamples(samples).map(sample => {
    const label = sample.subject ? `${sample.metricName} (${sample.subject})` : sample.metricName;
    return `${label}: ${formatSampleValue(sample)}`;
  });

  return {
    title: TELEMETRY_TITLE,
    body: lines.length > 0 ? lines.join('\n') : 'No telemetry collected',
  };
}

function commitSections(stats: RepoStat[], generatedAt: Date, options: CommitReportOptions): ReportSection[] {
  assertDate(generatedAt, 'Report time');
  stats.forEach(validateRepoStat);

  const windowHours = options.windowHours ?? 24;
  const sorted = [...stats].sort(byName);

  return [
    summarySection(sorted, generatedAt, windowHours),
    ...sorted.map(stat => repoSection(stat, windowHours)),
  ];
}

export function buildCommitReport(
  stats: RepoStat[],
  generatedAt: Date,
  options: CommitReportOptions = {},
): Report {
  return {
    title: 'Commit Report',
    generatedAt,
    sections: commitSections(stats, generatedAt, options),
  };
}

export function buildServerReport(samples: TelemetrySample[], generatedAt: Date): Report {
  assertDate(generatedAt, 'Report time');
  return {
    title: 'Server Report',
    generatedAt,
    sections: [telemetrySection(samples)],
  };
}

export function buildDailyReport(
  stats: RepoStat[],
  samples: TelemetrySample[],
  generatedAt: Date,
  options: CommitReportOptions = {},
): Report {
  return {
    title: 'Daily Report',
    generatedAt,
    sections: [...commitSections(stats, generatedAt, options), telemetrySection(samples)],
  };
}

export function renderText(report: Report): string {
  return report.sections
    .map(section => `=== ${section.title} ===\n${section.body}\n`)
    .join('\n');
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function renderHtml(report: Report): string {
  const sections = report.sections
    .map(section => `
    <h2>${escapeHtml(section.title)}</h2>
    <pre>${escapeHtml(section.body)}</pre>`)
    .join('');

  return `<!DOCTYPE html>
<html>
  <head>
    <meta charset="utf-8">
    <title>${escapeHtml(report.title)}</title>
  </head>
  <body style="font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', sans-serif">
    <h1>${escapeHtml(report.title)}</h1>
    <p>Generated ${format(report.generatedAt, TIME_FORMAT)}</p>${sections}
  </body>
</html>
`;
}

export function renderMessage(report: Report, options: { html?: boolean } = {}): RenderedMessage {
  const message: RenderedMessage = {
    subject: `${report.title} ${format(report.generatedAt, TIME_FORMAT)}`,
    text: renderText(report),
  };
  if (options.html) {
    message.html = renderHtml(report);
  }
  return message;
}
