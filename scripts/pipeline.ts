import type { Logger } from 'pino';
import { collectRepoStats, type GitReaderFactory } from './collect-repos';
import { collectTelemetry, type TelemetrySource } from './collect-telemetry';
import { ConfigError } from './errors';
import type { CollectionWarning } from './errors';
import { silentLogger } from './logger';
import type { DeliveryReceipt, Notifier } from './notify';
import { buildCommitReport, buildDailyReport, buildServerReport, renderMessage } from './render-report';
import type { RenderedMessage, RepoStat, Report, ReportKind, TelemetrySample } from './types';

function writeStdout(text: string): void {
  process.stdout.write(text);
}

export interface RunOptions {
  kind: ReportKind;
  reposDir?: string;
  windowHours?: number;
  countLines?: boolean;
  mounts?: string[];
  html?: boolean;
  /** Print instead of sending. */
  dryRun?: boolean;
}

export interface RunDeps {
  notifier?: Notifier;
  now?: () => Date;
  git?: GitReaderFactory;
  telemetry?: TelemetrySource;
  logger?: Logger;
  write?: (text: string) => void;
}

export interface RunResult {
  report: Report;
  message: RenderedMessage;
  warnings: CollectionWarning[];
  receipt: DeliveryReceipt | null;
}

/**
 * One run: collect, build the report, then print or send it. Collection
 * warnings are returned; any other failure propagates to the caller.
 */
export async function runReport(options: RunOptions, deps: RunDeps = {}): Promise<RunResult> {
  const logger = deps.logger ?? silentLogger;
  const generatedAt = (deps.now ?? (() => new Date()))();
  const warnings: CollectionWarning[] = [];
  const wantsRepos = options.kind !== 'server';
  const wantsTelemetry = options.kind !== 'commits';

  let stats: RepoStat[] = [];
  if (wantsRepos) {
    if (!options.reposDir) {
      throw new ConfigError([{ path: 'reposDir', message: `required for the ${options.kind} report` }]);
    }
    logger.info({ reposDir: options.reposDir }, 'Scanning repositories');
    const result = await collectRepoStats(options.reposDir, {
      now: generatedAt,
      windowHours: options.windowHours,
      countLines: options.countLines,
      git: deps.git,
      logger,
    });
    stats = result.items;
    warnings.push(...result.warnings);
  }

  let samples: TelemetrySample[] = [];
  if (wantsTelemetry) {
    const result = await collectTelemetry({
      now: generatedAt,
      mounts: options.mounts,
      source: deps.telemetry,
      logger,
    });
    samples = result.items;
    warnings.push(...result.warnings);
  }

  const reportOptions = { windowHours: options.windowHours };
  const report = options.kind === 'commits'
    ? buildCommitReport(stats, generatedAt, reportOptions)
    : options.kind === 'server'
      ? buildServerReport(samples, generatedAt)
      : buildDailyReport(stats, samples, generatedAt, reportOptions);

  const message = renderMessage(report, { html: options.html });
  logger.debug({ subject: message.subject, sections: report.sections.length, warnings: warnings.length }, 'Report rendered');

  if (options.dryRun) {
    (deps.write ?? writeStdout)(message.text);
    return { report, message, warnings, receipt: null };
  }

  if (!deps.notifier) {
    throw new ConfigError([{ path: 'notifier', message: 'required unless this is a dry run' }]);
  }

  const receipt = await deps.notifier.send(message);
  return { report, message, warnings, receipt };
}
