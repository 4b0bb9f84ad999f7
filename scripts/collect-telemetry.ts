import { statfs } from 'fs/promises';
import { freemem, loadavg, totalmem, uptime } from 'os';
import type { Logger } from 'pino';
import { CollectionWarning, errorMessage } from './errors';
import { silentLogger } from './logger';
import type { CollectionResult, TelemetrySample, TelemetryUnit } from './types';

/** Reporting order of the built-in metrics. */
export const TELEMETRY_METRICS = [
  'disk_used',
  'disk_free',
  'memory_used',
  'memory_free',
  'uptime',
  'load_average_1m',
  'load_average_5m',
  'load_average_15m',
] as const;

export type TelemetryMetric = (typeof TELEMETRY_METRICS)[number];

export interface DiskStats {
  blocks: number;
  bfree: number;
  bavail: number;
  bsize: number;
}

export interface TelemetrySource {
  statfs(path: string): Promise<DiskStats>;
  totalmem(): number;
  freemem(): number;
  uptime(): number;
  loadavg(): number[];
}

export const osTelemetrySource: TelemetrySource = {
  statfs: path => statfs(path),
  totalmem,
  freemem,
  uptime,
  loadavg,
};

export interface TelemetryCollectorOptions {
  now: Date;
  mounts?: string[];
  source?: TelemetrySource;
  logger?: Logger;
}

function percent(part: number, whole: number): number {
  if (whole <= 0) return 0;
  return Math.round((part / whole) * 1000) / 10;
}

/** Used share as `df` computes it: blocks reserved for root are not counted as available. */
export function diskUsedPercent(disk: DiskStats): number {
  const used = disk.blocks - disk.bfree;
  return percent(used, used + disk.bavail);
}

export async function collectTelemetry(
  options: TelemetryCollectorOptions,
): Promise<CollectionResult<TelemetrySample>> {
  const { now, mounts = ['/'], source = osTelemetrySource, logger = silentLogger } = options;
  const items: TelemetrySample[] = [];
  const warnings: CollectionWarning[] = [];

  const sample = (metricName: TelemetryMetric, value: number, unit: TelemetryUnit, subject?: string) => {
    items.push(subject === undefined
      ? { metricName, value, unit, timestamp: now }
      : { metricName, value, unit, timestamp: now, subject });
  };

  const skip = (sourceName: string, error: unknown) => {
    const warning = new CollectionWarning(sourceName, `Skipped ${sourceName}: ${errorMessage(error)}`, { cause: error });
    logger.warn({ source: sourceName, err: error }, warning.message);
    warnings.push(warning);
  };

  for (const mount of mounts) {
    try {
      const disk = await source.statfs(mount);
      sample('disk_used', diskUsedPercent(disk), 'percent', mount);
      sample('disk_free', disk.bavail * disk.bsize, 'bytes', mount);
    } catch (error) {
      skip(`disk ${mount}`, error);
    }
  }

  try {
    const total = source.totalmem();
    const free = source.freemem();
    sample('memory_used', percent(total - free, total), 'percent');
    sample('memory_free', free, 'bytes');
  } catch (error) {
    skip('memory', error);
  }

  try {
    sample('uptime', Math.floor(source.uptime()), 'seconds');
  } catch (error) {
    skip('uptime', error);
  }

  try {
    const [one = 0, five = 0, fifteen = 0] = source.loadavg();
    sample('load_average_1m', one, 'load');
    sample('load_average_5m', five, 'load');
    sample('load_average_15m', fifteen, 'load');
  } catch (error) {
    skip('load average', error);
  }

  logger.debug({ samples: items.length }, 'Collected telemetry');
  return { items, warnings };
}
