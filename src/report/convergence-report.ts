// src/report/convergence-report.ts — renders sampled series and convergence results.
// Renderers only format; every number they print was computed by the analyzer.
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ConvergenceResult, ConvergenceTarget, Series } from '../convergence/types.js';
import { analyzeAll } from '../convergence/analyzer.js';
import { bad, ok, plural, seconds, warn } from './format.js';

/** A device whose every fetch failed is 'no-samples', never a convergence miss. */
export type DeviceState = 'sampled' | 'no-samples';

export interface DeviceOutcome {
  readonly device: string;
  readonly state: DeviceState;
  readonly series: Series;
  readonly results: readonly ConvergenceResult[];
}

export interface ConvergenceReport {
  readonly startedAt: string;
  readonly durationSeconds: number;
  readonly intervalSeconds: number;
  readonly devices: readonly DeviceOutcome[];
}

export interface Reporter<T> {
  render(report: ConvergenceReport): T;
}

export function buildOutcomes(seriesByDevice: ReadonlyMap<string, Series>, targets: readonly ConvergenceTarget[]): DeviceOutcome[] {
  return [...seriesByDevice].map(([device, series]): DeviceOutcome => {
    if (series.samples.length === 0) {
      return { device, state: 'no-samples', series, results: [] };
    }
    return { device, state: 'sampled', series, results: analyzeAll(series, targets) };
  });
}

/** True when at least one device sampled and every requested convergence was found. */
export function reportPassed(report: ConvergenceReport): boolean {
  const sampled = report.devices.filter((d) => d.state === 'sampled');
  return sampled.length > 0 && sampled.every((d) => d.results.every((r) => r.status === 'found'));
}

export function formatResult(r: ConvergenceResult): string {
  const range = `${r.startValue} -> ${r.endValue}`;
  switch (r.status) {
    case 'found': {
      const times = `start ${seconds(r.startTime ?? 0)}, end ${seconds(r.endTime ?? 0)}, convergence ${seconds(r.convergenceTime ?? 0)}`;
      const rate = r.rate === undefined ? (r.note ?? 'rate undefined') : `rate ${r.rate.toFixed(2)} routes/sec`;
      return `${r.metric} (${range}): ${ok(`${times}, ${rate}`)}`;
    }
    case 'start-not-reached':
      return `${r.metric} (${range}): ${bad(`start value ${r.startValue} never reached`)}`;
    case 'end-not-reached':
      return `${r.metric} (${range}): ${bad(`start reached at ${seconds(r.startTime ?? 0)}, end value ${r.endValue} never reached`)}`;
    case 'invalid-range':
      return `${r.metric} (${range}): ${bad('invalid range, end value must exceed start value')}`;
  }
}

export function formatDevice(outcome: DeviceOutcome): string[] {
  const { device, series } = outcome;
  if (outcome.state === 'no-samples') {
    return [`${device}: ${bad(`no samples collected (${plural(series.gaps.length, 'failed fetch', 'failed fetches')})`)}`];
  }
  const summary = `${plural(series.samples.length, 'sample')} over ${plural(series.ticks, 'tick')}`;
  const gaps = series.gaps.length > 0 ? warn(`, ${plural(series.gaps.length, 'gap')}`) : '';
  return [`${device}: ${summary}${gaps}`, ...outcome.results.map((r) => `  ${formatResult(r)}`)];
}

export class TableReporter implements Reporter<string[]> {
  render(report: ConvergenceReport): string[] {
    return report.devices.flatMap((d) => formatDevice(d));
  }
}

export class JsonReporter implements Reporter<string> {
  render(report: ConvergenceReport): string {
    return JSON.stringify(
      {
        startedAt: report.startedAt,
        durationSeconds: report.durationSeconds,
        intervalSeconds: report.intervalSeconds,
        devices: report.devices.map((d) => ({
          device: d.device,
          state: d.state,
          ticks: d.series.ticks,
          samples: d.series.samples,
          gaps: d.series.gaps,
          results: d.results,
        })),
      },
      null,
      2,
    );
  }
}

/** Metric names across all samples, in first-seen order. */
export function metricColumns(series: Series): string[] {
  const columns = new Set<string>();
  for (const s of series.samples) {
    for (const metric of Object.keys(s.values)) columns.add(metric);
  }
  return [...columns];
}

/** One row per sample: elapsed seconds (2 decimals) then one column per metric. */
export function toCsv(series: Series): string {
  const columns = metricColumns(series);
  const lines = [['elapsed_seconds', ...columns].join(',')];
  for (const s of series.samples) {
    const cells = columns.map((c) => {
      const value = s.values[c];
      return value === undefined ? '' : String(value);
    });
    lines.push([s.elapsedSeconds.toFixed(2), ...cells].join(','));
  }
  return lines.join('\n') + '\n';
}

/** Writes <prefix>_<stamp>.json plus one <prefix>_<stamp>_<device>.csv per sampled device. */
export async function writeReportFiles(report: ConvergenceReport, dir: string, prefix: string, stamp: number): Promise<string[]> {
  await mkdir(dir, { recursive: true });
  const written: string[] = [];

  const jsonPath = join(dir, `${prefix}_${stamp}.json`);
  await writeFile(jsonPath, new JsonReporter().render(report) + '\n', 'utf-8');
  written.push(jsonPath);

  for (const d of report.devices) {
    if (d.state !== 'sampled') continue;
    const csvPath = join(dir, `${prefix}_${stamp}_${d.device}.csv`);
    await writeFile(csvPath, toCsv(d.series), 'utf-8');
    written.push(csvPath);
  }
  return written;
}
