/**
 * chart-routes command
 *
 * Samples BGP received/active route counts per address family on every device,
 * then reports convergence time and rate for the requested start/end values.
 * Collected data is written to <output_dir>/<prefix>_<epoch>.json and one CSV per device.
 */

import type { LabContext } from './context.js';
import { resolveTargets } from './context.js';
import { collect } from '../convergence/sampler.js';
import { buildConvergenceConfig, parseIntegerList } from '../convergence/config.js';
import { assertSupportedProtocol, routeCountFetcher, routeMetric } from '../lab/routes.js';
import {
  TableReporter,
  buildOutcomes,
  reportPassed,
  writeReportFiles,
  type ConvergenceReport,
} from '../report/convergence-report.js';
import { bad, dim, heading, warn } from '../report/format.js';
import { logger } from '../logger.js';

export interface ChartRoutesOptions {
  devices?: string;
  networkInstance?: string;
  protocol?: string;
  families?: string;
  duration?: number;
  interval?: number;
  output?: string;
  outputDir?: string;
  startValues?: string;
  endValues?: string;
  /** Operator early-stop. */
  signal?: AbortSignal;
  /** Injected for tests. */
  clock?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => Date;
}

/** Returns the process exit code. */
export async function chartRoutesCommand(ctx: LabContext, options: ChartRoutesOptions): Promise<number> {
  const chart = ctx.config.chart;
  const polling = ctx.config.polling;
  const protocol = options.protocol ?? chart.protocol;
  const networkInstance = options.networkInstance ?? chart.network_instance;
  const families = options.families
    ? options.families.split(',').map((f) => f.trim()).filter((f) => f.length > 0)
    : [...chart.families];

  assertSupportedProtocol(protocol);

  const targets = await resolveTargets(ctx, options.devices);
  const hosts = targets.map((t) => t.host);
  const deviceByHost = new Map(targets.map((t) => [t.host, t.device]));

  const conv = buildConvergenceConfig({
    devices: hosts,
    metrics: families.map((f) => routeMetric(f, 'total')),
    durationSeconds: options.duration ?? polling.duration_seconds,
    intervalSeconds: options.interval ?? polling.interval_seconds,
    startValues: options.startValues === undefined ? undefined : parseIntegerList(options.startValues, 'start values'),
    endValues: options.endValues === undefined ? undefined : parseIntegerList(options.endValues, 'end values'),
  });

  const now = options.now ?? (() => new Date());
  const startedAt = now();
  ctx.out(heading(`${protocol.toUpperCase()} route statistics`));
  ctx.out(`Families: ${families.join(', ')} in network-instance '${networkInstance}' on ${targets.length} device(s)`);
  ctx.out(`Collection duration: ${conv.durationSeconds}s, interval ${conv.intervalSeconds}s`);
  ctx.out(dim('Press ENTER or Ctrl-C to stop data collection early.'));

  const seriesByHost = await collect(conv.devices, routeCountFetcher(ctx.gnmic, networkInstance, families), {
    durationSeconds: conv.durationSeconds,
    intervalSeconds: conv.intervalSeconds,
    fetchTimeoutSeconds: polling.fetch_timeout_seconds ?? undefined,
    concurrency: polling.concurrency,
    signal: options.signal,
    clock: options.clock,
    sleep: options.sleep,
    onTick: (tick) => {
      logger.debug({ tick: tick.tick, elapsed: tick.elapsedSeconds, failed: tick.failed.length }, 'tick complete');
    },
  });

  const seriesByDevice = new Map([...seriesByHost].map(([host, series]) => [deviceByHost.get(host) ?? host, series]));
  const report: ConvergenceReport = {
    startedAt: startedAt.toISOString(),
    durationSeconds: conv.durationSeconds,
    intervalSeconds: conv.intervalSeconds,
    devices: buildOutcomes(seriesByDevice, conv.targets),
  };

  ctx.out('');
  ctx.out(heading(conv.targets.length > 0 ? 'Convergence' : 'Collection summary'));
  for (const line of new TableReporter().render(report)) ctx.out(line);

  if (report.devices.every((d) => d.state === 'no-samples')) {
    ctx.out(bad('No data collected from any device.'));
    return 1;
  }

  const outputDir = options.outputDir ?? chart.output_dir;
  const prefix = options.output ?? chart.output_prefix;
  const written = await writeReportFiles(report, outputDir, prefix, Math.floor(startedAt.getTime() / 1000));
  ctx.out('');
  for (const path of written) ctx.out(`Wrote ${path}`);

  if (report.devices.some((d) => d.state === 'no-samples')) {
    ctx.out(warn('Some devices returned no data.'));
  }
  return reportPassed(report) ? 0 : 1;
}
