/**
 * connectivity command
 *
 * Pings between lab clients from inside their containers.
 *   connectivity [matrix]        every configured /24, one subnet at a time
 *   connectivity <a.b.c>         one subnet
 *   connectivity comprehensive   every address to every other client's addresses
 *                                (same as --comprehensive)
 */

import type { LabContext } from './context.js';
import {
  assertClients,
  configuredSubnets,
  planComprehensive,
  planSubnet,
  runPingTests,
  summarize,
  type ConnectivitySummary,
  type PingTest,
} from '../lab/connectivity.js';
import { LabError, LabErrorCode } from '../shared/errors.js';
import { bad, heading, ok, warn } from '../report/format.js';

export interface ConnectivityOptions {
  /** A /24 prefix such as "10.255.10", or the mode words "matrix" and "comprehensive". */
  subnet?: string;
  comprehensive?: boolean;
  /** Percentage of pings that must succeed for a group to pass. */
  minSuccessRate?: number;
}

export function formatSummary(summary: ConnectivitySummary, minSuccessRate: number): string[] {
  const lines: string[] = [];
  let source = '';
  for (const r of summary.results) {
    if (r.sourceClient !== source) {
      source = r.sourceClient;
      lines.push(warn(`From ${r.sourceClient}:`));
    }
    const status = r.passed ? ok('OK') : bad('FAIL');
    lines.push(`  ${r.sourceIp} -> ${r.targetClient} (${r.targetIp}): ${status}`);
  }
  const counts = `${summary.passed}/${summary.total} (${summary.successRate}%)`;
  if (summary.passed === summary.total) {
    lines.push(ok(`${summary.name}: all ${summary.total} tests passed`));
  } else if (summary.successRate >= minSuccessRate) {
    lines.push(warn(`${summary.name}: ${counts} passed, within the ${minSuccessRate}% threshold`));
  } else {
    lines.push(bad(`${summary.name}: ${counts} passed`));
  }
  return lines;
}

export async function connectivityCommand(ctx: LabContext, options: ConnectivityOptions): Promise<number> {
  const cfg = ctx.config.connectivity;
  const clients = cfg.clients;
  assertClients(clients);
  const minSuccessRate = options.minSuccessRate ?? 100;

  const comprehensive = options.comprehensive === true || options.subnet === 'comprehensive';
  const subnet = options.subnet === 'matrix' ? undefined : options.subnet;

  const groups: { name: string; tests: PingTest[] }[] = [];
  if (comprehensive) {
    groups.push({ name: 'Comprehensive', tests: planComprehensive(clients) });
  } else if (subnet) {
    const known = configuredSubnets(clients);
    if (!known.includes(subnet)) {
      throw new LabError(LabErrorCode.CONFIG_INVALID, `Unknown subnet ${subnet} (configured: ${known.join(', ')})`);
    }
    groups.push({ name: `${subnet}.0/24`, tests: planSubnet(clients, subnet) });
  } else {
    for (const subnet of configuredSubnets(clients)) {
      groups.push({ name: `${subnet}.0/24`, tests: planSubnet(clients, subnet) });
    }
  }

  let failedGroups = 0;
  for (const group of groups) {
    ctx.out(heading(`${group.name} connectivity`));
    if (group.tests.length === 0) {
      ctx.out(warn('No client pairs to test'));
      continue;
    }
    const results = await runPingTests(ctx.executor, group.tests, {
      nodePrefix: ctx.config.lab.node_prefix,
      count: cfg.ping_count,
      waitSeconds: cfg.ping_wait_seconds,
      concurrency: cfg.concurrency,
    });
    const summary = summarize(group.name, results);
    for (const line of formatSummary(summary, minSuccessRate)) ctx.out(line);
    if (summary.successRate < minSuccessRate) failedGroups++;
    ctx.out('');
  }

  ctx.out(failedGroups === 0 ? ok('All connectivity tests passed') : bad(`${failedGroups} of ${groups.length} test groups failed`));
  return failedGroups === 0 ? 0 : 1;
}
