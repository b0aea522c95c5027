/**
 * bgp command
 *
 * Polls BGP neighbor state on every device until all sessions are established
 * or the timeout passes. Exit 0 only when every session came up.
 */

import type { LabContext } from './context.js';
import { resolveTargets } from './context.js';
import { pollSessions, waitForSessions, type DeviceSessions, type FabricSessions } from '../lab/bgp.js';
import { bad, heading, ok, ratio, warn } from '../report/format.js';

export interface BgpOptions {
  devices?: string;
  networkInstance?: string;
  timeout?: number;
  interval?: number;
  verbose?: boolean;
  signal?: AbortSignal;
  clock?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export function formatSessionDetail(devices: readonly DeviceSessions[]): string[] {
  const lines: string[] = [];
  for (const d of devices) {
    if (d.status === 'error') {
      lines.push(bad(`${d.device}: ERROR (${d.error})`));
      continue;
    }
    if (d.total === 0) continue;
    lines.push(
      d.established === d.total
        ? ok(`${d.device}: All ${d.total} sessions established`)
        : warn(`${d.device}: ${d.established}/${d.total} sessions established`),
    );
    for (const n of d.neighbors) {
      let peer = n.description ? `${n.peerAddress} (${n.description})` : n.peerAddress;
      if (n.peerGroup) peer += ` [${n.peerGroup}]`;
      const state = n.sessionState.toLowerCase() === 'established' ? ok('established') : bad(n.sessionState);
      lines.push(`  ${peer}: ${state}`);
    }
  }
  return lines;
}

export function formatProgress(snapshot: FabricSessions, elapsedSeconds: number, timeoutSeconds: number): string {
  const elapsed = Math.floor(elapsedSeconds);
  const remaining = Math.max(0, timeoutSeconds - elapsed);
  return `[${elapsed}s/${timeoutSeconds}s] BGP Sessions: ${ratio(snapshot.established, snapshot.total)} established (${remaining}s remaining)`;
}

export async function bgpCommand(ctx: LabContext, options: BgpOptions): Promise<number> {
  const timeoutSeconds = options.timeout ?? ctx.config.bgp.timeout_seconds;
  const intervalSeconds = options.interval ?? ctx.config.bgp.interval_seconds;
  const networkInstance = options.networkInstance ?? ctx.config.bgp.network_instance;
  const targets = await resolveTargets(ctx, options.devices);

  ctx.out(heading('BGP Session Test'));
  ctx.out(`Devices: ${targets.map((t) => t.device).join(' ')}`);
  ctx.out(`Timeout: ${timeoutSeconds}s, Poll interval: ${intervalSeconds}s`);
  ctx.out('');

  const result = await waitForSessions(
    () => pollSessions(ctx.stateReader, targets, networkInstance, ctx.config.polling.concurrency),
    {
      timeoutSeconds,
      intervalSeconds,
      signal: options.signal,
      clock: options.clock,
      sleep: options.sleep,
      onPoll: (snapshot, elapsed) => {
        ctx.out(formatProgress(snapshot, elapsed, timeoutSeconds));
        if (options.verbose) for (const line of formatSessionDetail(snapshot.devices)) ctx.out(`  ${line}`);
      },
    },
  );

  ctx.out('');
  ctx.out(heading('Detailed BGP Peer Status'));
  for (const line of formatSessionDetail(result.snapshot.devices)) ctx.out(line);
  ctx.out('');

  switch (result.outcome) {
    case 'established':
      ctx.out(ok('Success: All BGP sessions are established!'));
      return 0;
    case 'cancelled':
      ctx.out(warn('Stopped by operator before all BGP sessions were established'));
      return 1;
    case 'timeout':
      ctx.out(
        result.snapshot.total === 0
          ? bad('Failed: No BGP sessions found')
          : bad(`Failed: ${result.snapshot.total - result.snapshot.established} sessions not established within ${timeoutSeconds}s`),
      );
      return 1;
  }
}
