/**
 * multicast command
 *
 * Sends a burst of UDP datagrams from the sender client to a multicast group and counts
 * how many the receiver client logged. The receiver's socat listener is set up by the lab
 * topology; this command only checks that it is there.
 */

import type { LabContext } from './context.js';
import {
  assertMulticastGroup,
  checkReceiver,
  clearLog,
  countPackets,
  ensureClients,
  evaluateDelivery,
  monitorReception,
  readLog,
  samplePackets,
  startSender,
  stopSender,
  type DeliveryResult,
} from '../lab/multicast.js';
import { bad, dim, heading, ok, plural, warn } from '../report/format.js';

export interface MulticastOptions {
  group?: string;
  port?: number;
  duration?: number;
  verbose?: boolean;
  signal?: AbortSignal;
  clock?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export function formatDelivery(result: DeliveryResult, minSuccessRate: number): string[] {
  const lines = [`Expected packets: ${result.expected}`, `Received packets: ${result.received}`];
  if (result.received > 0) lines.push(`Success rate: ${result.successRate}%`);
  switch (result.status) {
    case 'complete':
      lines.push(ok('All packets received'));
      break;
    case 'acceptable':
      lines.push(ok(`Most packets received (acceptable, at least ${minSuccessRate}%)`));
      break;
    case 'lossy':
      lines.push(warn('Some packets lost'));
      break;
    case 'none':
      lines.push(bad('No packets received'));
      break;
  }
  return lines;
}

export async function multicastCommand(ctx: LabContext, options: MulticastOptions): Promise<number> {
  const cfg = ctx.config.multicast;
  const prefix = ctx.config.lab.node_prefix;
  const group = options.group ?? cfg.group;
  assertMulticastGroup(group);
  const port = options.port ?? cfg.port;
  const durationSeconds = options.duration ?? cfg.duration_seconds;
  const receiver = `${prefix}${cfg.receiver}`;
  const sender = `${prefix}${cfg.sender}`;

  ctx.out(heading('Multicast Traffic Verification'));
  await ensureClients(ctx.executor, prefix, [cfg.receiver, cfg.sender]);
  ctx.out(ok('Lab is deployed and client containers are running'));

  const state = await checkReceiver(ctx.executor, receiver, cfg.receiver_interface, group);
  if (!state.joined) {
    ctx.out(bad(`${cfg.receiver} has not joined multicast group ${group}`));
    ctx.out(dim(`Check the receiver: docker exec ${receiver} ps aux | grep socat`));
    return 1;
  }
  ctx.out(ok(`${cfg.receiver} is a member of multicast group ${group}`));
  if (!state.listening) {
    ctx.out(bad('socat receiver process is not running'));
    return 1;
  }
  ctx.out(ok('socat receiver process is running'));

  await clearLog(ctx.executor, receiver, cfg.receiver_log);
  ctx.out(
    `Sending ${plural(cfg.packet_count, 'packet')} from ${cfg.source_ip} to ${group}:${port} over ${durationSeconds}s`,
  );
  await startSender(ctx.executor, {
    container: sender,
    senderName: cfg.sender,
    sourceIp: cfg.source_ip,
    group,
    port,
    packetCount: cfg.packet_count,
    durationSeconds,
  });

  let log = '';
  let received: number;
  try {
    // One extra poll for datagrams still in flight when the sender finishes.
    received = await monitorReception(
      async () => {
        log = await readLog(ctx.executor, receiver, cfg.receiver_log);
        return countPackets(log);
      },
      {
        durationSeconds: durationSeconds + cfg.poll_interval_seconds,
        pollIntervalSeconds: cfg.poll_interval_seconds,
        signal: options.signal,
        clock: options.clock,
        sleep: options.sleep,
        onProgress: (n) => ctx.out(`  Received ${plural(n, 'packet')}...`),
      },
    );
  } finally {
    await stopSender(ctx.executor, sender);
  }

  const result = evaluateDelivery(received, cfg.packet_count, cfg.min_success_rate);
  ctx.out('');
  for (const line of formatDelivery(result, cfg.min_success_rate)) ctx.out(line);

  if (options.verbose) {
    ctx.out('');
    ctx.out('Sample received packets:');
    const samples = samplePackets(log);
    if (samples.length === 0) ctx.out(warn('  No packets captured'));
    for (const sample of samples) ctx.out(`  ${sample}`);
  }

  ctx.out('');
  ctx.out(heading('Verification Summary'));
  ctx.out(
    result.passed
      ? ok(`Multicast verification PASSED: ${cfg.receiver} received traffic from ${cfg.sender}`)
      : bad(`Multicast verification FAILED: ${cfg.receiver} did not receive the expected traffic from ${cfg.sender}`),
  );
  return result.passed ? 0 : 1;
}
