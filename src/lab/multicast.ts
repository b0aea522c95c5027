// src/lab/multicast.ts — multicast delivery between two lab clients.
// The receiver runs a socat listener that joined the group and appends every datagram to a log;
// the sender is a short python3 loop started detached inside the sender container.
import { executeOrThrow, type Executor } from '../execution/executor.js';
import { discoverNodes } from './containerlab.js';
import { sleep } from '../shared/timing.js';
import { LabError, LabErrorCode } from '../shared/errors.js';
import { logger } from '../logger.js';

const COMMAND_TIMEOUT_MS = 15_000;
const SAMPLE_LIMIT = 5;

/** Found in the sender's command line; pkill -f matches on it. */
export const SENDER_MARKER = 'srl-lab-mcast-sender';

const PACKET_LINE = /(?:Multicast packet|Packet) \d{3}(?:\/\d+)? from \S+? at [\d:]+/g;

export interface MulticastStream {
  /** Sender container name, e.g. clab-poc-client8. */
  readonly container: string;
  /** Name written into every payload. */
  readonly senderName: string;
  readonly sourceIp: string;
  readonly group: string;
  readonly port: number;
  readonly packetCount: number;
  readonly durationSeconds: number;
}

export interface ReceiverState {
  readonly joined: boolean;
  readonly listening: boolean;
}

export type DeliveryStatus = 'complete' | 'acceptable' | 'lossy' | 'none';

export interface DeliveryResult {
  readonly expected: number;
  readonly received: number;
  /** Whole percent, rounded down. */
  readonly successRate: number;
  readonly status: DeliveryStatus;
  readonly passed: boolean;
}

export function assertMulticastGroup(group: string): void {
  const octets = group.split('.');
  const valid =
    octets.length === 4 &&
    octets.every((o) => /^\d{1,3}$/.test(o) && Number(o) <= 255) &&
    Number(octets[0]) >= 224 &&
    Number(octets[0]) <= 239;
  if (!valid) {
    throw new LabError(LabErrorCode.CONFIG_INVALID, `Not an IPv4 multicast group: ${group}`);
  }
}

/** `ip maddr show` lists one address per line after its family, e.g. "inet  239.0.0.1". */
export function hasGroup(maddrOutput: string, group: string): boolean {
  return maddrOutput.split('\n').some((line) => line.trim().split(/\s+/).includes(group));
}

export function isReceiverRunning(psOutput: string, group: string): boolean {
  return psOutput.split('\n').some((line) => {
    const at = line.indexOf('socat');
    return at >= 0 && line.indexOf(group, at) > at;
  });
}

/** socat appends payloads without separators, so count occurrences rather than lines. */
export function countPackets(log: string): number {
  return log.match(/packet/g)?.length ?? 0;
}

export function samplePackets(log: string, limit = SAMPLE_LIMIT): string[] {
  return (log.match(PACKET_LINE) ?? []).slice(0, limit);
}

export function evaluateDelivery(received: number, expected: number, minSuccessRate: number): DeliveryResult {
  const successRate = expected > 0 ? Math.floor((received * 100) / expected) : 0;
  let status: DeliveryStatus;
  if (received === 0) status = 'none';
  else if (received >= expected) status = 'complete';
  else if (successRate >= minSuccessRate) status = 'acceptable';
  else status = 'lossy';
  return { expected, received, successRate, status, passed: status === 'complete' || status === 'acceptable' };
}

export function senderScript(stream: MulticastStream): string {
  return [
    `# ${SENDER_MARKER}`,
    'import socket, time',
    `GROUP, PORT, SRC = '${stream.group}', ${stream.port}, '${stream.sourceIp}'`,
    `COUNT, INTERVAL = ${stream.packetCount}, ${stream.durationSeconds} / ${stream.packetCount}`,
    'sock = socket.socket(socket.AF_INET, socket.SOCK_DGRAM, socket.IPPROTO_UDP)',
    'sock.setsockopt(socket.IPPROTO_IP, socket.IP_MULTICAST_TTL, 64)',
    'sock.bind((SRC, 0))',
    'for i in range(COUNT):',
    `    msg = 'Multicast packet %03d/%d from ${stream.senderName} at %s' % (i + 1, COUNT, time.strftime('%H:%M:%S'))`,
    '    sock.sendto(msg.encode(), (GROUP, PORT))',
    '    time.sleep(INTERVAL)',
    'sock.close()',
  ].join('\n');
}

export function senderArgv(stream: MulticastStream): string[] {
  return ['docker', 'exec', '-d', stream.container, 'python3', '-c', senderScript(stream)];
}

/** Both clients must be running containers of the deployed lab. */
export async function ensureClients(executor: Executor, nodePrefix: string, clients: readonly string[]): Promise<void> {
  const nodes = await discoverNodes(executor, nodePrefix, 'linux');
  const present = new Set(nodes.map((n) => n.shortName));
  const missing = clients.filter((c) => !present.has(c));
  if (missing.length > 0) {
    throw new LabError(
      LabErrorCode.NO_DEVICES,
      `${missing.map((c) => `${nodePrefix}${c}`).join(', ')} not found in the topology`,
    );
  }
}

export async function checkReceiver(
  executor: Executor,
  container: string,
  iface: string,
  group: string,
): Promise<ReceiverState> {
  const maddr = await executor.execute(
    { argv: ['docker', 'exec', container, 'ip', 'maddr', 'show', 'dev', iface] },
    COMMAND_TIMEOUT_MS,
  );
  const joined = maddr.exitCode === 0 && hasGroup(maddr.stdout, group);
  const ps = await executor.execute({ argv: ['docker', 'exec', container, 'ps', 'aux'] }, COMMAND_TIMEOUT_MS);
  return { joined, listening: ps.exitCode === 0 && isReceiverRunning(ps.stdout, group) };
}

export async function clearLog(executor: Executor, container: string, logPath: string): Promise<void> {
  await executeOrThrow(executor, { argv: ['docker', 'exec', container, 'sh', '-c', `> ${logPath}`] }, COMMAND_TIMEOUT_MS);
}

/** Missing or unreadable log reads as empty. */
export async function readLog(executor: Executor, container: string, logPath: string): Promise<string> {
  const result = await executor.execute({ argv: ['docker', 'exec', container, 'cat', logPath] }, COMMAND_TIMEOUT_MS);
  return result.exitCode === 0 ? result.stdout : '';
}

export async function startSender(executor: Executor, stream: MulticastStream): Promise<void> {
  await executeOrThrow(executor, { argv: senderArgv(stream) }, COMMAND_TIMEOUT_MS);
  logger.debug({ container: stream.container, group: stream.group, port: stream.port }, 'multicast sender started');
}

/** pkill exits 1 once the sender has already finished. */
export async function stopSender(executor: Executor, container: string): Promise<void> {
  const result = await executor.execute(
    { argv: ['docker', 'exec', container, 'pkill', '-f', SENDER_MARKER] },
    COMMAND_TIMEOUT_MS,
  );
  logger.debug({ container, exitCode: result.exitCode }, 'multicast sender stopped');
}

export interface MonitorOptions {
  readonly durationSeconds: number;
  readonly pollIntervalSeconds: number;
  readonly signal?: AbortSignal;
  readonly clock?: () => number;
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Called each time the count grows. */
  readonly onProgress?: (received: number) => void;
}

/**
 * Re-reads the receive count every poll interval until the duration has passed,
 * and returns the last count read.
 */
export async function monitorReception(count: () => Promise<number>, options: MonitorOptions): Promise<number> {
  const clock = options.clock ?? (() => performance.now());
  const wait = options.sleep ?? sleep;
  const durationMs = options.durationSeconds * 1000;
  const pollMs = options.pollIntervalSeconds * 1000;

  const startedAt = clock();
  let received = 0;
  let reported = 0;
  while (!options.signal?.aborted) {
    const remainingMs = durationMs - (clock() - startedAt);
    if (remainingMs <= 0) break;
    await wait(Math.min(pollMs, remainingMs), options.signal);
    received = await count();
    if (received > reported) {
      reported = received;
      options.onProgress?.(received);
    }
  }
  return received;
}
