// src/lab/connectivity.ts — ping matrix between lab clients, run inside the client containers.
import type { Executor } from '../execution/executor.js';
import { mapSettled } from '../shared/pool.js';
import { LabError, LabErrorCode, errorMessage } from '../shared/errors.js';

/** Client container name (without node prefix) -> addresses it owns. */
export type ClientAddresses = Readonly<Record<string, readonly string[]>>;

export interface PingTest {
  readonly sourceClient: string;
  readonly sourceIp: string;
  readonly targetClient: string;
  readonly targetIp: string;
}

export interface PingResult extends PingTest {
  readonly passed: boolean;
  readonly detail?: string;
}

export interface PingOptions {
  readonly nodePrefix: string;
  readonly count: number;
  readonly waitSeconds: number;
  readonly concurrency: number;
}

export interface ConnectivitySummary {
  readonly name: string;
  readonly results: readonly PingResult[];
  readonly passed: number;
  readonly total: number;
  /** Whole percent, rounded down. */
  readonly successRate: number;
}

/** "10.255.10.11" -> "10.255.10" */
export function subnetOf(ip: string): string {
  return ip.split('.').slice(0, 3).join('.');
}

/** Distinct /24 prefixes across all clients, in first-seen order. */
export function configuredSubnets(clients: ClientAddresses): string[] {
  const subnets = new Set<string>();
  for (const ips of Object.values(clients)) {
    for (const ip of ips) subnets.add(subnetOf(ip));
  }
  return [...subnets];
}

function endpoints(clients: ClientAddresses): { client: string; ip: string }[] {
  return Object.entries(clients).flatMap(([client, ips]) => ips.map((ip) => ({ client, ip })));
}

/** Every ordered pair of different clients holding an address in `subnet`. */
export function planSubnet(clients: ClientAddresses, subnet: string): PingTest[] {
  const members = endpoints(clients).filter((e) => subnetOf(e.ip) === subnet);
  const tests: PingTest[] = [];
  for (const src of members) {
    for (const dst of members) {
      if (src.client === dst.client) continue;
      tests.push({ sourceClient: src.client, sourceIp: src.ip, targetClient: dst.client, targetIp: dst.ip });
    }
  }
  return tests;
}

/** Every source address to every address of every other client, across subnets. */
export function planComprehensive(clients: ClientAddresses): PingTest[] {
  const all = endpoints(clients);
  const tests: PingTest[] = [];
  for (const src of all) {
    for (const dst of all) {
      if (src.client === dst.client) continue;
      tests.push({ sourceClient: src.client, sourceIp: src.ip, targetClient: dst.client, targetIp: dst.ip });
    }
  }
  return tests;
}

export function pingArgv(test: PingTest, options: Pick<PingOptions, 'nodePrefix' | 'count' | 'waitSeconds'>): string[] {
  return [
    'docker', 'exec', `${options.nodePrefix}${test.sourceClient}`,
    'ping', '-c', String(options.count), '-W', String(options.waitSeconds), '-I', test.sourceIp, test.targetIp,
  ];
}

export async function runPingTests(
  executor: Executor,
  tests: readonly PingTest[],
  options: PingOptions,
): Promise<PingResult[]> {
  // ping gives up after count * wait seconds; leave room for docker exec itself.
  const timeoutMs = (options.count * options.waitSeconds + 5) * 1000;
  const settled = await mapSettled(tests, options.concurrency, (test) =>
    executor.execute({ argv: pingArgv(test, options) }, timeoutMs),
  );
  return settled.map((outcome, i) => {
    const test = tests[i];
    if (!outcome.ok) return { ...test, passed: false, detail: errorMessage(outcome.error) };
    if (outcome.value.exitCode === 0) return { ...test, passed: true };
    return { ...test, passed: false, detail: outcome.value.stderr.trim() || `ping exited with ${outcome.value.exitCode}` };
  });
}

export function summarize(name: string, results: readonly PingResult[]): ConnectivitySummary {
  const passed = results.filter((r) => r.passed).length;
  const total = results.length;
  return { name, results, passed, total, successRate: total === 0 ? 0 : Math.floor((passed * 100) / total) };
}

export function assertClients(clients: ClientAddresses): void {
  if (Object.keys(clients).length === 0) {
    throw new LabError(
      LabErrorCode.CONFIG_INVALID,
      'No clients configured; add connectivity.clients to the config file',
    );
  }
}
