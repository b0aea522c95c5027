// src/lab/bgp.ts — BGP neighbor session state over JSON-RPC, and the wait-until-established loop.
import type { StateReader } from './jsonrpc.js';
import type { DeviceTarget } from './types.js';
import { mapSettled } from '../shared/pool.js';
import { sleep } from '../shared/timing.js';
import { LabError, LabErrorCode, errorMessage } from '../shared/errors.js';

export interface BgpNeighbor {
  readonly peerAddress: string;
  readonly sessionState: string;
  readonly description?: string;
  readonly peerGroup?: string;
}

export type DeviceSessions =
  | {
      readonly device: string;
      readonly status: 'ok';
      readonly neighbors: readonly BgpNeighbor[];
      readonly established: number;
      readonly total: number;
    }
  | { readonly device: string; readonly status: 'error'; readonly error: string };

export interface FabricSessions {
  readonly devices: readonly DeviceSessions[];
  readonly established: number;
  readonly total: number;
}

export function neighborPath(networkInstance: string): string {
  return `/network-instance[name=${networkInstance}]/protocols/bgp/neighbor[peer-address=*]`;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/** Neighbors from a JSON-RPC result; the list key may carry a module prefix. */
export function parseNeighbors(result: unknown): BgpNeighbor[] {
  if (!isObject(result)) {
    throw new LabError(LabErrorCode.PARSE_FAILED, 'BGP neighbor result is not an object');
  }
  const key = Object.keys(result).find((k) => k === 'neighbor' || k.endsWith(':neighbor'));
  if (!key) return [];
  const list = result[key];
  if (!Array.isArray(list)) return [];

  return list.filter(isObject).map((n) => ({
    peerAddress: optionalString(n['peer-address']) ?? 'unknown',
    sessionState: optionalString(n['session-state']) ?? 'unknown',
    description: optionalString(n['description']),
    peerGroup: optionalString(n['peer-group']),
  }));
}

export function isEstablished(neighbor: BgpNeighbor): boolean {
  return neighbor.sessionState.toLowerCase() === 'established';
}

export function summarizeDevice(device: string, neighbors: readonly BgpNeighbor[]): DeviceSessions {
  return {
    device,
    status: 'ok',
    neighbors,
    established: neighbors.filter(isEstablished).length,
    total: neighbors.length,
  };
}

export function summarizeFabric(devices: readonly DeviceSessions[]): FabricSessions {
  let established = 0;
  let total = 0;
  for (const d of devices) {
    if (d.status !== 'ok') continue;
    established += d.established;
    total += d.total;
  }
  return { devices, established, total };
}

export function allEstablished(snapshot: FabricSessions): boolean {
  return snapshot.total > 0 && snapshot.established === snapshot.total;
}

export async function pollSessions(
  reader: StateReader,
  targets: readonly DeviceTarget[],
  networkInstance: string,
  concurrency: number,
): Promise<FabricSessions> {
  const path = neighborPath(networkInstance);
  const settled = await mapSettled(targets, concurrency, async (t) => parseNeighbors(await reader.getState(t.host, path)));
  const devices = settled.map((outcome, i): DeviceSessions => {
    const device = targets[i].device;
    return outcome.ok ? summarizeDevice(device, outcome.value) : { device, status: 'error', error: errorMessage(outcome.error) };
  });
  return summarizeFabric(devices);
}

export type WaitOutcome = 'established' | 'timeout' | 'cancelled';

export interface WaitResult {
  readonly outcome: WaitOutcome;
  readonly snapshot: FabricSessions;
  readonly elapsedSeconds: number;
  readonly polls: number;
}

export interface WaitOptions {
  timeoutSeconds: number;
  intervalSeconds: number;
  signal?: AbortSignal;
  clock?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onPoll?: (snapshot: FabricSessions, elapsedSeconds: number) => void;
}

/** Poll until every session is established (with at least one session), the timeout passes, or abort. */
export async function waitForSessions(poll: () => Promise<FabricSessions>, options: WaitOptions): Promise<WaitResult> {
  if (!(options.timeoutSeconds > 0) || !(options.intervalSeconds > 0)) {
    throw new LabError(LabErrorCode.CONFIG_INVALID, 'BGP wait timeout and interval must be greater than zero');
  }
  const clock = options.clock ?? (() => performance.now());
  const wait = options.sleep ?? sleep;
  const timeoutMs = options.timeoutSeconds * 1000;
  const started = clock();
  let polls = 0;

  for (;;) {
    const snapshot = await poll();
    polls++;
    const elapsedMs = clock() - started;
    const elapsedSeconds = elapsedMs / 1000;
    options.onPoll?.(snapshot, elapsedSeconds);

    if (allEstablished(snapshot)) return { outcome: 'established', snapshot, elapsedSeconds, polls };
    if (options.signal?.aborted) return { outcome: 'cancelled', snapshot, elapsedSeconds, polls };
    if (elapsedMs >= timeoutMs) return { outcome: 'timeout', snapshot, elapsedSeconds, polls };

    await wait(Math.min(options.intervalSeconds * 1000, timeoutMs - elapsedMs), options.signal);
  }
}
