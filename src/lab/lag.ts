// src/lab/lag.ts — LAG discovery and LACP member verification over JSON-RPC.
// One Get on /interface[name=lag*] returns every LAG with its members, so no per-LAG follow-up.
import type { StateReader } from './jsonrpc.js';
import type { DeviceTarget } from './types.js';
import { mapSettled } from '../shared/pool.js';
import { errorMessage } from '../shared/errors.js';

export const LAG_PATH = '/interface[name=lag*]';

export interface LagMember {
  readonly name: string;
  readonly operState: string;
}

export interface LagStatus {
  readonly name: string;
  readonly adminState: string;
  readonly operState: string;
  readonly lagType: string;
  readonly members: readonly LagMember[];
  readonly activeMembers: number;
  readonly healthy: boolean;
}

export type DeviceLags =
  | { readonly device: string; readonly status: 'ok'; readonly lags: readonly LagStatus[] }
  | { readonly device: string; readonly status: 'error'; readonly error: string };

export interface LagTotals {
  lags: number;
  healthy: number;
  failed: number;
  members: number;
  activeMembers: number;
}

export interface LagReport {
  readonly devices: readonly DeviceLags[];
  readonly totals: Readonly<LagTotals>;
  readonly passed: boolean;
}

type Json = Record<string, unknown>;

function isObject(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Value of the first key equal to `name` or ending in `:name` (YANG module prefix). */
function pick(obj: Json, name: string): unknown {
  const key = Object.keys(obj).find((k) => k === name || k.endsWith(`:${name}`));
  return key === undefined ? undefined : obj[key];
}

function text(value: unknown): string {
  return typeof value === 'string' && value.length > 0 ? value : 'unknown';
}

export function parseLags(result: unknown): LagStatus[] {
  if (!isObject(result)) return [];
  const interfaces = pick(result, 'interface');
  if (!Array.isArray(interfaces)) return [];

  return interfaces
    .filter(isObject)
    .filter((itf) => typeof itf.name === 'string' && itf.name.startsWith('lag'))
    .map((itf) => {
      const lag = pick(itf, 'lag');
      const lagObj = isObject(lag) ? lag : {};
      const rawMembers = lagObj.member;
      const members: LagMember[] = Array.isArray(rawMembers)
        ? rawMembers.filter(isObject).map((m) => ({ name: text(m.name), operState: text(m['oper-state']) }))
        : [];
      const activeMembers = members.filter((m) => m.operState === 'up').length;
      const operState = text(itf['oper-state']);
      return {
        name: text(itf.name),
        adminState: text(itf['admin-state']),
        operState,
        lagType: text(lagObj['lag-type']),
        members,
        activeMembers,
        healthy: operState === 'up' && members.length > 0 && activeMembers === members.length,
      };
    });
}

export function summarizeLags(devices: readonly DeviceLags[]): LagReport {
  const totals: LagTotals = { lags: 0, healthy: 0, failed: 0, members: 0, activeMembers: 0 };
  for (const d of devices) {
    if (d.status !== 'ok') continue;
    for (const lag of d.lags) {
      totals.lags++;
      if (lag.healthy) totals.healthy++;
      else totals.failed++;
      totals.members += lag.members.length;
      totals.activeMembers += lag.activeMembers;
    }
  }
  const reachable = devices.every((d) => d.status === 'ok');
  return { devices, totals, passed: reachable && totals.failed === 0 };
}

export async function verifyLags(
  reader: StateReader,
  targets: readonly DeviceTarget[],
  concurrency: number,
): Promise<LagReport> {
  const settled = await mapSettled(targets, concurrency, async (t) => parseLags(await reader.getState(t.host, LAG_PATH)));
  const devices = settled.map((outcome, i): DeviceLags => {
    const device = targets[i].device;
    return outcome.ok ? { device, status: 'ok', lags: outcome.value } : { device, status: 'error', error: errorMessage(outcome.error) };
  });
  return summarizeLags(devices);
}
