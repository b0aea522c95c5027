// src/lab/lldp.ts — LLDP neighbor validation against a cabling cutsheet.
// Cutsheet columns: local_device,local_role,local_interface,remote_device,remote_role,remote_interface
// Rows touching a client (either role "client") are not LLDP speakers and are skipped.
import { readFile } from 'node:fs/promises';
import type { StateReader } from './jsonrpc.js';
import type { DeviceTarget } from './types.js';
import { mapSettled } from '../shared/pool.js';
import { LabError, LabErrorCode, errorMessage } from '../shared/errors.js';

export const LLDP_PATH = '/system/lldp';
const MGMT_INTERFACE = 'mgmt0';

export interface CutsheetLink {
  readonly localDevice: string;
  readonly localInterface: string;
  readonly remoteDevice: string;
  readonly remoteInterface: string;
}

export interface LldpNeighbor {
  readonly interface: string;
  readonly systemName: string;
  readonly portId: string;
}

export type CheckResult = 'pass' | 'fail' | 'unexpected' | 'missing';

export interface LldpCheck {
  readonly device: string;
  readonly interface: string;
  readonly result: CheckResult;
  readonly expected?: { readonly device: string; readonly interface: string };
  readonly observed?: { readonly systemName: string; readonly portId: string };
}

export interface LldpReport {
  readonly checks: readonly LldpCheck[];
  readonly errors: readonly { readonly device: string; readonly error: string }[];
  readonly totals: Readonly<Record<CheckResult, number>> & { readonly total: number };
  readonly passed: boolean;
}

const CUTSHEET_COLUMNS = 6;

export function parseCutsheet(content: string): CutsheetLink[] {
  const links: CutsheetLink[] = [];
  content.split(/\r?\n/).forEach((line, index) => {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) return;
    const fields = trimmed.split(',').map((f) => f.trim());
    if (fields[0] === 'local_device') return;
    if (fields.length !== CUTSHEET_COLUMNS) {
      throw new LabError(
        LabErrorCode.CUTSHEET_INVALID,
        `Cutsheet line ${index + 1} has ${fields.length} columns, expected ${CUTSHEET_COLUMNS}`,
      );
    }
    const [localDevice, localRole, localInterface, remoteDevice, remoteRole, remoteInterface] = fields;
    if (localRole === 'client' || remoteRole === 'client') return;
    links.push({ localDevice, localInterface, remoteDevice, remoteInterface });
  });
  return links;
}

export async function loadCutsheet(path: string): Promise<CutsheetLink[]> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    throw new LabError(LabErrorCode.CUTSHEET_INVALID, `Cannot read cutsheet ${path}: ${errorMessage(err)}`);
  }
  return parseCutsheet(content);
}

type Json = Record<string, unknown>;

function isObject(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function text(value: unknown): string {
  return typeof value === 'string' && value.length > 0 ? value : 'unknown';
}

export function parseLldpNeighbors(result: unknown): LldpNeighbor[] {
  if (!isObject(result)) return [];
  const key = Object.keys(result).find((k) => k === 'interface' || k.endsWith(':interface'));
  const interfaces = key === undefined ? undefined : result[key];
  if (!Array.isArray(interfaces)) return [];

  const neighbors: LldpNeighbor[] = [];
  for (const itf of interfaces.filter(isObject)) {
    const name = text(itf.name);
    if (name === MGMT_INTERFACE || !Array.isArray(itf.neighbor)) continue;
    for (const n of itf.neighbor.filter(isObject)) {
      neighbors.push({ interface: name, systemName: text(n['system-name']), portId: text(n['port-id']) });
    }
  }
  return neighbors;
}

/** Compare one device's observed neighbors with the cutsheet links that start on it. */
export function checkDevice(device: string, neighbors: readonly LldpNeighbor[], links: readonly CutsheetLink[]): LldpCheck[] {
  const expected = new Map(links.filter((l) => l.localDevice === device).map((l) => [l.localInterface, l]));
  const seen = new Set<string>();
  const checks: LldpCheck[] = [];

  for (const n of neighbors) {
    const observed = { systemName: n.systemName, portId: n.portId };
    const link = expected.get(n.interface);
    if (!link) {
      checks.push({ device, interface: n.interface, result: 'unexpected', observed });
      continue;
    }
    seen.add(n.interface);
    checks.push({
      device,
      interface: n.interface,
      result: n.systemName === link.remoteDevice ? 'pass' : 'fail',
      expected: { device: link.remoteDevice, interface: link.remoteInterface },
      observed,
    });
  }

  for (const [itf, link] of expected) {
    if (seen.has(itf)) continue;
    checks.push({
      device,
      interface: itf,
      result: 'missing',
      expected: { device: link.remoteDevice, interface: link.remoteInterface },
    });
  }
  return checks;
}

export function summarizeChecks(
  checks: readonly LldpCheck[],
  errors: readonly { device: string; error: string }[],
): LldpReport {
  const totals = { pass: 0, fail: 0, unexpected: 0, missing: 0, total: checks.length };
  for (const c of checks) totals[c.result]++;
  return { checks, errors, totals, passed: errors.length === 0 && totals.fail === 0 && totals.missing === 0 };
}

export async function verifyLldp(
  reader: StateReader,
  targets: readonly DeviceTarget[],
  links: readonly CutsheetLink[],
  concurrency: number,
): Promise<LldpReport> {
  const settled = await mapSettled(targets, concurrency, async (t) => parseLldpNeighbors(await reader.getState(t.host, LLDP_PATH)));
  const checks: LldpCheck[] = [];
  const errors: { device: string; error: string }[] = [];
  settled.forEach((outcome, i) => {
    const device = targets[i].device;
    if (outcome.ok) checks.push(...checkDevice(device, outcome.value, links));
    else errors.push({ device, error: errorMessage(outcome.error) });
  });
  return summarizeChecks(checks, errors);
}
