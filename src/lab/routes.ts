// src/lab/routes.ts — BGP route counts per address family from a gnmic afi-safi Get.
import type { GnmicClient } from './gnmic.js';
import type { MetricValues } from '../convergence/types.js';
import { LabError, LabErrorCode } from '../shared/errors.js';

/** Family names as SR Linux reports them under json_ietf encoding. */
export const SRL_FAMILY_NAMES: Readonly<Record<string, string>> = {
  'ipv4-unicast': 'srl_nokia-common:ipv4-unicast',
  'ipv6-unicast': 'srl_nokia-common:ipv6-unicast',
  evpn: 'srl_nokia-common:evpn',
};

export const SUPPORTED_PROTOCOLS = ['bgp'] as const;

export type RouteKind = 'total' | 'active';

export interface RouteCount {
  /** received-routes */
  readonly total: number;
  /** active-routes */
  readonly active: number;
}

export function routeMetric(family: string, kind: RouteKind): string {
  return `${family}/${kind}`;
}

export function afiSafiPath(networkInstance: string): string {
  return `/network-instance[name=${networkInstance}]/protocols/bgp/afi-safi`;
}

type Json = Record<string, unknown>;

function isObject(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toCount(value: unknown): number {
  if (typeof value === 'number' && Number.isInteger(value) && value >= 0) return value;
  if (typeof value === 'string' && /^\d+$/.test(value)) return Number(value);
  return 0;
}

// The afi-safi list shows up at different depths depending on how gnmic splits the
// notification, so walk everything and keep objects that carry an afi-safi-name.
function collectAfiSafi(value: unknown, out: Json[]): void {
  if (Array.isArray(value)) {
    for (const item of value) collectAfiSafi(item, out);
    return;
  }
  if (!isObject(value)) return;
  if (typeof value['afi-safi-name'] === 'string') {
    out.push(value);
    return;
  }
  for (const child of Object.values(value)) collectAfiSafi(child, out);
}

/**
 * Route counts for each requested family. Families the device did not report
 * count as zero.
 */
export function parseRouteCounts(response: unknown, families: readonly string[]): Record<string, RouteCount> {
  const entries: Json[] = [];
  const notifications = Array.isArray(response) ? response : [response];
  for (const notification of notifications) {
    if (!isObject(notification) || !Array.isArray(notification.updates)) continue;
    for (const update of notification.updates) {
      if (isObject(update)) collectAfiSafi(update.values, entries);
    }
  }

  const counts: Record<string, RouteCount> = {};
  for (const family of families) {
    const srlName = SRL_FAMILY_NAMES[family] ?? family;
    const entry = entries.find((e) => e['afi-safi-name'] === srlName || e['afi-safi-name'] === family);
    counts[family] = entry
      ? { total: toCount(entry['received-routes']), active: toCount(entry['active-routes']) }
      : { total: 0, active: 0 };
  }
  return counts;
}

export function toMetricValues(counts: Record<string, RouteCount>): MetricValues {
  const values: Record<string, number> = {};
  for (const [family, count] of Object.entries(counts)) {
    values[routeMetric(family, 'total')] = count.total;
    values[routeMetric(family, 'active')] = count.active;
  }
  return values;
}

export function assertSupportedProtocol(protocol: string): void {
  if (!SUPPORTED_PROTOCOLS.some((p) => p === protocol.toLowerCase())) {
    throw new LabError(LabErrorCode.CONFIG_INVALID, `Protocol ${protocol} is not supported (supported: bgp)`);
  }
}

/** Fetch function for the sampler: one gnmic Get per device per tick. */
export function routeCountFetcher(
  gnmic: GnmicClient,
  networkInstance: string,
  families: readonly string[],
): (target: string, signal: AbortSignal) => Promise<MetricValues> {
  const path = afiSafiPath(networkInstance);
  return async (target, signal) => toMetricValues(parseRouteCounts(await gnmic.get(target, path, signal), families));
}
