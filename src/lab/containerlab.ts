// src/lab/containerlab.ts — SR Linux node discovery from `containerlab inspect --format json`.
// Newer containerlab releases key the node list by lab name ({ "poc": [...] }), older ones
// emit a bare array or { "lab_nodes": [...] }; all three are accepted.
import { z } from 'zod';
import type { Executor } from '../execution/executor.js';
import { LabError, LabErrorCode } from '../shared/errors.js';
import { logger } from '../logger.js';

export const SRLINUX_KIND = 'nokia_srlinux';
const INSPECT_TIMEOUT_MS = 30_000;

const nodeSchema = z
  .object({
    name: z.string(),
    kind: z.string(),
    state: z.string().optional(),
    ipv4_address: z.string().optional(),
  })
  .passthrough();

export interface LabNode {
  /** Container name, e.g. clab-poc-leaf1. */
  readonly name: string;
  /** Name with the node prefix removed, e.g. leaf1. */
  readonly shortName: string;
  readonly kind: string;
  readonly state?: string;
  readonly mgmtIpv4?: string;
}

export function parseInspectOutput(stdout: string, nodePrefix: string): LabNode[] {
  let data: unknown;
  try {
    data = JSON.parse(stdout);
  } catch {
    throw new LabError(LabErrorCode.PARSE_FAILED, 'containerlab inspect did not return JSON');
  }

  const candidates: unknown[] = [];
  if (Array.isArray(data)) {
    candidates.push(...data);
  } else if (typeof data === 'object' && data !== null) {
    for (const value of Object.values(data)) {
      if (Array.isArray(value)) candidates.push(...value);
    }
  }

  const nodes: LabNode[] = [];
  for (const candidate of candidates) {
    const parsed = nodeSchema.safeParse(candidate);
    if (!parsed.success) continue;
    const { name, kind, state, ipv4_address } = parsed.data;
    nodes.push({
      name,
      shortName: nodePrefix && name.startsWith(nodePrefix) ? name.slice(nodePrefix.length) : name,
      kind,
      state,
      // inspect reports "172.20.20.2/24"
      mgmtIpv4: ipv4_address ? ipv4_address.split('/')[0] : undefined,
    });
  }
  return nodes;
}

export async function discoverNodes(executor: Executor, nodePrefix: string, kind = SRLINUX_KIND): Promise<LabNode[]> {
  const result = await executor.execute({ argv: ['containerlab', 'inspect', '--format', 'json'] }, INSPECT_TIMEOUT_MS);
  if (result.exitCode !== 0) {
    throw new LabError(LabErrorCode.LAB_NOT_DEPLOYED, 'Lab topology is not deployed (containerlab inspect failed)', {
      stderr: result.stderr.trim(),
    });
  }
  const nodes = parseInspectOutput(result.stdout, nodePrefix).filter((n) => n.kind === kind);
  if (nodes.length === 0) {
    throw new LabError(LabErrorCode.NO_DEVICES, `No ${kind} devices found in the topology`);
  }
  nodes.sort((a, b) => a.shortName.localeCompare(b.shortName));
  logger.debug({ count: nodes.length }, 'discovered lab nodes');
  return nodes;
}
