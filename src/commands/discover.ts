/**
 * discover command
 *
 * Lists the SR Linux nodes containerlab reports for the running lab.
 */

import type { LabContext } from './context.js';
import { discoverNodes } from '../lab/containerlab.js';
import { heading } from '../report/format.js';

export interface DiscoverOptions {
  json?: boolean;
}

export async function discoverCommand(ctx: LabContext, options: DiscoverOptions): Promise<number> {
  const nodes = await discoverNodes(ctx.executor, ctx.config.lab.node_prefix);
  if (options.json) {
    ctx.out(JSON.stringify(nodes, null, 2));
    return 0;
  }
  ctx.out(heading(`Discovered ${nodes.length} SR Linux devices`));
  for (const n of nodes) {
    ctx.out(`${n.shortName.padEnd(12)} ${n.name.padEnd(24)} ${n.mgmtIpv4 ?? '-'}  ${n.state ?? ''}`.trimEnd());
  }
  return 0;
}
