/**
 * lag command
 *
 * Discovers lag* interfaces on every device and checks oper state and LACP member status.
 */

import type { LabContext } from './context.js';
import { resolveTargets } from './context.js';
import { verifyLags, type LagReport } from '../lab/lag.js';
import { bad, heading, ok, ratio, warn } from '../report/format.js';

export interface LagOptions {
  devices?: string;
  verbose?: boolean;
}

export function formatLagReport(report: LagReport, verbose: boolean): string[] {
  const lines: string[] = [];
  for (const d of report.devices) {
    if (d.status === 'error') {
      lines.push(bad(`${d.device}: ERROR (${d.error})`));
      continue;
    }
    if (d.lags.length === 0) {
      lines.push(`${d.device}: no LAG interfaces`);
      continue;
    }
    for (const lag of d.lags) {
      const state = lag.healthy ? ok('healthy') : bad(`oper-state ${lag.operState}`);
      lines.push(`${d.device} ${lag.name} (${lag.lagType}): ${state}, members ${ratio(lag.activeMembers, lag.members.length)} up`);
      if (verbose || !lag.healthy) {
        for (const m of lag.members) {
          lines.push(`  ${m.name}: ${m.operState === 'up' ? ok('up') : bad(m.operState)}`);
        }
      }
    }
  }
  return lines;
}

export async function lagCommand(ctx: LabContext, options: LagOptions): Promise<number> {
  const targets = await resolveTargets(ctx, options.devices);
  ctx.out(heading('LAG Configuration Verification'));
  const report = await verifyLags(ctx.stateReader, targets, ctx.config.polling.concurrency);
  for (const line of formatLagReport(report, options.verbose ?? false)) ctx.out(line);

  const t = report.totals;
  ctx.out('');
  ctx.out(heading('LAG Summary'));
  ctx.out(`LAGs: ${t.lags} total, ${ok(`${t.healthy} healthy`)}, ${t.failed > 0 ? bad(`${t.failed} failed`) : '0 failed'}`);
  ctx.out(`Members: ${ratio(t.activeMembers, t.members)} active`);
  if (t.lags === 0) ctx.out(warn('No LAG interfaces found'));
  ctx.out(report.passed ? ok('All LAGs are healthy') : bad('LAG verification failed'));
  return report.passed ? 0 : 1;
}
