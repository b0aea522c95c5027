/**
 * lldp command
 *
 * Validates LLDP neighbors on every device against the cabling cutsheet.
 */

import type { LabContext } from './context.js';
import { resolveTargets } from './context.js';
import { loadCutsheet, verifyLldp, type LldpCheck, type LldpReport } from '../lab/lldp.js';
import { bad, heading, ok, warn } from '../report/format.js';

export interface LldpOptions {
  devices?: string;
  cutsheet?: string;
  verbose?: boolean;
}

export function formatCheck(c: LldpCheck): string {
  const expected = c.expected ? `${c.expected.device}:${c.expected.interface}` : '';
  const observed = c.observed ? `${c.observed.systemName}:${c.observed.portId}` : '';
  switch (c.result) {
    case 'pass':
      return `${c.device} ${c.interface} -> ${observed} ${ok('OK')}`;
    case 'fail':
      return `${c.device} ${c.interface} -> ${observed} ${bad(`MISMATCH (expected ${expected})`)}`;
    case 'unexpected':
      return `${c.device} ${c.interface} -> ${observed} ${warn('not in cutsheet')}`;
    case 'missing':
      return `${c.device} ${c.interface} ${bad(`MISSING (expected ${expected})`)}`;
  }
}

export function formatLldpReport(report: LldpReport, verbose: boolean): string[] {
  const lines = report.errors.map((e) => bad(`${e.device}: ERROR (${e.error})`));
  for (const c of report.checks) {
    if (verbose || c.result !== 'pass') lines.push(formatCheck(c));
  }
  return lines;
}

export async function lldpCommand(ctx: LabContext, options: LldpOptions): Promise<number> {
  const cutsheetPath = options.cutsheet ?? ctx.config.lldp.cutsheet;
  const links = await loadCutsheet(cutsheetPath);
  const targets = await resolveTargets(ctx, options.devices);

  ctx.out(heading('LLDP Neighbor Verification'));
  ctx.out(`Cutsheet: ${cutsheetPath} (${links.length} links)`);
  const report = await verifyLldp(ctx.stateReader, targets, links, ctx.config.polling.concurrency);
  for (const line of formatLldpReport(report, options.verbose ?? false)) ctx.out(line);

  const t = report.totals;
  ctx.out('');
  ctx.out(heading('LLDP Summary'));
  ctx.out(`Checks: ${t.total}, passed ${t.pass}, failed ${t.fail}, missing ${t.missing}, not in cutsheet ${t.unexpected}`);
  ctx.out(report.passed ? ok('All LLDP neighbors match the cutsheet') : bad('LLDP verification failed'));
  return report.passed ? 0 : 1;
}
