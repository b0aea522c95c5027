#!/usr/bin/env node

/**
 * srl-lab CLI
 *
 * Validation and route-convergence tooling for an SR Linux EVPN lab under Containerlab.
 *
 * Commands:
 *   srl-lab discover              List SR Linux nodes in the running lab
 *   srl-lab chart-routes          Sample BGP route counts and compute convergence
 *   srl-lab bgp                   Wait for all BGP sessions to establish
 *   srl-lab lag                   Verify LAG and LACP member state
 *   srl-lab lldp                  Check LLDP neighbors against the cutsheet
 *   srl-lab connectivity [subnet] Ping matrix between lab clients
 *   srl-lab multicast             Send multicast traffic between two clients and count deliveries
 */

import { createInterface } from 'node:readline';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { createContext, type LabContext } from './commands/context.js';
import { chartRoutesCommand, type ChartRoutesOptions } from './commands/chart-routes.js';
import { bgpCommand, type BgpOptions } from './commands/bgp.js';
import { lagCommand, type LagOptions } from './commands/lag.js';
import { lldpCommand, type LldpOptions } from './commands/lldp.js';
import { connectivityCommand } from './commands/connectivity.js';
import { discoverCommand } from './commands/discover.js';
import { multicastCommand, type MulticastOptions } from './commands/multicast.js';
import { errorMessage } from './shared/errors.js';

function positiveNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError('Must be a positive number.');
  }
  return n;
}

function percentage(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n < 0 || n > 100) {
    throw new InvalidArgumentError('Must be between 0 and 100.');
  }
  return n;
}

function portNumber(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1 || n > 65535) {
    throw new InvalidArgumentError('Must be a port between 1 and 65535.');
  }
  return n;
}

/** Aborts on Ctrl-C, or on ENTER when stdin is a terminal. */
function operatorStop(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once('SIGINT', onSigint);
  const rl = process.stdin.isTTY ? createInterface({ input: process.stdin }) : undefined;
  rl?.once('line', () => controller.abort());
  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', onSigint);
      rl?.close();
    },
  };
}

const program = new Command();

program
  .name('srl-lab')
  .description('SR Linux EVPN lab validation and route-convergence tooling')
  .version('0.1.0')
  .option('-c, --config <path>', 'Config file (default: ~/.config/srl-lab/config.yaml)');

async function run(action: (ctx: LabContext) => Promise<number>): Promise<void> {
  try {
    const ctx = createContext(program.opts<{ config?: string }>().config);
    process.exitCode = await action(ctx);
  } catch (error) {
    console.error(chalk.red('Error:'), errorMessage(error));
    process.exitCode = 1;
  }
}

program
  .command('discover')
  .description('List SR Linux nodes reported by containerlab inspect')
  .option('--json', 'Output as JSON')
  .action(async (options: { json?: boolean }) => {
    await run((ctx) => discoverCommand(ctx, options));
  });

program
  .command('chart-routes')
  .description('Sample BGP route counts over time and compute convergence time and rate')
  .option('-t, --devices <list>', 'Comma-separated devices (default: discover from containerlab)')
  .option('-n, --network-instance <name>', 'Network instance')
  .option('-P, --protocol <name>', 'Protocol to monitor')
  .option('-f, --families <list>', 'Comma-separated address families')
  .option('-d, --duration <seconds>', 'Collection duration', positiveNumber)
  .option('-i, --interval <seconds>', 'Sampling interval', positiveNumber)
  .option('-o, --output <prefix>', 'Output file prefix')
  .option('--output-dir <dir>', 'Output directory')
  .option('-s, --start-values <list>', 'Comma-separated start route counts, one per family')
  .option('-e, --end-values <list>', 'Comma-separated end route counts, one per family')
  .action(async (options: Omit<ChartRoutesOptions, 'signal' | 'clock' | 'sleep' | 'now'>) => {
    const stop = operatorStop();
    try {
      await run((ctx) => chartRoutesCommand(ctx, { ...options, signal: stop.signal }));
    } finally {
      stop.dispose();
    }
  });

program
  .command('bgp')
  .description('Wait for every BGP neighbor session to become established')
  .option('--devices <list>', 'Comma-separated devices (default: discover from containerlab)')
  .option('-n, --network-instance <name>', 'Network instance')
  .option('-t, --timeout <seconds>', 'Give up after this many seconds', positiveNumber)
  .option('-i, --interval <seconds>', 'Poll interval', positiveNumber)
  .option('-v, --verbose', 'Show per-peer state on every poll')
  .action(async (options: Omit<BgpOptions, 'signal' | 'clock' | 'sleep'>) => {
    const stop = operatorStop();
    try {
      await run((ctx) => bgpCommand(ctx, { ...options, signal: stop.signal }));
    } finally {
      stop.dispose();
    }
  });

program
  .command('lag')
  .description('Discover LAG interfaces and verify LACP member state')
  .option('--devices <list>', 'Comma-separated devices (default: discover from containerlab)')
  .option('-v, --verbose', 'Show members of healthy LAGs too')
  .action(async (options: LagOptions) => {
    await run((ctx) => lagCommand(ctx, options));
  });

program
  .command('lldp')
  .description('Validate LLDP neighbors against the cabling cutsheet')
  .option('--devices <list>', 'Comma-separated devices (default: discover from containerlab)')
  .option('--cutsheet <path>', 'Cutsheet CSV')
  .option('-v, --verbose', 'Show passing checks too')
  .action(async (options: LldpOptions) => {
    await run((ctx) => lldpCommand(ctx, options));
  });

program
  .command('connectivity [subnet]')
  .description('Ping matrix between lab clients; subnet is a /24 prefix such as 10.255.10, "matrix" (default) or "comprehensive"')
  .option('--comprehensive', 'Every client address to every other client address')
  .option('--min-success-rate <percent>', 'Pass a group when at least this share of pings succeed', percentage)
  .action(async (subnet: string | undefined, options: { comprehensive?: boolean; minSuccessRate?: number }) => {
    await run((ctx) => connectivityCommand(ctx, { ...options, subnet }));
  });

program
  .command('multicast')
  .description('Send multicast traffic from the sender client and count what the receiver logs')
  .option('-g, --group <address>', 'Multicast group')
  .option('-p, --port <port>', 'UDP port', portNumber)
  .option('-d, --duration <seconds>', 'How long the sender spreads its packets over', positiveNumber)
  .option('-v, --verbose', 'Show sample received packets')
  .action(async (options: Omit<MulticastOptions, 'signal' | 'clock' | 'sleep'>) => {
    const stop = operatorStop();
    try {
      await run((ctx) => multicastCommand(ctx, { ...options, signal: stop.signal }));
    } finally {
      stop.dispose();
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red('Error:'), errorMessage(error));
  process.exitCode = 1;
});
