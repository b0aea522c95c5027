import { mkdtempSync, readFileSync, readdirSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { chartRoutesCommand } from '../../../src/commands/chart-routes.js';
import { LabError, LabErrorCode } from '../../../src/shared/errors.js';
import { FakeExecutor, fakeTime, testContext } from '../../helpers/fakes.js';

function afiSafiResponse(received: number): string {
  return JSON.stringify([
    {
      updates: [
        {
          values: {
            'afi-safi': [
              { 'afi-safi-name': 'srl_nokia-common:ipv4-unicast', 'received-routes': received, 'active-routes': received },
            ],
          },
        },
      ],
    },
  ]);
}

describe('chartRoutesCommand', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'srl-lab-chart-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('samples, reports convergence and writes the data files', async () => {
    const leaf1Counts = [0, 150, 300];
    let leaf1Calls = 0;
    const executor = new FakeExecutor((argv) => {
      if (argv[2] === 'clab-poc-leaf2:57400') return { exitCode: 1, stderr: 'unreachable' };
      return { stdout: afiSafiResponse(leaf1Counts[leaf1Calls++]) };
    });
    const { ctx, lines } = testContext({ executor });
    const time = fakeTime();

    const code = await chartRoutesCommand(ctx, {
      devices: 'leaf1,clab-poc-leaf2',
      families: 'ipv4-unicast',
      duration: 3,
      interval: 1,
      outputDir: dir,
      startValues: '100',
      endValues: '300',
      clock: time.clock,
      sleep: time.sleep,
      now: () => new Date('2026-01-01T00:00:00Z'),
    });

    expect(code).toBe(0);
    expect(lines).toEqual([
      '=== BGP route statistics ===',
      "Families: ipv4-unicast in network-instance 'default' on 2 device(s)",
      'Collection duration: 3s, interval 1s',
      'Press ENTER or Ctrl-C to stop data collection early.',
      '',
      '=== Convergence ===',
      'leaf1: 3 samples over 3 ticks',
      '  ipv4-unicast/total (100 -> 300): start 1.00s, end 2.00s, convergence 1.00s, rate 200.00 routes/sec',
      'leaf2: no samples collected (3 failed fetches)',
      '',
      `Wrote ${join(dir, 'route_stats_1767225600.json')}`,
      `Wrote ${join(dir, 'route_stats_1767225600_leaf1.csv')}`,
      'Some devices returned no data.',
    ]);
    expect(readFileSync(join(dir, 'route_stats_1767225600_leaf1.csv'), 'utf-8')).toBe(
      'elapsed_seconds,ipv4-unicast/total,ipv4-unicast/active\n0.00,0,0\n1.00,150,150\n2.00,300,300\n',
    );
  });

  it('exits 1 and writes nothing when every device failed', async () => {
    const executor = new FakeExecutor(() => ({ exitCode: 1, stderr: 'unreachable' }));
    const { ctx, lines } = testContext({ executor });
    const time = fakeTime();

    const code = await chartRoutesCommand(ctx, {
      devices: 'leaf1',
      duration: 2,
      interval: 1,
      outputDir: dir,
      clock: time.clock,
      sleep: time.sleep,
    });

    expect(code).toBe(1);
    expect(lines[lines.length - 1]).toBe('No data collected from any device.');
    expect(readdirSync(dir)).toEqual([]);
  });

  it('rejects thresholds that cannot converge before polling any device', async () => {
    const executor = new FakeExecutor();
    const { ctx } = testContext({ executor });
    const err = await chartRoutesCommand(ctx, {
      devices: 'leaf1',
      families: 'ipv4-unicast',
      startValues: '500',
      endValues: '400',
    }).catch((e: unknown) => e);
    expect(err instanceof LabError && err.code).toBe(LabErrorCode.CONFIG_INVALID);
    expect(executor.calls).toEqual([]);
  });

  it('rejects an unsupported protocol', async () => {
    const { ctx } = testContext({});
    await expect(chartRoutesCommand(ctx, { devices: 'leaf1', protocol: 'isis' })).rejects.toThrow(
      'Protocol isis is not supported (supported: bgp)',
    );
  });
});
