import { LAG_PATH, parseLags, summarizeLags, verifyLags } from '../../../src/lab/lag.js';
import { FakeStateReader } from '../../helpers/fakes.js';

const lagResult = {
  'srl_nokia-interfaces:interface': [
    {
      name: 'lag1',
      'admin-state': 'enable',
      'oper-state': 'up',
      'srl_nokia-interfaces-lag:lag': {
        'lag-type': 'lacp',
        member: [
          { name: 'ethernet-1/1', 'oper-state': 'up' },
          { name: 'ethernet-1/2', 'oper-state': 'up' },
        ],
      },
    },
    {
      name: 'lag2',
      'admin-state': 'enable',
      'oper-state': 'up',
      'srl_nokia-interfaces-lag:lag': {
        'lag-type': 'lacp',
        member: [
          { name: 'ethernet-1/3', 'oper-state': 'up' },
          { name: 'ethernet-1/4', 'oper-state': 'down' },
        ],
      },
    },
    { name: 'ethernet-1/49', 'oper-state': 'up' },
  ],
};

describe('parseLags', () => {
  it('reads LAGs with their members and skips other interfaces', () => {
    const lags = parseLags(lagResult);
    expect(lags.map((l) => l.name)).toEqual(['lag1', 'lag2']);
    expect(lags[0]).toEqual({
      name: 'lag1',
      adminState: 'enable',
      operState: 'up',
      lagType: 'lacp',
      members: [
        { name: 'ethernet-1/1', operState: 'up' },
        { name: 'ethernet-1/2', operState: 'up' },
      ],
      activeMembers: 2,
      healthy: true,
    });
    expect(lags[1].activeMembers).toBe(1);
    expect(lags[1].healthy).toBe(false);
  });

  it('marks a LAG without members as unhealthy', () => {
    const [lag] = parseLags({ interface: [{ name: 'lag3', 'oper-state': 'up' }] });
    expect(lag.members).toEqual([]);
    expect(lag.lagType).toBe('unknown');
    expect(lag.healthy).toBe(false);
  });

  it('returns nothing for an empty result', () => {
    expect(parseLags({})).toEqual([]);
    expect(parseLags(undefined)).toEqual([]);
  });
});

describe('summarizeLags', () => {
  it('fails when any device is unreachable even if every LAG is healthy', () => {
    const healthy = parseLags(lagResult).slice(0, 1);
    const report = summarizeLags([
      { device: 'leaf1', status: 'ok', lags: healthy },
      { device: 'leaf2', status: 'error', error: 'timeout' },
    ]);
    expect(report.totals).toEqual({ lags: 1, healthy: 1, failed: 0, members: 2, activeMembers: 2 });
    expect(report.passed).toBe(false);
  });
});

describe('verifyLags', () => {
  it('reads the LAG path from every target', async () => {
    const reader = new FakeStateReader(() => lagResult);
    const report = await verifyLags(reader, [{ device: 'leaf1', host: 'clab-poc-leaf1' }], 2);
    expect(reader.calls).toEqual([{ host: 'clab-poc-leaf1', path: LAG_PATH }]);
    expect(report.totals).toEqual({ lags: 2, healthy: 1, failed: 1, members: 4, activeMembers: 3 });
    expect(report.passed).toBe(false);
  });
});
