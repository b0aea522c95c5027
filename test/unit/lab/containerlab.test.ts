import { discoverNodes, parseInspectOutput } from '../../../src/lab/containerlab.js';
import { LabError, LabErrorCode } from '../../../src/shared/errors.js';
import { FakeExecutor } from '../../helpers/fakes.js';

const inspectByLab = JSON.stringify({
  poc: [
    { name: 'clab-poc-spine1', kind: 'nokia_srlinux', state: 'running', ipv4_address: '172.20.20.3/24' },
    { name: 'clab-poc-leaf1', kind: 'nokia_srlinux', state: 'running', ipv4_address: '172.20.20.2/24' },
    { name: 'clab-poc-client1', kind: 'linux', state: 'running', ipv4_address: '172.20.20.9/24' },
  ],
});

describe('parseInspectOutput', () => {
  it('reads nodes keyed by lab name and strips the prefix and mask', () => {
    const nodes = parseInspectOutput(inspectByLab, 'clab-poc-');
    expect(nodes[0]).toEqual({
      name: 'clab-poc-spine1',
      shortName: 'spine1',
      kind: 'nokia_srlinux',
      state: 'running',
      mgmtIpv4: '172.20.20.3',
    });
    expect(nodes.map((n) => n.shortName)).toEqual(['spine1', 'leaf1', 'client1']);
  });

  it('accepts a bare array and skips entries without a name or kind', () => {
    const nodes = parseInspectOutput(JSON.stringify([{ name: 'leaf2', kind: 'nokia_srlinux' }, { image: 'x' }]), 'clab-poc-');
    expect(nodes).toEqual([
      { name: 'leaf2', shortName: 'leaf2', kind: 'nokia_srlinux', state: undefined, mgmtIpv4: undefined },
    ]);
  });

  it('accepts the older lab_nodes shape', () => {
    const nodes = parseInspectOutput(JSON.stringify({ lab_nodes: [{ name: 'clab-poc-leaf1', kind: 'nokia_srlinux' }] }), 'clab-poc-');
    expect(nodes.map((n) => n.shortName)).toEqual(['leaf1']);
  });

  it('throws PARSE_FAILED for non-JSON output', () => {
    expect(() => parseInspectOutput('not json', 'clab-poc-')).toThrow('containerlab inspect did not return JSON');
  });
});

describe('discoverNodes', () => {
  it('returns SR Linux nodes sorted by short name', async () => {
    const executor = new FakeExecutor(() => ({ stdout: inspectByLab }));
    const nodes = await discoverNodes(executor, 'clab-poc-');
    expect(nodes.map((n) => n.name)).toEqual(['clab-poc-leaf1', 'clab-poc-spine1']);
    expect(executor.calls).toEqual([{ argv: ['containerlab', 'inspect', '--format', 'json'], timeoutMs: 30_000 }]);
  });

  it('filters by another kind when asked', async () => {
    const executor = new FakeExecutor(() => ({ stdout: inspectByLab }));
    const nodes = await discoverNodes(executor, 'clab-poc-', 'linux');
    expect(nodes.map((n) => n.shortName)).toEqual(['client1']);
  });

  it('reports LAB_NOT_DEPLOYED when inspect fails', async () => {
    const executor = new FakeExecutor(() => ({ exitCode: 1, stderr: 'no containers found' }));
    const err = await discoverNodes(executor, 'clab-poc-').catch((e: unknown) => e);
    expect(err instanceof LabError && err.code).toBe(LabErrorCode.LAB_NOT_DEPLOYED);
  });

  it('reports NO_DEVICES when no node matches', async () => {
    const executor = new FakeExecutor(() => ({ stdout: '[]' }));
    await expect(discoverNodes(executor, 'clab-poc-')).rejects.toThrow('No nokia_srlinux devices found in the topology');
  });
});
