import {
  SENDER_MARKER,
  assertMulticastGroup,
  checkReceiver,
  clearLog,
  countPackets,
  ensureClients,
  evaluateDelivery,
  hasGroup,
  isReceiverRunning,
  monitorReception,
  readLog,
  samplePackets,
  senderArgv,
  startSender,
  stopSender,
} from '../../../src/lab/multicast.js';
import { LabError, LabErrorCode } from '../../../src/shared/errors.js';
import { FakeExecutor, fakeTime } from '../../helpers/fakes.js';

const MADDR = ['3:\teth1', '\tlink  01:00:5e:00:00:01', '\tinet  239.0.0.1', '\tinet  224.0.0.1', ''].join('\n');
const PS = [
  'PID   USER     TIME  COMMAND',
  '    1 root      0:00 sh -c sleep infinity',
  '   17 root      0:00 socat UDP4-RECVFROM:5000,ip-add-membership=239.0.0.1:eth1,fork OPEN:/tmp/mcast_client7.log,creat,append',
].join('\n');

const stream = {
  container: 'clab-poc-client8',
  senderName: 'client8',
  sourceIp: '10.255.80.2',
  group: '239.0.0.1',
  port: 5000,
  packetCount: 10,
  durationSeconds: 10,
};

function packets(count: number): string {
  return Array.from(
    { length: count },
    (_, i) => `Multicast packet ${String(i + 1).padStart(3, '0')}/10 from client8 at 10:00:${String(i).padStart(2, '0')}`,
  ).join('');
}

describe('parsing', () => {
  it('finds the group among the interface memberships', () => {
    expect(hasGroup(MADDR, '239.0.0.1')).toBe(true);
    expect(hasGroup(MADDR, '239.0.0.10')).toBe(false);
  });

  it('recognises a socat listener for the group', () => {
    expect(isReceiverRunning(PS, '239.0.0.1')).toBe(true);
    expect(isReceiverRunning(PS, '239.0.0.2')).toBe(false);
    expect(isReceiverRunning('   1 root 0:00 python3 239.0.0.1 socat', '239.0.0.1')).toBe(false);
  });

  it('counts packets in a log without line breaks', () => {
    expect(countPackets(packets(3))).toBe(3);
    expect(countPackets('')).toBe(0);
  });

  it('samples the first five packets', () => {
    expect(samplePackets(packets(7))).toEqual([
      'Multicast packet 001/10 from client8 at 10:00:00',
      'Multicast packet 002/10 from client8 at 10:00:01',
      'Multicast packet 003/10 from client8 at 10:00:02',
      'Multicast packet 004/10 from client8 at 10:00:03',
      'Multicast packet 005/10 from client8 at 10:00:04',
    ]);
    expect(samplePackets('noise')).toEqual([]);
  });
});

describe('assertMulticastGroup', () => {
  it.each(['239.0.0.1', '224.0.0.251'])('accepts %s', (group) => {
    expect(() => assertMulticastGroup(group)).not.toThrow();
  });

  it.each(['10.0.0.1', '240.0.0.1', '239.0.0', '239.0.0.256'])('rejects %s', (group) => {
    expect(() => assertMulticastGroup(group)).toThrow(`Not an IPv4 multicast group: ${group}`);
  });
});

describe('evaluateDelivery', () => {
  it('grades delivery against the threshold', () => {
    expect(evaluateDelivery(10, 10, 80)).toEqual({ expected: 10, received: 10, successRate: 100, status: 'complete', passed: true });
    expect(evaluateDelivery(8, 10, 80)).toEqual({ expected: 10, received: 8, successRate: 80, status: 'acceptable', passed: true });
    expect(evaluateDelivery(7, 10, 80)).toEqual({ expected: 10, received: 7, successRate: 70, status: 'lossy', passed: false });
    expect(evaluateDelivery(0, 10, 80)).toEqual({ expected: 10, received: 0, successRate: 0, status: 'none', passed: false });
  });
});

describe('sender', () => {
  it('starts python3 detached in the sender container', () => {
    const argv = senderArgv(stream);
    expect(argv.slice(0, 6)).toEqual(['docker', 'exec', '-d', 'clab-poc-client8', 'python3', '-c']);
    const script = argv[6].split('\n');
    expect(script[0]).toBe(`# ${SENDER_MARKER}`);
    expect(script).toContain("GROUP, PORT, SRC = '239.0.0.1', 5000, '10.255.80.2'");
    expect(script).toContain('COUNT, INTERVAL = 10, 10 / 10');
  });

  it('throws when docker cannot start the sender', async () => {
    const executor = new FakeExecutor(() => ({ exitCode: 1, stderr: 'No such container\n' }));
    const err = await startSender(executor, stream).catch((e: unknown) => e);
    expect(err instanceof LabError && err.code).toBe(LabErrorCode.COMMAND_FAILED);
    expect(err instanceof LabError && err.message).toBe('docker exited with 1');
  });

  it('ignores pkill finding nothing to stop', async () => {
    const executor = new FakeExecutor(() => ({ exitCode: 1 }));
    await expect(stopSender(executor, 'clab-poc-client8')).resolves.toBeUndefined();
    expect(executor.calls[0].argv).toEqual(['docker', 'exec', 'clab-poc-client8', 'pkill', '-f', SENDER_MARKER]);
  });
});

describe('receiver', () => {
  it('checks membership and the listener in the receiver container', async () => {
    const executor = new FakeExecutor((argv) => ({ stdout: argv.includes('maddr') ? MADDR : PS }));
    await expect(checkReceiver(executor, 'clab-poc-client7', 'eth1', '239.0.0.1')).resolves.toEqual({
      joined: true,
      listening: true,
    });
    expect(executor.calls.map((c) => c.argv)).toEqual([
      ['docker', 'exec', 'clab-poc-client7', 'ip', 'maddr', 'show', 'dev', 'eth1'],
      ['docker', 'exec', 'clab-poc-client7', 'ps', 'aux'],
    ]);
  });

  it('reports nothing joined when ip maddr fails', async () => {
    const executor = new FakeExecutor((argv) => (argv.includes('maddr') ? { exitCode: 1 } : { stdout: PS }));
    await expect(checkReceiver(executor, 'clab-poc-client7', 'eth1', '239.0.0.1')).resolves.toEqual({
      joined: false,
      listening: true,
    });
  });

  it('truncates the log and fails loudly if it cannot', async () => {
    const executor = new FakeExecutor();
    await clearLog(executor, 'clab-poc-client7', '/tmp/mcast.log');
    expect(executor.calls[0].argv).toEqual(['docker', 'exec', 'clab-poc-client7', 'sh', '-c', '> /tmp/mcast.log']);
    await expect(clearLog(new FakeExecutor(() => ({ exitCode: 2 })), 'clab-poc-client7', '/tmp/mcast.log')).rejects.toThrow(
      'docker exited with 2',
    );
  });

  it('reads a missing log as empty', async () => {
    const executor = new FakeExecutor(() => ({ exitCode: 1, stdout: 'partial' }));
    await expect(readLog(executor, 'clab-poc-client7', '/tmp/mcast.log')).resolves.toBe('');
  });
});

describe('ensureClients', () => {
  const inspect = JSON.stringify([
    { name: 'clab-poc-client7', kind: 'linux' },
    { name: 'clab-poc-leaf1', kind: 'nokia_srlinux' },
  ]);

  it('passes when every client is deployed', async () => {
    const executor = new FakeExecutor(() => ({ stdout: inspect }));
    await expect(ensureClients(executor, 'clab-poc-', ['client7'])).resolves.toBeUndefined();
  });

  it('names the clients that are missing', async () => {
    const executor = new FakeExecutor(() => ({ stdout: inspect }));
    const err = await ensureClients(executor, 'clab-poc-', ['client7', 'client8']).catch((e: unknown) => e);
    expect(err instanceof LabError && err.code).toBe(LabErrorCode.NO_DEVICES);
    expect(err instanceof LabError && err.message).toBe('clab-poc-client8 not found in the topology');
  });
});

describe('monitorReception', () => {
  it('polls until the duration is over and reports growth', async () => {
    const time = fakeTime();
    const counts = [3, 3, 7];
    let reads = 0;
    const progress: number[] = [];
    const received = await monitorReception(async () => counts[reads++], {
      durationSeconds: 6,
      pollIntervalSeconds: 2,
      clock: time.clock,
      sleep: time.sleep,
      onProgress: (n) => progress.push(n),
    });
    expect(received).toBe(7);
    expect(reads).toBe(3);
    expect(progress).toEqual([3, 7]);
    expect(time.clock()).toBe(6000);
  });

  it('shortens the last wait to the remaining time', async () => {
    const time = fakeTime();
    let reads = 0;
    await monitorReception(async () => ++reads, {
      durationSeconds: 5,
      pollIntervalSeconds: 2,
      clock: time.clock,
      sleep: time.sleep,
    });
    expect(reads).toBe(3);
    expect(time.clock()).toBe(5000);
  });

  it('does not read once already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const count = jest.fn(async () => 1);
    await expect(
      monitorReception(count, { durationSeconds: 10, pollIntervalSeconds: 2, signal: controller.signal }),
    ).resolves.toBe(0);
    expect(count).not.toHaveBeenCalled();
  });
});
