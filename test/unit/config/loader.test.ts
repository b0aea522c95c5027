import { mkdtempSync, readFileSync, rmSync, writeFileSync, existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_CONFIG_YAML, deepFreeze, deepMerge, loadConfig } from '../../../src/config/loader.js';
import { LabError, LabErrorCode } from '../../../src/shared/errors.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'srl-lab-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes the defaults on first run and returns them', () => {
    const path = join(dir, 'nested', 'config.yaml');
    const { config, configPath, firstRun } = loadConfig(path);
    expect(firstRun).toBe(true);
    expect(configPath).toBe(path);
    expect(existsSync(path)).toBe(true);
    expect(readFileSync(path, 'utf-8')).toBe(DEFAULT_CONFIG_YAML);
    expect(config.lab.node_prefix).toBe('clab-poc-');
    expect(config.polling).toEqual({
      duration_seconds: 60,
      interval_seconds: 1,
      fetch_timeout_seconds: null,
      concurrency: 8,
    });
    expect(config.chart.families).toEqual(['ipv4-unicast', 'ipv6-unicast']);
    expect(config.connectivity.clients).toEqual({});
    expect(config.multicast.group).toBe('239.0.0.1');
    expect(config.multicast.min_success_rate).toBe(80);
  });

  it('merges user values over the defaults and replaces arrays', () => {
    const path = join(dir, 'config.yaml');
    writeFileSync(
      path,
      [
        'lab:',
        '  node_prefix: clab-evpn-',
        'credentials:',
        '  password: test-secret',
        'chart:',
        '  families: [ipv4-unicast]',
        'connectivity:',
        '  clients:',
        '    client1: [10.255.10.11]',
        '',
      ].join('\n'),
    );
    const { config, firstRun } = loadConfig(path);
    expect(firstRun).toBe(false);
    expect(config.lab).toEqual({ name: 'poc', node_prefix: 'clab-evpn-' });
    expect(config.credentials).toEqual({ username: 'admin', password: 'test-secret' });
    expect(config.chart.families).toEqual(['ipv4-unicast']);
    expect(config.chart.output_prefix).toBe('route_stats');
    expect(config.connectivity.clients).toEqual({ client1: ['10.255.10.11'] });
  });

  it('treats an empty file as all defaults', () => {
    const path = join(dir, 'config.yaml');
    writeFileSync(path, '');
    expect(loadConfig(path).config.gnmi.port).toBe(57400);
  });

  it('returns a frozen config', () => {
    const { config } = loadConfig(join(dir, 'config.yaml'));
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.chart.families)).toBe(true);
  });

  it('rejects values that fail validation with the offending path', () => {
    const path = join(dir, 'config.yaml');
    writeFileSync(path, 'polling:\n  interval_seconds: 0\n');
    const err = (() => {
      try {
        loadConfig(path);
        return undefined;
      } catch (e) {
        return e;
      }
    })();
    expect(err).toBeInstanceOf(LabError);
    expect(err instanceof LabError && err.code).toBe(LabErrorCode.CONFIG_INVALID);
    expect(err instanceof LabError && err.message).toContain(`Invalid configuration in ${path}: polling.interval_seconds:`);
  });

  it('rejects a file that is not a mapping', () => {
    const path = join(dir, 'config.yaml');
    writeFileSync(path, '- just\n- a list\n');
    expect(() => loadConfig(path)).toThrow(`${path} must contain a YAML mapping`);
  });

  it('rejects unparseable YAML', () => {
    const path = join(dir, 'config.yaml');
    writeFileSync(path, 'lab: [unclosed\n');
    expect(() => loadConfig(path)).toThrow(`Failed to parse ${path}:`);
  });
});

describe('deepMerge', () => {
  it('merges nested records and lets the override win', () => {
    expect(deepMerge({ a: { x: 1, y: 2 }, b: [1, 2] }, { a: { y: 3 }, b: [9] })).toEqual({ a: { x: 1, y: 3 }, b: [9] });
  });

  it('ignores undefined overrides', () => {
    expect(deepMerge({ a: 1 }, { a: undefined })).toEqual({ a: 1 });
  });
});

describe('deepFreeze', () => {
  it('freezes nested objects and arrays', () => {
    const value = deepFreeze({ a: { b: [1] } });
    expect(Object.isFrozen(value.a)).toBe(true);
    expect(Object.isFrozen(value.a.b)).toBe(true);
  });
});
