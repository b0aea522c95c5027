// Config loader — reads ~/.config/srl-lab/config.yaml and deep-merges it over the defaults.
// On first run (no config file) the default YAML is written out and firstRun is reported.
// YAML that fails to parse or validate throws CONFIG_INVALID; nothing falls back to defaults.
// The returned config is deep-frozen.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { labConfigSchema, type LabConfig } from './schema.js';
import { LabError, LabErrorCode, errorMessage } from '../shared/errors.js';
import { logger } from '../logger.js';

const DEFAULT_CONFIG_DIR = join(homedir(), '.config', 'srl-lab');
export const DEFAULT_CONFIG_PATH = join(DEFAULT_CONFIG_DIR, 'config.yaml');

/** Default config YAML, written on first run and parsed as the merge base. */
export const DEFAULT_CONFIG_YAML = `# srl-lab configuration
# Generated automatically on first run. All values shown are defaults.

lab:
  name: poc
  node_prefix: clab-poc-

credentials:
  username: admin
  password: admin

gnmi:
  port: 57400
  skip_verify: true
  encoding: json_ietf
  timeout_seconds: 10

jsonrpc:
  scheme: http
  timeout_seconds: 10

polling:
  duration_seconds: 60
  interval_seconds: 1
  # null: each fetch may take up to one interval
  fetch_timeout_seconds: null
  concurrency: 8

chart:
  network_instance: default
  protocol: bgp
  families: [ipv4-unicast, ipv6-unicast]
  output_dir: data
  output_prefix: route_stats

bgp:
  network_instance: default
  timeout_seconds: 120
  interval_seconds: 5

lldp:
  cutsheet: cutsheet.csv

connectivity:
  ping_count: 2
  ping_wait_seconds: 2
  concurrency: 16
  # Client container name (without node_prefix) -> addresses to ping from/to.
  # client1: [10.255.10.11, 10.255.20.11]
  # client2: [10.255.10.12, 10.255.20.12]
  clients: {}

multicast:
  group: 239.0.0.1
  port: 5000
  receiver: client7
  sender: client8
  receiver_interface: eth1
  receiver_log: /tmp/mcast_client7.log
  source_ip: 10.255.80.2
  packet_count: 10
  duration_seconds: 10
  poll_interval_seconds: 2
  # Share of packets (percent) that still counts as a pass.
  min_success_rate: 80
`;

export interface ConfigResult {
  config: LabConfig;
  configPath: string;
  firstRun: boolean;
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;
  const defaults = parseYamlRecord(DEFAULT_CONFIG_YAML, '<defaults>');

  if (!existsSync(configPath)) {
    logger.info({ configPath }, 'No config file found, writing defaults (first run)');
    try {
      mkdirSync(dirname(configPath), { recursive: true });
      writeFileSync(configPath, DEFAULT_CONFIG_YAML, 'utf-8');
    } catch (err) {
      logger.warn({ configPath, error: errorMessage(err) }, 'Could not write default config file');
    }
    return { config: validate(defaults, configPath), configPath, firstRun: true };
  }

  const raw = readFileSync(configPath, 'utf-8');
  const user = parseYamlRecord(raw, configPath);
  return { config: validate(deepMerge(defaults, user), configPath), configPath, firstRun: false };
}

function parseYamlRecord(raw: string, source: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new LabError(LabErrorCode.CONFIG_INVALID, `Failed to parse ${source}: ${errorMessage(err)}`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new LabError(LabErrorCode.CONFIG_INVALID, `${source} must contain a YAML mapping`);
  }
  return parsed;
}

function validate(candidate: Record<string, unknown>, configPath: string): LabConfig {
  const result = labConfigSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new LabError(LabErrorCode.CONFIG_INVALID, `Invalid configuration in ${configPath}: ${issues.join('; ')}`, {
      issues,
    });
  }
  return deepFreeze(result.data);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Deep merge b into a (a provides defaults, b overrides). Arrays replace. */
export function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isRecord(aVal) && isRecord(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
