import type { LabConfig } from '../config/schema.js';
import type { Executor } from '../execution/executor.js';
import type { DeviceTarget } from '../lab/types.js';
import { JsonRpcClient, type StateReader } from '../lab/jsonrpc.js';
import { GnmicClient } from '../lab/gnmic.js';
import { discoverNodes } from '../lab/containerlab.js';
import { LocalExecutor } from '../execution/executor.js';
import { loadConfig } from '../config/loader.js';
import { logger } from '../logger.js';

/**
 * Shared command context, created once per CLI invocation and passed to every command.
 * Tests build one from fakes.
 */
export interface LabContext {
  readonly config: LabConfig;
  readonly executor: Executor;
  readonly stateReader: StateReader;
  readonly gnmic: GnmicClient;
  /** Report output; log lines go through the logger instead. */
  readonly out: (line: string) => void;
}

/** Explicit comma-separated device list, or every SR Linux node containerlab reports. */
export async function resolveTargets(ctx: LabContext, devices?: string): Promise<DeviceTarget[]> {
  const prefix = ctx.config.lab.node_prefix;
  if (devices) {
    return devices
      .split(',')
      .map((d) => d.trim())
      .filter((d) => d.length > 0)
      .map((d) => ({
        device: d.startsWith(prefix) && prefix ? d.slice(prefix.length) : d,
        host: d.startsWith(prefix) ? d : `${prefix}${d}`,
      }));
  }
  const nodes = await discoverNodes(ctx.executor, prefix);
  return nodes.map((n) => ({ device: n.shortName, host: n.name }));
}

/** Load config once and wire the real collaborators. */
export function createContext(configPath?: string): LabContext {
  const { config, configPath: resolved, firstRun } = loadConfig(configPath);
  logger.debug({ configPath: resolved, firstRun }, 'configuration loaded');

  const executor = new LocalExecutor();
  const { username, password } = config.credentials;
  return {
    config,
    executor,
    stateReader: new JsonRpcClient({
      scheme: config.jsonrpc.scheme,
      username,
      password,
      timeoutMs: config.jsonrpc.timeout_seconds * 1000,
    }),
    gnmic: new GnmicClient(executor, {
      username,
      password,
      port: config.gnmi.port,
      skipVerify: config.gnmi.skip_verify,
      encoding: config.gnmi.encoding,
      timeoutMs: config.gnmi.timeout_seconds * 1000,
    }),
    out: (line) => console.log(line),
  };
}
