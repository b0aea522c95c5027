// src/config/schema.ts
// Add new fields here and to DEFAULT_CONFIG_YAML in loader.ts together.
import { z } from 'zod';

const positiveSeconds = z.number().positive();

export const labConfigSchema = z.object({
  lab: z.object({
    name: z.string().min(1),
    /** Prefix Containerlab puts in front of node names, e.g. "clab-poc-". */
    node_prefix: z.string(),
  }),
  credentials: z.object({
    username: z.string().min(1),
    password: z.string(),
  }),
  gnmi: z.object({
    port: z.number().int().min(1).max(65535),
    skip_verify: z.boolean(),
    encoding: z.string().min(1),
    timeout_seconds: positiveSeconds,
  }),
  jsonrpc: z.object({
    scheme: z.enum(['http', 'https']),
    timeout_seconds: positiveSeconds,
  }),
  polling: z.object({
    duration_seconds: positiveSeconds,
    interval_seconds: positiveSeconds,
    fetch_timeout_seconds: positiveSeconds.nullable(),
    concurrency: z.number().int().min(1),
  }),
  chart: z.object({
    network_instance: z.string().min(1),
    protocol: z.string().min(1),
    families: z.array(z.string().min(1)).min(1),
    output_dir: z.string().min(1),
    output_prefix: z.string().min(1),
  }),
  bgp: z.object({
    network_instance: z.string().min(1),
    timeout_seconds: positiveSeconds,
    interval_seconds: positiveSeconds,
  }),
  lldp: z.object({
    cutsheet: z.string().min(1),
  }),
  connectivity: z.object({
    ping_count: z.number().int().min(1),
    ping_wait_seconds: z.number().int().min(1),
    concurrency: z.number().int().min(1),
    clients: z.record(z.array(z.string().ip({ version: 'v4' }))),
  }),
  multicast: z.object({
    group: z.string().ip({ version: 'v4' }),
    port: z.number().int().min(1).max(65535),
    /** Client containers (without node_prefix). */
    receiver: z.string().min(1),
    sender: z.string().min(1),
    receiver_interface: z.string().min(1),
    /** File the receiver's socat appends each datagram to. */
    receiver_log: z.string().min(1),
    source_ip: z.string().ip({ version: 'v4' }),
    packet_count: z.number().int().min(1),
    duration_seconds: positiveSeconds,
    poll_interval_seconds: positiveSeconds,
    min_success_rate: z.number().min(0).max(100),
  }),
});

export type LabConfig = z.infer<typeof labConfigSchema>;
