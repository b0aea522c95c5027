/**
 * SR Linux JSON-RPC client
 *
 * Issues `get` requests against the state datastore at <scheme>://<host>/jsonrpc
 * with HTTP basic auth. Each command's result is returned in request order.
 */

import { z } from 'zod';
import { LabError, LabErrorCode, errorMessage } from '../shared/errors.js';

export interface JsonRpcOptions {
  readonly scheme: 'http' | 'https';
  readonly username: string;
  readonly password: string;
  readonly timeoutMs: number;
}

/** What the lab modules need from a JSON-RPC transport. */
export interface StateReader {
  getState(host: string, path: string): Promise<unknown>;
}

const responseSchema = z.object({
  result: z.array(z.unknown()).optional(),
  error: z.object({ code: z.number().optional(), message: z.string().optional() }).optional(),
});

let requestId = 0;

export class JsonRpcClient implements StateReader {
  constructor(private readonly options: JsonRpcOptions) {}

  /**
   * Get one path from the state datastore and return its result object.
   */
  async getState(host: string, path: string): Promise<unknown> {
    const [result] = await this.get(host, [path]);
    return result;
  }

  async get(host: string, paths: readonly string[]): Promise<unknown[]> {
    const url = `${this.options.scheme}://${host}/jsonrpc`;
    const body = {
      jsonrpc: '2.0',
      id: requestId++,
      method: 'get',
      params: {
        commands: paths.map((path) => ({ path, datastore: 'state' })),
      },
    };
    const auth = Buffer.from(`${this.options.username}:${this.options.password}`).toString('base64');

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Authorization: `Basic ${auth}` },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new LabError(LabErrorCode.TRANSPORT_FAILED, `JSON-RPC request to ${host} failed: ${errorMessage(error)}`);
    }

    if (!response.ok) {
      throw new LabError(LabErrorCode.TRANSPORT_FAILED, `JSON-RPC request to ${host} returned HTTP ${response.status}`);
    }

    let raw: unknown;
    try {
      raw = await response.json();
    } catch {
      throw new LabError(LabErrorCode.PARSE_FAILED, `JSON-RPC response from ${host} is not JSON`);
    }
    const parsed = responseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new LabError(LabErrorCode.PARSE_FAILED, `JSON-RPC response from ${host} is malformed`);
    }
    const payload = parsed.data;

    if (payload.error) {
      throw new LabError(
        LabErrorCode.TRANSPORT_FAILED,
        `JSON-RPC error from ${host}: ${payload.error.message ?? 'unknown error'}`,
        { code: payload.error.code, paths },
      );
    }
    if (!payload.result) {
      throw new LabError(LabErrorCode.PARSE_FAILED, `JSON-RPC response from ${host} has no result`);
    }
    return payload.result;
  }
}
