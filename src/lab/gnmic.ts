// gNMI Get via the gnmic CLI. The JSON it prints is returned as-is.
import type { Executor } from '../execution/executor.js';
import { LabError, LabErrorCode } from '../shared/errors.js';

export interface GnmicOptions {
  readonly username: string;
  readonly password: string;
  readonly port: number;
  readonly skipVerify: boolean;
  readonly encoding: string;
  readonly timeoutMs: number;
}

export class GnmicClient {
  constructor(
    private readonly executor: Executor,
    private readonly options: GnmicOptions,
  ) {}

  buildGetArgv(target: string, path: string): string[] {
    const { username, password, port, skipVerify, encoding } = this.options;
    return [
      'gnmic',
      '-a', `${target}:${port}`,
      ...(skipVerify ? ['--skip-verify'] : []),
      '-u', username,
      '-p', password,
      '--encoding', encoding,
      'get',
      '--path', path,
      '--format', 'json',
    ];
  }

  /** Aborting `signal` kills the gnmic process. */
  async get(target: string, path: string, signal?: AbortSignal): Promise<unknown> {
    const result = await this.executor.execute({ argv: this.buildGetArgv(target, path) }, this.options.timeoutMs, signal);
    if (result.canceled) {
      throw new LabError(LabErrorCode.FETCH_TIMEOUT, `gnmic get cancelled for ${target}`, { path });
    }
    if (result.timedOut) {
      throw new LabError(LabErrorCode.FETCH_TIMEOUT, `gnmic get timed out for ${target}`, { path });
    }
    if (result.exitCode !== 0) {
      throw new LabError(LabErrorCode.TRANSPORT_FAILED, `gnmic get failed for ${target}: ${result.stderr.trim()}`, {
        path,
        exitCode: result.exitCode,
      });
    }
    try {
      return JSON.parse(result.stdout);
    } catch {
      throw new LabError(LabErrorCode.PARSE_FAILED, `gnmic returned invalid JSON for ${target}`, { path });
    }
  }
}
