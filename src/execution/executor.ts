// Command execution layer — every docker, containerlab and gnmic call passes through here.
// LocalExecutor never uses a shell; arguments reach the child process verbatim.
// Non-zero exits resolve normally; only a failure to spawn rejects.
// An aborted signal kills the child and resolves with canceled set.
import execa from 'execa';
import type { Command } from '../types/command.js';
import { LabError, LabErrorCode, errorMessage } from '../shared/errors.js';
import { logger } from '../logger.js';

/** Result of command execution. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
  readonly timedOut: boolean;
  readonly canceled: boolean;
}

/** Executor interface — tests substitute a fake. */
export interface Executor {
  execute(command: Command, timeoutMs: number, signal?: AbortSignal): Promise<ExecResult>;
}

export class LocalExecutor implements Executor {
  async execute(command: Command, timeoutMs: number, signal?: AbortSignal): Promise<ExecResult> {
    const [file, ...args] = command.argv;
    if (!file) {
      throw new LabError(LabErrorCode.COMMAND_FAILED, 'Empty command');
    }
    const start = performance.now();
    try {
      const result = await execa(file, args, {
        timeout: timeoutMs,
        reject: false,
        input: command.stdin,
        env: command.env,
        signal,
        // 10MB: a full afi-safi or LLDP dump stays well under this.
        maxBuffer: 10 * 1024 * 1024,
      });
      const durationMs = Math.round(performance.now() - start);
      logger.debug({ file, exitCode: result.exitCode, durationMs }, 'command finished');
      return {
        stdout: result.stdout ?? '',
        stderr: result.stderr ?? '',
        exitCode: result.exitCode ?? (result.timedOut ? 124 : 1),
        durationMs,
        timedOut: result.timedOut,
        canceled: result.isCanceled,
      };
    } catch (err) {
      throw new LabError(LabErrorCode.COMMAND_FAILED, `Command failed to spawn: ${file}`, {
        cause: errorMessage(err),
      });
    }
  }
}

/** Run a command and throw unless it exits 0. */
export async function executeOrThrow(executor: Executor, command: Command, timeoutMs: number): Promise<ExecResult> {
  const result = await executor.execute(command, timeoutMs);
  if (result.exitCode !== 0) {
    const reason = result.timedOut
      ? `timed out after ${timeoutMs}ms`
      : result.canceled
        ? 'was cancelled'
        : `exited with ${result.exitCode}`;
    throw new LabError(LabErrorCode.COMMAND_FAILED, `${command.argv[0]} ${reason}`, {
      stderr: result.stderr.trim(),
    });
  }
  return result;
}
