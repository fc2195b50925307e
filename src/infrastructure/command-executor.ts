/**
 * Command Executor - runs a single attempt of an external command
 * Spawns the process, feeds stdin, enforces the timeout and captures output
 */

import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import type { Logger } from 'pino';
import {
  COMMAND_INTERRUPTED,
  createCommand,
  formatCommand,
  type Command,
  type CommandResult,
  type ProcessExecutor,
} from '../domain/types/command';
import { errorMessage } from '../errors/index';

export type SpawnFn = (
  executable: string,
  args: readonly string[],
  options: SpawnOptions,
) => ChildProcess;

export interface CommandExecutorOptions {
  /** Delay between SIGTERM and SIGKILL for a terminated process */
  killGraceMs?: number;
  maxBuffer?: number;
  spawn?: SpawnFn;
}

const defaultSpawn: SpawnFn = (executable, args, options) => spawn(executable, args, options);

export class CommandExecutor implements ProcessExecutor {
  private readonly killGraceMs: number;
  private readonly maxBuffer: number;
  private readonly spawnProcess: SpawnFn;

  constructor(
    private readonly logger: Logger,
    options: CommandExecutorOptions = {},
  ) {
    this.killGraceMs = options.killGraceMs ?? 5000;
    this.maxBuffer = options.maxBuffer ?? 10 * 1024 * 1024; // 10MB
    this.spawnProcess = options.spawn ?? defaultSpawn;
  }

  /**
   * Execute one attempt. Resolves with a failed result instead of rejecting.
   *
   * The process leads its own process group, so a timeout, an oversized
   * output or an abort of `signal` terminates every descendant as well.
   */
  execute(command: Command, signal?: AbortSignal): Promise<CommandResult> {
    const startTime = Date.now();

    return new Promise((resolve) => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let overflowed = false;
      let interrupted = false;
      let settled = false;
      let timeoutHandle: NodeJS.Timeout | undefined;
      let killHandle: NodeJS.Timeout | undefined;
      let onAbort: (() => void) | undefined;
      let groupKill = false;

      const finish = (exitCode: number, failureMessage?: string): void => {
        if (settled) return;
        settled = true;
        if (timeoutHandle) clearTimeout(timeoutHandle);
        // descendants of a signalled group still get SIGKILL after the grace period
        if (killHandle && !groupKill) clearTimeout(killHandle);
        if (onAbort) signal?.removeEventListener('abort', onAbort);

        const durationMs = Date.now() - startTime;
        const success = exitCode === 0 && !timedOut && !overflowed && !interrupted && !failureMessage;
        this.logger.debug(
          { command: formatCommand(command), exitCode, timedOut, interrupted, durationMs },
          'Command completed',
        );
        resolve({
          exitCode,
          success,
          stdout: stdout.trim(),
          stderr: failureMessage ?? (interrupted ? COMMAND_INTERRUPTED : stderr.trim()),
          durationMs,
          timedOut,
        });
      };

      if (signal?.aborted) {
        interrupted = true;
        finish(-1);
        return;
      }

      const spawnOptions: SpawnOptions = {
        cwd: command.cwd,
        env: process.env,
        shell: command.shell,
        stdio: ['pipe', 'pipe', 'pipe'],
        detached: process.platform !== 'win32',
      };

      let child: ChildProcess;
      try {
        child = command.shell
          ? this.spawnProcess(formatCommand(command), [], spawnOptions)
          : this.spawnProcess(command.executable, command.args, spawnOptions);
      } catch (error) {
        finish(-1, errorMessage(error));
        return;
      }

      const pid = child.pid;
      groupKill = spawnOptions.detached === true && pid !== undefined;

      const sendSignal = (killSignal: NodeJS.Signals): void => {
        if (groupKill && pid !== undefined) {
          try {
            process.kill(-pid, killSignal);
            return;
          } catch (error) {
            this.logger.debug({ pid, signal: killSignal, error: errorMessage(error) }, 'Process group not signalled');
          }
        }
        child.kill(killSignal);
      };

      let exited = false;
      let terminating = false;
      const terminate = (): void => {
        if (terminating) return;
        terminating = true;
        sendSignal('SIGTERM');
        killHandle = setTimeout(() => {
          if (groupKill || !exited) {
            sendSignal('SIGKILL');
          }
        }, this.killGraceMs);
        killHandle.unref();
      };

      if (command.timeoutMs > 0) {
        timeoutHandle = setTimeout(() => {
          timedOut = true;
          terminate();
        }, command.timeoutMs);
      }

      if (signal) {
        onAbort = () => {
          interrupted = true;
          terminate();
        };
        signal.addEventListener('abort', onAbort, { once: true });
      }

      child.stdout?.on('data', (data: Buffer) => {
        const chunk = data.toString();
        if (stdout.length + chunk.length <= this.maxBuffer) {
          stdout += chunk;
        } else if (!overflowed) {
          overflowed = true;
          stderr += `Command output exceeded maximum buffer size of ${this.maxBuffer} bytes`;
          terminate();
        }
      });

      child.stderr?.on('data', (data: Buffer) => {
        const chunk = data.toString();
        if (stderr.length + chunk.length <= this.maxBuffer) {
          stderr += chunk;
        }
      });

      child.stdin?.on('error', (error: Error) => {
        this.logger.debug({ command: command.executable, error: error.message }, 'stdin closed early');
      });
      if (command.input !== undefined) {
        child.stdin?.end(command.input);
      } else {
        child.stdin?.end();
      }

      // a terminated process is done once it exits, even while a descendant holds its pipes
      child.on('exit', (code: number | null) => {
        exited = true;
        if (terminating) {
          child.stdout?.destroy();
          child.stderr?.destroy();
          finish(code ?? -1);
        }
      });

      child.on('close', (code: number | null) => {
        finish(code ?? -1);
      });

      child.on('error', (error: Error) => {
        this.logger.error({ command: command.executable, error: error.message }, 'Command execution failed');
        finish(-1, error.message);
      });
    });
  }

  /**
   * Check if a binary is on the PATH
   */
  async isAvailable(binary: string): Promise<boolean> {
    const result = await this.execute(createCommand({ executable: 'which', args: [binary], timeoutMs: 5000 }));
    return result.success && result.stdout.length > 0;
  }
}
