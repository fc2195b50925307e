/**
 * Command Runner - applies a command's retry policy on top of the executor.
 *
 * Only transient failures (non-zero exit, timeout) are retried, and none once
 * the runner's signal has aborted. The runner never throws: callers inspect
 * the returned RetryOutcome.
 */

import type { Logger } from 'pino';
import {
  ExhaustedRetries,
  Succeeded,
  formatCommand,
  type Command,
  type CommandResult,
  type ProcessExecutor,
  type RetryOutcome,
  type Runner,
} from '../domain/types/command';
import { sleep, type SleepFn } from '../shared/async';
import { CommandExecutor } from './command-executor';

export class CommandRunner implements Runner {
  private readonly executor: ProcessExecutor;

  constructor(
    private readonly logger: Logger,
    executor?: ProcessExecutor,
    private readonly sleepFn: SleepFn = sleep,
    /** Aborting it terminates the running attempt and skips further attempts */
    private readonly signal?: AbortSignal,
  ) {
    this.executor = executor ?? new CommandExecutor(logger);
  }

  async run(command: Command): Promise<RetryOutcome> {
    const commandLine = formatCommand(command);
    const maxAttempts = command.maxRetries;

    for (let attempt = 1; ; attempt++) {
      this.logger.debug({ command: commandLine, cwd: command.cwd, attempt }, `Running command: ${commandLine}`);

      const result = await this.attempt(command);
      if (result.success) {
        return Succeeded(result, attempt);
      }

      this.logger.warn(
        {
          command: commandLine,
          attempt,
          maxAttempts,
          exitCode: result.exitCode,
          timedOut: result.timedOut,
          stderr: result.stderr,
        },
        result.timedOut
          ? `Command timed out after ${command.timeoutMs}ms (attempt ${attempt}/${maxAttempts})`
          : `Command failed (attempt ${attempt}/${maxAttempts}): ${result.stderr}`,
      );

      if (attempt >= maxAttempts || this.signal?.aborted) {
        const lastError = describeFailure(command, result);
        this.logger.error(
          { command: commandLine, attempts: attempt, stderr: lastError },
          `Command failed after ${attempt} attempts: ${commandLine}`,
        );
        return ExhaustedRetries(result, attempt, lastError);
      }

      await this.sleepFn(command.backoffMs, this.signal);
    }
  }

  private async attempt(command: Command): Promise<CommandResult> {
    try {
      return await this.executor.execute(command, this.signal);
    } catch (error) {
      return {
        exitCode: -1,
        success: false,
        stdout: '',
        stderr: error instanceof Error ? error.message : String(error),
        durationMs: 0,
        timedOut: false,
      };
    }
  }
}

function describeFailure(command: Command, result: CommandResult): string {
  if (result.timedOut) {
    return `Command timed out after ${command.timeoutMs}ms`;
  }
  return result.stderr || `Command exited with code ${result.exitCode}`;
}
