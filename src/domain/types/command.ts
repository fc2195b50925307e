/**
 * Command Types
 *
 * An external process invocation, the result of a single attempt and the
 * terminal outcome of a retried invocation.
 */

export const DEFAULT_COMMAND_TIMEOUT_MS = 60_000;
export const DEFAULT_BACKOFF_MS = 5_000;
export const COMMAND_INTERRUPTED = 'Command interrupted';

/**
 * Immutable description of an external command
 */
export interface Command {
  readonly executable: string;
  readonly args: readonly string[];
  readonly cwd?: string;
  /** Payload written to stdin before it is closed */
  readonly input?: string;
  readonly timeoutMs: number;
  /** Total number of attempts, never less than 1 */
  readonly maxRetries: number;
  readonly backoffMs: number;
  /** Run the whole command line through the system shell */
  readonly shell: boolean;
}

export interface CommandSpec {
  executable: string;
  args?: readonly string[];
  cwd?: string;
  input?: string;
  timeoutMs?: number;
  maxRetries?: number;
  backoffMs?: number;
  shell?: boolean;
}

export function createCommand(spec: CommandSpec): Command {
  const command: Command = {
    executable: spec.executable,
    args: Object.freeze([...(spec.args ?? [])]),
    timeoutMs: spec.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS,
    maxRetries: Math.max(1, Math.floor(spec.maxRetries ?? 1)),
    backoffMs: spec.backoffMs ?? DEFAULT_BACKOFF_MS,
    shell: spec.shell ?? false,
    ...(spec.cwd !== undefined ? { cwd: spec.cwd } : {}),
    ...(spec.input !== undefined ? { input: spec.input } : {}),
  };
  return Object.freeze(command);
}

/**
 * Copy of a command with a different attempt count
 */
export function withAttempts(command: Command, maxRetries: number): Command {
  return createCommand({ ...command, maxRetries });
}

export function formatCommand(command: Command): string {
  return [command.executable, ...command.args].join(' ');
}

/**
 * Outcome of a single attempt
 */
export interface CommandResult {
  exitCode: number;
  success: boolean;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
}

export type RetryOutcome =
  | {
      readonly kind: 'succeeded';
      readonly output: string;
      readonly attempts: number;
      readonly result: CommandResult;
    }
  | {
      readonly kind: 'exhausted';
      readonly lastError: string;
      readonly attempts: number;
      readonly result: CommandResult;
    };

export const Succeeded = (result: CommandResult, attempts: number): RetryOutcome =>
  Object.freeze({ kind: 'succeeded', output: result.stdout, attempts, result });

export const ExhaustedRetries = (
  result: CommandResult,
  attempts: number,
  lastError: string,
): RetryOutcome => Object.freeze({ kind: 'exhausted', lastError, attempts, result });

export const isSucceeded = (
  outcome: RetryOutcome,
): outcome is Extract<RetryOutcome, { kind: 'succeeded' }> => outcome.kind === 'succeeded';

/**
 * Runs a single attempt of a command
 */
export interface ProcessExecutor {
  /** An abort of `signal` terminates the running process */
  execute(command: Command, signal?: AbortSignal): Promise<CommandResult>;
}

/**
 * Runs a command with its retry policy
 */
export interface Runner {
  run(command: Command): Promise<RetryOutcome>;
}
