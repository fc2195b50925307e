/**
 * Readiness Poller
 *
 * Polls an external status source until a predicate holds or a deadline
 * elapses. A failed status query counts as "not ready yet".
 */

import type { Logger } from 'pino';
import { isSucceeded, withAttempts, type Command, type Runner } from '../domain/types/command';
import { sleep, type SleepFn } from '../shared/async';

export interface ReadinessCheck {
  name: string;
  query: Command;
  predicate: (stdout: string) => boolean;
  pollIntervalMs: number;
  deadlineMs: number;
}

export interface WaitOptions {
  pollIntervalMs: number;
  deadlineMs: number;
}

export interface PollerOptions {
  now?: () => number;
  sleep?: SleepFn;
  /** Aborting it ends every wait as not ready */
  signal?: AbortSignal;
}

/** Pod phase of a single selected pod is Running */
export const phaseIsRunning = (stdout: string): boolean => stdout.includes('Running');

/**
 * At least one pod is listed and no pod reports a phase other than Running.
 * Input is the space separated output of `{.items[*].status.phase}`.
 */
export const allPodsRunning = (stdout: string): boolean => {
  const phases = stdout.replace(/'/g, ' ').split(/\s+/).filter(Boolean);
  return phases.length > 0 && phases.every((phase) => phase === 'Running');
};

export class ReadinessPoller {
  private readonly now: () => number;
  private readonly sleepFn: SleepFn;
  private readonly signal: AbortSignal | undefined;

  constructor(
    private readonly logger: Logger,
    private readonly runner: Runner,
    options: PollerOptions = {},
  ) {
    this.now = options.now ?? Date.now;
    this.sleepFn = options.sleep ?? sleep;
    this.signal = options.signal;
  }

  async waitUntilReady(check: ReadinessCheck): Promise<boolean> {
    const query = withAttempts(check.query, 1);

    return this.waitFor(
      check.name,
      async () => {
        const outcome = await this.runner.run(query);
        return isSucceeded(outcome) && check.predicate(outcome.output);
      },
      check,
    );
  }

  /**
   * Poll every check concurrently. Each check keeps its own deadline and
   * its own entry in the returned map.
   */
  async waitForAll(checks: readonly ReadinessCheck[]): Promise<Map<string, boolean>> {
    const entries = await Promise.all(
      checks.map(async (check): Promise<[string, boolean]> => [
        check.name,
        await this.waitUntilReady(check),
      ]),
    );
    return new Map(entries);
  }

  /**
   * Generic polling loop over an arbitrary readiness test
   */
  async waitFor(name: string, isReady: () => Promise<boolean>, options: WaitOptions): Promise<boolean> {
    const startTime = this.now();

    for (;;) {
      if (this.signal?.aborted) {
        this.logger.warn({ check: name }, `Stopped waiting for ${name}: interrupted`);
        return false;
      }

      if (await isReady()) {
        this.logger.info({ check: name }, `${name} is ready`);
        return true;
      }

      const elapsedMs = this.now() - startTime;
      if (elapsedMs >= options.deadlineMs) {
        this.logger.error(
          { check: name, deadlineMs: options.deadlineMs },
          `${name} not ready after ${Math.floor(options.deadlineMs / 1000)}s`,
        );
        return false;
      }

      const elapsed = Math.floor(elapsedMs / 1000);
      this.logger.info({ check: name, elapsed }, `Waiting for ${name}... (${elapsed}s elapsed)`);
      await this.sleepFn(options.pollIntervalMs, this.signal);
    }
  }
}
