/**
 * Cluster Lifecycle - idempotent start/stop/status for the local cluster runtime
 */

import type { Logger } from 'pino';
import { createCommand, isSucceeded, type Command, type Runner } from '../domain/types/command';
import type { ClusterConfig } from '../config/app-config';
import { DEFAULT_BINARIES } from '../config/defaults';
import { ReadinessPoller } from '../infrastructure/readiness-poller';
import { sleep, type SleepFn } from '../shared/async';
import { parseClusterStatus } from './status-parser';

export interface ClusterStatusSource {
  status(): Promise<boolean>;
}

export interface ClusterLifecycleOptions {
  kubectl?: string;
  poller?: ReadinessPoller;
  sleep?: SleepFn;
  /** Cuts the restart settle delay short */
  signal?: AbortSignal;
}

export class ClusterLifecycle implements ClusterStatusSource {
  private readonly kubectl: string;
  private readonly poller: ReadinessPoller;
  private readonly sleepFn: SleepFn;
  private readonly signal: AbortSignal | undefined;

  constructor(
    private readonly logger: Logger,
    private readonly runner: Runner,
    private readonly config: ClusterConfig,
    options: ClusterLifecycleOptions = {},
  ) {
    this.kubectl = options.kubectl ?? DEFAULT_BINARIES.kubectl;
    this.poller = options.poller ?? new ReadinessPoller(logger, runner);
    this.sleepFn = options.sleep ?? sleep;
    this.signal = options.signal;
  }

  statusCommand(): Command {
    return createCommand({
      executable: this.config.binary,
      args: ['status', '-o', 'json'],
      timeoutMs: this.config.statusTimeoutMs,
      maxRetries: 1,
    });
  }

  startCommand(): Command {
    return createCommand({
      executable: this.config.binary,
      args: [
        'start',
        `--memory=${this.config.memoryMb}`,
        `--cpus=${this.config.cpus}`,
        `--driver=${this.config.driver}`,
      ],
      timeoutMs: this.config.startTimeoutMs,
      maxRetries: 1,
    });
  }

  stopCommand(): Command {
    return createCommand({
      executable: this.config.binary,
      args: ['stop'],
      timeoutMs: this.config.startTimeoutMs,
      maxRetries: 1,
    });
  }

  controlPlaneCommand(): Command {
    return createCommand({
      executable: this.kubectl,
      args: ['version', '--output=yaml'],
      timeoutMs: this.config.statusTimeoutMs,
      maxRetries: 1,
    });
  }

  async status(): Promise<boolean> {
    const outcome = await this.runner.run(this.statusCommand());
    if (!isSucceeded(outcome)) {
      return false;
    }

    const status = parseClusterStatus(outcome.output);
    this.logger.debug({ running: status.running, strategy: status.strategy }, 'Cluster status parsed');
    return status.running;
  }

  async start(): Promise<boolean> {
    if (await this.status()) {
      this.logger.info('Cluster is already running');
      return true;
    }

    this.logger.info(
      { timeoutMs: this.config.startTimeoutMs },
      `Starting cluster (timeout: ${Math.floor(this.config.startTimeoutMs / 1000)}s)`,
    );
    const started = await this.runner.run(this.startCommand());
    if (!isSucceeded(started)) {
      this.logger.error({ stderr: started.lastError }, 'Failed to start cluster');
      return false;
    }

    const ready = await this.poller.waitFor(
      'cluster',
      async () => (await this.status()) && (await this.controlPlaneReachable()),
      { pollIntervalMs: this.config.pollIntervalMs, deadlineMs: this.config.readyDeadlineMs },
    );

    if (ready) {
      this.logger.info('Cluster started successfully');
    } else {
      this.logger.error(
        `Cluster failed to start within ${Math.floor(this.config.readyDeadlineMs / 1000)}s`,
      );
    }
    return ready;
  }

  async stop(): Promise<boolean> {
    if (!(await this.status())) {
      this.logger.info('Cluster is not running');
      return true;
    }

    this.logger.info('Stopping cluster');
    const stopped = await this.runner.run(this.stopCommand());
    if (!isSucceeded(stopped)) {
      this.logger.error({ stderr: stopped.lastError }, 'Failed to stop cluster');
      return false;
    }

    this.logger.info('Cluster stopped successfully');
    return true;
  }

  /**
   * Stop, let the runtime settle, then start. The result is the start result.
   */
  async restart(): Promise<boolean> {
    const stopped = await this.stop();
    if (!stopped) {
      this.logger.warn('Stop failed during restart, attempting start anyway');
    }
    await this.sleepFn(this.config.restartDelayMs, this.signal);
    return this.start();
  }

  private async controlPlaneReachable(): Promise<boolean> {
    const outcome = await this.runner.run(this.controlPlaneCommand());
    return isSucceeded(outcome);
  }
}
