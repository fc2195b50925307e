/**
 * Port Forward Session
 *
 * Owns long-lived `kubectl port-forward` processes. Handles are acquired by
 * `hold` and every one of them is terminated before `hold` returns.
 */

import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import type { Logger } from 'pino';
import { waitForAbort } from '../shared/async';
import type { SpawnFn } from './command-executor';

export interface PortForwardTarget {
  name: string;
  namespace: string;
  /** Resource reference such as `svc/grafana` */
  resource: string;
  localPort: number;
  remotePort: number;
  note?: string;
}

export interface PortForwardHandle {
  readonly target: PortForwardTarget;
  readonly pid: number | undefined;
  exited(): boolean;
  terminate(): Promise<void>;
}

export interface PortForwardOptions {
  kubectl?: string;
  killGraceMs?: number;
  spawn?: SpawnFn;
}

const defaultSpawn: SpawnFn = (executable, args, options) => spawn(executable, args, options);

export function portForwardArgs(target: PortForwardTarget): string[] {
  return [
    'port-forward',
    target.resource,
    `${target.localPort}:${target.remotePort}`,
    '-n',
    target.namespace,
  ];
}

export class PortForwardSession {
  private readonly kubectl: string;
  private readonly killGraceMs: number;
  private readonly spawnProcess: SpawnFn;

  constructor(
    private readonly logger: Logger,
    options: PortForwardOptions = {},
  ) {
    this.kubectl = options.kubectl ?? 'kubectl';
    this.killGraceMs = options.killGraceMs ?? 5000;
    this.spawnProcess = options.spawn ?? defaultSpawn;
  }

  /**
   * Start every forward and block until the signal aborts
   */
  async hold(targets: readonly PortForwardTarget[], signal: AbortSignal): Promise<void> {
    const handles: PortForwardHandle[] = [];
    try {
      this.logger.info('Setting up port forwarding...');
      for (const target of targets) {
        handles.push(this.open(target));
        this.logger.info(
          { forward: target.name, localPort: target.localPort },
          `${target.name} available at http://localhost:${target.localPort}${target.note ? ` (${target.note})` : ''}`,
        );
      }
      this.logger.info('Press Ctrl+C to stop port forwarding');
      await waitForAbort(signal);
      this.logger.info('Stopping port forwarding...');
    } finally {
      await this.closeAll(handles);
    }
  }

  open(target: PortForwardTarget): PortForwardHandle {
    const options: SpawnOptions = { stdio: 'ignore' };
    const child = this.spawnProcess(this.kubectl, portForwardArgs(target), options);
    return createHandle(child, target, this.logger, this.killGraceMs);
  }

  /**
   * Terminate every handle. A handle that fails to terminate does not stop
   * the others from being terminated.
   */
  async closeAll(handles: readonly PortForwardHandle[]): Promise<void> {
    const results = await Promise.allSettled(handles.map((handle) => handle.terminate()));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.logger.error(
          { forward: handles[index]?.target.name, error: String(result.reason) },
          'Failed to stop port forward',
        );
      }
    });
  }
}

function createHandle(
  child: ChildProcess,
  target: PortForwardTarget,
  logger: Logger,
  killGraceMs: number,
): PortForwardHandle {
  let hasExited = false;
  const exitPromise = new Promise<void>((resolve) => {
    child.once('exit', () => {
      hasExited = true;
      resolve();
    });
  });

  child.on('error', (error: Error) => {
    hasExited = true;
    logger.error({ forward: target.name, error: error.message }, 'Port forward process failed');
  });

  return {
    target,
    pid: child.pid,
    exited: () => hasExited,
    async terminate(): Promise<void> {
      if (hasExited) return;
      child.kill('SIGTERM');

      let graceHandle: NodeJS.Timeout | undefined;
      const grace = new Promise<'timeout'>((resolve) => {
        graceHandle = setTimeout(() => resolve('timeout'), killGraceMs);
      });
      const outcome = await Promise.race([exitPromise.then(() => 'exited' as const), grace]);
      if (graceHandle) clearTimeout(graceHandle);

      if (outcome === 'timeout' && !hasExited) {
        logger.warn({ forward: target.name }, 'Port forward did not stop, sending SIGKILL');
        child.kill('SIGKILL');
      }
    },
  };
}
