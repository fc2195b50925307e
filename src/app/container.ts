/**
 * Dependency Container
 *
 * Wires the executor, runner, poller, cluster lifecycle and port-forward
 * session for one configuration. Any dependency can be overridden in tests.
 */

import type { Logger } from 'pino';
import type { DeployConfig } from '../config/app-config';
import type { ProcessExecutor, Runner } from '../domain/types/command';
import { CommandExecutor } from '../infrastructure/command-executor';
import { CommandRunner } from '../infrastructure/command-runner';
import { PortForwardSession } from '../infrastructure/port-forward';
import { ReadinessPoller } from '../infrastructure/readiness-poller';
import { ClusterLifecycle } from '../services/cluster-lifecycle';
import { sleep } from '../shared/async';
import type { DeploymentDependencies } from '../workflows/deployment';

export interface Deps extends DeploymentDependencies {
  executor: ProcessExecutor;
  cluster: ClusterLifecycle;
}

export type DepsOverrides = Partial<Pick<Deps, 'executor' | 'runner' | 'poller' | 'portForwards'>>;

/**
 * Aborting `signal` terminates running commands, ends readiness waits and
 * skips remaining retries.
 */
export function createContainer(
  config: DeployConfig,
  logger: Logger,
  overrides: DepsOverrides = {},
  signal?: AbortSignal,
): Deps {
  const executor = overrides.executor ?? new CommandExecutor(logger);
  const runner: Runner = overrides.runner ?? new CommandRunner(logger, executor, sleep, signal);
  const poller = overrides.poller ?? new ReadinessPoller(logger, runner, { signal });
  const cluster = new ClusterLifecycle(logger, runner, config.cluster, {
    kubectl: config.binaries.kubectl,
    poller,
    signal,
  });
  const portForwards =
    overrides.portForwards ?? new PortForwardSession(logger, { kubectl: config.binaries.kubectl });

  return { config, logger, executor, runner, poller, cluster, portForwards };
}
