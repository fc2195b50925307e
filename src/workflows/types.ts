/**
 * Workflow Types
 */

import type { Logger } from 'pino';
import type { Runner } from '../domain/types/command';
import type { DeployConfig, Environment, ProjectLayout } from '../config/app-config';
import type { ReadinessPoller } from '../infrastructure/readiness-poller';

export interface DeployOptions {
  env: Environment;
  skipBuild: boolean;
  skipMonitoring: boolean;
  portForward: boolean;
}

/**
 * Everything a stage needs to issue commands and wait on the cluster
 */
export interface StageContext {
  logger: Logger;
  runner: Runner;
  poller: ReadinessPoller;
  config: DeployConfig;
  layout: ProjectLayout;
  env: Environment;
}
