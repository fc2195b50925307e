/**
 * Deployment Workflow - deploys the application to the local cluster
 *
 * Steps:
 * 1. Create namespaces
 * 2. Build the application (unless skipped)
 * 3. Build the image and load it into the cluster (unless skipped)
 * 4. Deploy the monitoring stack (unless skipped, soft)
 * 5. Deploy the application overlay
 * 6. Port-forward until interrupted (when requested and everything succeeded)
 */

import type { Logger } from 'pino';
import { resolveLayout, type DeployConfig, type Environment } from '../config/app-config';
import type { Runner } from '../domain/types/command';
import type { PipelineRun, PipelineStage } from '../domain/types/pipeline';
import type { PortForwardSession, PortForwardTarget } from '../infrastructure/port-forward';
import type { ReadinessPoller } from '../infrastructure/readiness-poller';
import type { ClusterStatusSource } from '../services/cluster-lifecycle';
import { DeploymentPipeline } from './deployment-pipeline';
import { createApplicationStage } from './stages/application';
import { createBuildAppStage, createBuildImageStage } from './stages/build';
import { createMonitoringStage } from './stages/monitoring';
import { createNamespacesStage } from './stages/namespaces';
import type { DeployOptions, StageContext } from './types';

export interface DeploymentDependencies {
  logger: Logger;
  runner: Runner;
  poller: ReadinessPoller;
  cluster: ClusterStatusSource;
  portForwards: PortForwardSession;
  config: DeployConfig;
}

export function planDeployment(options: DeployOptions, ctx: StageContext): PipelineStage[] {
  const stages: PipelineStage[] = [createNamespacesStage(ctx)];
  if (!options.skipBuild) {
    stages.push(createBuildAppStage(ctx), createBuildImageStage(ctx));
  }
  if (!options.skipMonitoring) {
    stages.push(createMonitoringStage(ctx));
  }
  stages.push(createApplicationStage(ctx));
  return stages;
}

export function resolvePortForwards(config: DeployConfig, env: Environment): PortForwardTarget[] {
  return config.portForwards.map((forward) => ({
    ...forward,
    resource: forward.resource.split('{env}').join(env),
  }));
}

/**
 * Run the deployment. With `portForward` set and a successful run this only
 * returns once `signal` aborts. An abort before that ends the pipeline at
 * the next stage boundary.
 */
export async function runDeployment(
  options: DeployOptions,
  deps: DeploymentDependencies,
  signal: AbortSignal = new AbortController().signal,
): Promise<PipelineRun> {
  const { logger, config } = deps;
  const ctx: StageContext = {
    logger,
    runner: deps.runner,
    poller: deps.poller,
    config,
    layout: resolveLayout(config, options.env),
    env: options.env,
  };

  const pipeline = new DeploymentPipeline(logger, deps.cluster, signal);
  const run = await pipeline.execute(planDeployment(options, ctx));

  if (run.success) {
    logger.info({ runId: run.id }, 'Deployment completed successfully');
  } else {
    logger.error(
      {
        runId: run.id,
        reason: run.abortReason,
        failedStages: run.stages.filter((stage) => stage.status === 'failed').map((stage) => stage.name),
      },
      'Deployment completed with errors',
    );
  }

  if (options.portForward && run.success && !signal.aborted) {
    await deps.portForwards.hold(resolvePortForwards(config, options.env), signal);
  }

  return run;
}
