/**
 * Application stage: apply the environment overlay and wait until every
 * selected pod is running.
 */

import { createCommand, isSucceeded } from '../../domain/types/command';
import type { PipelineStage } from '../../domain/types/pipeline';
import { Failure, Success } from '../../domain/types/result';
import { allPodsRunning, type ReadinessCheck } from '../../infrastructure/readiness-poller';
import type { StageContext } from '../types';
import { requirePath } from './prerequisites';

export function applicationCheck(ctx: StageContext): ReadinessCheck {
  const { timeouts } = ctx.config;
  return {
    name: 'application',
    query: createCommand({
      executable: ctx.config.binaries.kubectl,
      args: [
        'get',
        'pods',
        '-n',
        ctx.config.namespaces.app,
        '-l',
        ctx.config.appSelector,
        '-o',
        'jsonpath={.items[*].status.phase}',
      ],
      timeoutMs: timeouts.podQueryMs,
    }),
    predicate: allPodsRunning,
    pollIntervalMs: timeouts.deploymentPollMs,
    deadlineMs: timeouts.deploymentMs,
  };
}

export function createApplicationStage(ctx: StageContext): PipelineStage {
  return {
    name: 'application',
    policy: 'fatal',
    async run() {
      const { overlayDir } = ctx.layout;
      ctx.logger.info({ env: ctx.env }, `Deploying application to ${ctx.env} environment...`);
      requirePath(overlayDir, 'Kubernetes overlay directory');

      const applied = await ctx.runner.run(
        createCommand({
          executable: ctx.config.binaries.kubectl,
          args: ['apply', '-k', overlayDir],
          timeoutMs: ctx.config.timeouts.overlayApplyMs,
          maxRetries: ctx.config.retries.apply,
          backoffMs: ctx.config.timeouts.backoffMs,
        }),
      );
      if (!isSucceeded(applied)) {
        ctx.logger.error({ env: ctx.env, stderr: applied.lastError }, `Failed to deploy application to ${ctx.env} environment`);
        return Failure(`Failed to deploy application to ${ctx.env} environment: ${applied.lastError}`);
      }

      ctx.logger.info('Waiting for application to be ready...');
      if (!(await ctx.poller.waitUntilReady(applicationCheck(ctx)))) {
        return Failure(
          `Application not ready after ${Math.floor(ctx.config.timeouts.deploymentMs / 1000)}s`,
        );
      }

      ctx.logger.info('Application is ready');
      return Success(ctx.env);
    },
  };
}
