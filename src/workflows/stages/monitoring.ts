/**
 * Monitoring stage
 *
 * Applies each monitoring manifest, then waits on every monitored service
 * independently. Soft: a failure here does not stop the application deploy.
 */

import { join } from 'node:path';
import type { MonitoredService } from '../../config/app-config';
import { createCommand, isSucceeded } from '../../domain/types/command';
import type { PipelineStage } from '../../domain/types/pipeline';
import { Failure, Success } from '../../domain/types/result';
import { phaseIsRunning, type ReadinessCheck } from '../../infrastructure/readiness-poller';
import type { StageContext } from '../types';
import { requirePath } from './prerequisites';

export function monitoringCheck(ctx: StageContext, service: MonitoredService): ReadinessCheck {
  const { timeouts } = ctx.config;
  return {
    name: service.name,
    query: createCommand({
      executable: ctx.config.binaries.kubectl,
      args: [
        'get',
        'pods',
        '-n',
        ctx.config.namespaces.monitoring,
        '-l',
        service.selector,
        '-o',
        'jsonpath={.items[0].status.phase}',
      ],
      timeoutMs: timeouts.podQueryMs,
    }),
    predicate: phaseIsRunning,
    pollIntervalMs: timeouts.deploymentPollMs,
    deadlineMs: timeouts.deploymentMs,
  };
}

export function createMonitoringStage(ctx: StageContext): PipelineStage {
  return {
    name: 'monitoring',
    policy: 'soft',
    async run() {
      const { services } = ctx.config.monitoring;
      ctx.logger.info('Deploying monitoring stack...');

      for (const service of services) {
        const manifest = join(ctx.layout.monitoringDir, service.manifest);
        requirePath(manifest, `${service.name} manifest`);

        ctx.logger.info({ service: service.name }, `Deploying ${service.name}...`);
        const applied = await ctx.runner.run(
          createCommand({
            executable: ctx.config.binaries.kubectl,
            args: ['apply', '-f', manifest],
            timeoutMs: ctx.config.timeouts.manifestApplyMs,
            maxRetries: ctx.config.retries.apply,
            backoffMs: ctx.config.timeouts.backoffMs,
          }),
        );
        if (!isSucceeded(applied)) {
          ctx.logger.error({ service: service.name, stderr: applied.lastError }, `Failed to deploy ${service.name}`);
          return Failure(`Failed to deploy ${service.name}: ${applied.lastError}`);
        }
      }

      ctx.logger.info('Waiting for monitoring stack to be ready...');
      const readiness = await ctx.poller.waitForAll(services.map((service) => monitoringCheck(ctx, service)));
      const notReady = [...readiness.entries()].filter(([, ready]) => !ready).map(([name]) => name);

      if (notReady.length > 0) {
        return Failure(`Monitoring services not ready: ${notReady.join(', ')}`);
      }

      ctx.logger.info('Monitoring stack deployed successfully');
      return Success(services.map((service) => service.name));
    },
  };
}
