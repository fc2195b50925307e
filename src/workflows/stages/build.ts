/**
 * Build stages: the application artifact, then the container image loaded
 * into the cluster runtime.
 */

import { createCommand, isSucceeded, type Command } from '../../domain/types/command';
import type { PipelineStage } from '../../domain/types/pipeline';
import { Failure, Success, type Result } from '../../domain/types/result';
import type { StageContext } from '../types';
import { requirePath } from './prerequisites';

async function runStep(ctx: StageContext, command: Command, failure: string): Promise<Result<string>> {
  const outcome = await ctx.runner.run(command);
  if (!isSucceeded(outcome)) {
    ctx.logger.error({ stderr: outcome.lastError }, failure);
    return Failure(`${failure}: ${outcome.lastError}`);
  }
  return Success(outcome.output);
}

export function createBuildAppStage(ctx: StageContext): PipelineStage {
  return {
    name: 'build-app',
    policy: 'fatal',
    async run() {
      const { appDir } = ctx.layout;
      const { npm } = ctx.config.binaries;
      const timeoutMs = ctx.config.timeouts.npmStepMs;

      ctx.logger.info({ appDir }, 'Building application...');
      requirePath(appDir, 'Application directory');

      ctx.logger.info('Installing npm dependencies...');
      const installed = await runStep(
        ctx,
        createCommand({ executable: npm, args: ['install', '--legacy-peer-deps'], cwd: appDir, timeoutMs }),
        'Failed to install npm dependencies',
      );
      if (!installed.ok) return installed;

      const built = await runStep(
        ctx,
        createCommand({ executable: npm, args: ['run', 'build'], cwd: appDir, timeoutMs }),
        'Failed to build application',
      );
      if (!built.ok) return built;

      ctx.logger.info('Application built successfully');
      return Success(appDir);
    },
  };
}

export function createBuildImageStage(ctx: StageContext): PipelineStage {
  return {
    name: 'build-image',
    policy: 'fatal',
    async run() {
      const { appDir, dockerfile } = ctx.layout;
      const { image, timeouts } = ctx.config;

      ctx.logger.info({ image }, 'Building Docker image...');
      requirePath(dockerfile, 'Dockerfile');

      const built = await runStep(
        ctx,
        createCommand({
          executable: ctx.config.binaries.docker,
          args: ['build', '-t', image, '.'],
          cwd: appDir,
          timeoutMs: timeouts.dockerBuildMs,
        }),
        'Failed to build Docker image',
      );
      if (!built.ok) return built;

      ctx.logger.info({ image }, 'Loading Docker image into the cluster...');
      const loaded = await runStep(
        ctx,
        createCommand({
          executable: ctx.config.cluster.binary,
          args: ['image', 'load', image],
          timeoutMs: timeouts.imageLoadMs,
        }),
        'Failed to load Docker image into the cluster',
      );
      if (!loaded.ok) return loaded;

      ctx.logger.info({ image }, 'Docker image built and loaded successfully');
      return Success(image);
    },
  };
}
