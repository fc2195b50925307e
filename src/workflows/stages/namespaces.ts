/**
 * Namespace stage
 *
 * Each namespace is rendered with a client-side dry run and the rendered
 * manifest is piped to `kubectl apply -f -`, which makes the step idempotent.
 */

import { createCommand, isSucceeded } from '../../domain/types/command';
import type { PipelineStage } from '../../domain/types/pipeline';
import { Failure, Success, type Result } from '../../domain/types/result';
import type { StageContext } from '../types';

export function namespacesFor(ctx: StageContext): string[] {
  return [...new Set([ctx.config.namespaces.app, ctx.config.namespaces.monitoring])];
}

export async function createNamespace(ctx: StageContext, namespace: string): Promise<Result<void>> {
  const { kubectl } = ctx.config.binaries;

  const rendered = await ctx.runner.run(
    createCommand({
      executable: kubectl,
      args: ['create', 'namespace', namespace, '--dry-run=client', '-o', 'yaml'],
      timeoutMs: ctx.config.timeouts.namespaceRenderMs,
    }),
  );
  if (!isSucceeded(rendered)) {
    ctx.logger.error({ namespace, stderr: rendered.lastError }, `Failed to generate namespace YAML for ${namespace}`);
    return Failure(`Failed to generate namespace YAML for ${namespace}: ${rendered.lastError}`);
  }

  ctx.logger.debug({ namespace }, `Applying namespace YAML for ${namespace}`);
  const applied = await ctx.runner.run(
    createCommand({
      executable: kubectl,
      args: ['apply', '-f', '-'],
      input: rendered.output,
      timeoutMs: ctx.config.timeouts.namespaceApplyMs,
    }),
  );
  if (!isSucceeded(applied)) {
    ctx.logger.error({ namespace, stderr: applied.lastError }, `Failed to create namespace ${namespace}`);
    return Failure(`Failed to create namespace ${namespace}: ${applied.lastError}`);
  }

  return Success(undefined);
}

export function createNamespacesStage(ctx: StageContext): PipelineStage {
  return {
    name: 'namespaces',
    policy: 'fatal',
    async run() {
      ctx.logger.info('Creating Kubernetes namespaces...');
      const namespaces = namespacesFor(ctx);
      for (const namespace of namespaces) {
        const result = await createNamespace(ctx, namespace);
        if (!result.ok) {
          return result;
        }
      }
      ctx.logger.info({ namespaces }, 'Kubernetes namespaces created successfully');
      return Success(namespaces);
    },
  };
}
