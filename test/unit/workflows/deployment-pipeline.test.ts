/**
 * Deployment Pipeline Unit Tests
 */

import { describe, test, expect, jest } from '@jest/globals';
import {
  DEPLOYMENT_INTERRUPTED,
  DeploymentPipeline,
  PREREQUISITE_NOT_MET,
} from '../../../src/workflows/deployment-pipeline';
import type { PipelineStage, StagePolicy } from '../../../src/domain/types/pipeline';
import { Failure, Success, type Result } from '../../../src/domain/types/result';
import { ErrorCodes, PrerequisiteError } from '../../../src/errors/index';
import { createSilentLogger } from '../../__support__/logger';

const cluster = (running: boolean) => ({ status: async () => running });

function stage(
  name: string,
  policy: StagePolicy,
  behaviour: () => Promise<Result<unknown>> = async () => Success(name),
) {
  const run = jest.fn(behaviour);
  const definition: PipelineStage = { name, policy, run };
  return { definition, run };
}

function scenario(failing: Partial<Record<string, string>> = {}) {
  const make = (name: string, policy: StagePolicy) =>
    stage(name, policy, async () => {
      const error = failing[name];
      return error === undefined ? Success(name) : Failure(error);
    });
  const stages = {
    namespaces: make('namespaces', 'fatal'),
    build: make('build', 'fatal'),
    monitor: make('monitor', 'soft'),
    deploy: make('deploy', 'fatal'),
  };
  return { stages, definitions: Object.values(stages).map((entry) => entry.definition) };
}

describe('DeploymentPipeline', () => {
  test('should abort before any stage when the cluster is not running', async () => {
    const { stages, definitions } = scenario();
    const pipeline = new DeploymentPipeline(createSilentLogger(), cluster(false));

    const run = await pipeline.execute(definitions);

    expect(run.state).toBe('aborted');
    expect(run.success).toBe(false);
    expect(run.abortReason).toBe(PREREQUISITE_NOT_MET);
    expect(run.stages).toEqual([]);
    expect(stages.namespaces.run).not.toHaveBeenCalled();
  });

  test('should complete successfully when every stage succeeds', async () => {
    const { definitions } = scenario();
    const pipeline = new DeploymentPipeline(createSilentLogger(), cluster(true));

    const run = await pipeline.execute(definitions);

    expect(run.state).toBe('completed');
    expect(run.success).toBe(true);
    expect(run.stages.map((outcome) => [outcome.name, outcome.status])).toEqual([
      ['namespaces', 'succeeded'],
      ['build', 'succeeded'],
      ['monitor', 'succeeded'],
      ['deploy', 'succeeded'],
    ]);
    expect(run.abortReason).toBeUndefined();
    expect(run.finishedAt).toBeInstanceOf(Date);
  });

  test('should continue past a failed soft stage and report overall failure', async () => {
    const { stages, definitions } = scenario({ monitor: 'Monitoring services not ready: grafana' });
    const pipeline = new DeploymentPipeline(createSilentLogger(), cluster(true));

    const run = await pipeline.execute(definitions);

    expect(run.state).toBe('completed');
    expect(run.success).toBe(false);
    expect(stages.deploy.run).toHaveBeenCalledTimes(1);
    expect(run.stages[2]).toEqual(
      expect.objectContaining({
        name: 'monitor',
        policy: 'soft',
        status: 'failed',
        error: 'Monitoring services not ready: grafana',
        code: ErrorCodes.STAGE_FAILED,
      }),
    );
    expect(run.stages[3]?.status).toBe('succeeded');
  });

  test('should halt at a failed fatal stage', async () => {
    const { stages, definitions } = scenario({ build: 'docker build failed' });
    const pipeline = new DeploymentPipeline(createSilentLogger(), cluster(true));

    const run = await pipeline.execute(definitions);

    expect(run.state).toBe('aborted');
    expect(run.success).toBe(false);
    expect(run.abortReason).toBe('Stage build failed: docker build failed');
    expect(run.stages.map((outcome) => outcome.name)).toEqual(['namespaces', 'build']);
    expect(stages.monitor.run).not.toHaveBeenCalled();
    expect(stages.deploy.run).not.toHaveBeenCalled();
  });

  test('should record a thrown prerequisite error with its code', async () => {
    const missing = stage('build', 'fatal', async () => {
      throw new PrerequisiteError('Dockerfile not found: /srv/app/Dockerfile', '/srv/app/Dockerfile');
    });
    const pipeline = new DeploymentPipeline(createSilentLogger(), cluster(true));

    const run = await pipeline.execute([missing.definition]);

    expect(run.stages[0]).toEqual(
      expect.objectContaining({
        status: 'failed',
        error: 'Dockerfile not found: /srv/app/Dockerfile',
        code: ErrorCodes.PREREQUISITE_NOT_MET,
      }),
    );
    expect(run.abortReason).toBe('Stage build failed: Dockerfile not found: /srv/app/Dockerfile');
  });

  test('should record an unexpected exception as an internal error', async () => {
    const broken = stage('monitor', 'soft', async () => {
      throw new Error('boom');
    });
    const after = stage('deploy', 'fatal');
    const pipeline = new DeploymentPipeline(createSilentLogger(), cluster(true));

    const run = await pipeline.execute([broken.definition, after.definition]);

    expect(run.stages[0]?.code).toBe(ErrorCodes.INTERNAL_ERROR);
    expect(after.run).toHaveBeenCalledTimes(1);
    expect(run.state).toBe('completed');
  });

  test('should expose the current stage while running', async () => {
    const pipeline = new DeploymentPipeline(createSilentLogger(), cluster(true));
    const seen: Array<string | undefined> = [];
    const observer = stage('deploy', 'fatal', async () => {
      seen.push(pipeline.run?.currentStage, pipeline.run?.state);
      return Success(undefined);
    });

    const run = await pipeline.execute([observer.definition]);

    expect(seen).toEqual(['deploy', 'running']);
    expect(run.currentStage).toBeUndefined();
    expect(pipeline.run).toBe(run);
  });

  test('should return a frozen run', async () => {
    const { definitions } = scenario();
    const pipeline = new DeploymentPipeline(createSilentLogger(), cluster(true));

    const run = await pipeline.execute(definitions);

    expect(Object.isFrozen(run)).toBe(true);
    expect(Object.isFrozen(run.stages)).toBe(true);
    expect(run.id).toHaveLength(10);
  });

  test('should stop before the next stage once its signal aborts', async () => {
    const controller = new AbortController();
    const { stages, definitions } = scenario();
    stages.build.run.mockImplementation(async () => {
      controller.abort();
      return Success('build');
    });
    const pipeline = new DeploymentPipeline(createSilentLogger(), cluster(true), controller.signal);

    const run = await pipeline.execute(definitions);

    expect(run.state).toBe('aborted');
    expect(run.success).toBe(false);
    expect(run.abortReason).toBe(DEPLOYMENT_INTERRUPTED);
    expect(run.stages.map((outcome) => outcome.name)).toEqual(['namespaces', 'build']);
    expect(stages.monitor.run).not.toHaveBeenCalled();
    expect(stages.deploy.run).not.toHaveBeenCalled();
  });

  test('should not query the cluster when its signal has already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const status = jest.fn(async () => true);
    const { stages, definitions } = scenario();
    const pipeline = new DeploymentPipeline(createSilentLogger(), { status }, controller.signal);

    const run = await pipeline.execute(definitions);

    expect(run.abortReason).toBe(DEPLOYMENT_INTERRUPTED);
    expect(status).not.toHaveBeenCalled();
    expect(stages.namespaces.run).not.toHaveBeenCalled();
  });
});
