/**
 * Deployment Pipeline
 *
 * Runs stages strictly in order after the cluster prerequisite holds.
 * State: not-started -> running -> completed | aborted
 */

import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import type { PipelineRun, PipelineStage, StageOutcome } from '../domain/types/pipeline';
import { ErrorCodes, isApplicationError } from '../errors/index';
import { createTimer } from '../lib/logger';
import type { ClusterStatusSource } from '../services/cluster-lifecycle';

export const PREREQUISITE_NOT_MET = 'Prerequisite not met: cluster is not running';
export const DEPLOYMENT_INTERRUPTED = 'Deployment interrupted';

export class DeploymentPipeline {
  private current: PipelineRun | undefined;

  constructor(
    private readonly logger: Logger,
    private readonly cluster: ClusterStatusSource,
    /** Checked before the prerequisite and before every stage */
    private readonly signal?: AbortSignal,
  ) {}

  /**
   * Snapshot of the run in progress, or of the last finished run
   */
  get run(): PipelineRun | undefined {
    return this.current;
  }

  async execute(stages: readonly PipelineStage[]): Promise<PipelineRun> {
    const outcomes: StageOutcome[] = [];
    const run: PipelineRun = {
      id: nanoid(10),
      state: 'not-started',
      stages: outcomes,
      success: true,
      startedAt: new Date(),
    };
    this.current = run;

    if (this.signal?.aborted) {
      return this.finish(run, 'aborted', DEPLOYMENT_INTERRUPTED);
    }

    if (!(await this.cluster.status())) {
      this.logger.error({ runId: run.id }, 'Cluster is not running. Please start it first.');
      return this.finish(run, 'aborted', PREREQUISITE_NOT_MET);
    }

    run.state = 'running';
    this.logger.info(
      { runId: run.id, stages: stages.map((stage) => stage.name) },
      'Starting deployment pipeline',
    );

    for (const stage of stages) {
      if (this.signal?.aborted) {
        return this.finish(run, 'aborted', DEPLOYMENT_INTERRUPTED);
      }

      run.currentStage = stage.name;
      const outcome = await this.runStage(stage);
      outcomes.push(outcome);

      if (outcome.status === 'succeeded') {
        continue;
      }

      run.success = false;
      if (stage.policy === 'fatal') {
        const reason = this.signal?.aborted
          ? DEPLOYMENT_INTERRUPTED
          : `Stage ${stage.name} failed: ${outcome.error ?? 'unknown error'}`;
        return this.finish(run, 'aborted', reason);
      }
      this.logger.warn({ runId: run.id, stage: stage.name }, `Stage ${stage.name} failed, continuing`);
    }

    return this.finish(run, 'completed');
  }

  private async runStage(stage: PipelineStage): Promise<StageOutcome> {
    const timer = createTimer(this.logger, stage.name, { policy: stage.policy });

    try {
      const result = await stage.run();
      if (result.ok) {
        return { name: stage.name, policy: stage.policy, status: 'succeeded', durationMs: timer.end() };
      }
      return {
        name: stage.name,
        policy: stage.policy,
        status: 'failed',
        durationMs: timer.error(result.error),
        error: result.error,
        code: ErrorCodes.STAGE_FAILED,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return {
        name: stage.name,
        policy: stage.policy,
        status: 'failed',
        durationMs: timer.error(error),
        error: message,
        code: isApplicationError(error) ? error.code : ErrorCodes.INTERNAL_ERROR,
      };
    }
  }

  private finish(run: PipelineRun, state: 'completed' | 'aborted', reason?: string): PipelineRun {
    run.state = state;
    run.finishedAt = new Date();
    delete run.currentStage;
    if (state === 'aborted') {
      run.success = false;
      run.abortReason = reason;
      this.logger.error({ runId: run.id, reason }, 'Deployment pipeline aborted');
    }

    const finished: PipelineRun = Object.freeze({ ...run, stages: Object.freeze([...run.stages]) });
    this.current = finished;
    return finished;
  }
}
