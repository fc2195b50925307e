/**
 * Pipeline Types
 */

import type { Result } from './result';

/**
 * fatal: a failure aborts the run. soft: a failure is recorded and the run continues.
 */
export type StagePolicy = 'fatal' | 'soft';

export interface PipelineStage {
  name: string;
  policy: StagePolicy;
  run: () => Promise<Result<unknown>>;
}

export type StageStatus = 'succeeded' | 'failed';

export interface StageOutcome {
  name: string;
  policy: StagePolicy;
  status: StageStatus;
  durationMs: number;
  error?: string;
  code?: string;
}

export type PipelineState = 'not-started' | 'running' | 'completed' | 'aborted';

export interface PipelineRun {
  id: string;
  state: PipelineState;
  /** Name of the stage being executed while the run is in progress */
  currentStage?: string;
  stages: readonly StageOutcome[];
  success: boolean;
  abortReason?: string;
  startedAt: Date;
  finishedAt?: Date;
}
