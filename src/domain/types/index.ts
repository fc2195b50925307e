export { Success, Failure, isOk, isFail, type Result } from './result';
export {
  COMMAND_INTERRUPTED,
  DEFAULT_BACKOFF_MS,
  DEFAULT_COMMAND_TIMEOUT_MS,
  createCommand,
  withAttempts,
  formatCommand,
  Succeeded,
  ExhaustedRetries,
  isSucceeded,
  type Command,
  type CommandSpec,
  type CommandResult,
  type RetryOutcome,
  type ProcessExecutor,
  type Runner,
} from './command';
export type {
  StagePolicy,
  PipelineStage,
  StageStatus,
  StageOutcome,
  PipelineState,
  PipelineRun,
} from './pipeline';
