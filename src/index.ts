/**
 * Library entry point
 */

export * from './domain/types/index';
export * from './config/index';
export * from './errors/index';
export * from './infrastructure/index';
export * from './services/index';
export * from './workflows/index';
export { createContainer, type Deps, type DepsOverrides } from './app/container';
export { createLogger, createTimer, type Logger, type Timer } from './lib/logger';
export { sleep, waitForAbort, type SleepFn } from './shared/async';
export { createProgram, type CliRuntime, type RuntimeFactory, type RuntimeRequest } from './cli/program';
