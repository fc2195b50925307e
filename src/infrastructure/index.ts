export { CommandExecutor, type CommandExecutorOptions, type SpawnFn } from './command-executor';
export { CommandRunner } from './command-runner';
export {
  ReadinessPoller,
  allPodsRunning,
  phaseIsRunning,
  type PollerOptions,
  type ReadinessCheck,
  type WaitOptions,
} from './readiness-poller';
export {
  PortForwardSession,
  portForwardArgs,
  type PortForwardHandle,
  type PortForwardOptions,
  type PortForwardTarget,
} from './port-forward';
