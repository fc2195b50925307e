export {
  ClusterConfigSchema,
  DeployConfigSchema,
  EnvironmentSchema,
  deepMerge,
  loadConfig,
  resolveLayout,
  type ClusterConfig,
  type DeployConfig,
  type Environment,
  type LoadConfigOptions,
  type MonitoredService,
  type ProjectLayout,
} from './app-config';
export * from './defaults';
