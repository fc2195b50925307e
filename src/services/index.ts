export {
  ClusterLifecycle,
  type ClusterLifecycleOptions,
  type ClusterStatusSource,
} from './cluster-lifecycle';
export {
  RUNNING_TOKEN,
  parseClusterStatus,
  parseFallbackStatus,
  parseJson,
  parseStructuredStatus,
  type ClusterStatus,
  type StatusParseStrategy,
} from './status-parser';
