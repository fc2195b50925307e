/**
 * Centralized Configuration Defaults
 *
 * Default values for the local cluster deployment. Every value can be
 * overridden from the YAML configuration file or an environment overlay.
 */

export const DEFAULT_BINARIES = {
  minikube: 'minikube',
  kubectl: 'kubectl',
  docker: 'docker',
  npm: 'npm',
} as const;

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  statusQuery: 10000, // 10 seconds
  clusterStart: 60000, // 1 minute
  clusterReady: 60000, // 1 minute
  clusterPoll: 5000, // 5 seconds
  restartDelay: 5000, // 5 seconds between stop and start
  namespaceRender: 10000, // 10 seconds
  namespaceApply: 30000, // 30 seconds
  npmStep: 300000, // 5 minutes
  dockerBuild: 300000, // 5 minutes
  imageLoad: 120000, // 2 minutes
  manifestApply: 30000, // 30 seconds
  overlayApply: 60000, // 1 minute
  podQuery: 10000, // 10 seconds
  deployment: 300000, // 5 minutes
  deploymentPoll: 10000, // 10 seconds
  backoff: 5000, // 5 seconds between attempts
} as const;

export const DEFAULT_RETRIES = {
  apply: 3,
} as const;

export const DEFAULT_CLUSTER = {
  memoryMb: 4096,
  cpus: 2,
  driver: 'docker',
} as const;

export const DEFAULT_LAYOUT = {
  appDir: 'sre-react-app',
  k8sDir: 'kubernetes',
  monitoringDir: 'monitoring',
  configFile: 'kube-deploy.yaml',
} as const;

export const DEFAULT_NAMESPACES = {
  app: 'react-sre-app',
  monitoring: 'monitoring',
} as const;

export const DEFAULT_IMAGE = 'react-sre-app:latest';

export const DEFAULT_APP_SELECTOR = 'app=react-sre-app';

export const DEFAULT_MONITORED_SERVICES = [
  { name: 'prometheus', manifest: 'prometheus-k8s.yaml', selector: 'app=prometheus' },
  { name: 'grafana', manifest: 'grafana-k8s.yaml', selector: 'app=grafana' },
] as const;

/**
 * `{env}` in a resource is replaced with the target environment name
 */
export const DEFAULT_PORT_FORWARDS = [
  {
    name: 'Application',
    namespace: DEFAULT_NAMESPACES.app,
    resource: 'svc/{env}-react-sre-app',
    localPort: 3000,
    remotePort: 80,
  },
  {
    name: 'Prometheus',
    namespace: DEFAULT_NAMESPACES.monitoring,
    resource: 'svc/prometheus',
    localPort: 9090,
    remotePort: 9090,
  },
  {
    name: 'Grafana',
    namespace: DEFAULT_NAMESPACES.monitoring,
    resource: 'svc/grafana',
    localPort: 8081,
    remotePort: 3000,
    note: 'admin/admin',
  },
] as const;

export const ENVIRONMENTS = ['dev', 'prod'] as const;
