export { DEPLOYMENT_INTERRUPTED, DeploymentPipeline, PREREQUISITE_NOT_MET } from './deployment-pipeline';
export {
  planDeployment,
  resolvePortForwards,
  runDeployment,
  type DeploymentDependencies,
} from './deployment';
export { createNamespacesStage, createNamespace, namespacesFor } from './stages/namespaces';
export { createBuildAppStage, createBuildImageStage } from './stages/build';
export { createMonitoringStage, monitoringCheck } from './stages/monitoring';
export { createApplicationStage, applicationCheck } from './stages/application';
export { requirePath } from './stages/prerequisites';
export type { DeployOptions, StageContext } from './types';
