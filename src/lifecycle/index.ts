export {
  ServiceManager,
  VALIDATION_PROJECT_ID,
  composeFileFor,
  isDeploymentProfile,
  parseComposePs,
  parseDeployment,
  resolveDockerDir,
} from './manager.js';
export type { LifecycleClient, ServiceManagerOptions } from './manager.js';
export { DEPLOYMENT_PROFILES } from './types.js';
export type {
  ComponentHealth,
  DeploymentProfile,
  ServerStatus,
  ServicePorts,
  ServiceState,
} from './types.js';
