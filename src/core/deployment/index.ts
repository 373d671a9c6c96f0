export { KubernetesAppDeployer, type KubernetesAppDeployerOptions } from './app-deployer.js';
export { KubernetesDeployerBase, type KubernetesDeployerOptions } from './base-deployer.js';
export {
  createDeploymentId,
  createIdMap,
  createTaskId,
  toLabelSelector,
  toPlatformName,
} from './deployment-ids.js';
export { createRuntimeEnvironmentInfo, type EnvironmentInfoInput } from './environment-info.js';
export { LOG_TAIL_LINES, reverseLogLines } from './logs.js';
export {
  aggregateState,
  buildAppStatus,
  buildInstanceStatus,
  type CrashThresholds,
  isTerminalAppState,
  isTerminalLaunchState,
  mapInstanceState,
  mapJobLaunchState,
  mapPodLaunchState,
} from './status.js';
export { type PollOptions, type PollResult, pollUntilTerminal } from './status-poller.js';
export { KubernetesTaskLauncher, type KubernetesTaskLauncherOptions } from './task-launcher.js';
