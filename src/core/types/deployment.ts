/**
 * Deployment-related types
 */

/**
 * Well-known top-level deployment property keys
 */
export const COUNT_PROPERTY_KEY = 'deployer.count';
export const GROUP_PROPERTY_KEY = 'deployer.group';
export const INDEXED_PROPERTY_KEY = 'deployer.indexed';
export const APP_NAME_PROPERTY_KEY = 'deployer.appName';

/**
 * Opaque handle to the artifact being deployed. Only its URI is consumed here.
 */
export interface ArtifactResource {
  readonly uri: string;
  getFile?(): string;
}

export interface AppDefinition {
  readonly name: string;
  readonly properties: Readonly<Record<string, string>>;
}

export interface DeploymentRequest {
  readonly definition: AppDefinition;
  readonly resource: ArtifactResource;
  readonly deploymentProperties: Readonly<Record<string, string>>;
  readonly commandlineArguments: readonly string[];
}

export interface DeploymentRequestInit {
  name: string;
  resource: ArtifactResource | string;
  appProperties?: Record<string, string>;
  deploymentProperties?: Record<string, string>;
  commandlineArguments?: string[];
}

/**
 * Build an immutable deployment request. A string resource is taken as the artifact URI.
 */
export function createDeploymentRequest(init: DeploymentRequestInit): DeploymentRequest {
  const resource: ArtifactResource =
    typeof init.resource === 'string' ? Object.freeze({ uri: init.resource }) : init.resource;

  return Object.freeze({
    definition: Object.freeze({
      name: init.name,
      properties: Object.freeze({ ...init.appProperties }),
    }),
    resource,
    deploymentProperties: Object.freeze({ ...init.deploymentProperties }),
    commandlineArguments: Object.freeze([...(init.commandlineArguments ?? [])]),
  });
}

export type DeploymentState =
  | 'unknown'
  | 'deploying'
  | 'deployed'
  | 'failed'
  | 'partial'
  | 'undeployed'
  | 'error';

export type LaunchState = 'unknown' | 'launching' | 'running' | 'complete' | 'failed' | 'error';

export interface AppInstanceStatus {
  id: string;
  state: DeploymentState;
  attributes: Record<string, string>;
}

export interface AppStatus {
  deploymentId: string;
  state: DeploymentState;
  instances: Record<string, AppInstanceStatus>;
}

export interface TaskStatus {
  taskId: string;
  state: LaunchState;
  attributes: Record<string, string>;
}

export interface AppScaleRequest {
  deploymentId: string;
  count: number;
  properties?: Readonly<Record<string, string>>;
}

export interface RuntimeEnvironmentInfo {
  spiClass: string;
  implementationName: string;
  implementationVersion: string;
  platformType: string;
  platformApiVersion: string;
  platformClientVersion: string;
  platformHostVersion: string;
  nodeVersion: string;
  platformSpecificInfo: Record<string, string>;
}

export interface AppDeployer {
  deploy(request: DeploymentRequest): Promise<string>;
  undeploy(deploymentId: string): Promise<void>;
  status(deploymentId: string): Promise<AppStatus>;
  scale(request: AppScaleRequest): Promise<void>;
  getLog(deploymentId: string): Promise<string>;
  environmentInfo(): RuntimeEnvironmentInfo;
}

export interface TaskLauncher {
  launch(request: DeploymentRequest): Promise<string>;
  cancel(taskId: string): Promise<void>;
  cleanup(taskId: string): Promise<void>;
  destroy(appName: string): Promise<void>;
  status(taskId: string): Promise<TaskStatus>;
  getLog(taskId: string): Promise<string>;
  getRunningTaskExecutionCount(): Promise<number>;
  getMaximumConcurrentTasks(): number;
  environmentInfo(): RuntimeEnvironmentInfo;
}
