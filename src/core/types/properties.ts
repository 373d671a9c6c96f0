/**
 * Deployer-wide defaults and the shapes bound from structured deployment properties
 */

import type {
  V1Container,
  V1NodeAffinity,
  V1PodAffinity,
  V1PodAntiAffinity,
  V1PodSecurityContext,
  V1SecurityContext,
  V1Toleration,
  V1Volume,
  V1VolumeMount,
} from '@kubernetes/client-node';

export type ImagePullPolicy = 'Always' | 'IfNotPresent' | 'Never';
export type RestartPolicy = 'Always' | 'OnFailure' | 'Never';
export type EntryPointStyle = 'exec' | 'shell';
export type ProbeType = 'HTTP' | 'TCP' | 'COMMAND';
export type ProbeKind = 'liveness' | 'readiness' | 'startup';

export interface ResourceSettings {
  memory?: string;
  cpu?: string;
  ephemeralStorage?: string;
  hugepages2Mi?: string;
  hugepages1Gi?: string;
}

export interface LimitSettings extends ResourceSettings {
  gpuVendor?: string;
  gpuCount?: string;
}

export interface ConfigMapKeyRef {
  envVarName: string;
  configMapName: string;
  dataKey: string;
}

export interface SecretKeyRef {
  envVarName: string;
  secretName: string;
  dataKey: string;
}

export interface InitContainerSettings {
  name?: string;
  image?: string;
  command?: string[];
  args?: string[];
  /** `NAME=value` entries */
  environmentVariables?: string[];
  /** `NAME=fieldPath` entries */
  environmentVariablesFromFieldRefs?: string[];
  configMapRefEnvVars?: string[];
  secretRefEnvVars?: string[];
  volumeMounts?: V1VolumeMount[];
}

export interface LifecycleHook {
  exec: { command: string[] };
}

export interface LifecycleSettings {
  postStart?: LifecycleHook;
  preStop?: LifecycleHook;
}

export interface ProbeSettings {
  path?: string;
  port?: number;
  command?: string;
  delay: number;
  period: number;
  timeout: number;
  failure: number;
  success: number;
}

export interface VolumeClaimTemplateSettings {
  name?: string;
  storage: string;
  storageClassName?: string;
}

/**
 * Defaults applied to every request unless the request overrides them.
 * Read-only once a deployer has been constructed with it.
 */
export interface DeployerProperties {
  namespace: string;
  /** Master URL reported by environmentInfo */
  masterUrl?: string;

  environmentVariables: string[];
  entryPointStyle: EntryPointStyle;
  containerCommand?: string;

  imagePullPolicy: ImagePullPolicy;
  imagePullSecret?: string;
  imagePullSecrets: string[];

  limits: LimitSettings;
  requests: ResourceSettings;

  tolerations: V1Toleration[];
  volumes: V1Volume[];
  volumeMounts: V1VolumeMount[];
  additionalContainers: V1Container[];

  configMapKeyRefs: ConfigMapKeyRef[];
  secretKeyRefs: SecretKeyRef[];
  configMapRefs: string[];
  secretRefs: string[];

  podSecurityContext?: V1PodSecurityContext;
  containerSecurityContext?: V1SecurityContext;

  nodeAffinity?: V1NodeAffinity;
  podAffinity?: V1PodAffinity;
  podAntiAffinity?: V1PodAntiAffinity;

  initContainer?: InitContainerSettings;
  initContainers: InitContainerSettings[];

  nodeSelector?: string;
  podAnnotations?: string;
  serviceAnnotations?: string;
  jobAnnotations?: string;
  deploymentLabels?: string;

  deploymentServiceAccountName?: string;
  taskServiceAccountName: string;
  shareProcessNamespace?: boolean;
  priorityClassName?: string;
  hostNetwork: boolean;

  createLoadBalancer: boolean;
  createJob: boolean;
  maximumConcurrentTasks: number;

  restartPolicy: RestartPolicy;
  terminationGracePeriodSeconds?: number;
  lifecycle: LifecycleSettings;

  statefulSet: { volumeClaimTemplate: VolumeClaimTemplateSettings };
  statefulSetInitContainerImageName?: string;

  probeType: ProbeType;
  probes: Record<ProbeKind, ProbeSettings>;

  maxTerminatedErrorRestarts: number;
  maxCrashLoopBackOffRestarts: number;

  /** Upper bound for a scale request */
  scaleTimeoutMs: number;
}

export interface TaskLauncherProperties {
  restartPolicy: RestartPolicy;
  backoffLimit?: number;
  ttlSecondsAfterFinished?: number;
}
