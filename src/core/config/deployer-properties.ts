/**
 * Deployer-wide configuration
 *
 * Defaults live here; a YAML settings document and KUBELAUNCH_* environment
 * variables may override them before a deployer is constructed.
 */

import { type } from 'arktype';
import * as yaml from 'js-yaml';
import { ConfigurationError, formatArktypeError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';
import { normalizeKeys } from '../properties/yaml-binder.js';
import type {
  DeployerProperties,
  ProbeKind,
  ProbeSettings,
  TaskLauncherProperties,
  VolumeClaimTemplateSettings,
} from '../types/properties.js';
import { deployerSettingsSchema, taskLauncherSettingsSchema } from './schemas.js';

const logger = getComponentLogger('deployer-properties');

/**
 * Key prefix under which every resolvable aspect lives
 */
export const DEFAULT_PROPERTY_PREFIX = 'deployer.kubernetes';

export const DEFAULT_STATEFUL_SET_INIT_IMAGE = 'busybox';

const DEFAULT_PROBES: Record<ProbeKind, ProbeSettings> = {
  liveness: {
    path: '/actuator/health/liveness',
    delay: 10,
    period: 60,
    timeout: 2,
    failure: 3,
    success: 1,
  },
  readiness: {
    path: '/actuator/health/readiness',
    delay: 10,
    period: 10,
    timeout: 2,
    failure: 3,
    success: 1,
  },
  startup: {
    path: '/actuator/health',
    delay: 30,
    period: 3,
    timeout: 2,
    failure: 20,
    success: 1,
  },
};

export const DEFAULT_TASK_LAUNCHER_PROPERTIES: TaskLauncherProperties = {
  restartPolicy: 'Never',
};

export type DeployerPropertiesOverrides = Partial<
  Omit<DeployerProperties, 'probes' | 'statefulSet'>
> & {
  probes?: Partial<Record<ProbeKind, Partial<ProbeSettings>>>;
  statefulSet?: { volumeClaimTemplate?: Partial<VolumeClaimTemplateSettings> };
};

/**
 * Build a complete DeployerProperties from defaults plus overrides.
 * Nested settings (limits, requests, probes, stateful set) merge one level deep.
 */
export function createDeployerProperties(
  overrides: DeployerPropertiesOverrides = {}
): DeployerProperties {
  const { probes, limits, requests, statefulSet, lifecycle, ...rest } = overrides;

  return {
    namespace: 'default',
    environmentVariables: [],
    entryPointStyle: 'exec',
    imagePullPolicy: 'IfNotPresent',
    imagePullSecrets: [],
    tolerations: [],
    volumes: [],
    volumeMounts: [],
    additionalContainers: [],
    configMapKeyRefs: [],
    secretKeyRefs: [],
    configMapRefs: [],
    secretRefs: [],
    initContainers: [],
    taskServiceAccountName: 'default',
    hostNetwork: false,
    createLoadBalancer: false,
    createJob: false,
    maximumConcurrentTasks: 20,
    restartPolicy: 'Always',
    probeType: 'HTTP',
    maxTerminatedErrorRestarts: 2,
    maxCrashLoopBackOffRestarts: 4,
    scaleTimeoutMs: 60_000,
    ...rest,
    limits: { ...limits },
    requests: { ...requests },
    lifecycle: { ...lifecycle },
    statefulSet: {
      volumeClaimTemplate: { storage: '10g', ...statefulSet?.volumeClaimTemplate },
    },
    probes: {
      liveness: { ...DEFAULT_PROBES.liveness, ...probes?.liveness },
      readiness: { ...DEFAULT_PROBES.readiness, ...probes?.readiness },
      startup: { ...DEFAULT_PROBES.startup, ...probes?.startup },
    },
  };
}

function parseSettingsDocument(text: string, source: string): unknown {
  try {
    return normalizeKeys(yaml.load(text, { schema: yaml.CORE_SCHEMA }) ?? {});
  } catch (error) {
    throw new ConfigurationError(`Invalid deployer settings in ${source}`, undefined, undefined, {
      cause: error,
    });
  }
}

/**
 * Load deployer properties from a YAML document, then apply environment overrides.
 *
 * @example
 * loadDeployerProperties(`
 * namespace: apps
 * tolerations: [{key: dedicated, value: deployer, operator: Equal, effect: NoSchedule}]
 * limits: {memory: 1Gi}
 * `)
 */
export function loadDeployerProperties(
  text: string,
  env: NodeJS.ProcessEnv = process.env
): DeployerProperties {
  const settings = deployerSettingsSchema(parseSettingsDocument(text, 'deployer settings'));
  if (settings instanceof type.errors) {
    throw formatArktypeError(settings, 'Invalid deployer settings', 'deployer', text);
  }

  const properties = createDeployerProperties(settings);
  return applyEnvironmentOverrides(properties, env);
}

export function loadTaskLauncherProperties(text: string): TaskLauncherProperties {
  const settings = taskLauncherSettingsSchema(parseSettingsDocument(text, 'task launcher settings'));
  if (settings instanceof type.errors) {
    throw formatArktypeError(settings, 'Invalid task launcher settings', 'taskLauncher', text);
  }
  return { ...DEFAULT_TASK_LAUNCHER_PROPERTIES, ...settings };
}

/**
 * KUBELAUNCH_NAMESPACE and KUBELAUNCH_MASTER_URL take precedence over file settings
 */
export function applyEnvironmentOverrides(
  properties: DeployerProperties,
  env: NodeJS.ProcessEnv = process.env
): DeployerProperties {
  const overridden = { ...properties };

  if (env.KUBELAUNCH_NAMESPACE) {
    overridden.namespace = env.KUBELAUNCH_NAMESPACE;
  }
  if (env.KUBELAUNCH_MASTER_URL) {
    overridden.masterUrl = env.KUBELAUNCH_MASTER_URL;
  }

  if (overridden.namespace !== properties.namespace || overridden.masterUrl !== properties.masterUrl) {
    logger.debug('Applied environment overrides to deployer properties', {
      namespace: overridden.namespace,
      masterUrl: overridden.masterUrl,
    });
  }

  return overridden;
}
