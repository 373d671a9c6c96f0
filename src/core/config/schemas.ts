/**
 * ArkType schemas for structured deployment properties and deployer settings.
 *
 * Values arrive from YAML where scalars may be typed loosely (`readOnly: 'true'`,
 * `runAsUser: '1000'`), so the leaf schemas accept both forms and normalize.
 */

import { type } from 'arktype';
import type { InitContainerSettings } from '../types/properties.js';

export const integerish = type('number | string')
  .narrow((value) => String(value).trim() !== '' && Number.isInteger(Number(value)))
  .pipe((value) => Number(value));

export const booleanish = type('boolean | "true" | "false"').pipe(
  (value) => value === true || value === 'true'
);

export const stringish = type('string | number | boolean').pipe((value) => String(value));

/**
 * A YAML list or a single comma-separated scalar
 */
export const stringList = type('string | (string | number | boolean)[]').pipe((value) =>
  typeof value === 'string'
    ? value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
    : value.map((item) => String(item))
);

const stringMap = type({ '[string]': stringish });

export const tolerationSchema = type({
  'key?': stringish,
  'operator?': 'string',
  'value?': stringish,
  'effect?': 'string',
  'tolerationSeconds?': integerish,
});

const keyToPath = type({ key: 'string', path: 'string', 'mode?': integerish });

export const volumeSchema = type({
  name: 'string',
  'hostPath?': { path: 'string', 'type?': 'string' },
  'emptyDir?': { 'medium?': 'string', 'sizeLimit?': stringish },
  'persistentVolumeClaim?': { claimName: 'string', 'readOnly?': booleanish },
  'nfs?': { server: 'string', path: 'string', 'readOnly?': booleanish },
  'secret?': {
    'secretName?': 'string',
    'defaultMode?': integerish,
    'optional?': booleanish,
    'items?': keyToPath.array(),
  },
  'configMap?': {
    'name?': 'string',
    'defaultMode?': integerish,
    'optional?': booleanish,
    'items?': keyToPath.array(),
  },
});

export const volumeMountSchema = type({
  name: 'string',
  mountPath: 'string',
  'readOnly?': booleanish,
  'subPath?': 'string',
  'subPathExpr?': 'string',
  'mountPropagation?': 'string',
});

const resourceRequirements = type({ 'limits?': stringMap, 'requests?': stringMap });

export const containerSchema = type({
  name: 'string',
  'image?': 'string',
  'imagePullPolicy?': 'string',
  'command?': stringish.array(),
  'args?': stringish.array(),
  'workingDir?': 'string',
  'env?': type({ name: 'string', 'value?': stringish }).array(),
  'ports?': type({
    containerPort: integerish,
    'name?': 'string',
    'protocol?': 'string',
    'hostPort?': integerish,
  }).array(),
  'volumeMounts?': volumeMountSchema.array(),
  'resources?': resourceRequirements,
});

export const configMapKeyRefSchema = type({
  envVarName: 'string',
  configMapName: 'string',
  dataKey: 'string',
});

export const secretKeyRefSchema = type({
  envVarName: 'string',
  secretName: 'string',
  dataKey: 'string',
});

const seccompProfile = type({ type: 'string', 'localhostProfile?': 'string' });

const seLinuxOptions = type({
  'level?': 'string',
  'role?': 'string',
  'type?': 'string',
  'user?': 'string',
});

const windowsOptions = type({
  'gmsaCredentialSpec?': 'string',
  'gmsaCredentialSpecName?': 'string',
  'hostProcess?': booleanish,
  'runAsUserName?': 'string',
});

export const podSecurityContextSchema = type({
  'runAsUser?': integerish,
  'runAsGroup?': integerish,
  'runAsNonRoot?': booleanish,
  'fsGroup?': integerish,
  'fsGroupChangePolicy?': 'string',
  'supplementalGroups?': integerish.array(),
  'seccompProfile?': seccompProfile,
  'seLinuxOptions?': seLinuxOptions,
  'sysctls?': type({ name: 'string', value: stringish }).array(),
  'windowsOptions?': windowsOptions,
});

export const containerSecurityContextSchema = type({
  'allowPrivilegeEscalation?': booleanish,
  'privileged?': booleanish,
  'procMount?': 'string',
  'readOnlyRootFilesystem?': booleanish,
  'runAsUser?': integerish,
  'runAsGroup?': integerish,
  'runAsNonRoot?': booleanish,
  'capabilities?': { 'add?': 'string[]', 'drop?': 'string[]' },
  'seccompProfile?': seccompProfile,
  'seLinuxOptions?': seLinuxOptions,
  'windowsOptions?': windowsOptions,
});

const selectorRequirement = type({
  key: 'string',
  operator: 'string',
  'values?': stringish.array(),
});

const labelSelector = type({
  'matchExpressions?': selectorRequirement.array(),
  'matchLabels?': stringMap,
});

const nodeSelectorTerm = type({
  'matchExpressions?': selectorRequirement.array(),
  'matchFields?': selectorRequirement.array(),
});

export const nodeAffinitySchema = type({
  'requiredDuringSchedulingIgnoredDuringExecution?': {
    nodeSelectorTerms: nodeSelectorTerm.array(),
  },
  'preferredDuringSchedulingIgnoredDuringExecution?': type({
    weight: integerish,
    preference: nodeSelectorTerm,
  }).array(),
});

const podAffinityTerm = type({
  'labelSelector?': labelSelector,
  'namespaceSelector?': labelSelector,
  'namespaces?': 'string[]',
  topologyKey: 'string',
});

export const podAffinitySchema = type({
  'requiredDuringSchedulingIgnoredDuringExecution?': podAffinityTerm.array(),
  'preferredDuringSchedulingIgnoredDuringExecution?': type({
    weight: integerish,
    podAffinityTerm,
  }).array(),
});

/**
 * Init containers accept `name`/`containerName`, `image`/`imageName`,
 * `command`/`commands` and `environmentVariables`/`env`; the canonical name wins.
 */
export const initContainerSchema = type({
  'name?': 'string',
  'containerName?': 'string',
  'image?': 'string',
  'imageName?': 'string',
  'command?': stringList,
  'commands?': stringList,
  'args?': stringList,
  'environmentVariables?': stringList,
  'env?': stringList,
  'environmentVariablesFromFieldRefs?': stringList,
  'configMapRefEnvVars?': stringList,
  'secretRefEnvVars?': stringList,
  'volumeMounts?': volumeMountSchema.array(),
}).pipe(
  (raw): InitContainerSettings => ({
    name: raw.name ?? raw.containerName,
    image: raw.image ?? raw.imageName,
    command: raw.command ?? raw.commands,
    args: raw.args,
    environmentVariables: raw.environmentVariables ?? raw.env,
    environmentVariablesFromFieldRefs: raw.environmentVariablesFromFieldRefs,
    configMapRefEnvVars: raw.configMapRefEnvVars,
    secretRefEnvVars: raw.secretRefEnvVars,
    volumeMounts: raw.volumeMounts,
  })
);

export const lifecycleHookSchema = type({ exec: { command: stringList } });

const probeSettingsSchema = type({
  'path?': 'string',
  'port?': integerish,
  'command?': 'string',
  'delay?': integerish,
  'period?': integerish,
  'timeout?': integerish,
  'failure?': integerish,
  'success?': integerish,
});

const resourceSettings = {
  'memory?': stringish,
  'cpu?': stringish,
  'ephemeralStorage?': stringish,
  'hugepages2Mi?': stringish,
  'hugepages1Gi?': stringish,
} as const;

/**
 * Deployer settings file. Every field is optional; absent fields keep their defaults.
 */
export const deployerSettingsSchema = type({
  'namespace?': 'string',
  'masterUrl?': 'string',
  'environmentVariables?': stringList,
  'entryPointStyle?': '"exec" | "shell"',
  'containerCommand?': 'string',
  'imagePullPolicy?': '"Always" | "IfNotPresent" | "Never"',
  'imagePullSecret?': 'string',
  'imagePullSecrets?': stringList,
  'limits?': { ...resourceSettings, 'gpuVendor?': 'string', 'gpuCount?': stringish },
  'requests?': resourceSettings,
  'tolerations?': tolerationSchema.array(),
  'volumes?': volumeSchema.array(),
  'volumeMounts?': volumeMountSchema.array(),
  'additionalContainers?': containerSchema.array(),
  'configMapKeyRefs?': configMapKeyRefSchema.array(),
  'secretKeyRefs?': secretKeyRefSchema.array(),
  'configMapRefs?': stringList,
  'secretRefs?': stringList,
  'podSecurityContext?': podSecurityContextSchema,
  'containerSecurityContext?': containerSecurityContextSchema,
  'nodeAffinity?': nodeAffinitySchema,
  'podAffinity?': podAffinitySchema,
  'podAntiAffinity?': podAffinitySchema,
  'initContainer?': initContainerSchema,
  'initContainers?': initContainerSchema.array(),
  'nodeSelector?': 'string',
  'podAnnotations?': 'string',
  'serviceAnnotations?': 'string',
  'jobAnnotations?': 'string',
  'deploymentLabels?': 'string',
  'deploymentServiceAccountName?': 'string',
  'taskServiceAccountName?': 'string',
  'shareProcessNamespace?': booleanish,
  'priorityClassName?': 'string',
  'hostNetwork?': booleanish,
  'createLoadBalancer?': booleanish,
  'createJob?': booleanish,
  'maximumConcurrentTasks?': integerish,
  'restartPolicy?': '"Always" | "OnFailure" | "Never"',
  'terminationGracePeriodSeconds?': integerish,
  'lifecycle?': { 'postStart?': lifecycleHookSchema, 'preStop?': lifecycleHookSchema },
  'statefulSet?': {
    'volumeClaimTemplate?': {
      'name?': 'string',
      'storage?': stringish,
      'storageClassName?': 'string',
    },
  },
  'statefulSetInitContainerImageName?': 'string',
  'probeType?': '"HTTP" | "TCP" | "COMMAND"',
  'probes?': {
    'liveness?': probeSettingsSchema,
    'readiness?': probeSettingsSchema,
    'startup?': probeSettingsSchema,
  },
  'maxTerminatedErrorRestarts?': integerish,
  'maxCrashLoopBackOffRestarts?': integerish,
  'scaleTimeoutMs?': integerish,
});

export const taskLauncherSettingsSchema = type({
  'restartPolicy?': '"Always" | "OnFailure" | "Never"',
  'backoffLimit?': integerish,
  'ttlSecondsAfterFinished?': integerish,
});
