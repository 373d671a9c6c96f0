/**
 * Deployment properties resolver
 *
 * Every configurable aspect of a pod is resolved from two inputs only: the
 * request's flat deployment properties and the deployer-wide defaults. Each
 * getter is pure over those inputs, so resolving twice yields equal results.
 *
 * Merge laws, per aspect family:
 * - scalars: a non-blank request value wins, otherwise the default
 * - identity-keyed lists: request entries, then defaults whose key is not taken
 * - resource maps: per key, request value else default
 * - security contexts and lifecycle: all-or-nothing at the aspect level
 * - affinity: node, pod and pod-anti sub-trees resolved independently
 */

import type {
  V1Affinity,
  V1Container,
  V1EnvFromSource,
  V1EnvVar,
  V1NodeAffinity,
  V1PodAffinity,
  V1PodAntiAffinity,
  V1PodSecurityContext,
  V1SecurityContext,
  V1Toleration,
  V1Volume,
  V1VolumeMount,
} from '@kubernetes/client-node';
import { DEFAULT_STATEFUL_SET_INIT_IMAGE } from '../config/deployer-properties.js';
import {
  configMapKeyRefSchema,
  containerSchema,
  containerSecurityContextSchema,
  initContainerSchema,
  nodeAffinitySchema,
  podAffinitySchema,
  podSecurityContextSchema,
  secretKeyRefSchema,
  stringList,
  tolerationSchema,
  volumeMountSchema,
  volumeSchema,
} from '../config/schemas.js';
import { ConfigurationError } from '../errors.js';
import { type DeployerLogger, getComponentLogger } from '../logging/index.js';
import {
  bindProperty,
  bindValue,
  type DeploymentProperties,
  getDeploymentPropertyValue,
  getFirstNonBlankPropertyValue,
  getStringPairsToMap,
  hasText,
  parseIntegerProperty,
  parseNestedCommaDelimitedVariables,
  parseToMebibytes,
  tokenizeCommandLine,
  type Validator,
} from '../properties/index.js';
import type {
  ConfigMapKeyRef,
  DeployerProperties,
  EntryPointStyle,
  ImagePullPolicy,
  InitContainerSettings,
  LifecycleHook,
  LifecycleSettings,
  ProbeType,
  RestartPolicy,
  SecretKeyRef,
} from '../types/properties.js';
import {
  configMapEnvSource,
  configMapKeyRefEnvVar,
  secretEnvSource,
  secretKeyRefEnvVar,
  toEnvironmentMap,
  toEnvironmentVariables,
  toFieldRefEnvironmentVariables,
} from './env-vars.js';

const IMAGE_PULL_POLICIES: readonly ImagePullPolicy[] = ['Always', 'IfNotPresent', 'Never'];
const RESTART_POLICIES: readonly RestartPolicy[] = ['Always', 'OnFailure', 'Never'];
const PROBE_TYPES: readonly ProbeType[] = ['HTTP', 'TCP', 'COMMAND'];
const ENTRY_POINT_STYLES: readonly EntryPointStyle[] = ['exec', 'shell'];

/**
 * Everything the pod spec builder needs for one request, fully merged
 */
export interface ResolvedPodConfiguration {
  volumes: V1Volume[];
  volumeMounts: V1VolumeMount[];
  tolerations: V1Toleration[];
  imagePullPolicy: ImagePullPolicy;
  imagePullSecret?: string;
  imagePullSecrets: string[];
  nodeSelector: Record<string, string>;
  podSecurityContext?: V1PodSecurityContext;
  containerSecurityContext?: V1SecurityContext;
  affinity: V1Affinity;
  initContainers: V1Container[];
  additionalContainers: V1Container[];
  limits: Record<string, string>;
  requests: Record<string, string>;
  lifecycle: LifecycleSettings;
  terminationGracePeriodSeconds?: number;
  podAnnotations: Record<string, string>;
  serviceAnnotations: Record<string, string>;
  jobAnnotations: Record<string, string>;
  deploymentLabels: Record<string, string>;
  hostNetwork: boolean;
  deploymentServiceAccountName?: string;
  taskServiceAccountName: string;
  shareProcessNamespace?: boolean;
  priorityClassName?: string;
  restartPolicy: RestartPolicy;
  containerCommand: string[];
  containerPorts: number[];
  environmentVariables: Record<string, string>;
  environmentVariablesFromFieldRefs: V1EnvVar[];
  configMapKeyRefs: V1EnvVar[];
  secretKeyRefs: V1EnvVar[];
  configMapRefs: V1EnvFromSource[];
  secretRefs: V1EnvFromSource[];
  entryPointStyle: EntryPointStyle;
  probeType: ProbeType;
  statefulSet: {
    storage: string;
    storageClassName?: string;
    volumeClaimTemplateName?: string;
    initContainerImageName: string;
  };
}

/**
 * Request entries first, then every default whose identity is not already present
 */
export function mergeByIdentity<T>(
  requested: readonly T[],
  defaults: readonly T[],
  identity: (item: T) => string | undefined
): T[] {
  const taken = new Set(requested.map(identity));
  return [...requested, ...defaults.filter((item) => !taken.has(identity(item)))];
}

function normalizeEnumName(value: string): string {
  return value.replace(/[-_\s]/g, '').toLowerCase();
}

function relaxedEnumValue<T extends string>(values: readonly T[], raw: string): T | undefined {
  const wanted = normalizeEnumName(raw);
  return values.find((value) => normalizeEnumName(value) === wanted);
}

function splitCommaList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export class DeploymentPropertiesResolver {
  constructor(
    readonly prefix: string,
    private readonly properties: DeployerProperties,
    private readonly logger: DeployerLogger = getComponentLogger('deployment-properties-resolver')
  ) {}

  /**
   * Resolve every aspect for one request
   */
  resolve(deploymentProperties: DeploymentProperties): ResolvedPodConfiguration {
    return {
      volumes: this.getVolumes(deploymentProperties),
      volumeMounts: this.getVolumeMounts(deploymentProperties),
      tolerations: this.getTolerations(deploymentProperties),
      imagePullPolicy: this.getImagePullPolicy(deploymentProperties),
      imagePullSecret: this.getImagePullSecret(deploymentProperties),
      imagePullSecrets: this.getImagePullSecrets(deploymentProperties),
      nodeSelector: this.getNodeSelectors(deploymentProperties),
      podSecurityContext: this.getPodSecurityContext(deploymentProperties),
      containerSecurityContext: this.getContainerSecurityContext(deploymentProperties),
      affinity: this.getAffinityRules(deploymentProperties),
      initContainers: this.getInitContainers(deploymentProperties),
      additionalContainers: this.getAdditionalContainers(deploymentProperties),
      limits: this.deduceResourceLimits(deploymentProperties),
      requests: this.deduceResourceRequests(deploymentProperties),
      lifecycle: this.getLifecycle(deploymentProperties),
      terminationGracePeriodSeconds: this.getTerminationGracePeriodSeconds(deploymentProperties),
      podAnnotations: this.getPodAnnotations(deploymentProperties),
      serviceAnnotations: this.getServiceAnnotations(deploymentProperties),
      jobAnnotations: this.getJobAnnotations(deploymentProperties),
      deploymentLabels: this.getDeploymentLabels(deploymentProperties),
      hostNetwork: this.getHostNetwork(deploymentProperties),
      deploymentServiceAccountName: this.getDeploymentServiceAccountName(deploymentProperties),
      taskServiceAccountName: this.getTaskServiceAccountName(deploymentProperties),
      shareProcessNamespace: this.getShareProcessNamespace(deploymentProperties),
      priorityClassName: this.getPriorityClassName(deploymentProperties),
      restartPolicy: this.getRestartPolicy(deploymentProperties),
      containerCommand: this.getContainerCommand(deploymentProperties),
      containerPorts: this.getContainerPorts(deploymentProperties),
      environmentVariables: this.getAppEnvironmentVariables(deploymentProperties),
      environmentVariablesFromFieldRefs: this.getEnvironmentVariablesFromFieldRefs(deploymentProperties),
      configMapKeyRefs: this.getConfigMapKeyRefs(deploymentProperties),
      secretKeyRefs: this.getSecretKeyRefs(deploymentProperties),
      configMapRefs: this.getConfigMapRefs(deploymentProperties),
      secretRefs: this.getSecretRefs(deploymentProperties),
      entryPointStyle: this.getEntryPointStyle(deploymentProperties),
      probeType: this.getProbeType(deploymentProperties),
      statefulSet: {
        storage: this.getStatefulSetStorage(deploymentProperties),
        storageClassName: this.getStatefulSetStorageClassName(deploymentProperties),
        volumeClaimTemplateName: this.getStatefulSetVolumeClaimTemplateName(deploymentProperties),
        initContainerImageName: this.getStatefulSetInitContainerImageName(deploymentProperties),
      },
    };
  }

  getTolerations(deploymentProperties: DeploymentProperties): V1Toleration[] {
    const requested: V1Toleration[] =
      bindProperty(deploymentProperties, this.key('tolerations'), 'tolerations', tolerationSchema.array()) ??
      [];
    return mergeByIdentity(requested, this.properties.tolerations, (toleration) => toleration.key);
  }

  /**
   * @example
   * deployer.kubernetes.volumes=[{name: data, hostPath: {path: '/mnt/data'}},
   *   {name: claim, persistentVolumeClaim: {claimName: 'app-claim', readOnly: 'true'}}]
   */
  getVolumes(deploymentProperties: DeploymentProperties): V1Volume[] {
    const requested: V1Volume[] =
      bindProperty(deploymentProperties, this.key('volumes'), 'volumes', volumeSchema.array()) ?? [];
    return mergeByIdentity(requested, this.properties.volumes, (volume) => volume.name);
  }

  getVolumeMounts(deploymentProperties: DeploymentProperties): V1VolumeMount[] {
    return this.volumeMountsFrom(getDeploymentPropertyValue(deploymentProperties, this.key('volumeMounts')));
  }

  getAdditionalContainers(deploymentProperties: DeploymentProperties): V1Container[] {
    const requested: V1Container[] =
      bindProperty(
        deploymentProperties,
        this.key('additionalContainers'),
        'additionalContainers',
        containerSchema.array()
      ) ?? [];
    return mergeByIdentity(requested, this.properties.additionalContainers, (container) => container.name);
  }

  getConfigMapKeyRefs(deploymentProperties: DeploymentProperties): V1EnvVar[] {
    const requested: ConfigMapKeyRef[] =
      bindProperty(
        deploymentProperties,
        this.key('configMapKeyRefs'),
        'configMapKeyRefs',
        configMapKeyRefSchema.array()
      ) ?? [];
    return mergeByIdentity(requested, this.properties.configMapKeyRefs, (ref) => ref.envVarName).map(
      configMapKeyRefEnvVar
    );
  }

  getSecretKeyRefs(deploymentProperties: DeploymentProperties): V1EnvVar[] {
    const requested: SecretKeyRef[] =
      bindProperty(
        deploymentProperties,
        this.key('secretKeyRefs'),
        'secretKeyRefs',
        secretKeyRefSchema.array()
      ) ?? [];
    return mergeByIdentity(requested, this.properties.secretKeyRefs, (ref) => ref.envVarName).map(
      secretKeyRefEnvVar
    );
  }

  /**
   * Defaults apply only when the request names no config maps at all
   */
  getConfigMapRefs(deploymentProperties: DeploymentProperties): V1EnvFromSource[] {
    const requested = this.getStringList(deploymentProperties, 'configMapRefs');
    return (requested.length > 0 ? requested : this.properties.configMapRefs).map(configMapEnvSource);
  }

  getSecretRefs(deploymentProperties: DeploymentProperties): V1EnvFromSource[] {
    const requested = this.getStringList(deploymentProperties, 'secretRefs');
    return (requested.length > 0 ? requested : this.properties.secretRefs).map(secretEnvSource);
  }

  deduceResourceLimits(deploymentProperties: DeploymentProperties): Record<string, string> {
    const defaults = this.properties.limits;
    const limits = this.resourceMap(deploymentProperties, 'limits', defaults);

    const gpuVendor = getDeploymentPropertyValue(
      deploymentProperties,
      this.key('limits.gpuVendor'),
      defaults.gpuVendor ?? ''
    );
    const gpuCount = getDeploymentPropertyValue(
      deploymentProperties,
      this.key('limits.gpuCount'),
      defaults.gpuCount ?? ''
    );
    if (hasText(gpuVendor) && hasText(gpuCount)) {
      limits[gpuVendor] = gpuCount;
    }

    return limits;
  }

  deduceResourceRequests(deploymentProperties: DeploymentProperties): Record<string, string> {
    const requests = this.resourceMap(deploymentProperties, 'requests', this.properties.requests);
    this.logger.debug('Using resource requests', { requests });
    return requests;
  }

  /**
   * Accepts relaxed spellings (`always`, `if-not-present`, `IF_NOT_PRESENT`).
   * An unparseable value never fails the request: it falls back to IfNotPresent.
   */
  getImagePullPolicy(deploymentProperties: DeploymentProperties): ImagePullPolicy {
    const override = getDeploymentPropertyValue(deploymentProperties, this.key('imagePullPolicy'));
    if (override === undefined) {
      return this.properties.imagePullPolicy;
    }

    const policy = relaxedEnumValue(IMAGE_PULL_POLICIES, override);
    if (policy === undefined) {
      this.logger.warn(`Parsing of pull policy ${override} failed, using default "IfNotPresent".`);
      return 'IfNotPresent';
    }
    return policy;
  }

  getImagePullSecret(deploymentProperties: DeploymentProperties): string | undefined {
    const secret = getDeploymentPropertyValue(deploymentProperties, this.key('imagePullSecret'), '');
    return hasText(secret) ? secret : this.properties.imagePullSecret;
  }

  getImagePullSecrets(deploymentProperties: DeploymentProperties): string[] {
    const requested = this.getStringList(deploymentProperties, 'imagePullSecrets');
    return requested.length > 0 ? requested : [...this.properties.imagePullSecrets];
  }

  getHostNetwork(deploymentProperties: DeploymentProperties): boolean {
    const override = getDeploymentPropertyValue(deploymentProperties, this.key('hostNetwork'));
    if (!hasText(override)) {
      return this.properties.hostNetwork;
    }
    return override.trim().toLowerCase() === 'true';
  }

  /**
   * `disktype:ssd,zone:a`; every pair must have exactly one colon
   */
  getNodeSelectors(deploymentProperties: DeploymentProperties): Record<string, string> {
    const nodeSelector =
      getFirstNonBlankPropertyValue(deploymentProperties, [this.key('nodeSelector')]) ??
      this.properties.nodeSelector;

    const selectors: Record<string, string> = {};
    if (!hasText(nodeSelector)) {
      return selectors;
    }

    for (const pair of nodeSelector.split(',')) {
      const parts = pair.split(':');
      if (parts.length !== 2) {
        throw new ConfigurationError(
          `Invalid nodeSelector value: '${pair}'`,
          this.key('nodeSelector'),
          nodeSelector
        );
      }
      selectors[(parts[0] ?? '').trim()] = (parts[1] ?? '').trim();
    }
    return selectors;
  }

  getDeploymentServiceAccountName(deploymentProperties: DeploymentProperties): string | undefined {
    return (
      this.scalar(deploymentProperties, 'deploymentServiceAccountName') ??
      this.properties.deploymentServiceAccountName
    );
  }

  getTaskServiceAccountName(deploymentProperties: DeploymentProperties): string {
    return (
      this.scalar(deploymentProperties, 'taskServiceAccountName') ??
      this.properties.taskServiceAccountName
    );
  }

  getShareProcessNamespace(deploymentProperties: DeploymentProperties): boolean | undefined {
    const override = this.scalar(deploymentProperties, 'shareProcessNamespace');
    if (override === undefined) {
      return this.properties.shareProcessNamespace;
    }
    const normalized = override.trim().toLowerCase();
    if (normalized !== 'true' && normalized !== 'false') {
      throw new ConfigurationError(
        `Invalid binding property '${override}'`,
        this.key('shareProcessNamespace'),
        override
      );
    }
    return normalized === 'true';
  }

  getPriorityClassName(deploymentProperties: DeploymentProperties): string | undefined {
    return this.scalar(deploymentProperties, 'priorityClassName') ?? this.properties.priorityClassName;
  }

  /**
   * A request context replaces the default wholesale; unset fields stay unset
   */
  getPodSecurityContext(deploymentProperties: DeploymentProperties): V1PodSecurityContext | undefined {
    return (
      bindProperty(
        deploymentProperties,
        this.key('podSecurityContext'),
        'podSecurityContext',
        podSecurityContextSchema
      ) ?? this.properties.podSecurityContext
    );
  }

  getContainerSecurityContext(deploymentProperties: DeploymentProperties): V1SecurityContext | undefined {
    return (
      bindProperty(
        deploymentProperties,
        this.key('containerSecurityContext'),
        'containerSecurityContext',
        containerSecurityContextSchema
      ) ?? this.properties.containerSecurityContext
    );
  }

  getAffinityRules(deploymentProperties: DeploymentProperties): V1Affinity {
    const affinity: V1Affinity = {};

    const nodeAffinity = this.resolveAffinity<V1NodeAffinity>(
      deploymentProperties,
      'nodeAffinity',
      nodeAffinitySchema,
      this.properties.nodeAffinity
    );
    if (nodeAffinity) {
      affinity.nodeAffinity = nodeAffinity;
    }

    const podAffinity = this.resolveAffinity<V1PodAffinity>(
      deploymentProperties,
      'podAffinity',
      podAffinitySchema,
      this.properties.podAffinity
    );
    if (podAffinity) {
      affinity.podAffinity = podAffinity;
    }

    const podAntiAffinity = this.resolveAffinity<V1PodAntiAffinity>(
      deploymentProperties,
      'podAntiAffinity',
      podAffinitySchema,
      this.properties.podAntiAffinity
    );
    if (podAntiAffinity) {
      affinity.podAntiAffinity = podAntiAffinity;
    }

    return affinity;
  }

  /**
   * Init containers come from, in order:
   * 1. `.initContainer` as one object, as flat `.initContainer.name`/`.image` keys, or the default
   * 2. `.initContainers` as an inline list; only when that is empty,
   *    `.initContainers[0]`, `.initContainers[1]`, ... until an index is missing
   * 3. default init containers past the count already collected
   */
  getInitContainers(deploymentProperties: DeploymentProperties): V1Container[] {
    const initContainers: V1Container[] = [];
    const defaults = this.properties.initContainers;

    const singleKey = this.key('initContainer');
    const single =
      bindProperty(deploymentProperties, singleKey, 'initContainer', initContainerSchema) ??
      this.initContainerFromFlatKeys(deploymentProperties, singleKey) ??
      this.properties.initContainer;
    if (single) {
      initContainers.push(this.initContainerFromSettings(single));
    }

    const inline =
      bindProperty(deploymentProperties, this.key('initContainers'), 'initContainers', initContainerSchema.array()) ??
      [];
    initContainers.push(...inline.map((settings) => this.initContainerFromSettings(settings)));

    if (inline.length === 0) {
      for (let index = 0; ; index++) {
        const indexedKey = this.key(`initContainers[${index}]`);
        const indexed =
          bindProperty(deploymentProperties, indexedKey, 'initContainer', initContainerSchema) ??
          this.initContainerFromFlatKeys(deploymentProperties, indexedKey);
        if (!indexed) {
          const fallback = defaults[index];
          if (fallback) {
            initContainers.push(this.initContainerFromSettings(fallback));
          }
          break;
        }
        initContainers.push(this.initContainerFromSettings(indexed));
      }
    }

    for (let index = initContainers.length; index < defaults.length; index++) {
      const remaining = defaults[index];
      if (remaining) {
        initContainers.push(this.initContainerFromSettings(remaining));
      }
    }

    return initContainers;
  }

  getPodAnnotations(deploymentProperties: DeploymentProperties): Record<string, string> {
    return getStringPairsToMap(this.joinWithDefault(deploymentProperties, 'podAnnotations', this.properties.podAnnotations));
  }

  getServiceAnnotations(deploymentProperties: DeploymentProperties): Record<string, string> {
    return getStringPairsToMap(
      this.joinWithDefault(deploymentProperties, 'serviceAnnotations', this.properties.serviceAnnotations)
    );
  }

  getJobAnnotations(deploymentProperties: DeploymentProperties): Record<string, string> {
    return getStringPairsToMap(this.joinWithDefault(deploymentProperties, 'jobAnnotations', this.properties.jobAnnotations));
  }

  getDeploymentLabels(deploymentProperties: DeploymentProperties): Record<string, string> {
    const joined = this.joinWithDefault(deploymentProperties, 'deploymentLabels', this.properties.deploymentLabels);
    const labels: Record<string, string> = {};
    if (!hasText(joined)) {
      return labels;
    }

    for (const label of joined.split(',')) {
      const pair = label.split(':');
      if (pair.length !== 2) {
        throw new ConfigurationError(
          `Invalid label format, expected 'labelKey:labelValue', got: '${label}'`,
          this.key('deploymentLabels'),
          joined
        );
      }
      labels[(pair[0] ?? '').trim()] = (pair[1] ?? '').trim();
    }
    return labels;
  }

  getRestartPolicy(
    deploymentProperties: DeploymentProperties,
    defaultValue: RestartPolicy = this.properties.restartPolicy
  ): RestartPolicy {
    const override = this.scalar(deploymentProperties, 'restartPolicy');
    if (override === undefined) {
      return defaultValue;
    }
    const policy = RESTART_POLICIES.find((candidate) => candidate === override.trim());
    if (policy === undefined) {
      throw new ConfigurationError(
        `Invalid restart policy '${override}'`,
        this.key('restartPolicy'),
        override
      );
    }
    return policy;
  }

  /**
   * Hooks given on the request replace the default lifecycle entirely
   */
  getLifecycle(deploymentProperties: DeploymentProperties): LifecycleSettings {
    const lifecyclePrefix = this.key('lifecycle');
    if (!Object.keys(deploymentProperties).some((key) => key.startsWith(lifecyclePrefix))) {
      return this.properties.lifecycle;
    }

    const lifecycle: LifecycleSettings = {};
    const postStart = getDeploymentPropertyValue(
      deploymentProperties,
      this.key('lifecycle.postStart.exec.command')
    );
    if (hasText(postStart)) {
      lifecycle.postStart = lifecycleHook(postStart);
    }

    const preStop = getDeploymentPropertyValue(deploymentProperties, this.key('lifecycle.preStop.exec.command'));
    if (hasText(preStop)) {
      lifecycle.preStop = lifecycleHook(preStop);
    }
    return lifecycle;
  }

  getTerminationGracePeriodSeconds(deploymentProperties: DeploymentProperties): number | undefined {
    return (
      this.integer(deploymentProperties, 'terminationGracePeriodSeconds') ??
      this.properties.terminationGracePeriodSeconds
    );
  }

  getBackoffLimit(
    deploymentProperties: DeploymentProperties,
    defaultValue?: number
  ): number | undefined {
    return this.integer(deploymentProperties, 'backoffLimit') ?? defaultValue;
  }

  getTtlSecondsAfterFinished(
    deploymentProperties: DeploymentProperties,
    defaultValue?: number
  ): number | undefined {
    return this.integer(deploymentProperties, 'ttlSecondsAfterFinished') ?? defaultValue;
  }

  /**
   * The command replaces the image entry point; quoted segments stay one token
   */
  getContainerCommand(deploymentProperties: DeploymentProperties): string[] {
    return tokenizeCommandLine(
      getDeploymentPropertyValue(deploymentProperties, this.key('containerCommand'), this.properties.containerCommand ?? '')
    );
  }

  getContainerPorts(deploymentProperties: DeploymentProperties): number[] {
    const key = this.key('containerPorts');
    const ports = getDeploymentPropertyValue(deploymentProperties, key);
    if (ports === undefined) {
      return [];
    }
    return ports.split(',').map((port) => parseIntegerProperty(key, port));
  }

  /**
   * Default environment variables overlaid with the request's
   * `FOO=bar,NODE_OPTIONS='--max-old-space-size=512,--enable-source-maps'` list
   */
  getAppEnvironmentVariables(deploymentProperties: DeploymentProperties): Record<string, string> {
    const env = toEnvironmentMap(this.properties.environmentVariables);
    const requested = getDeploymentPropertyValue(deploymentProperties, this.key('environmentVariables'));
    if (requested !== undefined) {
      Object.assign(env, toEnvironmentMap(parseNestedCommaDelimitedVariables(requested)));
    }
    return env;
  }

  getEnvironmentVariablesFromFieldRefs(deploymentProperties: DeploymentProperties): V1EnvVar[] {
    const value = getDeploymentPropertyValue(deploymentProperties, this.key('environmentVariablesFromFieldRefs'));
    return hasText(value) ? toFieldRefEnvironmentVariables(splitCommaList(value)) : [];
  }

  getEntryPointStyle(deploymentProperties: DeploymentProperties): EntryPointStyle {
    const override = getDeploymentPropertyValue(deploymentProperties, this.key('entryPointStyle'));
    const style = override === undefined ? undefined : relaxedEnumValue(ENTRY_POINT_STYLES, override);
    return style ?? this.properties.entryPointStyle;
  }

  getProbeType(deploymentProperties: DeploymentProperties, key: string = this.key('probeType')): ProbeType {
    const override = getDeploymentPropertyValue(deploymentProperties, key);
    if (!hasText(override)) {
      return this.properties.probeType;
    }
    const probeType = PROBE_TYPES.find((candidate) => candidate === override.trim().toUpperCase());
    if (probeType === undefined) {
      throw new ConfigurationError(`Invalid probe type '${override}'`, key, override);
    }
    return probeType;
  }

  /**
   * Claim size in mebibytes, e.g. `10g` becomes `10240Mi`
   */
  getStatefulSetStorage(deploymentProperties: DeploymentProperties): string {
    const storage = getDeploymentPropertyValue(
      deploymentProperties,
      this.key('statefulSet.volumeClaimTemplate.storage'),
      this.properties.statefulSet.volumeClaimTemplate.storage
    );
    return `${parseToMebibytes(storage)}Mi`;
  }

  getStatefulSetStorageClassName(deploymentProperties: DeploymentProperties): string | undefined {
    return getDeploymentPropertyValue(
      deploymentProperties,
      this.key('statefulSet.volumeClaimTemplate.storageClassName')
    ) ?? this.properties.statefulSet.volumeClaimTemplate.storageClassName;
  }

  getStatefulSetVolumeClaimTemplateName(deploymentProperties: DeploymentProperties): string | undefined {
    return getDeploymentPropertyValue(
      deploymentProperties,
      this.key('statefulSet.volumeClaimTemplate.name')
    ) ?? this.properties.statefulSet.volumeClaimTemplate.name;
  }

  getStatefulSetInitContainerImageName(deploymentProperties: DeploymentProperties): string {
    return (
      this.scalar(deploymentProperties, 'statefulSetInitContainerImageName') ??
      (hasText(this.properties.statefulSetInitContainerImageName)
        ? this.properties.statefulSetInitContainerImageName
        : DEFAULT_STATEFUL_SET_INIT_IMAGE)
    );
  }

  key(name: string): string {
    return `${this.prefix}.${name}`;
  }

  private scalar(deploymentProperties: DeploymentProperties, name: string): string | undefined {
    const value = getDeploymentPropertyValue(deploymentProperties, this.key(name));
    return hasText(value) ? value : undefined;
  }

  private integer(deploymentProperties: DeploymentProperties, name: string): number | undefined {
    const value = this.scalar(deploymentProperties, name);
    return value === undefined ? undefined : parseIntegerProperty(this.key(name), value);
  }

  /**
   * `a,b` or a YAML flow list `[a, b]`
   */
  private getStringList(deploymentProperties: DeploymentProperties, name: string): string[] {
    const value = getDeploymentPropertyValue(deploymentProperties, this.key(name));
    if (!hasText(value)) {
      return [];
    }
    if (!value.trim().startsWith('[')) {
      return splitCommaList(value);
    }
    return bindValue(value, name, stringList, undefined, this.key(name)) ?? [];
  }

  private resourceMap(
    deploymentProperties: DeploymentProperties,
    kind: 'limits' | 'requests',
    defaults: DeployerProperties['requests']
  ): Record<string, string> {
    const candidates: Array<[string, string | undefined]> = [
      ['memory', defaults.memory],
      ['cpu', defaults.cpu],
      ['ephemeral-storage', defaults.ephemeralStorage],
      ['hugepages-2Mi', defaults.hugepages2Mi],
      ['hugepages-1Gi', defaults.hugepages1Gi],
    ];

    const resources: Record<string, string> = {};
    for (const [resource, fallback] of candidates) {
      const value = getDeploymentPropertyValue(deploymentProperties, this.key(`${kind}.${resource}`), fallback ?? '');
      if (hasText(value)) {
        resources[resource] = value;
      }
    }
    return resources;
  }

  private resolveAffinity<T>(
    deploymentProperties: DeploymentProperties,
    name: 'nodeAffinity' | 'podAffinity' | 'podAntiAffinity',
    schema: Validator<T>,
    fallback: T | undefined
  ): T | undefined {
    const key = this.key(`affinity.${name}`);
    const value = getDeploymentPropertyValue(deploymentProperties, key);
    if (!hasText(value)) {
      return fallback;
    }
    return bindValue(value, name, schema, undefined, key);
  }

  private volumeMountsFrom(value: string | undefined): V1VolumeMount[] {
    const requested =
      bindValue(value, 'volumeMounts', volumeMountSchema.array(), (raw) => `Invalid volume mount '${raw}'`) ?? [];
    return mergeByIdentity(requested, this.properties.volumeMounts, (mount) => mount.name);
  }

  private joinWithDefault(
    deploymentProperties: DeploymentProperties,
    name: string,
    defaultValue: string | undefined
  ): string {
    const requested = getDeploymentPropertyValue(deploymentProperties, this.key(name), '');
    if (!hasText(defaultValue)) {
      return requested;
    }
    return hasText(requested) ? `${requested},${defaultValue}` : defaultValue;
  }

  private initContainerFromFlatKeys(
    deploymentProperties: DeploymentProperties,
    baseKey: string
  ): InitContainerSettings | undefined {
    const name = getFirstNonBlankPropertyValue(deploymentProperties, [`${baseKey}.name`, `${baseKey}.containerName`]);
    const image = getFirstNonBlankPropertyValue(deploymentProperties, [`${baseKey}.image`, `${baseKey}.imageName`]);
    if (!hasText(name) || !hasText(image)) {
      return undefined;
    }

    const command = getFirstNonBlankPropertyValue(deploymentProperties, [`${baseKey}.command`, `${baseKey}.commands`]);
    const env = getFirstNonBlankPropertyValue(deploymentProperties, [
      `${baseKey}.env`,
      `${baseKey}.environmentVariables`,
    ]);

    return {
      name,
      image,
      command: hasText(command) ? command.split(',') : [],
      environmentVariables: hasText(env) ? env.split(',') : [],
      volumeMounts: this.volumeMountsFrom(getDeploymentPropertyValue(deploymentProperties, `${baseKey}.volumeMounts`)),
    };
  }

  private initContainerFromSettings(settings: InitContainerSettings): V1Container {
    if (!hasText(settings.name) || !hasText(settings.image)) {
      throw new ConfigurationError(
        `Init container requires a name and an image, got name '${settings.name ?? ''}' and image '${settings.image ?? ''}'`,
        this.key('initContainers')
      );
    }

    const container: V1Container = {
      name: settings.name,
      image: settings.image,
      env: [
        ...toEnvironmentVariables(settings.environmentVariables),
        ...toFieldRefEnvironmentVariables(settings.environmentVariablesFromFieldRefs),
      ],
      envFrom: [
        ...(settings.configMapRefEnvVars ?? []).map(configMapEnvSource),
        ...(settings.secretRefEnvVars ?? []).map(secretEnvSource),
      ],
      volumeMounts: settings.volumeMounts ?? [],
    };
    if (settings.command && settings.command.length > 0) {
      container.command = settings.command;
    }
    if (settings.args && settings.args.length > 0) {
      container.args = settings.args;
    }
    return container;
  }
}

function lifecycleHook(command: string): LifecycleHook {
  return { exec: { command: command.split(',') } };
}
