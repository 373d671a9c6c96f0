export {
  DeploymentPropertiesResolver,
  mergeByIdentity,
  type ResolvedPodConfiguration,
} from './deployment-properties-resolver.js';
export {
  configMapEnvSource,
  configMapKeyRefEnvVar,
  secretEnvSource,
  secretKeyRefEnvVar,
  toEnvironmentMap,
  toEnvironmentVariables,
  toFieldRefEnvironmentVariables,
} from './env-vars.js';
export {
  type ContainerProbes,
  createProbe,
  createProbes,
  isStartupProbeConfigured,
  type ProbeCapability,
  type ProbeContext,
  resolveProbeType,
} from './probes.js';
