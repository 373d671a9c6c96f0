import type { V1EnvFromSource, V1EnvVar } from '@kubernetes/client-node';
import { ConfigurationError } from '../errors.js';
import { hasText } from '../properties/index.js';
import type { ConfigMapKeyRef, SecretKeyRef } from '../types/properties.js';

/**
 * Split `NAME=value` entries on the first `=` into an ordered map; a later
 * entry for the same name replaces the earlier value
 */
export function toEnvironmentMap(entries: readonly string[] | undefined): Record<string, string> {
  const env: Record<string, string> = {};
  for (const entry of entries ?? []) {
    const separator = entry.indexOf('=');
    if (separator < 0) {
      throw new ConfigurationError(`Invalid environment variable declared: ${entry}`, undefined, entry);
    }
    env[entry.slice(0, separator)] = entry.slice(separator + 1);
  }
  return env;
}

export function toEnvironmentVariables(entries: readonly string[] | undefined): V1EnvVar[] {
  return Object.entries(toEnvironmentMap(entries)).map(([name, value]) => ({ name, value }));
}

/**
 * `NAME=metadata.name` entries become env vars sourced from the pod's own fields
 */
export function toFieldRefEnvironmentVariables(entries: readonly string[] | undefined): V1EnvVar[] {
  return (entries ?? []).map((entry) => {
    const separator = entry.indexOf('=');
    const name = separator < 0 ? '' : entry.slice(0, separator);
    const fieldPath = separator < 0 ? '' : entry.slice(separator + 1);
    if (!hasText(name) || !hasText(fieldPath)) {
      throw new ConfigurationError(
        `Invalid environment variable from field ref: ${entry}`,
        undefined,
        entry
      );
    }
    return { name, valueFrom: { fieldRef: { fieldPath } } };
  });
}

export function configMapKeyRefEnvVar(ref: ConfigMapKeyRef): V1EnvVar {
  return {
    name: ref.envVarName,
    valueFrom: { configMapKeyRef: { name: ref.configMapName, key: ref.dataKey } },
  };
}

export function secretKeyRefEnvVar(ref: SecretKeyRef): V1EnvVar {
  return {
    name: ref.envVarName,
    valueFrom: { secretKeyRef: { name: ref.secretName, key: ref.dataKey } },
  };
}

export function configMapEnvSource(name: string): V1EnvFromSource {
  return { configMapRef: { name } };
}

export function secretEnvSource(name: string): V1EnvFromSource {
  return { secretRef: { name } };
}
