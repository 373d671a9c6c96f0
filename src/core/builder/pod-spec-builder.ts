/**
 * Pod spec builder
 *
 * Assembles one pod spec from the primary container and a resolved
 * configuration. The same spec backs deployments, stateful sets, jobs and
 * bare task pods.
 */

import type {
  V1Affinity,
  V1Container,
  V1LocalObjectReference,
  V1Lifecycle,
  V1PodSpec,
  V1SecurityContext,
} from '@kubernetes/client-node';
import {
  CONFIG_MOUNT_PATH,
  CONFIG_VOLUME,
  INDEX_PROVIDER_CONTAINER,
} from '../constants/labels.js';
import type { ResolvedPodConfiguration } from '../resolver/index.js';
import type { DeploymentRequest } from '../types/deployment.js';
import type { LifecycleSettings, RestartPolicy } from '../types/properties.js';
import { type ContainerFactory, getExternalPort } from './container-factory.js';

export type WorkloadKind = 'app' | 'task';

export interface PodSpecOptions {
  appId: string;
  workload: WorkloadKind;
  /** Written to the spec for tasks; apps leave it to the controller */
  restartPolicy?: RestartPolicy;
}

function toLifecycle(settings: LifecycleSettings): V1Lifecycle | undefined {
  if (!settings.postStart && !settings.preStop) {
    return undefined;
  }
  return {
    ...(settings.postStart && { postStart: settings.postStart }),
    ...(settings.preStop && { preStop: settings.preStop }),
  };
}

function hasAffinity(affinity: V1Affinity): boolean {
  return Boolean(affinity.nodeAffinity ?? affinity.podAffinity ?? affinity.podAntiAffinity);
}

function inheritSecurityContext(
  containers: readonly V1Container[],
  securityContext: V1SecurityContext | undefined
): V1Container[] {
  if (!securityContext) {
    return [...containers];
  }
  return containers.map((container) =>
    container.securityContext ? container : { ...container, securityContext }
  );
}

export class PodSpecBuilder {
  constructor(private readonly containerFactory: ContainerFactory) {}

  build(
    request: DeploymentRequest,
    resolved: ResolvedPodConfiguration,
    options: PodSpecOptions
  ): V1PodSpec {
    const podSpec: V1PodSpec = { containers: [] };

    const pullSecrets: V1LocalObjectReference[] = [
      ...(resolved.imagePullSecret ? [resolved.imagePullSecret] : []),
      ...resolved.imagePullSecrets,
    ].map((name) => ({ name }));
    if (pullSecrets.length > 0) {
      podSpec.imagePullSecrets = pullSecrets;
    }

    if (resolved.hostNetwork) {
      podSpec.hostNetwork = true;
    }

    const container: V1Container = {
      ...this.containerFactory.create({
        appId: options.appId,
        request,
        resolved,
        externalPort: options.workload === 'app' ? getExternalPort(request) : undefined,
      }),
      resources: { limits: resolved.limits, requests: resolved.requests },
      imagePullPolicy: resolved.imagePullPolicy,
    };
    const lifecycle = toLifecycle(resolved.lifecycle);
    if (lifecycle) {
      container.lifecycle = lifecycle;
    }
    if (resolved.containerSecurityContext) {
      container.securityContext = resolved.containerSecurityContext;
    }

    if (Object.keys(resolved.nodeSelector).length > 0) {
      podSpec.nodeSelector = resolved.nodeSelector;
    }
    if (resolved.tolerations.length > 0) {
      podSpec.tolerations = resolved.tolerations;
    }

    const serviceAccountName =
      options.workload === 'app'
        ? resolved.deploymentServiceAccountName
        : resolved.taskServiceAccountName;
    if (serviceAccountName) {
      podSpec.serviceAccountName = serviceAccountName;
    }

    if (resolved.podSecurityContext) {
      podSpec.securityContext = resolved.podSecurityContext;
    }
    if (hasAffinity(resolved.affinity)) {
      podSpec.affinity = resolved.affinity;
    }

    if (resolved.initContainers.length > 0) {
      podSpec.initContainers = inheritSecurityContext(
        resolved.initContainers,
        resolved.containerSecurityContext
      );
    }

    if (resolved.shareProcessNamespace !== undefined) {
      podSpec.shareProcessNamespace = resolved.shareProcessNamespace;
    }
    if (resolved.priorityClassName) {
      podSpec.priorityClassName = resolved.priorityClassName;
    }

    podSpec.containers = [
      container,
      ...inheritSecurityContext(resolved.additionalContainers, resolved.containerSecurityContext),
    ];

    // only volumes some container mounts
    const mounted = new Set(
      [...podSpec.containers, ...(podSpec.initContainers ?? [])].flatMap((c) =>
        (c.volumeMounts ?? []).map((mount) => mount.name)
      )
    );
    const volumes = resolved.volumes.filter((volume) => mounted.has(volume.name));
    if (volumes.length > 0) {
      podSpec.volumes = volumes;
    }

    if (resolved.terminationGracePeriodSeconds !== undefined) {
      podSpec.terminationGracePeriodSeconds = resolved.terminationGracePeriodSeconds;
    }
    if (options.restartPolicy) {
      podSpec.restartPolicy = options.restartPolicy;
    }

    return podSpec;
  }
}

function writeIndexProperty(name: string): string {
  return `echo ${name}="$(expr $HOSTNAME | grep -o "[[:digit:]]*$")" >> ${CONFIG_MOUNT_PATH}/application.properties`;
}

/**
 * Init container that derives the instance index from the ordinal suffix of the
 * pod hostname and writes it to the shared config volume
 */
export function createIndexProviderContainer(
  imageName: string,
  securityContext?: V1SecurityContext
): V1Container {
  return {
    name: INDEX_PROVIDER_CONTAINER,
    image: imageName,
    imagePullPolicy: 'IfNotPresent',
    command: [
      'sh',
      '-c',
      `${writeIndexProperty('INSTANCE_INDEX')} && ${writeIndexProperty('instance.index')}`,
    ],
    volumeMounts: [{ name: CONFIG_VOLUME, mountPath: CONFIG_MOUNT_PATH }],
    ...(securityContext && { securityContext }),
  };
}

/**
 * Stateful topology: a `config` emptyDir shared between the index provider and
 * container[0], which reads its instance index from /config/application.properties
 */
export function withIndexedTopology(podSpec: V1PodSpec, initImageName: string): V1PodSpec {
  const [primary, ...others] = podSpec.containers;
  if (!primary) {
    return podSpec;
  }
  const configMount = { name: CONFIG_VOLUME, mountPath: CONFIG_MOUNT_PATH };

  return {
    ...podSpec,
    volumes: [...(podSpec.volumes ?? []), { name: CONFIG_VOLUME, emptyDir: {} }],
    containers: [
      { ...primary, volumeMounts: [...(primary.volumeMounts ?? []), configMount] },
      ...others,
    ],
    initContainers: [
      ...(podSpec.initContainers ?? []),
      createIndexProviderContainer(initImageName, primary.securityContext),
    ],
  };
}
