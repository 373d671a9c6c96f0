/**
 * Base Kubernetes deployer
 *
 * State and helpers shared by the app deployer and the task launcher: the
 * resolver, the pod spec builder and the platform client, all scoped to one
 * namespace.
 */

import type { V1PodSpec } from '@kubernetes/client-node';
import {
  type ContainerFactory,
  DefaultContainerFactory,
  PodSpecBuilder,
  type PodSpecOptions,
} from '../builder/index.js';
import { DEFAULT_PROPERTY_PREFIX } from '../config/deployer-properties.js';
import type { PlatformClient } from '../kubernetes/platform-client.js';
import type { DeployerLogger } from '../logging/index.js';
import { getComponentLogger } from '../logging/index.js';
import { DeploymentPropertiesResolver, type ResolvedPodConfiguration } from '../resolver/index.js';
import type { DeploymentRequest, RuntimeEnvironmentInfo } from '../types/deployment.js';
import type { DeployerProperties } from '../types/properties.js';
import { createRuntimeEnvironmentInfo, type EnvironmentInfoInput } from './environment-info.js';

export interface KubernetesDeployerOptions {
  properties: DeployerProperties;
  client: PlatformClient;
  /** Replaces the default primary container factory */
  containerFactory?: ContainerFactory;
  /** Key prefix for resolvable deployment properties */
  prefix?: string;
  logger?: DeployerLogger;
}

export abstract class KubernetesDeployerBase {
  protected readonly properties: DeployerProperties;
  protected readonly client: PlatformClient;
  protected readonly resolver: DeploymentPropertiesResolver;
  protected readonly podSpecBuilder: PodSpecBuilder;
  protected readonly logger: DeployerLogger;

  constructor(options: KubernetesDeployerOptions, component: string) {
    this.properties = options.properties;
    this.client = options.client;
    this.logger = options.logger ?? getComponentLogger(component);
    this.resolver = new DeploymentPropertiesResolver(
      options.prefix ?? DEFAULT_PROPERTY_PREFIX,
      options.properties,
      this.logger.child({ component: 'deployment-properties-resolver' })
    );
    this.podSpecBuilder = new PodSpecBuilder(
      options.containerFactory ?? new DefaultContainerFactory(options.properties, this.resolver)
    );
  }

  get namespace(): string {
    return this.properties.namespace;
  }

  protected createPodSpec(
    request: DeploymentRequest,
    resolved: ResolvedPodConfiguration,
    options: PodSpecOptions
  ): V1PodSpec {
    return this.podSpecBuilder.build(request, resolved, options);
  }

  protected createEnvironmentInfo(
    spiClass: EnvironmentInfoInput['spiClass'],
    implementationName: string
  ): RuntimeEnvironmentInfo {
    return createRuntimeEnvironmentInfo({
      spiClass,
      implementationName,
      namespace: this.namespace,
      masterUrl: this.properties.masterUrl ?? this.client.getServerUrl(),
    });
  }
}

/**
 * Omit empty label and annotation maps from manifests
 */
export function nonEmpty(map: Record<string, string>): Record<string, string> | undefined {
  return Object.keys(map).length > 0 ? map : undefined;
}
