/**
 * Kubernetes app deployer
 *
 * A long-running app becomes one service plus either a deployment or, when
 * `deployer.indexed=true`, a stateful set. Every object carries the app id
 * label, which is all undeploy, status and log lookups select on.
 */

import type { V1ServicePort } from '@kubernetes/client-node';
import { Deployment, Pvc, Service, StatefulSet } from '../../factories/simple/index.js';
import type { ServiceType } from '../../factories/simple/types.js';
import { sanitizeArguments, sanitizeProperties } from '../../utils/argument-sanitizer.js';
import { getExternalPort, withIndexedTopology } from '../builder/index.js';
import {
  APP_ID_LABEL,
  APP_NAME_LABEL,
  APPLICATION_GUID_ENV,
  DEPLOYMENT_ID_LABEL,
  GROUP_ID_LABEL,
  MARKER_LABEL,
  MARKER_VALUE,
} from '../constants/labels.js';
import { ConfigurationError, DeploymentStateError, PlatformError } from '../errors.js';
import { isConflictError } from '../kubernetes/errors.js';
import {
  getDeploymentPropertyValue,
  hasText,
  parseIntegerProperty,
} from '../properties/index.js';
import type { ResolvedPodConfiguration } from '../resolver/index.js';
import {
  APP_NAME_PROPERTY_KEY,
  type AppDeployer,
  type AppScaleRequest,
  type AppStatus,
  COUNT_PROPERTY_KEY,
  type DeploymentRequest,
  GROUP_PROPERTY_KEY,
  INDEXED_PROPERTY_KEY,
  type RuntimeEnvironmentInfo,
} from '../types/deployment.js';
import { KubernetesDeployerBase, type KubernetesDeployerOptions, nonEmpty } from './base-deployer.js';
import {
  createDeploymentId,
  createIdMap,
  toLabelSelector,
  toPlatformName,
} from './deployment-ids.js';
import { LOG_TAIL_LINES } from './logs.js';
import { buildAppStatus } from './status.js';
import { pollUntilTerminal } from './status-poller.js';

export interface KubernetesAppDeployerOptions extends KubernetesDeployerOptions {
  /** Pause between replica checks while waiting for a scale request */
  scalePollIntervalMs?: number;
}

const DEFAULT_SCALE_POLL_INTERVAL_MS = 1000;

export class KubernetesAppDeployer extends KubernetesDeployerBase implements AppDeployer {
  private readonly scalePollIntervalMs: number;

  constructor(options: KubernetesAppDeployerOptions) {
    super(options, 'app-deployer');
    this.scalePollIntervalMs = options.scalePollIntervalMs ?? DEFAULT_SCALE_POLL_INTERVAL_MS;
  }

  async deploy(request: DeploymentRequest): Promise<string> {
    const appId = createDeploymentId(request);
    const log = this.logger.child({ deploymentId: appId, namespace: this.namespace });
    log.debug('Deploying app', {
      commandlineArguments: sanitizeArguments(request.commandlineArguments),
      deploymentProperties: sanitizeProperties(request.deploymentProperties),
      definition: request.definition.name,
      resource: request.resource.uri,
    });

    try {
      const status = await this.status(appId);
      if (status.state !== 'unknown') {
        throw new DeploymentStateError(`App '${appId}' is already deployed`, appId);
      }

      const resolved = this.resolver.resolve(request.deploymentProperties);
      const indexed = request.deploymentProperties[INDEXED_PROPERTY_KEY]?.toLowerCase() === 'true';

      await this.createService(appId, request, resolved);
      if (indexed) {
        await this.createStatefulSet(appId, request, resolved);
      } else {
        await this.createDeployment(appId, request, resolved);
      }
      return appId;
    } catch (error) {
      log.error('Deploy failed', error);
      throw error;
    }
  }

  /**
   * Deletes every object labelled with the app id. When nothing is deployed the
   * leftovers of an earlier failed deploy are still removed before the error is raised.
   */
  async undeploy(appId: string): Promise<void> {
    const log = this.logger.child({ deploymentId: appId, namespace: this.namespace });
    log.debug('Undeploying app');

    const status = await this.status(appId);
    if (status.state === 'unknown') {
      try {
        await this.deleteAllObjects(appId);
      } catch (error) {
        if (!(error instanceof PlatformError)) {
          throw error;
        }
        log.warn('Failed to delete leftover objects', { error: error.message });
      }
      throw new DeploymentStateError(`App '${appId}' is not deployed`, appId);
    }

    try {
      await this.deleteAllObjects(appId);
    } catch (error) {
      log.error('Undeploy failed', error);
      throw error;
    }
  }

  async status(appId: string): Promise<AppStatus> {
    const selector = toLabelSelector({ [APP_ID_LABEL]: appId });
    const services = await this.client.listServices(this.namespace, selector);
    const pods = await this.client.listPods(this.namespace, selector);

    const status = buildAppStatus(appId, pods, services, this.properties);
    this.logger.debug('Built app status', {
      deploymentId: appId,
      state: status.state,
      instances: Object.keys(status.instances),
    });
    return status;
  }

  /**
   * Only the container carrying the application GUID is read when a pod runs several
   */
  async getLog(appId: string): Promise<string> {
    const pods = await this.client.listPods(
      this.namespace,
      toLabelSelector({ [APP_ID_LABEL]: appId })
    );

    const logs: string[] = [];
    for (const pod of pods) {
      const podName = pod.metadata?.name;
      if (!podName) {
        continue;
      }
      const containers = pod.spec?.containers ?? [];
      if (containers.length > 1) {
        const primary = containers.find((container) =>
          (container.env ?? []).some((env) => env.name === APPLICATION_GUID_ENV)
        );
        if (primary) {
          logs.push(
            await this.client.readPodLog(this.namespace, podName, {
              container: primary.name,
              tailLines: LOG_TAIL_LINES,
            })
          );
        }
      } else {
        logs.push(
          await this.client.readPodLog(this.namespace, podName, { tailLines: LOG_TAIL_LINES })
        );
      }
    }
    return logs.join('');
  }

  /**
   * Scales the deployment, or else the stateful set, then waits up to
   * `scaleTimeoutMs` for the reported replica count to match
   */
  async scale(request: AppScaleRequest): Promise<void> {
    const { deploymentId, count } = request;
    this.logger.debug('Scaling app', { deploymentId, count });

    let readReplicas: () => Promise<number | undefined>;
    if (await this.client.readDeployment(this.namespace, deploymentId)) {
      await this.client.scaleDeployment(this.namespace, deploymentId, count);
      readReplicas = async () =>
        (await this.client.readDeployment(this.namespace, deploymentId))?.status?.replicas;
    } else if (await this.client.readStatefulSet(this.namespace, deploymentId)) {
      await this.client.scaleStatefulSet(this.namespace, deploymentId, count);
      readReplicas = async () =>
        (await this.client.readStatefulSet(this.namespace, deploymentId))?.status?.replicas;
    } else {
      throw new DeploymentStateError(`App '${deploymentId}' is not deployed`, deploymentId);
    }

    const result = await pollUntilTerminal(async () => (await readReplicas()) ?? 0, {
      maxAttempts: Math.max(1, Math.ceil(this.properties.scaleTimeoutMs / this.scalePollIntervalMs)),
      pauseMs: this.scalePollIntervalMs,
      terminal: (replicas) => replicas === count,
    });
    if (!result.reachedTerminal) {
      throw new DeploymentStateError(
        `App '${deploymentId}' did not reach ${count} replicas within ${this.properties.scaleTimeoutMs}ms (last seen ${result.value})`,
        deploymentId
      );
    }
  }

  environmentInfo(): RuntimeEnvironmentInfo {
    return this.createEnvironmentInfo('AppDeployer', 'KubernetesAppDeployer');
  }

  private getCount(request: DeploymentRequest): number {
    const count = request.deploymentProperties[COUNT_PROPERTY_KEY];
    return count === undefined ? 1 : parseIntegerProperty(COUNT_PROPERTY_KEY, count);
  }

  private async createDeployment(
    appId: string,
    request: DeploymentRequest,
    resolved: ResolvedPodConfiguration
  ): Promise<void> {
    const idMap = createIdMap(appId, request);
    const labels = { ...idMap, [MARKER_LABEL]: MARKER_VALUE, ...resolved.deploymentLabels };
    const replicas = this.getCount(request);
    this.logger.debug('Creating deployment', { deploymentId: appId, replicas });

    const podSpec = this.createPodSpec(request, resolved, { appId, workload: 'app' });
    await this.client.createDeployment(
      this.namespace,
      Deployment({
        name: appId,
        labels,
        replicas,
        selector: idMap,
        template: { labels, annotations: nonEmpty(resolved.podAnnotations), spec: podSpec },
      })
    );
  }

  private async createStatefulSet(
    appId: string,
    request: DeploymentRequest,
    resolved: ResolvedPodConfiguration
  ): Promise<void> {
    const idMap = createIdMap(appId, request);
    const marked = { ...idMap, [MARKER_LABEL]: MARKER_VALUE };
    const labels = { ...marked, ...resolved.deploymentLabels };
    const replicas = this.getCount(request);
    const { storage, storageClassName, volumeClaimTemplateName, initContainerImageName } =
      resolved.statefulSet;
    this.logger.debug('Creating stateful set', { deploymentId: appId, replicas, storage });

    const podSpec = withIndexedTopology(
      this.createPodSpec(request, resolved, { appId, workload: 'app' }),
      initContainerImageName
    );
    await this.client.createStatefulSet(
      this.namespace,
      StatefulSet({
        name: appId,
        labels,
        replicas,
        selector: marked,
        serviceName: appId,
        volumeClaimTemplates: [
          Pvc({
            name: hasText(volumeClaimTemplateName) ? volumeClaimTemplateName : appId,
            labels: marked,
            size: storage,
            storageClass: storageClassName,
          }),
        ],
        template: { labels, annotations: nonEmpty(resolved.podAnnotations), spec: podSpec },
      })
    );
  }

  private async createService(
    appId: string,
    request: DeploymentRequest,
    resolved: ResolvedPodConfiguration
  ): Promise<void> {
    const props = request.deploymentProperties;
    const externalPort = getExternalPort(request);
    this.logger.debug('Creating service', {
      deploymentId: appId,
      port: externalPort,
      deploymentProperties: sanitizeProperties(props),
    });

    const createLoadBalancer = getDeploymentPropertyValue(props, this.resolver.key('createLoadBalancer'));
    const createNodePort = getDeploymentPropertyValue(props, this.resolver.key('createNodePort'));
    if (createLoadBalancer !== undefined && createNodePort !== undefined) {
      throw new ConfigurationError('Cannot create NodePort and LoadBalancer at the same time.');
    }

    const primaryPort: V1ServicePort = { port: externalPort, name: `port-${externalPort}` };
    let type: ServiceType | undefined;
    if (createNodePort !== undefined) {
      type = 'NodePort';
      if (createNodePort.toLowerCase() !== 'true') {
        if (!/^\d+$/.test(createNodePort.trim())) {
          throw new ConfigurationError(
            `Invalid value: ${createNodePort}: provided port is not valid.`,
            this.resolver.key('createNodePort'),
            createNodePort
          );
        }
        primaryPort.nodePort = Number(createNodePort.trim());
      }
    } else if (
      createLoadBalancer === undefined
        ? this.properties.createLoadBalancer
        : createLoadBalancer.toLowerCase() === 'true'
    ) {
      type = 'LoadBalancer';
    }

    const ports = [primaryPort, ...this.getAdditionalServicePorts(props)].filter(
      (port, index, all) => all.findIndex((other) => other.port === port.port) === index
    );

    const appName = props[APP_NAME_PROPERTY_KEY];
    const groupId = props[GROUP_PROPERTY_KEY];
    const idMap = createIdMap(appId, request);
    // a stable app name keeps the selector valid across versioned deployments
    const selector =
      appName === undefined
        ? idMap
        : { [APP_NAME_LABEL]: appName, ...(groupId !== undefined && { [GROUP_ID_LABEL]: groupId }) };

    const service = Service({
      name: await this.getServiceName(request, appId),
      labels: { ...idMap, [MARKER_LABEL]: MARKER_VALUE },
      annotations: nonEmpty(resolved.serviceAnnotations),
      selector,
      ports,
      type,
    });

    try {
      await this.client.createService(this.namespace, service);
    } catch (error) {
      if (!isConflictError(error)) {
        throw error;
      }
      this.logger.info('Service already exists, replacing it', {
        deploymentId: appId,
        service: service.metadata?.name,
      });
      await this.client.replaceService(this.namespace, service);
    }
  }

  private getAdditionalServicePorts(props: Readonly<Record<string, string>>): V1ServicePort[] {
    const key = this.resolver.key('servicePorts');
    const value = getDeploymentPropertyValue(props, key);
    if (!hasText(value)) {
      return [];
    }
    return value
      .split(',')
      .map((port) => parseIntegerProperty(key, port.trim()))
      .map((port) => ({ port, name: `port-${port}` }));
  }

  /**
   * An un-versioned app name gives an un-versioned service name, unless a
   * `<name>-v*` service from an earlier versioned deployment is still around
   */
  private async getServiceName(request: DeploymentRequest, appId: string): Promise<string> {
    const appName = request.deploymentProperties[APP_NAME_PROPERTY_KEY];
    if (!hasText(appName)) {
      return appId;
    }
    const groupId = request.deploymentProperties[GROUP_PROPERTY_KEY];
    const serviceName = toPlatformName(groupId === undefined ? appName : `${groupId}-${appName}`);

    const services = await this.client.listServices(
      this.namespace,
      toLabelSelector({ [DEPLOYMENT_ID_LABEL]: undefined })
    );
    const versioned = services.some((service) =>
      (service.metadata?.name ?? '').startsWith(`${serviceName}-v`)
    );
    return versioned ? appId : serviceName;
  }

  private async deleteAllObjects(appId: string): Promise<void> {
    const selector = toLabelSelector({ [APP_ID_LABEL]: appId });
    this.logger.debug('Deleting all objects', { deploymentId: appId, selector });

    const names = (items: ReadonlyArray<{ metadata?: { name?: string } }>) =>
      items.flatMap((item) => (item.metadata?.name ? [item.metadata.name] : []));

    for (const name of names(await this.client.listServices(this.namespace, selector))) {
      await this.client.deleteService(this.namespace, name);
    }
    for (const name of names(await this.client.listDeployments(this.namespace, selector))) {
      await this.client.deleteDeployment(this.namespace, name);
    }
    for (const name of names(await this.client.listStatefulSets(this.namespace, selector))) {
      await this.client.deleteStatefulSet(this.namespace, name);
    }
    for (const name of names(await this.client.listPods(this.namespace, selector))) {
      await this.client.deletePod(this.namespace, name);
    }
    for (const name of names(await this.client.listPersistentVolumeClaims(this.namespace, selector))) {
      await this.client.deletePersistentVolumeClaim(this.namespace, name);
    }
  }
}
