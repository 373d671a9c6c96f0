/**
 * Platform client
 *
 * The narrow set of cluster operations the deployer and task launcher need.
 * Every lookup is scoped by namespace and label selector; deleting an object
 * that no longer exists is a no-op, and a missing object reads as `undefined`.
 */

import type {
  V1Deployment,
  V1Job,
  V1PersistentVolumeClaim,
  V1Pod,
  V1Service,
  V1StatefulSet,
} from '@kubernetes/client-node';
import { getComponentLogger } from '../logging/index.js';
import type { KubernetesClientProvider } from './client-provider.js';
import { isNotFoundError, toPlatformError } from './errors.js';

export interface PodLogOptions {
  container?: string;
  tailLines?: number;
}

export interface PlatformClient {
  /** API server URL, reported by environment info */
  getServerUrl(): string | undefined;

  listPods(namespace: string, labelSelector: string): Promise<V1Pod[]>;
  createPod(namespace: string, pod: V1Pod): Promise<V1Pod>;
  deletePod(namespace: string, name: string): Promise<void>;
  readPodLog(namespace: string, name: string, options?: PodLogOptions): Promise<string>;

  listServices(namespace: string, labelSelector: string): Promise<V1Service[]>;
  createService(namespace: string, service: V1Service): Promise<V1Service>;
  /** Overwrites an existing service, keeping its resource version and cluster IP */
  replaceService(namespace: string, service: V1Service): Promise<V1Service>;
  deleteService(namespace: string, name: string): Promise<void>;

  listDeployments(namespace: string, labelSelector: string): Promise<V1Deployment[]>;
  readDeployment(namespace: string, name: string): Promise<V1Deployment | undefined>;
  createDeployment(namespace: string, deployment: V1Deployment): Promise<V1Deployment>;
  deleteDeployment(namespace: string, name: string): Promise<void>;
  scaleDeployment(namespace: string, name: string, replicas: number): Promise<void>;

  listStatefulSets(namespace: string, labelSelector: string): Promise<V1StatefulSet[]>;
  readStatefulSet(namespace: string, name: string): Promise<V1StatefulSet | undefined>;
  createStatefulSet(namespace: string, statefulSet: V1StatefulSet): Promise<V1StatefulSet>;
  deleteStatefulSet(namespace: string, name: string): Promise<void>;
  scaleStatefulSet(namespace: string, name: string, replicas: number): Promise<void>;

  listJobs(namespace: string, labelSelector: string): Promise<V1Job[]>;
  readJob(namespace: string, name: string): Promise<V1Job | undefined>;
  createJob(namespace: string, job: V1Job): Promise<V1Job>;
  /** Deletes the job and, in the background, its pods */
  deleteJob(namespace: string, name: string): Promise<void>;

  listPersistentVolumeClaims(
    namespace: string,
    labelSelector: string
  ): Promise<V1PersistentVolumeClaim[]>;
  deletePersistentVolumeClaim(namespace: string, name: string): Promise<void>;
}

const logger = getComponentLogger('platform-client');

/**
 * PlatformClient over the typed @kubernetes/client-node APIs
 */
export class KubernetesPlatformClient implements PlatformClient {
  constructor(private readonly clients: KubernetesClientProvider) {}

  getServerUrl(): string | undefined {
    return this.clients.getServerUrl();
  }

  async listPods(namespace: string, labelSelector: string): Promise<V1Pod[]> {
    const list = await this.call('listPods', () =>
      this.clients.getCoreV1Api().listNamespacedPod({ namespace, labelSelector })
    );
    return list.items;
  }

  createPod(namespace: string, body: V1Pod): Promise<V1Pod> {
    return this.call('createPod', () =>
      this.clients.getCoreV1Api().createNamespacedPod({ namespace, body })
    );
  }

  deletePod(namespace: string, name: string): Promise<void> {
    return this.deleteIgnoringAbsent('deletePod', name, () =>
      this.clients.getCoreV1Api().deleteNamespacedPod({ name, namespace })
    );
  }

  async readPodLog(namespace: string, name: string, options: PodLogOptions = {}): Promise<string> {
    const log = await this.readIgnoringAbsent('readPodLog', name, () =>
      this.clients.getCoreV1Api().readNamespacedPodLog({
        name,
        namespace,
        container: options.container,
        tailLines: options.tailLines,
      })
    );
    return log ?? '';
  }

  async listServices(namespace: string, labelSelector: string): Promise<V1Service[]> {
    const list = await this.call('listServices', () =>
      this.clients.getCoreV1Api().listNamespacedService({ namespace, labelSelector })
    );
    return list.items;
  }

  createService(namespace: string, body: V1Service): Promise<V1Service> {
    return this.call('createService', () =>
      this.clients.getCoreV1Api().createNamespacedService({ namespace, body })
    );
  }

  async replaceService(namespace: string, body: V1Service): Promise<V1Service> {
    const name = body.metadata?.name ?? '';
    const current = await this.readIgnoringAbsent('readService', name, () =>
      this.clients.getCoreV1Api().readNamespacedService({ name, namespace })
    );
    const replacement: V1Service = {
      ...body,
      metadata: { ...body.metadata, resourceVersion: current?.metadata?.resourceVersion },
      spec: { ...body.spec, clusterIP: current?.spec?.clusterIP ?? body.spec?.clusterIP },
    };
    return this.call('replaceService', () =>
      this.clients.getCoreV1Api().replaceNamespacedService({ name, namespace, body: replacement })
    );
  }

  deleteService(namespace: string, name: string): Promise<void> {
    return this.deleteIgnoringAbsent('deleteService', name, () =>
      this.clients.getCoreV1Api().deleteNamespacedService({ name, namespace })
    );
  }

  async listDeployments(namespace: string, labelSelector: string): Promise<V1Deployment[]> {
    const list = await this.call('listDeployments', () =>
      this.clients.getAppsV1Api().listNamespacedDeployment({ namespace, labelSelector })
    );
    return list.items;
  }

  readDeployment(namespace: string, name: string): Promise<V1Deployment | undefined> {
    return this.readIgnoringAbsent('readDeployment', name, () =>
      this.clients.getAppsV1Api().readNamespacedDeployment({ name, namespace })
    );
  }

  createDeployment(namespace: string, body: V1Deployment): Promise<V1Deployment> {
    return this.call('createDeployment', () =>
      this.clients.getAppsV1Api().createNamespacedDeployment({ namespace, body })
    );
  }

  deleteDeployment(namespace: string, name: string): Promise<void> {
    return this.deleteIgnoringAbsent('deleteDeployment', name, () =>
      this.clients.getAppsV1Api().deleteNamespacedDeployment({ name, namespace })
    );
  }

  async scaleDeployment(namespace: string, name: string, replicas: number): Promise<void> {
    await this.call('scaleDeployment', () =>
      this.clients.getAppsV1Api().replaceNamespacedDeploymentScale({
        name,
        namespace,
        body: { metadata: { name, namespace }, spec: { replicas } },
      })
    );
  }

  async listStatefulSets(namespace: string, labelSelector: string): Promise<V1StatefulSet[]> {
    const list = await this.call('listStatefulSets', () =>
      this.clients.getAppsV1Api().listNamespacedStatefulSet({ namespace, labelSelector })
    );
    return list.items;
  }

  readStatefulSet(namespace: string, name: string): Promise<V1StatefulSet | undefined> {
    return this.readIgnoringAbsent('readStatefulSet', name, () =>
      this.clients.getAppsV1Api().readNamespacedStatefulSet({ name, namespace })
    );
  }

  createStatefulSet(namespace: string, body: V1StatefulSet): Promise<V1StatefulSet> {
    return this.call('createStatefulSet', () =>
      this.clients.getAppsV1Api().createNamespacedStatefulSet({ namespace, body })
    );
  }

  deleteStatefulSet(namespace: string, name: string): Promise<void> {
    return this.deleteIgnoringAbsent('deleteStatefulSet', name, () =>
      this.clients.getAppsV1Api().deleteNamespacedStatefulSet({ name, namespace })
    );
  }

  async scaleStatefulSet(namespace: string, name: string, replicas: number): Promise<void> {
    await this.call('scaleStatefulSet', () =>
      this.clients.getAppsV1Api().replaceNamespacedStatefulSetScale({
        name,
        namespace,
        body: { metadata: { name, namespace }, spec: { replicas } },
      })
    );
  }

  async listJobs(namespace: string, labelSelector: string): Promise<V1Job[]> {
    const list = await this.call('listJobs', () =>
      this.clients.getBatchV1Api().listNamespacedJob({ namespace, labelSelector })
    );
    return list.items;
  }

  readJob(namespace: string, name: string): Promise<V1Job | undefined> {
    return this.readIgnoringAbsent('readJob', name, () =>
      this.clients.getBatchV1Api().readNamespacedJob({ name, namespace })
    );
  }

  createJob(namespace: string, body: V1Job): Promise<V1Job> {
    return this.call('createJob', () =>
      this.clients.getBatchV1Api().createNamespacedJob({ namespace, body })
    );
  }

  deleteJob(namespace: string, name: string): Promise<void> {
    return this.deleteIgnoringAbsent('deleteJob', name, () =>
      this.clients
        .getBatchV1Api()
        .deleteNamespacedJob({ name, namespace, propagationPolicy: 'Background' })
    );
  }

  async listPersistentVolumeClaims(
    namespace: string,
    labelSelector: string
  ): Promise<V1PersistentVolumeClaim[]> {
    const list = await this.call('listPersistentVolumeClaims', () =>
      this.clients
        .getCoreV1Api()
        .listNamespacedPersistentVolumeClaim({ namespace, labelSelector })
    );
    return list.items;
  }

  deletePersistentVolumeClaim(namespace: string, name: string): Promise<void> {
    return this.deleteIgnoringAbsent('deletePersistentVolumeClaim', name, () =>
      this.clients.getCoreV1Api().deleteNamespacedPersistentVolumeClaim({ name, namespace })
    );
  }

  private async call<T>(operation: string, request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (error) {
      const platformError = toPlatformError(error, operation);
      logger.error('Platform call failed', platformError, { operation });
      throw platformError;
    }
  }

  private async readIgnoringAbsent<T>(
    operation: string,
    name: string,
    request: () => Promise<T>
  ): Promise<T | undefined> {
    try {
      return await request();
    } catch (error) {
      if (isNotFoundError(error)) {
        logger.debug('Object not found', { operation, name });
        return undefined;
      }
      const platformError = toPlatformError(error, operation);
      logger.error('Platform call failed', platformError, { operation, name });
      throw platformError;
    }
  }

  private async deleteIgnoringAbsent(
    operation: string,
    name: string,
    request: () => Promise<unknown>
  ): Promise<void> {
    await this.readIgnoringAbsent(operation, name, request);
  }
}
