/**
 * In-memory PlatformClient for deployer and launcher tests
 */

import type {
  V1Deployment,
  V1Job,
  V1PersistentVolumeClaim,
  V1Pod,
  V1Service,
  V1StatefulSet,
} from '@kubernetes/client-node';
import { PlatformError } from '../../src/core/errors.js';
import type { PlatformClient, PodLogOptions } from '../../src/core/kubernetes/platform-client.js';

interface Named {
  metadata?: { name?: string; labels?: Record<string, string> };
}

/**
 * `a=1,b` matches objects labelled a=1 that also carry label b
 */
export function matchesSelector(labels: Record<string, string> | undefined, selector: string): boolean {
  if (selector.length === 0) {
    return true;
  }
  return selector.split(',').every((term) => {
    const separator = term.indexOf('=');
    if (separator < 0) {
      return labels !== undefined && Object.hasOwn(labels, term);
    }
    return labels?.[term.slice(0, separator)] === term.slice(separator + 1);
  });
}

class Store<T extends Named> {
  private readonly items = new Map<string, T>();

  constructor(private readonly kind: string) {}

  list(namespace: string, selector: string): T[] {
    return [...this.items.entries()]
      .filter(([key, item]) => key.startsWith(`${namespace}/`) && matchesSelector(item.metadata?.labels, selector))
      .map(([, item]) => item);
  }

  read(namespace: string, name: string): T | undefined {
    return this.items.get(`${namespace}/${name}`);
  }

  create(namespace: string, item: T): T {
    const key = `${namespace}/${item.metadata?.name ?? ''}`;
    if (this.items.has(key)) {
      throw new PlatformError(`create ${this.kind} failed: already exists`, 409, `create${this.kind}`);
    }
    this.items.set(key, item);
    return item;
  }

  replace(namespace: string, item: T): T {
    const key = `${namespace}/${item.metadata?.name ?? ''}`;
    if (!this.items.has(key)) {
      throw new PlatformError(`replace ${this.kind} failed: not found`, 404, `replace${this.kind}`);
    }
    this.items.set(key, item);
    return item;
  }

  delete(namespace: string, name: string): void {
    this.items.delete(`${namespace}/${name}`);
  }

  names(): string[] {
    return [...this.items.keys()];
  }
}

export class FakePlatformClient implements PlatformClient {
  readonly pods = new Store<V1Pod>('Pod');
  readonly services = new Store<V1Service>('Service');
  readonly deployments = new Store<V1Deployment>('Deployment');
  readonly statefulSets = new Store<V1StatefulSet>('StatefulSet');
  readonly jobs = new Store<V1Job>('Job');
  readonly claims = new Store<V1PersistentVolumeClaim>('PersistentVolumeClaim');

  /** Pod logs keyed by `pod` or `pod/container` */
  readonly logs = new Map<string, string>();
  readonly logRequests: Array<{ name: string; options?: PodLogOptions }> = [];

  /** When false, scale requests change spec.replicas but never status.replicas */
  reflectScale = true;

  /** Makes every list call fail, as an unreachable API server would */
  failLists = false;

  constructor(private readonly serverUrl?: string) {}

  getServerUrl(): string | undefined {
    return this.serverUrl;
  }

  async listPods(namespace: string, labelSelector: string): Promise<V1Pod[]> {
    this.checkList('listPods');
    return this.pods.list(namespace, labelSelector);
  }

  async createPod(namespace: string, pod: V1Pod): Promise<V1Pod> {
    return this.pods.create(namespace, pod);
  }

  async deletePod(namespace: string, name: string): Promise<void> {
    this.pods.delete(namespace, name);
  }

  async readPodLog(_namespace: string, name: string, options?: PodLogOptions): Promise<string> {
    this.logRequests.push({ name, options });
    const key = options?.container ? `${name}/${options.container}` : name;
    return this.logs.get(key) ?? '';
  }

  async listServices(namespace: string, labelSelector: string): Promise<V1Service[]> {
    this.checkList('listServices');
    return this.services.list(namespace, labelSelector);
  }

  async createService(namespace: string, service: V1Service): Promise<V1Service> {
    return this.services.create(namespace, service);
  }

  async replaceService(namespace: string, service: V1Service): Promise<V1Service> {
    return this.services.replace(namespace, service);
  }

  async deleteService(namespace: string, name: string): Promise<void> {
    this.services.delete(namespace, name);
  }

  async listDeployments(namespace: string, labelSelector: string): Promise<V1Deployment[]> {
    this.checkList('listDeployments');
    return this.deployments.list(namespace, labelSelector);
  }

  async readDeployment(namespace: string, name: string): Promise<V1Deployment | undefined> {
    return this.deployments.read(namespace, name);
  }

  async createDeployment(namespace: string, deployment: V1Deployment): Promise<V1Deployment> {
    return this.deployments.create(namespace, deployment);
  }

  async deleteDeployment(namespace: string, name: string): Promise<void> {
    this.deployments.delete(namespace, name);
  }

  async scaleDeployment(namespace: string, name: string, replicas: number): Promise<void> {
    const deployment = this.deployments.read(namespace, name);
    if (deployment) {
      deployment.spec = {
        ...deployment.spec,
        replicas,
        selector: deployment.spec?.selector ?? {},
        template: deployment.spec?.template ?? {},
      };
      if (this.reflectScale) {
        deployment.status = { ...deployment.status, replicas };
      }
    }
  }

  async listStatefulSets(namespace: string, labelSelector: string): Promise<V1StatefulSet[]> {
    this.checkList('listStatefulSets');
    return this.statefulSets.list(namespace, labelSelector);
  }

  async readStatefulSet(namespace: string, name: string): Promise<V1StatefulSet | undefined> {
    return this.statefulSets.read(namespace, name);
  }

  async createStatefulSet(namespace: string, statefulSet: V1StatefulSet): Promise<V1StatefulSet> {
    return this.statefulSets.create(namespace, statefulSet);
  }

  async deleteStatefulSet(namespace: string, name: string): Promise<void> {
    this.statefulSets.delete(namespace, name);
  }

  async scaleStatefulSet(namespace: string, name: string, replicas: number): Promise<void> {
    const statefulSet = this.statefulSets.read(namespace, name);
    if (statefulSet) {
      statefulSet.spec = {
        ...statefulSet.spec,
        replicas,
        selector: statefulSet.spec?.selector ?? {},
        serviceName: statefulSet.spec?.serviceName ?? name,
        template: statefulSet.spec?.template ?? {},
      };
      if (this.reflectScale) {
        statefulSet.status = { ...statefulSet.status, replicas };
      }
    }
  }

  async listJobs(namespace: string, labelSelector: string): Promise<V1Job[]> {
    this.checkList('listJobs');
    return this.jobs.list(namespace, labelSelector);
  }

  async readJob(namespace: string, name: string): Promise<V1Job | undefined> {
    return this.jobs.read(namespace, name);
  }

  async createJob(namespace: string, job: V1Job): Promise<V1Job> {
    return this.jobs.create(namespace, job);
  }

  async deleteJob(namespace: string, name: string): Promise<void> {
    this.jobs.delete(namespace, name);
  }

  async listPersistentVolumeClaims(
    namespace: string,
    labelSelector: string
  ): Promise<V1PersistentVolumeClaim[]> {
    this.checkList('listPersistentVolumeClaims');
    return this.claims.list(namespace, labelSelector);
  }

  async deletePersistentVolumeClaim(namespace: string, name: string): Promise<void> {
    this.claims.delete(namespace, name);
  }

  private checkList(operation: string): void {
    if (this.failLists) {
      throw new PlatformError(`${operation} failed: connection refused`, undefined, operation);
    }
  }
}
