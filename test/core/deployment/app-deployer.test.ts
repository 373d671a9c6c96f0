import type { V1Pod } from '@kubernetes/client-node';
import { beforeEach, describe, expect, it } from 'vitest';
import {
  createDeployerProperties,
  type DeployerPropertiesOverrides,
} from '../../../src/core/config/deployer-properties.js';
import { KubernetesAppDeployer } from '../../../src/core/deployment/app-deployer.js';
import { ConfigurationError, DeploymentStateError, PlatformError } from '../../../src/core/errors.js';
import { createDeploymentRequest, type DeploymentRequestInit } from '../../../src/core/types/deployment.js';
import { FakePlatformClient } from '../../utils/fake-platform-client.js';

const NAMESPACE = 'apps';
const PREFIX = 'deployer.kubernetes';

const webIds = { 'kubelaunch-app-id': 'web', 'kubelaunch-deployment-id': 'web' };

function request(init: Partial<DeploymentRequestInit> = {}) {
  return createDeploymentRequest({ name: 'web', resource: 'docker:web:1', ...init });
}

function appPod(name: string, appId: string, phase = 'Running', spec?: V1Pod['spec']): V1Pod {
  return {
    metadata: { name, labels: { 'kubelaunch-app-id': appId } },
    ...(spec && { spec }),
    status: { phase },
  };
}

describe('KubernetesAppDeployer', () => {
  let client: FakePlatformClient;

  function deployerWith(overrides: DeployerPropertiesOverrides = {}) {
    return new KubernetesAppDeployer({
      properties: createDeployerProperties({ namespace: NAMESPACE, ...overrides }),
      client,
      scalePollIntervalMs: 1,
    });
  }

  beforeEach(() => {
    client = new FakePlatformClient('https://cluster.test:6443');
  });

  describe('deploy', () => {
    it('should create a service and a deployment', async () => {
      const id = await deployerWith().deploy(
        request({
          appProperties: { 'server.port': '9090' },
          deploymentProperties: {
            'deployer.count': '3',
            [`${PREFIX}.deploymentLabels`]: 'team:core',
            [`${PREFIX}.podAnnotations`]: 'prometheus.io/scrape:true',
          },
        })
      );

      expect(id).toBe('web');

      const service = await client.services.read(NAMESPACE, 'web');
      expect(service?.metadata?.labels).toEqual({ ...webIds, role: 'kubelaunch-app' });
      expect(service?.spec).toEqual({
        selector: webIds,
        ports: [{ port: 9090, name: 'port-9090' }],
      });

      const deployment = await client.readDeployment(NAMESPACE, 'web');
      expect(deployment?.kind).toBe('Deployment');
      expect(deployment?.spec?.replicas).toBe(3);
      expect(deployment?.spec?.selector).toEqual({ matchLabels: webIds });
      expect(deployment?.spec?.template.metadata).toEqual({
        labels: { ...webIds, role: 'kubelaunch-app', team: 'core' },
        annotations: { 'prometheus.io/scrape': 'true' },
      });

      const container = deployment?.spec?.template.spec?.containers[0];
      expect(container?.name).toBe('web');
      expect(container?.image).toBe('web:1');
      expect(container?.ports).toEqual([{ containerPort: 9090 }]);
      expect(await client.readStatefulSet(NAMESPACE, 'web')).toBeUndefined();
    });

    it('should create a stateful set for indexed apps', async () => {
      await deployerWith().deploy(
        request({
          deploymentProperties: {
            'deployer.indexed': 'TRUE',
            [`${PREFIX}.statefulSet.volumeClaimTemplate.storage`]: '1g',
            [`${PREFIX}.statefulSet.volumeClaimTemplate.storageClassName`]: 'fast',
          },
        })
      );

      const statefulSet = await client.readStatefulSet(NAMESPACE, 'web');
      const marked = { ...webIds, role: 'kubelaunch-app' };
      expect(statefulSet?.spec?.serviceName).toBe('web');
      expect(statefulSet?.spec?.podManagementPolicy).toBe('Parallel');
      expect(statefulSet?.spec?.replicas).toBe(1);
      expect(statefulSet?.spec?.selector).toEqual({ matchLabels: marked });
      expect(statefulSet?.spec?.volumeClaimTemplates).toEqual([
        {
          apiVersion: 'v1',
          kind: 'PersistentVolumeClaim',
          metadata: { name: 'web', labels: marked },
          spec: {
            accessModes: ['ReadWriteOnce'],
            resources: { limits: { storage: '1024Mi' }, requests: { storage: '1024Mi' } },
            storageClassName: 'fast',
          },
        },
      ]);
      expect(statefulSet?.spec?.template.spec?.initContainers?.map((c) => c.name)).toEqual([
        'index-provider',
      ]);
      expect(await client.readDeployment(NAMESPACE, 'web')).toBeUndefined();
    });

    it('should refuse an app that is already deployed', async () => {
      await client.createPod(NAMESPACE, appPod('web-1', 'web'));

      const deploy = deployerWith().deploy(request());
      await expect(deploy).rejects.toThrow(DeploymentStateError);
      await expect(deployerWith().deploy(request())).rejects.toThrow("App 'web' is already deployed");
    });

    it('should reject NodePort and LoadBalancer together before creating anything', async () => {
      const deploy = deployerWith().deploy(
        request({
          deploymentProperties: {
            [`${PREFIX}.createNodePort`]: 'true',
            [`${PREFIX}.createLoadBalancer`]: 'true',
          },
        })
      );

      await expect(deploy).rejects.toThrow('Cannot create NodePort and LoadBalancer at the same time.');
      expect(await client.listServices(NAMESPACE, '')).toEqual([]);
      expect(await client.listDeployments(NAMESPACE, '')).toEqual([]);
    });

    it('should create a NodePort service on the requested port', async () => {
      await deployerWith().deploy(request({ deploymentProperties: { [`${PREFIX}.createNodePort`]: '30080' } }));

      const service = await client.services.read(NAMESPACE, 'web');
      expect(service?.spec?.type).toBe('NodePort');
      expect(service?.spec?.ports).toEqual([{ port: 8080, name: 'port-8080', nodePort: 30080 }]);
    });

    it('should reject an invalid node port', async () => {
      const deploy = deployerWith().deploy(request({ deploymentProperties: { [`${PREFIX}.createNodePort`]: 'abc' } }));
      await expect(deploy).rejects.toThrow(ConfigurationError);
      await expect(
        deployerWith().deploy(request({ deploymentProperties: { [`${PREFIX}.createNodePort`]: 'abc' } }))
      ).rejects.toThrow('Invalid value: abc: provided port is not valid.');
    });

    it('should let a NodePort request win over a global LoadBalancer setting', async () => {
      await deployerWith({ createLoadBalancer: true }).deploy(
        request({ deploymentProperties: { [`${PREFIX}.createNodePort`]: 'true' } })
      );

      const service = await client.services.read(NAMESPACE, 'web');
      expect(service?.spec?.type).toBe('NodePort');
      expect(service?.spec?.ports).toEqual([{ port: 8080, name: 'port-8080' }]);
    });

    it('should create a LoadBalancer service when configured globally', async () => {
      await deployerWith({ createLoadBalancer: true }).deploy(request());
      expect((await client.services.read(NAMESPACE, 'web'))?.spec?.type).toBe('LoadBalancer');
    });

    it('should add extra service ports once each', async () => {
      await deployerWith().deploy(request({ deploymentProperties: { [`${PREFIX}.servicePorts`]: '8080, 9000' } }));

      expect((await client.services.read(NAMESPACE, 'web'))?.spec?.ports).toEqual([
        { port: 8080, name: 'port-8080' },
        { port: 9000, name: 'port-9000' },
      ]);
    });

    it('should name the service after an un-versioned app name', async () => {
      const id = await deployerWith().deploy(
        request({ name: 'web-v2', deploymentProperties: { 'deployer.appName': 'web' } })
      );

      expect(id).toBe('web-v2');
      const service = await client.services.read(NAMESPACE, 'web');
      expect(service?.spec?.selector).toEqual({ 'kubelaunch-application-name': 'web' });
    });

    it('should keep the versioned service name while a versioned service exists', async () => {
      await client.createService(NAMESPACE, {
        metadata: { name: 'web-v1', labels: { 'kubelaunch-deployment-id': 'web-v1' } },
      });

      await deployerWith().deploy(request({ name: 'web-v2', deploymentProperties: { 'deployer.appName': 'web' } }));

      expect(await client.services.read(NAMESPACE, 'web-v2')).toBeDefined();
      expect(await client.services.read(NAMESPACE, 'web')).toBeUndefined();
    });

    it('should replace an existing service with the same name', async () => {
      await client.createService(NAMESPACE, {
        metadata: { name: 'web', labels: { owner: 'someone-else' } },
        spec: { ports: [{ port: 7000 }] },
      });

      await deployerWith().deploy(request());

      const service = await client.services.read(NAMESPACE, 'web');
      expect(service?.metadata?.labels).toEqual({ ...webIds, role: 'kubelaunch-app' });
      expect(service?.spec?.ports).toEqual([{ port: 8080, name: 'port-8080' }]);
      expect(await client.readDeployment(NAMESPACE, 'web')).toBeDefined();
    });

    it('should hand a shared app name service over to the newer version', async () => {
      const deployer = deployerWith();
      const versioned = (name: string, port: string) =>
        request({
          name,
          appProperties: { 'server.port': port },
          deploymentProperties: { 'deployer.appName': 'web' },
        });
      await deployer.deploy(versioned('web-v1', '8080'));
      await client.createPod(NAMESPACE, appPod('web-v1-a', 'web-v1'));
      await deployer.deploy(versioned('web-v2', '9090'));

      const shared = await client.services.read(NAMESPACE, 'web');
      expect(shared?.metadata?.labels).toEqual({
        'kubelaunch-app-id': 'web-v2',
        'kubelaunch-deployment-id': 'web-v2',
        'kubelaunch-application-name': 'web',
        role: 'kubelaunch-app',
      });
      expect(shared?.spec?.ports).toEqual([{ port: 9090, name: 'port-9090' }]);

      await deployer.undeploy('web-v1');

      expect(await client.readDeployment(NAMESPACE, 'web-v1')).toBeUndefined();
      expect((await client.services.read(NAMESPACE, 'web'))?.spec?.selector).toEqual({
        'kubelaunch-application-name': 'web',
      });
      expect(await client.readDeployment(NAMESPACE, 'web-v2')).toBeDefined();
    });
  });

  describe('undeploy', () => {
    it('should delete every object carrying the app id', async () => {
      const deployer = deployerWith();
      await deployer.deploy(request());
      await client.createPod(NAMESPACE, appPod('web-1', 'web'));

      await deployer.undeploy('web');

      expect(await client.listServices(NAMESPACE, '')).toEqual([]);
      expect(await client.listDeployments(NAMESPACE, '')).toEqual([]);
      expect(await client.listPods(NAMESPACE, '')).toEqual([]);
    });

    it('should clean up leftovers and then report that nothing is deployed', async () => {
      await client.createService(NAMESPACE, { metadata: { name: 'web', labels: webIds } });

      await expect(deployerWith().undeploy('web')).rejects.toThrow("App 'web' is not deployed");
      expect(await client.listServices(NAMESPACE, '')).toEqual([]);
    });

    it('should report that nothing is deployed even when leftovers cannot be deleted', async () => {
      class StuckServiceClient extends FakePlatformClient {
        override async deleteService(): Promise<void> {
          throw new PlatformError('deleteService failed: forbidden', 403, 'deleteService');
        }
      }
      client = new StuckServiceClient();
      await client.createService(NAMESPACE, { metadata: { name: 'web', labels: webIds } });

      await expect(deployerWith().undeploy('web')).rejects.toThrow("App 'web' is not deployed");
      expect(await client.services.read(NAMESPACE, 'web')).toBeDefined();
    });
  });

  describe('status', () => {
    it('should report unknown for an app with no pods', async () => {
      expect(await deployerWith().status('ghost')).toEqual({
        deploymentId: 'ghost',
        state: 'unknown',
        instances: {},
      });
    });

    it('should aggregate instance states', async () => {
      await client.createPod(NAMESPACE, appPod('web-1', 'web', 'Running'));
      await client.createPod(NAMESPACE, appPod('web-2', 'web', 'Failed'));
      await client.createPod(NAMESPACE, appPod('other-1', 'other', 'Pending'));

      const status = await deployerWith().status('web');
      expect(status.state).toBe('partial');
      expect(Object.keys(status.instances)).toEqual(['web-1', 'web-2']);
    });
  });

  describe('getLog', () => {
    it('should read the application container of each pod', async () => {
      await client.createPod(NAMESPACE, appPod('web-a', 'web', 'Running', { containers: [{ name: 'web' }] }));
      await client.createPod(
        NAMESPACE,
        appPod('web-b', 'web', 'Running', {
          containers: [
            { name: 'sidecar' },
            { name: 'web', env: [{ name: 'KUBELAUNCH_APPLICATION_GUID' }] },
          ],
        })
      );
      client.logs.set('web-a', 'log-a\n');
      client.logs.set('web-b/web', 'log-b\n');
      client.logs.set('web-b/sidecar', 'noise\n');

      expect(await deployerWith().getLog('web')).toBe('log-a\nlog-b\n');
      expect(client.logRequests).toEqual([
        { name: 'web-a', options: { tailLines: 500 } },
        { name: 'web-b', options: { container: 'web', tailLines: 500 } },
      ]);
    });

    it('should return an empty log for an unknown app', async () => {
      expect(await deployerWith().getLog('ghost')).toBe('');
    });
  });

  describe('scale', () => {
    it('should scale a deployment and wait for the replicas', async () => {
      const deployer = deployerWith();
      await deployer.deploy(request());

      await deployer.scale({ deploymentId: 'web', count: 5 });

      const deployment = await client.readDeployment(NAMESPACE, 'web');
      expect(deployment?.spec?.replicas).toBe(5);
      expect(deployment?.status?.replicas).toBe(5);
    });

    it('should scale a stateful set', async () => {
      const deployer = deployerWith();
      await deployer.deploy(request({ deploymentProperties: { 'deployer.indexed': 'true' } }));

      await deployer.scale({ deploymentId: 'web', count: 2 });

      expect((await client.readStatefulSet(NAMESPACE, 'web'))?.spec?.replicas).toBe(2);
    });

    it('should give up once the scale timeout has passed', async () => {
      const deployer = deployerWith({ scaleTimeoutMs: 3 });
      await deployer.deploy(request());
      client.reflectScale = false;

      await expect(deployer.scale({ deploymentId: 'web', count: 5 })).rejects.toThrow(
        "App 'web' did not reach 5 replicas within 3ms (last seen 0)"
      );
    });

    it('should refuse to scale an app that is not deployed', async () => {
      await expect(deployerWith().scale({ deploymentId: 'ghost', count: 1 })).rejects.toThrow(
        "App 'ghost' is not deployed"
      );
    });
  });

  describe('environmentInfo', () => {
    it('should report the namespace and the API server', () => {
      const info = deployerWith().environmentInfo();
      expect(info.spiClass).toBe('AppDeployer');
      expect(info.implementationName).toBe('KubernetesAppDeployer');
      expect(info.platformSpecificInfo).toEqual({
        namespace: NAMESPACE,
        'master-url': 'https://cluster.test:6443',
      });
    });

    it('should prefer a configured master URL', () => {
      const info = deployerWith({ masterUrl: 'https://override.test:6443' }).environmentInfo();
      expect(info.platformSpecificInfo['master-url']).toBe('https://override.test:6443');
    });
  });
});
