import { describe, expect, it } from 'vitest';
import {
  applyEnvironmentOverrides,
  createDeployerProperties,
  loadDeployerProperties,
  loadTaskLauncherProperties,
} from '../../../src/core/config/deployer-properties.js';
import { ConfigurationError } from '../../../src/core/errors.js';

describe('Deployer properties', () => {
  describe('createDeployerProperties', () => {
    it('should fill in the defaults', () => {
      const properties = createDeployerProperties();

      expect(properties.namespace).toBe('default');
      expect(properties.entryPointStyle).toBe('exec');
      expect(properties.imagePullPolicy).toBe('IfNotPresent');
      expect(properties.restartPolicy).toBe('Always');
      expect(properties.taskServiceAccountName).toBe('default');
      expect(properties.maximumConcurrentTasks).toBe(20);
      expect(properties.statefulSet.volumeClaimTemplate).toEqual({ storage: '10g' });
      expect(properties.probes.readiness).toEqual({
        path: '/actuator/health/readiness',
        delay: 10,
        period: 10,
        timeout: 2,
        failure: 3,
        success: 1,
      });
    });

    it('should merge nested overrides one level deep', () => {
      const properties = createDeployerProperties({
        probes: { liveness: { delay: 5 } },
        limits: { memory: '512Mi' },
        statefulSet: { volumeClaimTemplate: { storageClassName: 'fast' } },
      });

      expect(properties.probes.liveness).toEqual({
        path: '/actuator/health/liveness',
        delay: 5,
        period: 60,
        timeout: 2,
        failure: 3,
        success: 1,
      });
      expect(properties.limits).toEqual({ memory: '512Mi' });
      expect(properties.statefulSet.volumeClaimTemplate).toEqual({
        storage: '10g',
        storageClassName: 'fast',
      });
    });
  });

  describe('loadDeployerProperties', () => {
    it('should bind a settings document with kebab-case keys', () => {
      const properties = loadDeployerProperties(
        [
          'namespace: apps',
          'create-load-balancer: true',
          "maximum-concurrent-tasks: '5'",
          'limits: {memory: 1Gi}',
          'tolerations: [{key: dedicated, value: deployer, operator: Equal, effect: NoSchedule}]',
        ].join('\n'),
        {}
      );

      expect(properties.namespace).toBe('apps');
      expect(properties.createLoadBalancer).toBe(true);
      expect(properties.maximumConcurrentTasks).toBe(5);
      expect(properties.limits).toEqual({ memory: '1Gi' });
      expect(properties.tolerations).toEqual([
        { key: 'dedicated', value: 'deployer', operator: 'Equal', effect: 'NoSchedule' },
      ]);
      expect(properties.restartPolicy).toBe('Always');
    });

    it('should give defaults for an empty document', () => {
      expect(loadDeployerProperties('', {})).toEqual(createDeployerProperties());
    });

    it('should let the environment override the namespace and master URL', () => {
      const properties = loadDeployerProperties('namespace: apps', {
        KUBELAUNCH_NAMESPACE: 'staging',
        KUBELAUNCH_MASTER_URL: 'https://cluster.test:6443',
      });

      expect(properties.namespace).toBe('staging');
      expect(properties.masterUrl).toBe('https://cluster.test:6443');
    });

    it('should reject settings that do not validate', () => {
      expect(() => loadDeployerProperties('restart-policy: Sometimes', {})).toThrow(ConfigurationError);
      expect(() => loadDeployerProperties('restart-policy: Sometimes', {})).toThrow(
        'Invalid deployer settings'
      );
    });

    it('should reject malformed YAML', () => {
      expect(() => loadDeployerProperties('namespace: [apps', {})).toThrow(ConfigurationError);
    });
  });

  it('should leave properties alone without overriding variables', () => {
    const properties = createDeployerProperties({ namespace: 'apps' });
    expect(applyEnvironmentOverrides(properties, {})).toEqual(properties);
  });

  describe('loadTaskLauncherProperties', () => {
    it('should default the restart policy to Never', () => {
      expect(loadTaskLauncherProperties('backoff-limit: 2\nttl-seconds-after-finished: 30')).toEqual({
        restartPolicy: 'Never',
        backoffLimit: 2,
        ttlSecondsAfterFinished: 30,
      });
    });

    it('should reject an unknown restart policy', () => {
      expect(() => loadTaskLauncherProperties('restartPolicy: Sometimes')).toThrow(
        'Invalid task launcher settings'
      );
    });
  });
});
