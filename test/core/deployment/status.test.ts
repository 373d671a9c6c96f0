import type { V1Pod, V1PodStatus, V1Service } from '@kubernetes/client-node';
import * as fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import {
  aggregateState,
  buildAppStatus,
  isTerminalAppState,
  isTerminalLaunchState,
  mapInstanceState,
  mapJobLaunchState,
  mapPodLaunchState,
} from '../../../src/core/deployment/status.js';
import type { DeploymentState } from '../../../src/core/types/deployment.js';

const thresholds = { maxTerminatedErrorRestarts: 2, maxCrashLoopBackOffRestarts: 4 };

function runningPod(name: string, restartCount = 0, extra: Partial<V1PodStatus> = {}): V1Pod {
  return {
    metadata: { name, uid: `${name}-uid` },
    status: {
      phase: 'Running',
      podIP: '10.0.0.5',
      hostIP: '192.168.1.10',
      containerStatuses: [{ name: 'app', image: 'app', imageID: '', ready: true, restartCount }],
      ...extra,
    },
  };
}

describe('Status mapping', () => {
  describe('mapInstanceState', () => {
    it('should map pod phases', () => {
      expect(mapInstanceState({ status: { phase: 'Pending' } }, thresholds)).toBe('deploying');
      expect(mapInstanceState({ status: { phase: 'Succeeded' } }, thresholds)).toBe('undeployed');
      expect(mapInstanceState({ status: { phase: 'Failed' } }, thresholds)).toBe('failed');
      expect(mapInstanceState({ status: { phase: 'Running' } }, thresholds)).toBe('deployed');
      expect(mapInstanceState({}, thresholds)).toBe('unknown');
    });

    it('should fail a pod restarted too often after an error exit', () => {
      const pod = runningPod('web-1', 3, {
        containerStatuses: [
          {
            name: 'app',
            image: 'app',
            imageID: '',
            ready: false,
            restartCount: 3,
            lastState: { terminated: { exitCode: 1 } },
          },
        ],
      });
      expect(mapInstanceState(pod, thresholds)).toBe('failed');
    });

    it('should tolerate restarts up to the threshold', () => {
      const pod = runningPod('web-1', 2, {
        containerStatuses: [
          {
            name: 'app',
            image: 'app',
            imageID: '',
            ready: false,
            restartCount: 2,
            lastState: { terminated: { exitCode: 1 } },
          },
        ],
      });
      expect(mapInstanceState(pod, thresholds)).toBe('deployed');
    });

    it('should fail a pod in CrashLoopBackOff past its threshold', () => {
      const status = (restartCount: number): V1Pod =>
        runningPod('web-1', restartCount, {
          containerStatuses: [
            {
              name: 'app',
              image: 'app',
              imageID: '',
              ready: false,
              restartCount,
              state: { waiting: { reason: 'CrashLoopBackOff' } },
            },
          ],
        });
      expect(mapInstanceState(status(4), thresholds)).toBe('deployed');
      expect(mapInstanceState(status(5), thresholds)).toBe('failed');
    });
  });

  describe('aggregateState', () => {
    it('should be unknown without instances', () => {
      expect(aggregateState([])).toBe('unknown');
    });

    it('should return the only distinct state', () => {
      expect(aggregateState(['deployed', 'deployed'])).toBe('deployed');
    });

    it('should rank mixed states', () => {
      expect(aggregateState(['deployed', 'error', 'deploying'])).toBe('error');
      expect(aggregateState(['deployed', 'deploying'])).toBe('deploying');
      expect(aggregateState(['deployed', 'failed'])).toBe('partial');
      expect(aggregateState(['failed', 'undeployed'])).toBe('failed');
      expect(aggregateState(['unknown', 'undeployed'])).toBe('partial');
    });

    it('should not depend on instance order', () => {
      const states: DeploymentState[] = [
        'unknown',
        'deploying',
        'deployed',
        'failed',
        'partial',
        'undeployed',
        'error',
      ];
      fc.assert(
        fc.property(fc.array(fc.constantFrom(...states)), (instances) => {
          expect(aggregateState([...instances].reverse())).toBe(aggregateState(instances));
        })
      );
    });
  });

  describe('buildAppStatus', () => {
    it('should describe every pod and attach the service', () => {
      const startTime = new Date('2026-01-02T03:04:05.000Z');
      const service: V1Service = {
        metadata: { name: 'web' },
        spec: { type: 'LoadBalancer', ports: [{ port: 8080 }] },
        status: { loadBalancer: { ingress: [{ ip: '203.0.113.7' }] } },
      };

      const status = buildAppStatus(
        'web',
        [
          runningPod('web-abc', 0, { startTime }),
          { metadata: { name: 'web-def' }, status: { phase: 'Pending' } },
        ],
        [service],
        thresholds
      );

      expect(status.deploymentId).toBe('web');
      expect(status.state).toBe('deploying');
      expect(status.instances['web-abc']).toEqual({
        id: 'web-abc',
        state: 'deployed',
        attributes: {
          'pod.name': 'web-abc',
          'pod.startTime': '2026-01-02T03:04:05.000Z',
          'pod.ip': '10.0.0.5',
          'host.ip': '192.168.1.10',
          phase: 'Running',
          guid: 'web-abc-uid',
          'service.name': 'web',
          url: 'http://203.0.113.7:8080',
        },
      });
      expect(status.instances['web-def']?.state).toBe('deploying');
    });

    it('should be unknown when nothing is deployed', () => {
      expect(buildAppStatus('web', [], [], thresholds)).toEqual({
        deploymentId: 'web',
        state: 'unknown',
        instances: {},
      });
    });
  });

  describe('launch states', () => {
    it('should map job counters', () => {
      expect(mapJobLaunchState({ status: { failed: 1 } })).toBe('failed');
      expect(mapJobLaunchState({ status: { failed: 1, succeeded: 1 } })).toBe('failed');
      expect(mapJobLaunchState({ status: { succeeded: 1 } })).toBe('complete');
      expect(mapJobLaunchState({ status: {} })).toBe('launching');
      expect(mapJobLaunchState({})).toBe('unknown');
      expect(mapJobLaunchState(undefined)).toBe('unknown');
    });

    it('should map pod phases', () => {
      expect(mapPodLaunchState({ status: { phase: 'Pending' } })).toBe('launching');
      expect(mapPodLaunchState({ status: { phase: 'Running' } })).toBe('running');
      expect(mapPodLaunchState({ status: { phase: 'Succeeded' } })).toBe('complete');
      expect(mapPodLaunchState({ status: { phase: 'Failed' } })).toBe('failed');
      expect(mapPodLaunchState(undefined)).toBe('unknown');
    });

    it('should know the terminal states', () => {
      expect(isTerminalLaunchState('complete')).toBe(true);
      expect(isTerminalLaunchState('running')).toBe(false);
      expect(isTerminalAppState('deployed')).toBe(true);
      expect(isTerminalAppState('deploying')).toBe(false);
      expect(isTerminalAppState('partial')).toBe(false);
    });
  });
});
