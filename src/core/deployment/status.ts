/**
 * Status reconciliation
 *
 * Maps observed pods, jobs and services onto deployment and launch states.
 * Nothing here talks to the cluster; callers pass in what they listed.
 */

import type { V1ContainerStatus, V1Job, V1Pod, V1Service } from '@kubernetes/client-node';
import type {
  AppInstanceStatus,
  AppStatus,
  DeploymentState,
  LaunchState,
} from '../types/deployment.js';

export interface CrashThresholds {
  /** Restarts tolerated after a container terminated with an error */
  maxTerminatedErrorRestarts: number;
  /** Restarts tolerated while the container is in CrashLoopBackOff */
  maxCrashLoopBackOffRestarts: number;
}

function hasCrashed(status: V1ContainerStatus, thresholds: CrashThresholds): boolean {
  const terminated = status.lastState?.terminated ?? status.state?.terminated;
  if (terminated && terminated.exitCode !== 0 && status.restartCount > thresholds.maxTerminatedErrorRestarts) {
    return true;
  }
  return (
    status.state?.waiting?.reason === 'CrashLoopBackOff' &&
    status.restartCount > thresholds.maxCrashLoopBackOffRestarts
  );
}

export function mapInstanceState(pod: V1Pod, thresholds: CrashThresholds): DeploymentState {
  const phase = pod.status?.phase;
  switch (phase) {
    case undefined:
      return 'unknown';
    case 'Pending':
      return 'deploying';
    case 'Succeeded':
      return 'undeployed';
    case 'Failed':
      return 'failed';
    default: {
      // only the primary container is considered
      const primary = pod.status?.containerStatuses?.[0];
      return primary && hasCrashed(primary, thresholds) ? 'failed' : 'deployed';
    }
  }
}

function serviceUrl(service: V1Service): string | undefined {
  const ingress = service.status?.loadBalancer?.ingress?.[0];
  const host = ingress?.hostname ?? ingress?.ip;
  const port = service.spec?.ports?.[0]?.port;
  return host && port !== undefined ? `http://${host}:${port}` : undefined;
}

export function buildInstanceStatus(
  pod: V1Pod,
  service: V1Service | undefined,
  thresholds: CrashThresholds
): AppInstanceStatus {
  const id = pod.metadata?.name ?? 'unknown';
  const attributes: Record<string, string> = { 'pod.name': id };
  const set = (key: string, value: string | undefined) => {
    if (value !== undefined) {
      attributes[key] = value;
    }
  };

  set('pod.startTime', pod.status?.startTime?.toISOString());
  set('pod.ip', pod.status?.podIP);
  set('host.ip', pod.status?.hostIP);
  set('phase', pod.status?.phase);
  set('guid', pod.metadata?.uid);
  set('service.name', service?.metadata?.name);
  if (service?.spec?.type === 'LoadBalancer') {
    set('url', serviceUrl(service));
  }

  return { id, state: mapInstanceState(pod, thresholds), attributes };
}

/**
 * One state for a set of instances
 */
export function aggregateState(states: readonly DeploymentState[]): DeploymentState {
  const distinct = new Set(states);
  if (distinct.size === 0) {
    return 'unknown';
  }
  const [only] = distinct;
  if (distinct.size === 1 && only !== undefined) {
    return only;
  }
  if (distinct.has('error')) {
    return 'error';
  }
  if (distinct.has('deploying')) {
    return 'deploying';
  }
  if (distinct.has('deployed') || distinct.has('partial')) {
    return 'partial';
  }
  if (distinct.has('failed')) {
    return 'failed';
  }
  return 'partial';
}

export function buildAppStatus(
  deploymentId: string,
  pods: readonly V1Pod[],
  services: readonly V1Service[],
  thresholds: CrashThresholds
): AppStatus {
  const service = services[0];
  const instances: Record<string, AppInstanceStatus> = {};
  for (const pod of pods) {
    const instance = buildInstanceStatus(pod, service, thresholds);
    instances[instance.id] = instance;
  }
  return {
    deploymentId,
    state: aggregateState(Object.values(instances).map((instance) => instance.state)),
    instances,
  };
}

/**
 * Job counters: any failure wins over any success; neither yet means launching
 */
export function mapJobLaunchState(job: V1Job | undefined): LaunchState {
  const status = job?.status;
  if (!status) {
    return 'unknown';
  }
  if ((status.failed ?? 0) > 0) {
    return 'failed';
  }
  if ((status.succeeded ?? 0) > 0) {
    return 'complete';
  }
  return 'launching';
}

export function mapPodLaunchState(pod: V1Pod | undefined): LaunchState {
  const phase = pod?.status?.phase;
  switch (phase) {
    case undefined:
      return 'unknown';
    case 'Pending':
      return 'launching';
    case 'Failed':
      return 'failed';
    case 'Succeeded':
      return 'complete';
    default:
      return 'running';
  }
}

const TERMINAL_APP_STATES: ReadonlySet<DeploymentState> = new Set([
  'deployed',
  'undeployed',
  'failed',
  'error',
  'unknown',
]);
const TERMINAL_LAUNCH_STATES: ReadonlySet<LaunchState> = new Set(['complete', 'failed', 'error']);

export function isTerminalAppState(state: DeploymentState): boolean {
  return TERMINAL_APP_STATES.has(state);
}

export function isTerminalLaunchState(state: LaunchState): boolean {
  return TERMINAL_LAUNCH_STATES.has(state);
}
