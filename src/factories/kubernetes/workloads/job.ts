import type { V1Job } from '@kubernetes/client-node';

export type V1JobSpec = NonNullable<V1Job['spec']>;

export function job(resource: V1Job): V1Job {
  return {
    ...resource,
    apiVersion: 'batch/v1',
    kind: 'Job',
    metadata: resource.metadata ?? { name: 'unnamed-job' },
  };
}
