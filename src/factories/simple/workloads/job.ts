import type { V1Job } from '@kubernetes/client-node';
import { job } from '../../kubernetes/workloads/job.js';
import type { JobConfig } from '../types.js';

export function Job(config: JobConfig): V1Job {
  return job({
    metadata: {
      name: config.name,
      ...(config.namespace && { namespace: config.namespace }),
      labels: config.labels,
      ...(config.annotations && { annotations: config.annotations }),
    },
    spec: {
      template: {
        metadata: {
          labels: config.template.labels,
          ...(config.template.annotations && { annotations: config.template.annotations }),
        },
        spec: config.template.spec,
      },
      ...(config.backoffLimit !== undefined && { backoffLimit: config.backoffLimit }),
      ...(config.ttlSecondsAfterFinished !== undefined && {
        ttlSecondsAfterFinished: config.ttlSecondsAfterFinished,
      }),
    },
  });
}
