import type { V1Pod } from '@kubernetes/client-node';
import { pod } from '../../kubernetes/core/pod.js';
import type { PodConfig } from '../types.js';

/**
 * A bare pod, used for tasks when jobs are disabled
 */
export function Pod(config: PodConfig): V1Pod {
  return pod({
    metadata: {
      name: config.name,
      ...(config.namespace && { namespace: config.namespace }),
      labels: config.labels,
      ...(config.annotations && { annotations: config.annotations }),
    },
    spec: config.spec,
  });
}
