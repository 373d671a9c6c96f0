/**
 * Simple StatefulSet Factory
 *
 * Pods start in parallel; ordinal start-up is not needed because each pod
 * learns its index from its own hostname.
 */

import type { V1StatefulSet } from '@kubernetes/client-node';
import { statefulSet } from '../../kubernetes/workloads/stateful-set.js';
import type { StatefulSetConfig } from '../types.js';

export function StatefulSet(config: StatefulSetConfig): V1StatefulSet {
  return statefulSet({
    metadata: {
      name: config.name,
      ...(config.namespace && { namespace: config.namespace }),
      labels: config.labels,
    },
    spec: {
      replicas: config.replicas,
      serviceName: config.serviceName,
      podManagementPolicy: 'Parallel',
      selector: { matchLabels: config.selector },
      volumeClaimTemplates: config.volumeClaimTemplates,
      template: {
        metadata: {
          labels: config.template.labels,
          ...(config.template.annotations && { annotations: config.template.annotations }),
        },
        spec: config.template.spec,
      },
    },
  });
}
