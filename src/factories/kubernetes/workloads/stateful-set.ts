import type { V1StatefulSet } from '@kubernetes/client-node';

export function statefulSet(resource: V1StatefulSet): V1StatefulSet {
  return {
    ...resource,
    apiVersion: 'apps/v1',
    kind: 'StatefulSet',
    metadata: resource.metadata ?? { name: 'unnamed-statefulset' },
  };
}
