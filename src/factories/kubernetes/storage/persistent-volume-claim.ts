import type { V1PersistentVolumeClaim } from '@kubernetes/client-node';

export type V1PvcSpec = NonNullable<V1PersistentVolumeClaim['spec']>;

export function persistentVolumeClaim(resource: V1PersistentVolumeClaim): V1PersistentVolumeClaim {
  return {
    ...resource,
    apiVersion: 'v1',
    kind: 'PersistentVolumeClaim',
    metadata: resource.metadata ?? { name: 'unnamed-pvc' },
  };
}
