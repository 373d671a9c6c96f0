import type { V1Pod } from '@kubernetes/client-node';

export function pod(resource: V1Pod): V1Pod {
  return {
    ...resource,
    apiVersion: 'v1',
    kind: 'Pod',
    metadata: resource.metadata ?? { name: 'unnamed-pod' },
  };
}
