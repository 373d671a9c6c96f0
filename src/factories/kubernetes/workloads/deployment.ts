import type { V1Deployment } from '@kubernetes/client-node';

export function deployment(resource: V1Deployment): V1Deployment {
  return {
    ...resource,
    apiVersion: 'apps/v1',
    kind: 'Deployment',
    metadata: resource.metadata ?? { name: 'unnamed-deployment' },
  };
}
