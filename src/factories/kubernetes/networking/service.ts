import type { V1Service } from '@kubernetes/client-node';

export function service(resource: V1Service): V1Service {
  return {
    ...resource,
    apiVersion: 'v1',
    kind: 'Service',
    metadata: resource.metadata ?? { name: 'unnamed-service' },
  };
}
