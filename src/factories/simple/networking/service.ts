/**
 * Simple Service Factory
 */

import type { V1Service } from '@kubernetes/client-node';
import { service } from '../../kubernetes/networking/service.js';
import type { ServiceConfig } from '../types.js';

export function Service(config: ServiceConfig): V1Service {
  return service({
    metadata: {
      name: config.name,
      ...(config.namespace && { namespace: config.namespace }),
      labels: config.labels,
      ...(config.annotations && { annotations: config.annotations }),
    },
    spec: {
      selector: config.selector,
      ports: config.ports,
      ...(config.type && { type: config.type }),
    },
  });
}
