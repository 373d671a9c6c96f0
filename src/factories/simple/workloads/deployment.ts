/**
 * Simple Deployment Factory
 */

import type { V1Deployment } from '@kubernetes/client-node';
import { deployment } from '../../kubernetes/workloads/deployment.js';
import type { DeploymentConfig } from '../types.js';

export function Deployment(config: DeploymentConfig): V1Deployment {
  return deployment({
    metadata: {
      name: config.name,
      ...(config.namespace && { namespace: config.namespace }),
      labels: config.labels,
      ...(config.annotations && { annotations: config.annotations }),
    },
    spec: {
      replicas: config.replicas,
      selector: { matchLabels: config.selector },
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
