/**
 * Simple PVC Factory
 *
 * The requested size is written to both limits and requests.
 */

import type { V1PersistentVolumeClaim } from '@kubernetes/client-node';
import { persistentVolumeClaim } from '../../kubernetes/storage/persistent-volume-claim.js';
import type { PvcConfig } from '../types.js';

export function Pvc(config: PvcConfig): V1PersistentVolumeClaim {
  return persistentVolumeClaim({
    metadata: {
      name: config.name,
      labels: config.labels,
    },
    spec: {
      accessModes: config.accessModes ?? ['ReadWriteOnce'],
      resources: {
        limits: { storage: config.size },
        requests: { storage: config.size },
      },
      ...(config.storageClass && { storageClassName: config.storageClass }),
    },
  });
}
