/**
 * Simple Factory Namespace
 *
 * Usage: simple.Deployment({ name, labels, replicas, selector, template })
 */

export { Service } from './networking/index.js';
export { Pvc } from './storage/index.js';
export type * from './types.js';
export { Deployment, Job, Pod, StatefulSet } from './workloads/index.js';

import { Service } from './networking/index.js';
import { Pvc } from './storage/index.js';
import { Deployment, Job, Pod, StatefulSet } from './workloads/index.js';

export const simple = {
  // Workloads
  Deployment,
  StatefulSet,
  Job,
  Pod,

  // Networking
  Service,

  // Storage
  Pvc,
} as const;
