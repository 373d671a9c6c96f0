/**
 * kubelaunch - deploy long-running apps and short-lived tasks to Kubernetes
 * from flat deployment properties.
 */

export * from './core.js';

// =============================================================================
// Manifest factories
// =============================================================================
export { simple } from './factories/simple/index.js';
export type * from './factories/simple/types.js';

// =============================================================================
// Utilities
// =============================================================================
export * from './utils/index.js';
