/**
 * Core - consolidated exports
 */

// =============================================================================
// Builder
// =============================================================================
export * from './core/builder/index.js';

// =============================================================================
// Configuration
// =============================================================================
export {
  applyEnvironmentOverrides,
  createDeployerProperties,
  DEFAULT_PROPERTY_PREFIX,
  DEFAULT_STATEFUL_SET_INIT_IMAGE,
  DEFAULT_TASK_LAUNCHER_PROPERTIES,
  type DeployerPropertiesOverrides,
  loadDeployerProperties,
  loadTaskLauncherProperties,
} from './core/config/deployer-properties.js';
export * from './core/constants/labels.js';

// =============================================================================
// Deployers
// =============================================================================
export * from './core/deployment/index.js';

// =============================================================================
// Errors
// =============================================================================
export {
  ConfigurationError,
  DeployerError,
  DeploymentStateError,
  formatArktypeError,
  isDeployerError,
  PlatformError,
} from './core/errors.js';

// =============================================================================
// Kubernetes
// =============================================================================
export * from './core/kubernetes/index.js';

// =============================================================================
// Logging
// =============================================================================
export * from './core/logging/index.js';

// =============================================================================
// Properties and resolution
// =============================================================================
export * from './core/properties/index.js';
export * from './core/resolver/index.js';

// =============================================================================
// Types
// =============================================================================
export * from './core/types/deployment.js';
export type * from './core/types/properties.js';
