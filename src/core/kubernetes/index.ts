/**
 * Kubernetes Module
 *
 * Client provider, the platform client the deployer submits through, and
 * error helpers for the API's status codes.
 */

export { KubernetesClientProvider } from './client-provider.js';
export type { KubernetesClientConfig } from './client-provider.js';

export { KubernetesPlatformClient } from './platform-client.js';
export type { PlatformClient, PodLogOptions } from './platform-client.js';

export {
  formatKubernetesError,
  getErrorStatusCode,
  getStatusBody,
  isConflictError,
  isNotFoundError,
  toPlatformError,
} from './errors.js';
