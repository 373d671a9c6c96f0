import type { RuntimeEnvironmentInfo } from '../types/deployment.js';

export const IMPLEMENTATION_VERSION = '0.1.0';
export const PLATFORM_TYPE = 'Kubernetes';
export const PLATFORM_API_VERSION = 'v1';
export const PLATFORM_CLIENT = '@kubernetes/client-node@1';

export interface EnvironmentInfoInput {
  spiClass: 'AppDeployer' | 'TaskLauncher';
  implementationName: string;
  namespace: string;
  masterUrl?: string;
}

export function createRuntimeEnvironmentInfo(input: EnvironmentInfoInput): RuntimeEnvironmentInfo {
  return {
    spiClass: input.spiClass,
    implementationName: input.implementationName,
    implementationVersion: IMPLEMENTATION_VERSION,
    platformType: PLATFORM_TYPE,
    platformApiVersion: PLATFORM_API_VERSION,
    platformClientVersion: PLATFORM_CLIENT,
    platformHostVersion: 'unknown',
    nodeVersion: process.versions.node,
    platformSpecificInfo: {
      namespace: input.namespace,
      'master-url': input.masterUrl ?? 'unknown',
    },
  };
}
