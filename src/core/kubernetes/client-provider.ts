/**
 * Kubernetes Client Provider
 *
 * Loads a KubeConfig once and hands out the typed API clients the deployer
 * talks to (core, apps, batch). Clients are created lazily and cached.
 */

import * as k8s from '@kubernetes/client-node';
import { ConfigurationError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';

/**
 * How to reach the cluster
 */
export interface KubernetesClientConfig {
  /**
   * Only set to true in non-production environments: disables TLS certificate verification.
   *
   * @default false
   */
  skipTLSVerify?: boolean;

  /** Overrides the server URL of the current cluster */
  server?: string;

  /** Context to switch to after loading the kubeconfig */
  context?: string;

  /**
   * Explicit cluster definition; used together with `user` instead of a kubeconfig file
   */
  cluster?: {
    name: string;
    server: string;
    skipTLSVerify?: boolean;
    caData?: string;
    caFile?: string;
  };

  user?: {
    name: string;
    token?: string;
    certData?: string;
    certFile?: string;
    keyData?: string;
    keyFile?: string;
  };

  /**
   * Load ~/.kube/config (or in-cluster config) when no explicit cluster/user is given
   * @default true
   */
  loadFromDefault?: boolean;

  kubeconfigPath?: string;
}

export class KubernetesClientProvider {
  private readonly logger = getComponentLogger('kubernetes-client-provider');
  private readonly kubeConfig: k8s.KubeConfig;
  private coreV1Api: k8s.CoreV1Api | undefined;
  private appsV1Api: k8s.AppsV1Api | undefined;
  private batchV1Api: k8s.BatchV1Api | undefined;

  constructor(config: KubernetesClientConfig | k8s.KubeConfig = {}) {
    this.kubeConfig =
      config instanceof k8s.KubeConfig ? config : this.createKubeConfig(config);

    this.logger.debug('Kubernetes client provider initialized', {
      currentContext: this.kubeConfig.getCurrentContext(),
      server: this.kubeConfig.getCurrentCluster()?.server,
      clusterName: this.kubeConfig.getCurrentCluster()?.name,
    });
  }

  getKubeConfig(): k8s.KubeConfig {
    return this.kubeConfig;
  }

  /**
   * Server URL of the current cluster, reported in the runtime environment info
   */
  getServerUrl(): string | undefined {
    return this.kubeConfig.getCurrentCluster()?.server;
  }

  /**
   * Pods, services, persistent volume claims and pod logs
   */
  getCoreV1Api(): k8s.CoreV1Api {
    this.coreV1Api ??= this.makeClient('CoreV1Api', () => this.kubeConfig.makeApiClient(k8s.CoreV1Api));
    return this.coreV1Api;
  }

  /**
   * Deployments and stateful sets
   */
  getAppsV1Api(): k8s.AppsV1Api {
    this.appsV1Api ??= this.makeClient('AppsV1Api', () => this.kubeConfig.makeApiClient(k8s.AppsV1Api));
    return this.appsV1Api;
  }

  getBatchV1Api(): k8s.BatchV1Api {
    this.batchV1Api ??= this.makeClient('BatchV1Api', () =>
      this.kubeConfig.makeApiClient(k8s.BatchV1Api)
    );
    return this.batchV1Api;
  }

  private makeClient<T>(clientType: string, create: () => T): T {
    try {
      const client = create();
      this.logger.debug('Created API client', { clientType });
      return client;
    } catch (error) {
      this.logger.error('Failed to create API client', error, { clientType });
      throw new ConfigurationError(
        `Failed to create ${clientType} API client`,
        undefined,
        undefined,
        { cause: error }
      );
    }
  }

  private createKubeConfig(config: KubernetesClientConfig): k8s.KubeConfig {
    const kc = new k8s.KubeConfig();

    if (config.cluster && config.user) {
      const contextName = config.context ?? 'kubelaunch-context';

      kc.loadFromOptions({
        clusters: [
          {
            name: config.cluster.name,
            server: config.cluster.server,
            skipTLSVerify: config.cluster.skipTLSVerify ?? false,
            caData: config.cluster.caData,
            caFile: config.cluster.caFile,
          },
        ],
        users: [
          {
            name: config.user.name,
            token: config.user.token,
            certData: config.user.certData,
            certFile: config.user.certFile,
            keyData: config.user.keyData,
            keyFile: config.user.keyFile,
          },
        ],
        contexts: [{ name: contextName, cluster: config.cluster.name, user: config.user.name }],
        currentContext: contextName,
      });
    } else if (config.loadFromDefault !== false) {
      try {
        if (config.kubeconfigPath) {
          kc.loadFromFile(config.kubeconfigPath);
        } else {
          kc.loadFromDefault();
        }
      } catch (error) {
        throw new ConfigurationError(
          'Failed to load kubeconfig',
          'kubeconfigPath',
          config.kubeconfigPath,
          { cause: error }
        );
      }
      this.applyConfigModifications(kc, config);
    } else {
      throw new ConfigurationError(
        'Either complete cluster/user configuration must be provided, or loadFromDefault must be true'
      );
    }

    if (kc.getCurrentCluster()?.skipTLSVerify) {
      this.logger.warn('TLS verification disabled; only use this against development clusters', {
        server: kc.getCurrentCluster()?.server,
      });
    }

    return kc;
  }

  private applyConfigModifications(kc: k8s.KubeConfig, config: KubernetesClientConfig): void {
    if (config.context) {
      try {
        kc.setCurrentContext(config.context);
      } catch (error) {
        throw new ConfigurationError(
          `Context '${config.context}' not found in kubeconfig`,
          'context',
          config.context,
          { cause: error }
        );
      }
    }

    const cluster = kc.getCurrentCluster();
    if (!cluster || (config.skipTLSVerify === undefined && !config.server)) {
      return;
    }

    const modified: k8s.Cluster = {
      ...cluster,
      ...(config.server ? { server: config.server } : {}),
      ...(config.skipTLSVerify !== undefined ? { skipTLSVerify: config.skipTLSVerify } : {}),
    };
    kc.clusters = kc.clusters.map((c) => (c === cluster ? modified : c));

    this.logger.debug('Applied cluster modifications', {
      server: modified.server,
      skipTLSVerify: modified.skipTLSVerify,
    });
  }
}
