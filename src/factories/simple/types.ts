/**
 * Simple Factory Configuration Types
 *
 * Flat inputs for the manifests the deployer submits. Every object carries
 * its own labels; selectors and templates are derived from them.
 */

import type {
  V1PersistentVolumeClaim,
  V1PodSpec,
  V1ServicePort,
} from '@kubernetes/client-node';

interface ObjectConfig {
  name: string;
  namespace?: string;
  labels: Record<string, string>;
  annotations?: Record<string, string>;
}

/**
 * Pod template shared by every workload kind
 */
export interface PodTemplateConfig {
  labels: Record<string, string>;
  annotations?: Record<string, string>;
  spec: V1PodSpec;
}

export interface DeploymentConfig extends ObjectConfig {
  replicas: number;
  selector: Record<string, string>;
  template: PodTemplateConfig;
}

export interface StatefulSetConfig extends DeploymentConfig {
  serviceName: string;
  volumeClaimTemplates: V1PersistentVolumeClaim[];
}

export interface JobConfig extends ObjectConfig {
  template: PodTemplateConfig;
  backoffLimit?: number;
  ttlSecondsAfterFinished?: number;
}

export interface PodConfig extends ObjectConfig {
  spec: V1PodSpec;
}

export type ServiceType = 'ClusterIP' | 'NodePort' | 'LoadBalancer';

export interface ServiceConfig extends ObjectConfig {
  selector: Record<string, string>;
  ports: V1ServicePort[];
  type?: ServiceType;
}

export interface PvcConfig {
  name: string;
  labels: Record<string, string>;
  size: string;
  storageClass?: string;
  accessModes?: string[];
}
