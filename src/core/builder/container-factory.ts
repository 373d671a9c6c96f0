/**
 * Primary container factory
 *
 * Builds container[0] of every pod: image, entry point arguments, environment,
 * ports and (for long-running apps) probes. Pod-level decoration such as
 * resources and security contexts is left to the pod spec builder.
 */

import type { V1Container, V1ContainerPort, V1EnvVar } from '@kubernetes/client-node';
import {
  APPLICATION_GUID_ENV,
  DEFAULT_EXTERNAL_PORT,
  SERVER_PORT_KEY,
} from '../constants/labels.js';
import { parseIntegerProperty } from '../properties/index.js';
import type { DeploymentPropertiesResolver, ResolvedPodConfiguration } from '../resolver/index.js';
import { createProbes } from '../resolver/index.js';
import type { DeploymentRequest } from '../types/deployment.js';
import type { DeployerProperties } from '../types/properties.js';

export interface ContainerConfiguration {
  appId: string;
  request: DeploymentRequest;
  resolved: ResolvedPodConfiguration;
  /** Set for apps only; tasks expose no port and get no probes */
  externalPort?: number;
}

export interface ContainerFactory {
  create(configuration: ContainerConfiguration): V1Container;
}

const DOCKER_SCHEME = 'docker:';

/**
 * Image reference from an artifact URI; `docker:` and `docker://` prefixes are dropped
 */
export function getImage(uri: string): string {
  if (!uri.startsWith(DOCKER_SCHEME)) {
    return uri;
  }
  const image = uri.slice(DOCKER_SCHEME.length);
  return image.startsWith('//') ? image.slice(2) : image;
}

/**
 * `server.port` from the app properties, else 8080
 */
export function getExternalPort(request: DeploymentRequest): number {
  const port = request.definition.properties[SERVER_PORT_KEY];
  return port === undefined ? DEFAULT_EXTERNAL_PORT : parseIntegerProperty(SERVER_PORT_KEY, port);
}

/**
 * App properties become `--key=value` options ahead of the command line arguments.
 * A property already given as an option on the command line is not repeated.
 */
export function createCommandArgs(request: DeploymentRequest): string[] {
  const given = new Set(
    request.commandlineArguments
      .filter((arg) => arg.startsWith('--'))
      .map((arg) => {
        const separator = arg.indexOf('=');
        return arg.slice(2, separator < 0 ? undefined : separator);
      })
  );

  const args: string[] = [];
  for (const [key, value] of Object.entries(request.definition.properties)) {
    if (value.length > 0 && !given.has(key)) {
      args.push(`--${key}=${value}`);
    }
  }
  return [...args, ...request.commandlineArguments];
}

/**
 * `app.datasource.url` style keys as shell variables: APP_DATASOURCE_URL
 */
export function toShellVariableName(key: string): string {
  return key.replace(/[.-]/g, '_').toUpperCase();
}

export class DefaultContainerFactory implements ContainerFactory {
  constructor(
    private readonly properties: DeployerProperties,
    private readonly resolver: DeploymentPropertiesResolver
  ) {}

  create(configuration: ContainerConfiguration): V1Container {
    const { appId, request, resolved, externalPort } = configuration;

    const environment = { ...resolved.environmentVariables };
    let args: string[] = [];
    if (resolved.entryPointStyle === 'exec') {
      args = createCommandArgs(request);
    } else {
      for (const [key, value] of Object.entries(request.definition.properties)) {
        environment[toShellVariableName(key)] = value;
      }
    }

    const env: V1EnvVar[] = [
      ...Object.entries(environment).map(([name, value]) => ({ name, value })),
      ...resolved.configMapKeyRefs,
      ...resolved.secretKeyRefs,
      ...resolved.environmentVariablesFromFieldRefs,
      { name: APPLICATION_GUID_ENV, valueFrom: { fieldRef: { fieldPath: 'metadata.uid' } } },
    ];

    const container: V1Container = {
      name: appId,
      image: getImage(request.resource.uri),
      env,
    };

    const envFrom = [...resolved.configMapRefs, ...resolved.secretRefs];
    if (envFrom.length > 0) {
      container.envFrom = envFrom;
    }
    if (args.length > 0) {
      container.args = args;
    }
    if (resolved.containerCommand.length > 0) {
      container.command = resolved.containerCommand;
    }

    const ports = this.createPorts(externalPort, resolved);
    if (ports.length > 0) {
      container.ports = ports;
    }
    if (resolved.volumeMounts.length > 0) {
      container.volumeMounts = resolved.volumeMounts;
    }

    if (externalPort !== undefined) {
      Object.assign(
        container,
        createProbes(this.properties.probes, {
          resolver: this.resolver,
          deploymentProperties: request.deploymentProperties,
          defaultPort: externalPort,
        })
      );
    }

    return container;
  }

  private createPorts(
    externalPort: number | undefined,
    resolved: ResolvedPodConfiguration
  ): V1ContainerPort[] {
    const numbers = new Set<number>();
    if (externalPort !== undefined) {
      numbers.add(externalPort);
    }
    for (const port of resolved.containerPorts) {
      numbers.add(port);
    }
    return [...numbers].map((containerPort) =>
      resolved.hostNetwork ? { containerPort, hostPort: containerPort } : { containerPort }
    );
  }
}
