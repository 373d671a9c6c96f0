/**
 * Liveness, readiness and startup probes
 *
 * One algorithm serves all three kinds; a kind only differs in its key prefix
 * and its defaults. Keys follow `<prefix>.<kind><Http|Tcp|Command>Probe<Field>`,
 * e.g. `deployer.kubernetes.readinessHttpProbePath`.
 */

import type { V1Probe } from '@kubernetes/client-node';
import { ConfigurationError } from '../errors.js';
import {
  type DeploymentProperties,
  getDeploymentPropertyValue,
  hasText,
  parseIntegerProperty,
  tokenizeCommandLine,
} from '../properties/index.js';
import type { ProbeKind, ProbeSettings, ProbeType } from '../types/properties.js';
import type { DeploymentPropertiesResolver } from './deployment-properties-resolver.js';

const TYPE_SEGMENT: Record<ProbeType, string> = {
  HTTP: 'Http',
  TCP: 'Tcp',
  COMMAND: 'Command',
};

export interface ProbeCapability {
  kind: ProbeKind;
  /** Defaults for delay, period, timeout, thresholds, path, port and command */
  defaults: ProbeSettings;
}

export interface ProbeContext {
  resolver: DeploymentPropertiesResolver;
  deploymentProperties: DeploymentProperties;
  /** HTTP probes fall back to this port when none is configured */
  defaultPort?: number;
}

/**
 * Probe type for one kind: `<prefix>.<kind>ProbeType`, else `<prefix>.probeType`, else the default
 */
export function resolveProbeType(kind: ProbeKind, context: ProbeContext): ProbeType {
  const { resolver, deploymentProperties } = context;
  const perKindKey = resolver.key(`${kind}ProbeType`);
  if (hasText(getDeploymentPropertyValue(deploymentProperties, perKindKey))) {
    return resolver.getProbeType(deploymentProperties, perKindKey);
  }
  return resolver.getProbeType(deploymentProperties);
}

export function createProbe(capability: ProbeCapability, context: ProbeContext): V1Probe {
  const { kind, defaults } = capability;
  const { resolver, deploymentProperties } = context;
  const type = resolveProbeType(kind, context);
  const fieldKey = (field: string) => resolver.key(`${kind}${TYPE_SEGMENT[type]}Probe${field}`);

  const value = (field: string): string | undefined => {
    const raw = getDeploymentPropertyValue(deploymentProperties, fieldKey(field));
    return hasText(raw) ? raw : undefined;
  };
  const integer = (field: string, fallback: number): number => {
    const raw = value(field);
    return raw === undefined ? fallback : parseIntegerProperty(fieldKey(field), raw);
  };
  const port = (): number | undefined => {
    const raw = value('Port');
    return raw === undefined ? defaults.port : parseIntegerProperty(fieldKey('Port'), raw);
  };

  const probe: V1Probe = {
    initialDelaySeconds: integer('Delay', defaults.delay),
    periodSeconds: integer('Period', defaults.period),
    timeoutSeconds: integer('Timeout', defaults.timeout),
    failureThreshold: integer('Failure', defaults.failure),
    successThreshold: integer('Success', defaults.success),
  };

  switch (type) {
    case 'HTTP': {
      const httpPort = port() ?? context.defaultPort;
      if (httpPort === undefined) {
        throw new ConfigurationError(`The ${kind}HttpProbePort property must be set.`, fieldKey('Port'));
      }
      probe.httpGet = { path: value('Path') ?? defaults.path ?? '/', port: httpPort };
      break;
    }
    case 'TCP': {
      const tcpPort = port();
      if (tcpPort === undefined) {
        throw new ConfigurationError(`The ${kind}TcpProbePort property must be set.`, fieldKey('Port'));
      }
      probe.tcpSocket = { port: tcpPort };
      break;
    }
    case 'COMMAND': {
      const command = value('Command') ?? defaults.command;
      if (!hasText(command)) {
        throw new ConfigurationError(
          `The ${kind}CommandProbeCommand property must be set.`,
          fieldKey('Command')
        );
      }
      probe.exec = { command: tokenizeCommandLine(command) };
      break;
    }
  }

  return probe;
}

/**
 * A startup probe is only added once something for it has been configured:
 * a port for HTTP/TCP or a command for COMMAND probes
 */
export function isStartupProbeConfigured(capability: ProbeCapability, context: ProbeContext): boolean {
  const type = resolveProbeType('startup', context);
  const { resolver, deploymentProperties } = context;
  const field = type === 'COMMAND' ? 'Command' : 'Port';
  const requested = getDeploymentPropertyValue(
    deploymentProperties,
    resolver.key(`startup${TYPE_SEGMENT[type]}Probe${field}`)
  );
  if (hasText(requested)) {
    return true;
  }
  return type === 'COMMAND'
    ? hasText(capability.defaults.command)
    : capability.defaults.port !== undefined;
}

export interface ContainerProbes {
  livenessProbe: V1Probe;
  readinessProbe: V1Probe;
  startupProbe?: V1Probe;
}

export function createProbes(
  defaults: Record<ProbeKind, ProbeSettings>,
  context: ProbeContext
): ContainerProbes {
  const startup: ProbeCapability = { kind: 'startup', defaults: defaults.startup };
  const probes: ContainerProbes = {
    livenessProbe: createProbe({ kind: 'liveness', defaults: defaults.liveness }, context),
    readinessProbe: createProbe({ kind: 'readiness', defaults: defaults.readiness }, context),
  };
  if (isStartupProbeConfigured(startup, context)) {
    probes.startupProbe = createProbe(startup, context);
  }
  return probes;
}
