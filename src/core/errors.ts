/**
 * Error hierarchy for the deployer.
 *
 * Every error carries a stable `code` and a context record so callers can
 * branch on the failure class without parsing messages.
 */

import type { ArkErrors } from 'arktype';

export class DeployerError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DeployerError';
  }
}

/**
 * A deployment property or deployer setting could not be parsed or bound.
 * The message always names the offending raw value.
 */
export class ConfigurationError extends DeployerError {
  constructor(
    message: string,
    public readonly propertyKey?: string,
    public readonly value?: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'CONFIGURATION_ERROR', { propertyKey, value }, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * The requested operation conflicts with the observed state of a deployment
 */
export class DeploymentStateError extends DeployerError {
  constructor(
    message: string,
    public readonly deploymentId: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'STATE_ERROR', { deploymentId }, options);
    this.name = 'DeploymentStateError';
  }
}

/**
 * A call to the platform API failed. The original client error is kept as `cause`.
 */
export class PlatformError extends DeployerError {
  constructor(
    message: string,
    public readonly statusCode: number | undefined,
    public readonly operation: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'PLATFORM_ERROR', { statusCode, operation }, options);
    this.name = 'PlatformError';
  }
}

/**
 * Turn arktype validation problems for a bound property into a ConfigurationError
 */
export function formatArktypeError(
  errors: ArkErrors,
  message: string,
  propertyKey: string,
  value: string
): ConfigurationError {
  const details = errors.map((problem) => {
    const path = problem.path.length > 0 ? problem.path.map(String).join('.') : 'root';
    return `${path}: ${problem.message}`;
  });

  return new ConfigurationError(message, propertyKey, value, {
    cause: new Error(details.join('; ')),
  });
}

export function isDeployerError(error: unknown): error is DeployerError {
  return error instanceof DeployerError;
}
