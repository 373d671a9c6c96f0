/**
 * Kubernetes API error helpers
 *
 * The 1.x client throws `ApiException` with a numeric `code` and a body that
 * may be an already parsed Status object or its JSON text. Older shapes
 * (`statusCode`, `response.statusCode`, `body.code`) are still recognized.
 */

import { PlatformError } from '../errors.js';
import { getComponentLogger } from '../logging/index.js';

const logger = getComponentLogger('kubernetes-errors');

interface StatusBody {
  code?: number;
  message?: string;
  reason?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function numberField(record: Record<string, unknown>, field: string): number | undefined {
  const value = record[field];
  return typeof value === 'number' ? value : undefined;
}

function stringField(record: Record<string, unknown>, field: string): string | undefined {
  const value = record[field];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Read the Kubernetes Status object carried by an error body, parsing JSON text if needed
 */
export function getStatusBody(error: unknown): StatusBody | undefined {
  if (!isRecord(error)) {
    return undefined;
  }

  let body: unknown = error.body;
  if (typeof body === 'string') {
    const text = body;
    try {
      body = JSON.parse(text);
    } catch {
      return { message: text };
    }
  }

  if (!isRecord(body)) {
    return undefined;
  }

  return {
    code: numberField(body, 'code'),
    message: stringField(body, 'message'),
    reason: stringField(body, 'reason'),
  };
}

/**
 * Extract the HTTP status code from a Kubernetes API error
 *
 * @example
 * ```typescript
 * try {
 *   await coreApi.readNamespacedPod({ name, namespace });
 * } catch (error) {
 *   if (getErrorStatusCode(error) === 404) {
 *     return undefined;
 *   }
 *   throw error;
 * }
 * ```
 */
export function getErrorStatusCode(error: unknown): number | undefined {
  if (!isRecord(error)) {
    return undefined;
  }

  const direct = numberField(error, 'code') ?? numberField(error, 'statusCode');
  if (direct !== undefined) {
    return direct;
  }

  const response = error.response;
  if (isRecord(response)) {
    const responseCode = numberField(response, 'statusCode');
    if (responseCode !== undefined) {
      return responseCode;
    }
  }

  const bodyCode = getStatusBody(error)?.code;
  if (bodyCode !== undefined) {
    return bodyCode;
  }

  logger.debug('Could not extract status code from error', {
    errorKeys: Object.keys(error),
  });
  return undefined;
}

export function isNotFoundError(error: unknown): boolean {
  return getErrorStatusCode(error) === 404;
}

export function isConflictError(error: unknown): boolean {
  return getErrorStatusCode(error) === 409;
}

/**
 * Format a Kubernetes API error as `Kubernetes API error (404): NotFound: pods "x" not found`
 */
export function formatKubernetesError(error: unknown): string {
  if (!isRecord(error)) {
    return String(error);
  }

  const statusCode = getErrorStatusCode(error);
  const body = getStatusBody(error);
  const parts = [
    statusCode !== undefined ? `Kubernetes API error (${statusCode})` : 'Kubernetes API error',
  ];

  if (body?.reason) {
    parts.push(body.reason);
  }

  const message = body?.message ?? stringField(error, 'message');
  if (message) {
    parts.push(message);
  }

  return parts.join(': ');
}

/**
 * Wrap a client error for the given operation
 */
export function toPlatformError(error: unknown, operation: string): PlatformError {
  if (error instanceof PlatformError) {
    return error;
  }
  return new PlatformError(
    `${operation} failed: ${formatKubernetesError(error)}`,
    getErrorStatusCode(error),
    operation,
    { cause: error }
  );
}
