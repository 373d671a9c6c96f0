/**
 * YAML fragment binding
 *
 * Structured deployment properties carry inline YAML (flow style) such as
 * `[{key: 'test', value: 'true'}]`. A value is wrapped in a one-field document
 * `{ <field>: <value> }`, parsed, its keys normalized to camelCase and the
 * result validated against an arktype schema.
 */

import { type ArkErrors, type } from 'arktype';
import * as yaml from 'js-yaml';
import { ConfigurationError, formatArktypeError } from '../errors.js';
import { type DeploymentProperties, getDeploymentPropertyValue, hasText } from './property-lookup.js';

export type Validator<T> = (data: unknown) => T | ArkErrors;

/**
 * Keys whose children are user data (label keys, resource names) and must
 * not be camelized
 */
const FREEFORM_KEYS = new Set([
  'annotations',
  'labels',
  'limits',
  'matchLabels',
  'nodeSelector',
  'requests',
  'volumeAttributes',
]);

export function toCamelCase(key: string): string {
  return key.replace(/[-_]+([a-zA-Z0-9])/g, (_match, c: string) => c.toUpperCase());
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively camelize object keys, leaving free-form maps untouched
 */
export function normalizeKeys(value: unknown, freeform = false): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => normalizeKeys(item));
  }
  if (!isPlainObject(value)) {
    return value;
  }

  const normalized: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    const name = freeform ? key : toCamelCase(key);
    normalized[name] = freeform ? child : normalizeKeys(child, FREEFORM_KEYS.has(name));
  }
  return normalized;
}

/**
 * Parse `{ <fieldName>: <value> }` and return the normalized field value.
 * Throws the underlying YAML exception on malformed input.
 */
export function parseYamlFragment(value: string, fieldName: string): unknown {
  const document = yaml.load(`{ ${fieldName}: ${value} }`, { schema: yaml.CORE_SCHEMA });
  if (!isPlainObject(document)) {
    throw new Error(`Expected a mapping for '${fieldName}'`);
  }
  const normalized = normalizeKeys(document);
  return isPlainObject(normalized) ? normalized[toCamelCase(fieldName)] : undefined;
}

/**
 * Bind a raw property value through a schema. Blank values and YAML nulls bind
 * to `undefined`.
 */
export function bindValue<T>(
  value: string | undefined,
  fieldName: string,
  validate: Validator<T>,
  describe: (value: string) => string = (raw) => `Invalid binding property '${raw}'`,
  propertyKey: string = fieldName
): T | undefined {
  if (!hasText(value)) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = parseYamlFragment(value, fieldName);
  } catch (error) {
    throw new ConfigurationError(describe(value), propertyKey, value, { cause: error });
  }

  if (parsed === null || parsed === undefined) {
    return undefined;
  }

  const result = validate(parsed);
  if (result instanceof type.errors) {
    throw formatArktypeError(result, describe(value), propertyKey, value);
  }
  return result;
}

/**
 * Look up `propertyKey` (relaxed) in the request and bind it as `fieldName`
 */
export function bindProperty<T>(
  properties: DeploymentProperties,
  propertyKey: string,
  fieldName: string,
  validate: Validator<T>,
  describe?: (value: string) => string
): T | undefined {
  return bindValue(
    getDeploymentPropertyValue(properties, propertyKey),
    fieldName,
    validate,
    describe,
    propertyKey
  );
}
