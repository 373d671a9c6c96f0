import { ConfigurationError } from '../errors.js';

/**
 * Flat deployment property namespace of a request
 */
export type DeploymentProperties = Readonly<Record<string, string>>;

export function hasText(value: string | undefined | null): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function toKebabCase(segment: string): string {
  return segment.replace(/([a-z0-9])([A-Z])/g, '$1-$2').toLowerCase();
}

/**
 * Ordered candidate spellings accepted for one logical property key.
 *
 * The key itself comes first, then its last segment in kebab-case and
 * snake_case, the lowercased key and finally the environment-variable form.
 */
export function relaxedNames(key: string): string[] {
  const lastDot = key.lastIndexOf('.');
  const head = key.slice(0, lastDot + 1);
  const kebab = toKebabCase(key.slice(lastDot + 1));

  const candidates = [
    key,
    head + kebab,
    head + kebab.replaceAll('-', '_'),
    key.toLowerCase(),
    key.toUpperCase().replace(/[.-]/g, '_'),
  ];

  return [...new Set(candidates)];
}

/**
 * Look a property up under its relaxed names; the first candidate present wins,
 * even when its value is blank.
 */
export function getDeploymentPropertyValue(
  properties: DeploymentProperties,
  key: string
): string | undefined;
export function getDeploymentPropertyValue(
  properties: DeploymentProperties,
  key: string,
  defaultValue: string
): string;
export function getDeploymentPropertyValue(
  properties: DeploymentProperties,
  key: string,
  defaultValue?: string
): string | undefined {
  for (const name of relaxedNames(key)) {
    if (Object.hasOwn(properties, name)) {
      return properties[name];
    }
  }
  return defaultValue;
}

/**
 * Like getDeploymentPropertyValue but skips candidates whose value is blank
 */
export function getFirstNonBlankPropertyValue(
  properties: DeploymentProperties,
  keys: readonly string[]
): string | undefined {
  for (const key of keys) {
    for (const name of relaxedNames(key)) {
      const value = properties[name];
      if (hasText(value)) {
        return value;
      }
    }
  }
  return undefined;
}

/**
 * Parse `key1:value1,key2:value2` into a map. Each pair is split on its first
 * colon; later duplicates overwrite earlier ones.
 */
export function getStringPairsToMap(
  value: string | undefined,
  errorPrefix = 'Invalid annotation value'
): Record<string, string> {
  const map: Record<string, string> = {};
  if (!hasText(value)) {
    return map;
  }

  for (const pair of value.split(',')) {
    const separator = pair.indexOf(':');
    if (separator < 0) {
      throw new ConfigurationError(`${errorPrefix}: '${pair}'`, undefined, value);
    }
    map[pair.slice(0, separator).trim()] = pair.slice(separator + 1).trim();
  }

  return map;
}

/**
 * Parse an integer-valued property; non-numeric input is a configuration error
 */
export function parseIntegerProperty(key: string, value: string): number {
  const trimmed = value.trim();
  if (!/^[-+]?\d+$/.test(trimmed)) {
    throw new ConfigurationError(
      `Invalid integer value '${value}' for property '${key}'`,
      key,
      value
    );
  }
  return Number.parseInt(trimmed, 10);
}
