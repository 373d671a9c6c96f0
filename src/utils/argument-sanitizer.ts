/**
 * Masks secrets in deployment properties and command line arguments before
 * they reach a log line.
 */

export const REDACTED = '******';

const SENSITIVE_KEYS: readonly RegExp[] = [
  /password$/i,
  /secret$/i,
  /key$/i,
  /token$/i,
  /credentials/i,
  /vcap_services$/i,
];

export function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.some((pattern) => pattern.test(key));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sanitizeJsonValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sanitizeJsonValue);
  }
  if (!isRecord(value)) {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value).map(([key, nested]) => [
      key,
      isSensitiveKey(key) && nested !== null && nested !== '' ? REDACTED : sanitizeJsonValue(nested),
    ])
  );
}

/**
 * A JSON object or array value has its sensitive fields masked; anything else is returned as is
 */
export function sanitizeJsonString(value: string): string {
  const trimmed = value.trim();
  if (!trimmed.startsWith('{') && !trimmed.startsWith('[')) {
    return value;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return value;
  }
  return JSON.stringify(sanitizeJsonValue(parsed));
}

export function sanitizeValue(key: string, value: string): string {
  if (value.length === 0) {
    return value;
  }
  return isSensitiveKey(key) ? REDACTED : sanitizeJsonString(value);
}

/**
 * `--app.datasource.password=x` → `--app.datasource.password=******`
 */
export function sanitizeArgument(argument: string): string {
  const separator = argument.indexOf('=');
  if (separator < 0) {
    return argument;
  }
  const key = argument.slice(0, separator);
  return `${key}=${sanitizeValue(key, argument.slice(separator + 1))}`;
}

export function sanitizeArguments(args: readonly string[]): string[] {
  return args.map(sanitizeArgument);
}

export function sanitizeProperties(properties: Readonly<Record<string, string>>): Record<string, string> {
  return Object.fromEntries(
    Object.entries(properties).map(([key, value]) => [key, sanitizeValue(key, value)])
  );
}
