import { ConfigurationError } from '../errors.js';

const MEBIBYTES_PATTERN = /^(\d+)([mMgG]?)$/;

/**
 * Parse `512`, `512m` or `2g` into mebibytes; a bare number is already MiB
 */
export function parseToMebibytes(text: string): number {
  const match = MEBIBYTES_PATTERN.exec(text.trim());
  if (!match) {
    throw new ConfigurationError(
      `Could not parse '${text}' as a byte size. Expected a number with optional 'm' or 'g' suffix`,
      undefined,
      text
    );
  }

  const size = Number.parseInt(match[1] ?? '', 10);
  return match[2]?.toLowerCase() === 'g' ? size * 1024 : size;
}
