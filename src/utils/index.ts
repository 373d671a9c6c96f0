export {
  isSensitiveKey,
  REDACTED,
  sanitizeArgument,
  sanitizeArguments,
  sanitizeJsonString,
  sanitizeProperties,
  sanitizeValue,
} from './argument-sanitizer.js';
