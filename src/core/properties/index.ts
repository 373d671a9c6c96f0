export { parseToMebibytes } from './byte-size.js';
export { tokenizeCommandLine } from './command-line-tokenizer.js';
export { parseNestedCommaDelimitedVariables } from './nested-variable-parser.js';
export {
  type DeploymentProperties,
  getDeploymentPropertyValue,
  getFirstNonBlankPropertyValue,
  getStringPairsToMap,
  hasText,
  parseIntegerProperty,
  relaxedNames,
} from './property-lookup.js';
export {
  bindProperty,
  bindValue,
  normalizeKeys,
  parseYamlFragment,
  toCamelCase,
  type Validator,
} from './yaml-binder.js';
