/**
 * Matches `KEY='quoted value'` with an optional trailing comma
 */
const QUOTED_VARIABLE_PATTERN = /(\w+='.+?'),?/g;

/**
 * Parse `KEY1='a,b',KEY2=c` into `['KEY1=a,b', 'KEY2=c']`.
 *
 * Quoted entries are extracted first (in the order found) with their quotes
 * removed; whatever is left is split on commas. An unquoted value must not
 * itself contain a comma.
 */
export function parseNestedCommaDelimitedVariables(value: string): string[] {
  const vars: string[] = [];

  for (const match of value.matchAll(QUOTED_VARIABLE_PATTERN)) {
    const unquoted = (match[1] ?? '').replaceAll("'", '');
    if (unquoted.trim().length > 0) {
      vars.push(unquoted);
    }
  }

  const remainder = value.replace(QUOTED_VARIABLE_PATTERN, '');
  if (remainder.trim().length > 0) {
    vars.push(...remainder.split(',').filter((part) => part.length > 0));
  }

  return vars;
}
