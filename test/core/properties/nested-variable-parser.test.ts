import { describe, expect, it } from 'vitest';
import { parseNestedCommaDelimitedVariables } from '../../../src/core/properties/nested-variable-parser.js';

describe('parseNestedCommaDelimitedVariables', () => {
  it('should keep commas inside quoted values', () => {
    expect(
      parseNestedCommaDelimitedVariables("JAVA_TOOL_OPTIONS='thing1,thing2',foo='bar,baz',car=caz")
    ).toEqual(['JAVA_TOOL_OPTIONS=thing1,thing2', 'foo=bar,baz', 'car=caz']);
  });

  it('should split plain entries on commas', () => {
    expect(parseNestedCommaDelimitedVariables('A=1,B=2')).toEqual(['A=1', 'B=2']);
  });

  it('should list quoted entries before plain ones', () => {
    expect(parseNestedCommaDelimitedVariables("A=1,OPTS='-Xmx1g -Dx=a,b'")).toEqual([
      'OPTS=-Xmx1g -Dx=a,b',
      'A=1',
    ]);
  });

  it('should return nothing for a blank value', () => {
    expect(parseNestedCommaDelimitedVariables('   ')).toEqual([]);
  });
});
