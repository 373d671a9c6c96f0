import { describe, expect, it } from 'vitest';
import { tolerationSchema, volumeMountSchema } from '../../../src/core/config/schemas.js';
import { ConfigurationError } from '../../../src/core/errors.js';
import {
  bindProperty,
  bindValue,
  normalizeKeys,
  parseYamlFragment,
  toCamelCase,
} from '../../../src/core/properties/yaml-binder.js';

describe('YAML binder', () => {
  describe('toCamelCase', () => {
    it('should camelize kebab and snake keys', () => {
      expect(toCamelCase('mount-path')).toBe('mountPath');
      expect(toCamelCase('read_only')).toBe('readOnly');
      expect(toCamelCase('name')).toBe('name');
    });
  });

  describe('normalizeKeys', () => {
    it('should leave free-form maps alone', () => {
      expect(
        normalizeKeys({ 'match-labels': { 'app-name': 'x' }, 'topology-key': 'zone' })
      ).toEqual({ matchLabels: { 'app-name': 'x' }, topologyKey: 'zone' });
    });

    it('should recurse into lists', () => {
      expect(normalizeKeys([{ 'mount-path': '/a' }])).toEqual([{ mountPath: '/a' }]);
    });
  });

  describe('parseYamlFragment', () => {
    it('should parse a flow list under the field name', () => {
      expect(parseYamlFragment("[{name: 'data', mount-path: '/data'}]", 'volumeMounts')).toEqual([
        { name: 'data', mountPath: '/data' },
      ]);
    });
  });

  describe('bindValue', () => {
    it('should coerce quoted scalars through the schema', () => {
      expect(
        bindValue("[{name: 'data', mountPath: '/data', readOnly: 'true'}]", 'volumeMounts', volumeMountSchema.array())
      ).toEqual([{ name: 'data', mountPath: '/data', readOnly: true }]);
    });

    it('should bind blank values and YAML nulls to undefined', () => {
      expect(bindValue('', 'volumeMounts', volumeMountSchema.array())).toBeUndefined();
      expect(bindValue('null', 'volumeMounts', volumeMountSchema.array())).toBeUndefined();
    });

    it('should name the raw value when the YAML is malformed', () => {
      expect(() => bindValue('[{name: ', 'volumeMounts', volumeMountSchema.array())).toThrow(
        "Invalid binding property '[{name: '"
      );
    });

    it('should raise a ConfigurationError when the schema rejects the value', () => {
      const bind = () => bindValue('[{mountPath: /data}]', 'volumeMounts', volumeMountSchema.array());
      expect(bind).toThrow(ConfigurationError);
      expect(bind).toThrow("Invalid binding property '[{mountPath: /data}]'");
    });

    it('should use a custom description', () => {
      expect(() =>
        bindValue('{', 'volumeMounts', volumeMountSchema.array(), (raw) => `Invalid volume mount '${raw}'`)
      ).toThrow("Invalid volume mount '{'");
    });
  });

  describe('bindProperty', () => {
    it('should look the key up under relaxed spellings', () => {
      expect(
        bindProperty(
          { 'deployer.kubernetes.tolerations': "[{key: 'test', value: 'true', operator: 'Equal', effect: 'NoSchedule'}]" },
          'deployer.kubernetes.tolerations',
          'tolerations',
          tolerationSchema.array()
        )
      ).toEqual([{ key: 'test', value: 'true', operator: 'Equal', effect: 'NoSchedule' }]);
    });

    it('should record the property key on failure', () => {
      try {
        bindProperty(
          { 'deployer.kubernetes.tolerations': '[{tolerationSeconds: soon}]' },
          'deployer.kubernetes.tolerations',
          'tolerations',
          tolerationSchema.array()
        );
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        if (error instanceof ConfigurationError) {
          expect(error.propertyKey).toBe('deployer.kubernetes.tolerations');
          expect(error.value).toBe('[{tolerationSeconds: soon}]');
        }
      }
    });
  });
});
