/**
 * Test suite for CSharpTypeResolver
 *
 * Covers the schema to type expression rules, nullability, enumeration
 * inference and in-place generator replacement.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { CSharpTypeResolver } from '../../../src/generator/csharp/type-resolver.js';
import { CSharpTypeGenerator } from '../../../src/generator/csharp/type-generator.js';
import { createCSharpGeneratorSettings } from '../../../src/generator/csharp/settings.js';
import { JsonSchemaDocument } from '../../../src/schema/json-schema.js';
import type { CSharpGeneratorSettings, JSONSchema } from '../../../src/types/index.js';

const node = (raw: JSONSchema) => new JsonSchemaDocument(raw).root;

describe('CSharpTypeResolver', () => {
  let resolver: CSharpTypeResolver;

  const createResolver = (settings: Partial<CSharpGeneratorSettings> = {}) =>
    new CSharpTypeResolver(createCSharpGeneratorSettings({ arrayType: 'List', dictionaryType: 'Dictionary', ...settings }));

  const resolve = (raw: JSONSchema, isNullable = false, hint?: string) => resolver.resolve(node(raw), isNullable, hint);

  beforeEach(() => {
    resolver = createResolver();
  });

  describe('Any Type', () => {
    it('should map unconstrained schemas to object', () => {
      expect(resolve({})).toBe('object');
      expect(resolve({ type: 'object' })).toBe('object');
    });

    it('should not mark object as nullable', () => {
      expect(resolve({}, true)).toBe('object');
    });
  });

  describe('Numbers', () => {
    it('should map number to double', () => {
      expect(resolve({ type: 'number' })).toBe('double');
      expect(resolve({ type: 'number' }, true)).toBe('double?');
    });

    it('should map decimal format to decimal', () => {
      expect(resolve({ type: 'number', format: 'decimal' })).toBe('decimal');
      expect(resolve({ type: 'number', format: 'decimal' }, true)).toBe('decimal?');
    });

    it('should map integer formats', () => {
      expect(resolve({ type: 'integer' })).toBe('int');
      expect(resolve({ type: 'integer' }, true)).toBe('int?');
      expect(resolve({ type: 'integer', format: 'int64' }, true)).toBe('long?');
      expect(resolve({ type: 'integer', format: 'long' })).toBe('long');
      expect(resolve({ type: 'integer', format: 'byte' }, true)).toBe('byte?');
    });

    it('should prefer number when both numeric flags are set', () => {
      expect(resolve({ type: ['integer', 'number'] })).toBe('double');
    });
  });

  describe('Booleans', () => {
    it('should map boolean to bool', () => {
      expect(resolve({ type: 'boolean' })).toBe('bool');
      expect(resolve({ type: 'boolean' }, true)).toBe('bool?');
    });
  });

  describe('Strings', () => {
    it('should never mark plain strings as nullable', () => {
      expect(resolve({ type: 'string' })).toBe('string');
      expect(resolve({ type: 'string' }, true)).toBe('string');
    });

    it('should map date formats to the configured types', () => {
      expect(resolve({ type: 'string', format: 'date' })).toBe('System.DateTimeOffset');
      expect(resolve({ type: 'string', format: 'date-time' }, true)).toBe('System.DateTimeOffset?');
      expect(resolve({ type: 'string', format: 'time' }, true)).toBe('System.TimeSpan?');
      expect(resolve({ type: 'string', format: 'duration' })).toBe('System.TimeSpan');
      expect(resolve({ type: 'string', format: 'time-span' }, true)).toBe('System.TimeSpan?');
    });

    it('should not mark a configured string type as nullable', () => {
      resolver = createResolver({ dateType: 'string', dateTimeType: 'System.DateTime' });

      expect(resolve({ type: 'string', format: 'date' }, true)).toBe('string');
      expect(resolve({ type: 'string', format: 'date-time' }, true)).toBe('System.DateTime?');
    });

    it('should map guid and uuid formats to System.Guid', () => {
      expect(resolve({ type: 'string', format: 'uuid' })).toBe('System.Guid');
      expect(resolve({ type: 'string', format: 'guid' }, true)).toBe('System.Guid?');
    });

    it('should map binary formats to byte arrays', () => {
      expect(resolve({ type: 'string', format: 'byte' }, true)).toBe('byte[]');
      expect(resolve({ type: 'string', format: 'base64' })).toBe('byte[]');
    });

    it('should map file to byte arrays', () => {
      expect(resolve({ type: 'file' }, true)).toBe('byte[]');
    });
  });

  describe('Nullability', () => {
    it('should return the same expression for repeated nullable resolution', () => {
      const schema = node({ type: 'integer' });

      expect(resolver.resolve(schema, true)).toBe(resolver.resolve(schema, true));
    });

    it('should never include the marker when not nullable', () => {
      const schemas: JSONSchema[] = [
        { type: 'number' },
        { type: 'integer', format: 'int64' },
        { type: 'boolean' },
        { type: 'string', format: 'uuid' },
        { type: 'string', format: 'date' },
      ];

      for (const schema of schemas) {
        expect(resolve(schema)).not.toMatch(/\?$/);
      }
    });
  });

  describe('Arrays', () => {
    it('should map a single item schema to the sequence type', () => {
      expect(resolve({ type: 'array', items: { type: 'string' } })).toBe('List<string>');
    });

    it('should never mark array elements as nullable', () => {
      expect(resolve({ type: 'array', items: { type: ['integer', 'null'] } }, true)).toBe('List<int>');
    });

    it('should map item lists to tuples', () => {
      expect(resolve({ type: 'array', items: [{ type: 'integer' }, { type: 'string' }] })).toBe('System.Tuple<int, string>');
    });

    it('should map arrays without items to a sequence of object', () => {
      expect(resolve({ type: 'array' })).toBe('List<object>');
    });

    it('should nest sequences', () => {
      expect(resolve({ type: 'array', items: { type: 'array', items: { type: 'number' } } })).toBe('List<List<double>>');
    });
  });

  describe('Dictionaries', () => {
    it('should map additional properties to the map type', () => {
      expect(resolve({ type: 'object', additionalProperties: { type: 'boolean' } })).toBe('Dictionary<string, bool>');
    });

    it('should apply the nullable value policy', () => {
      resolver = createResolver({ nullableDictionaryValues: true });

      expect(resolve({ type: 'object', additionalProperties: { type: 'boolean' } })).toBe('Dictionary<string, bool?>');
    });

    it('should use a single pattern property type when additional properties are closed', () => {
      expect(resolve({
        type: 'object',
        additionalProperties: false,
        patternProperties: { '^x-': { type: 'string' }, '^y-': { type: 'string' } },
      })).toBe('Dictionary<string, string>');
    });

    it('should fall back to object values for mixed pattern properties', () => {
      expect(resolve({
        type: 'object',
        additionalProperties: false,
        patternProperties: { '^x-': { type: 'string' }, '^y-': { type: 'integer' } },
      })).toBe('Dictionary<string, object>');
    });
  });

  describe('Recursive Inline Types', () => {
    const definition = (raw: JSONSchema, key: string) => {
      const entry = new JsonSchemaDocument(raw).definitions.find(([name]) => name === key);
      if (!entry) {
        throw new Error(`Missing definition ${key}`);
      }
      return entry[1];
    };

    it('should stop an array that contains itself at object', () => {
      const tree = definition({
        definitions: { Tree: { type: 'array', items: { $ref: '#/definitions/Tree' } } },
      }, 'Tree');

      expect(resolver.resolve(tree, false)).toBe('List<object>');
    });

    it('should stop a dictionary that contains itself at object', () => {
      const map = definition({
        definitions: { Map: { type: 'object', additionalProperties: { $ref: '#/definitions/Map' } } },
      }, 'Map');

      expect(resolver.resolve(map, false)).toBe('Dictionary<string, object>');
    });

    it('should stop cycles running through arrays and dictionaries', () => {
      const outer = definition({
        definitions: {
          Outer: { type: 'array', items: { $ref: '#/definitions/Inner' } },
          Inner: { type: 'object', additionalProperties: { $ref: '#/definitions/Outer' } },
        },
      }, 'Outer');

      expect(resolver.resolve(outer, false)).toBe('List<Dictionary<string, object>>');
    });

    it('should expand the same array again once it is resolved', () => {
      const pair = definition({
        definitions: {
          Tags: { type: 'array', items: { type: 'string' } },
          Pair: { type: 'array', items: [{ $ref: '#/definitions/Tags' }, { $ref: '#/definitions/Tags' }] },
        },
      }, 'Pair');

      expect(resolver.resolve(pair, false)).toBe('System.Tuple<List<string>, List<string>>');
    });
  });

  describe('Named Types', () => {
    it('should generate a named type for objects with properties', () => {
      const schema = node({ type: 'object', properties: { name: { type: 'string' } } });

      expect(resolver.resolve(schema, false, 'person')).toBe('Person');
      expect(resolver.resolve(schema, true, 'Other')).toBe('Person');
      expect(resolver.typeGenerators().map(([name]) => name)).toEqual(['Person']);
    });

    it('should converge differently hinted references on one name', () => {
      const document = new JsonSchemaDocument({
        properties: { a: { $ref: '#/definitions/Pet' }, b: { $ref: '#/definitions/Pet' } },
        definitions: { Pet: { type: 'object', properties: { name: { type: 'string' } } } },
      });
      const [a, b] = document.root.properties;

      expect(a && resolver.resolve(a[1], false, 'First')).toBe('First');
      expect(b && resolver.resolve(b[1], false, 'Second')).toBe('First');
      expect(resolver.typeGenerators()).toHaveLength(1);
    });

    it('should fall back to a named type for unrecognized shapes', () => {
      expect(resolve({ type: 'null' }, false, 'Nothing')).toBe('Nothing');
    });
  });

  describe('Enumerations', () => {
    const isStringEnum = (typeName: string) =>
      resolver.getTypeGenerator(typeName)?.createEnumModel(typeName).isStringEnum;

    it('should infer integer enumerations from integer literals', () => {
      expect(resolve({ enum: [1, 2, 3] }, false, 'Level')).toBe('Level');
      expect(isStringEnum('Level')).toBe(false);
    });

    it('should infer string enumerations from string literals', () => {
      expect(resolve({ enum: ['a', 'b'] }, false, 'Letter')).toBe('Letter');
      expect(isStringEnum('Letter')).toBe(true);
    });

    it('should infer string enumerations from mixed literals', () => {
      expect(resolve({ enum: [1, 'a'] }, false, 'Mixed')).toBe('Mixed');
      expect(isStringEnum('Mixed')).toBe(true);
    });

    it('should mark nullable string enumerations', () => {
      expect(resolve({ type: 'string', enum: ['on', 'off'] }, true, 'Switch')).toBe('Switch?');
      expect(resolve({ enum: ['up', 'down'] }, true, 'Direction')).toBe('Direction?');
    });

    it('should not mark integer enumerations', () => {
      expect(resolve({ type: 'integer', enum: [1, 2] }, true, 'Priority')).toBe('Priority');
    });
  });

  describe('Generator Replacement', () => {
    it('should upgrade a provisional generator for an integer enumeration in place', () => {
      const settings = resolver.settings;
      const enumeration = node({ type: 'integer', enum: [1, 2] });
      const typeName = resolver.getOrGenerateTypeName(enumeration, 'Priority');
      const provisional = new CSharpTypeGenerator(node({ type: 'object' }), settings, resolver);
      resolver.addOrReplaceTypeGenerator(typeName, provisional);
      resolver.resolve(node({ type: 'object', properties: { id: { type: 'string' } } }), false, 'Task');

      expect(resolver.resolve(enumeration, false)).toBe('Priority');

      const upgraded = resolver.getTypeGenerator('Priority');
      expect(upgraded).not.toBe(provisional);
      expect(upgraded?.schema).toBe(enumeration);
      expect(resolver.typeGenerators().map(([name]) => name)).toEqual(['Priority', 'Task']);
      expect(resolver.generateTypes()[0]?.code).toBe([
        'public enum Priority',
        '{',
        '    _1 = 1,',
        '    _2 = 2,',
        '}',
      ].join('\n'));
    });

    it('should rebind integer enumerations on every resolution', () => {
      const enumeration = node({ type: 'integer', enum: [1, 2] });
      resolver.resolve(enumeration, false, 'Priority');
      const first = resolver.getTypeGenerator('Priority');

      resolver.resolve(enumeration, false, 'Priority');

      expect(resolver.getTypeGenerator('Priority')).not.toBe(first);
      expect(resolver.typeGenerators()).toHaveLength(1);
    });

    it('should keep the generator of string enumerations', () => {
      const enumeration = node({ type: 'string', enum: ['a'] });
      resolver.resolve(enumeration, false, 'Letter');
      const first = resolver.getTypeGenerator('Letter');

      resolver.resolve(enumeration, false, 'Letter');

      expect(resolver.getTypeGenerator('Letter')).toBe(first);
    });

    it('should keep the generator of untyped integer enumerations', () => {
      const enumeration = node({ enum: [1, 2] });
      resolver.resolve(enumeration, false, 'Level');
      const first = resolver.getTypeGenerator('Level');

      resolver.resolve(enumeration, false, 'Level');

      expect(resolver.getTypeGenerator('Level')).toBe(first);
    });
  });
});
