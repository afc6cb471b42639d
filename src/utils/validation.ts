/**
 * Validation functions for configuration and schema data
 */

import type { CSharpGeneratorSettings, JSONSchema } from '../types/index.js';
import { ValidationError } from '../types/errors.js';
import { isSchemaObject } from '../schema/json-schema.js';

type StringSettingKey = 'namespace' | 'arrayType' | 'dictionaryType' | 'dateType' | 'dateTimeType'
  | 'timeType' | 'timeSpanType' | 'rootTypeName';
type BooleanSettingKey = 'nullableDictionaryValues' | 'generateAllDefinitions' | 'generateDocumentation';

const STRING_SETTINGS: readonly StringSettingKey[] = [
  'namespace',
  'arrayType',
  'dictionaryType',
  'dateType',
  'dateTimeType',
  'timeType',
  'timeSpanType',
  'rootTypeName'
];

const BOOLEAN_SETTINGS: readonly BooleanSettingKey[] = [
  'nullableDictionaryValues',
  'generateAllDefinitions',
  'generateDocumentation'
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Validates a partial generator settings object, e.g. one loaded from a config file.
 * Unknown keys are rejected so typos do not silently fall back to defaults.
 */
export function validateGeneratorSettings(config: unknown): Partial<CSharpGeneratorSettings> {
  if (!isRecord(config)) {
    throw new ValidationError('Generator settings must be an object');
  }

  const knownKeys = new Set<string>([...STRING_SETTINGS, ...BOOLEAN_SETTINGS]);
  for (const key of Object.keys(config)) {
    if (!knownKeys.has(key)) {
      throw new ValidationError(`Unknown generator setting: ${key}`, key);
    }
  }

  const result: Partial<CSharpGeneratorSettings> = {};

  for (const key of STRING_SETTINGS) {
    const value = config[key];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== 'string' || value.trim() === '') {
      throw new ValidationError(`${key} must be a non-empty string`, key);
    }
    result[key] = value;
  }

  for (const key of BOOLEAN_SETTINGS) {
    const value = config[key];
    if (value === undefined) {
      continue;
    }
    if (typeof value !== 'boolean') {
      throw new ValidationError(`${key} must be a boolean`, key);
    }
    result[key] = value;
  }

  return result;
}

/**
 * Validates the shape of a JSON Schema document's root
 */
export function validateJSONSchema(schema: unknown): JSONSchema {
  if (!isSchemaObject(schema)) {
    throw new ValidationError('JSON Schema must be an object');
  }

  // Basic validation - JSON Schema is quite flexible, so we only validate the most common fields
  const type: unknown = schema.type;
  if (type !== undefined && typeof type !== 'string' && !isStringArray(type)) {
    throw new ValidationError('JSON Schema type must be string or string array', 'type');
  }

  const properties: unknown = schema.properties;
  if (properties !== undefined && !isRecord(properties)) {
    throw new ValidationError('JSON Schema properties must be an object', 'properties');
  }

  const required: unknown = schema.required;
  if (required !== undefined && !isStringArray(required)) {
    throw new ValidationError('JSON Schema required must be an array of strings', 'required');
  }

  const enumeration: unknown = schema.enum;
  if (enumeration !== undefined && !Array.isArray(enumeration)) {
    throw new ValidationError('JSON Schema enum must be an array', 'enum');
  }

  const ref: unknown = schema.$ref;
  if (ref !== undefined && typeof ref !== 'string') {
    throw new ValidationError('JSON Schema $ref must be a string', '$ref');
  }

  for (const keyword of ['definitions', '$defs'] as const) {
    const definitions: unknown = schema[keyword];
    if (definitions !== undefined && !isRecord(definitions)) {
      throw new ValidationError(`JSON Schema ${keyword} must be an object`, keyword);
    }
  }

  return schema;
}
