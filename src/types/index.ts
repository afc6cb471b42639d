/**
 * Core data models and interfaces for schema-typegen
 */

// Re-export error types
export * from './errors.js';

/**
 * Raw JSON Schema document as read from disk.
 * Covers draft-04 through 2020-12 keywords plus the OpenAPI extensions the
 * generator understands.
 */
export interface JSONSchema {
  $ref?: string;
  $schema?: string;
  type?: string | string[];
  format?: string;
  title?: string;
  description?: string;
  properties?: Record<string, JSONSchema>;
  patternProperties?: Record<string, JSONSchema>;
  additionalProperties?: boolean | JSONSchema;
  required?: string[];
  items?: JSONSchema | JSONSchema[];
  prefixItems?: JSONSchema[];
  enum?: unknown[];
  'x-enumNames'?: string[];
  nullable?: boolean;
  allOf?: JSONSchema[];
  anyOf?: JSONSchema[];
  oneOf?: JSONSchema[];
  discriminator?: string | { propertyName: string };
  definitions?: Record<string, JSONSchema>;
  $defs?: Record<string, JSONSchema>;
  components?: { schemas?: Record<string, JSONSchema> };
  default?: unknown;
}

/**
 * Structured log sink. Generation code never writes to the console directly.
 */
export type Logger = (message: string, context?: Record<string, unknown>) => void;

/**
 * Output of a single type generator
 */
export interface TypeGeneratorResult {
  /** Name the type was registered under */
  typeName: string;
  /** Name of the base type, when the type inherits from another */
  baseTypeName?: string;
  /** Rendered source */
  code: string;
}

/**
 * Settings for the C# target
 */
export interface CSharpGeneratorSettings {
  /** Namespace wrapping the generated file */
  namespace: string;
  /** Generic sequence container, e.g. System.Collections.Generic.List */
  arrayType: string;
  /** Generic string-keyed map container */
  dictionaryType: string;
  /** Scalar for format "date" */
  dateType: string;
  /** Scalar for format "date-time" */
  dateTimeType: string;
  /** Scalar for format "time" */
  timeType: string;
  /** Scalar for formats "duration" and "time-span" */
  timeSpanType: string;
  /** Whether dictionary values are resolved as nullable */
  nullableDictionaryValues: boolean;
  /** Whether unreferenced definitions still produce types */
  generateAllDefinitions: boolean;
  /** Name hint for the root schema */
  rootTypeName?: string;
  /** Whether schema descriptions become doc comments */
  generateDocumentation: boolean;
}
