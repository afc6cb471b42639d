/**
 * Read-only object model over a raw JSON Schema document.
 *
 * A document hands out exactly one node per raw schema object, so node
 * identity can key the type registry: two `$ref`s to the same definition
 * dereference to the same node.
 */

import type { JSONSchema } from '../types/index.js';
import { SchemaError } from '../types/errors.js';
import { JsonObjectType, hasFlag, parseObjectType } from './json-object-type.js';

export type SchemaEntry = readonly [name: string, schema: JsonSchemaNode];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Any non-array object is accepted as a schema; unknown keywords are ignored
 */
export function isSchemaObject(value: unknown): value is JSONSchema {
  return isRecord(value);
}

function decodePointerToken(token: string): string {
  return decodeURIComponent(token).replace(/~1/g, '/').replace(/~0/g, '~');
}

function stringValue(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export class JsonSchemaDocument {
  readonly root: JsonSchemaNode;
  private readonly nodes = new WeakMap<JSONSchema, JsonSchemaNode>();
  private readonly definitionEntries: SchemaEntry[] = [];

  constructor(private readonly rawRoot: JSONSchema) {
    this.root = this.nodeFor(rawRoot, '#');

    const sources: Array<[string, Record<string, JSONSchema> | undefined]> = [
      ['#/definitions', rawRoot.definitions],
      ['#/$defs', rawRoot.$defs],
      ['#/components/schemas', rawRoot.components?.schemas],
    ];
    for (const [basePath, definitions] of sources) {
      for (const [key, raw] of Object.entries(definitions ?? {})) {
        if (isSchemaObject(raw)) {
          this.definitionEntries.push([key, this.nodeFor(raw, `${basePath}/${key}`, key)]);
        }
      }
    }
  }

  /**
   * Definitions declared on the root, in declaration order
   */
  get definitions(): readonly SchemaEntry[] {
    return this.definitionEntries;
  }

  /**
   * Returns the node for a raw schema object, creating it on first access
   */
  nodeFor(raw: JSONSchema, path: string, typeNameRaw?: string): JsonSchemaNode {
    const existing = this.nodes.get(raw);
    if (existing) {
      return existing;
    }

    const node = new JsonSchemaNode(this, raw, path, typeNameRaw);
    this.nodes.set(raw, node);
    return node;
  }

  /**
   * Resolves a local JSON pointer reference such as `#/definitions/Pet`
   */
  resolveReference(ref: string, fromPath: string): JsonSchemaNode {
    if (!ref.startsWith('#')) {
      throw new SchemaError(`External reference '${ref}' is not supported`, fromPath, { ref });
    }

    const pointer = ref.slice(1);
    if (pointer === '') {
      return this.root;
    }
    if (!pointer.startsWith('/')) {
      throw new SchemaError(`Reference '${ref}' is not a JSON pointer`, fromPath, { ref });
    }

    let tokens: string[];
    try {
      tokens = pointer.slice(1).split('/').map(decodePointerToken);
    } catch (error) {
      throw new SchemaError(
        `Reference '${ref}' is not a valid JSON pointer`,
        fromPath,
        { ref },
        error instanceof Error ? error : undefined
      );
    }

    let current: unknown = this.rawRoot;
    for (const token of tokens) {
      if (Array.isArray(current)) {
        const index = Number(token);
        current = Number.isInteger(index) ? current[index] : undefined;
      } else if (isRecord(current)) {
        current = current[token];
      } else {
        current = undefined;
      }

      if (current === undefined) {
        throw new SchemaError(`Could not resolve reference '${ref}'`, fromPath, { ref });
      }
    }

    if (!isSchemaObject(current)) {
      throw new SchemaError(`Reference '${ref}' does not point to a schema`, fromPath, { ref });
    }

    return this.nodeFor(current, ref);
  }
}

export class JsonSchemaNode {
  constructor(
    readonly document: JsonSchemaDocument,
    readonly raw: JSONSchema,
    readonly path: string,
    /** Key under which the node is declared in the root definitions */
    readonly typeNameRaw?: string
  ) {}

  get hasReference(): boolean {
    return typeof this.raw.$ref === 'string';
  }

  /**
   * Follows `$ref` indirection to the concrete node
   */
  get actualSchema(): JsonSchemaNode {
    let node: JsonSchemaNode = this;
    const visited = new Set<JsonSchemaNode>();

    while (typeof node.raw.$ref === 'string') {
      if (visited.has(node)) {
        throw new SchemaError(`Reference chain at '${this.path}' never reaches a schema`, this.path);
      }
      visited.add(node);
      node = this.document.resolveReference(node.raw.$ref, node.path);
    }

    return node;
  }

  get type(): JsonObjectType {
    return parseObjectType(this.raw.type);
  }

  get format(): string | undefined {
    return stringValue(this.raw.format);
  }

  get title(): string | undefined {
    return stringValue(this.raw.title);
  }

  get description(): string | undefined {
    return stringValue(this.raw.description);
  }

  /** Whether `null` is an accepted value at this node */
  get acceptsNull(): boolean {
    return hasFlag(this.type, JsonObjectType.Null) || this.raw.nullable === true;
  }

  /** Single item schema (array-of-T) */
  get item(): JsonSchemaNode | undefined {
    const items = this.raw.items;
    return isSchemaObject(items) ? this.child(items, 'items') : undefined;
  }

  /** Ordered item schemas of a fixed tuple */
  get items(): JsonSchemaNode[] {
    return Array.isArray(this.raw.items)
      ? this.list(this.raw.items, 'items')
      : this.list(this.raw.prefixItems, 'prefixItems');
  }

  get properties(): SchemaEntry[] {
    return this.entries(this.raw.properties, 'properties');
  }

  get patternProperties(): SchemaEntry[] {
    return this.entries(this.raw.patternProperties, 'patternProperties');
  }

  get requiredProperties(): readonly string[] {
    const required: unknown = this.raw.required;
    return Array.isArray(required) ? required.filter((name): name is string => typeof name === 'string') : [];
  }

  get allowAdditionalProperties(): boolean {
    return this.raw.additionalProperties !== false;
  }

  get additionalPropertiesSchema(): JsonSchemaNode | undefined {
    const additional = this.raw.additionalProperties;
    return isSchemaObject(additional) ? this.child(additional, 'additionalProperties') : undefined;
  }

  get allOf(): JsonSchemaNode[] {
    return this.list(this.raw.allOf, 'allOf');
  }

  get anyOf(): JsonSchemaNode[] {
    return this.list(this.raw.anyOf, 'anyOf');
  }

  get oneOf(): JsonSchemaNode[] {
    return this.list(this.raw.oneOf, 'oneOf');
  }

  get isEnumeration(): boolean {
    return Array.isArray(this.raw.enum) && this.raw.enum.length > 0;
  }

  get enumeration(): readonly unknown[] {
    return Array.isArray(this.raw.enum) ? this.raw.enum : [];
  }

  get enumerationNames(): readonly string[] {
    const names = this.raw['x-enumNames'];
    return Array.isArray(names) && names.every(name => typeof name === 'string') ? names : [];
  }

  /**
   * Object (or untyped) with nothing constraining its shape
   */
  get isAnyType(): boolean {
    const type = this.type;
    return (
      !this.hasReference &&
      (type === JsonObjectType.None || hasFlag(type, JsonObjectType.Object)) &&
      this.properties.length === 0 &&
      this.patternProperties.length === 0 &&
      this.allOf.length === 0 &&
      this.anyOf.length === 0 &&
      this.oneOf.length === 0 &&
      this.allowAdditionalProperties &&
      this.additionalPropertiesSchema === undefined &&
      !this.isEnumeration
    );
  }

  /**
   * String-keyed map whose values are described by a schema
   */
  get isDictionary(): boolean {
    const type = this.type;
    return (
      !this.hasReference &&
      (type === JsonObjectType.None || hasFlag(type, JsonObjectType.Object)) &&
      this.properties.length === 0 &&
      this.allOf.length === 0 &&
      !this.isEnumeration &&
      (this.additionalPropertiesSchema !== undefined || this.patternProperties.length > 0)
    );
  }

  /**
   * First `allOf` member given as a reference; its type becomes the base type
   */
  get inheritedSchema(): JsonSchemaNode | undefined {
    return this.allOf.find(member => member.hasReference);
  }

  get discriminator(): string | undefined {
    const discriminator = this.raw.discriminator;
    if (typeof discriminator === 'string') {
      return discriminator;
    }
    return isRecord(discriminator) && typeof discriminator.propertyName === 'string'
      ? discriminator.propertyName
      : undefined;
  }

  private child(raw: JSONSchema, segment: string): JsonSchemaNode {
    return this.document.nodeFor(raw, `${this.path}/${segment}`);
  }

  // Keyword values below the root are unchecked; a value of the wrong shape reads as absent
  private list(schemas: unknown, keyword: string): JsonSchemaNode[] {
    if (!Array.isArray(schemas)) {
      return [];
    }
    return schemas
      .filter(isSchemaObject)
      .map((schema, index) => this.child(schema, `${keyword}/${index}`));
  }

  private entries(map: unknown, keyword: string): SchemaEntry[] {
    if (!isRecord(map)) {
      return [];
    }
    return Object.entries(map)
      .filter((entry): entry is [string, JSONSchema] => isSchemaObject(entry[1]))
      .map(([name, schema]) => [name, this.child(schema, `${keyword}/${name}`)] as const);
  }
}
