/**
 * TypeResolverBase - Type name reservation and generator registry for one run
 *
 * A name is reserved for a schema before its generator resolves any member,
 * so a self-referencing schema resolves to the reserved name instead of
 * recursing. Registry records are keyed by name and never move: replacing a
 * generator rewrites the record in place, so names already handed out stay
 * valid and output order stays fixed.
 */

import type { Logger, TypeGeneratorResult } from '../types/index.js';
import { CodegenError, GenerationError } from '../types/errors.js';
import type { JsonSchemaNode, SchemaEntry } from '../schema/json-schema.js';
import { JsonObjectType, hasFlag } from '../schema/json-object-type.js';
import { DefaultTypeNameGenerator, type TypeNameGenerator } from './type-name-generator.js';
import type { TemplateFactory } from './template-factory.js';
import { silentLogger } from '../utils/logger.js';

/**
 * Produces the source of one named type
 */
export interface TypeGenerator {
  readonly schema: JsonSchemaNode;
  generateType(typeName: string): TypeGeneratorResult;
}

/**
 * Options shared by all resolvers
 */
export interface TypeResolverOptions {
  /** Template registry used to render generated types */
  templateFactory?: TemplateFactory;
  /** Name allocation strategy */
  typeNameGenerator?: TypeNameGenerator;
  /** Receives reservation, replacement and render events */
  logger?: Logger;
}

interface GeneratorRecord<TGenerator> {
  readonly name: string;
  generator: TGenerator;
}

interface RenderedRecord<TGenerator> {
  generator: TGenerator;
  result: TypeGeneratorResult;
}

export abstract class TypeResolverBase<TGenerator extends TypeGenerator> {
  protected readonly logger: Logger;
  private readonly typeNameGenerator: TypeNameGenerator;
  private readonly records = new Map<string, GeneratorRecord<TGenerator>>();
  private readonly typeNames = new Map<JsonSchemaNode, string>();
  private readonly reservedNames = new Set<string>();

  constructor(readonly templateFactory: TemplateFactory, options: TypeResolverOptions = {}) {
    this.typeNameGenerator = options.typeNameGenerator ?? new DefaultTypeNameGenerator();
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Resolves a schema to a type expression, generating a named type if needed
   */
  abstract resolve(schema: JsonSchemaNode, isNullable: boolean, typeNameHint?: string): string;

  protected abstract createTypeGenerator(schema: JsonSchemaNode): TGenerator;

  /**
   * Returns the name reserved for the dereferenced schema, reserving one on first sight.
   * Later hints for an already named schema are ignored.
   */
  getOrGenerateTypeName(schema: JsonSchemaNode, typeNameHint?: string): string {
    const actualSchema = schema.actualSchema;
    const existing = this.typeNames.get(actualSchema);
    if (existing !== undefined) {
      return existing;
    }

    const typeName = this.typeNameGenerator.generate(actualSchema, typeNameHint, this.reservedNames);
    this.typeNames.set(actualSchema, typeName);
    this.reservedNames.add(typeName);
    this.logger('Reserved type name', { typeName, schemaPath: actualSchema.path });
    return typeName;
  }

  /**
   * Binds a generator to a name. An existing binding is replaced in place.
   */
  addOrReplaceTypeGenerator(typeName: string, generator: TGenerator): void {
    const record = this.records.get(typeName);
    if (record) {
      record.generator = generator;
      this.logger('Replaced type generator', { typeName });
      return;
    }

    this.records.set(typeName, { name: typeName, generator });
    this.reservedNames.add(typeName);
  }

  getTypeGenerator(typeName: string): TGenerator | undefined {
    return this.records.get(typeName)?.generator;
  }

  hasTypeGenerator(typeName: string): boolean {
    return this.records.has(typeName);
  }

  /**
   * Registered generators in insertion order
   */
  typeGenerators(): Array<[string, TGenerator]> {
    return Array.from(this.records.values(), record => [record.name, record.generator]);
  }

  /**
   * Reserves definition keys as names before anything else claims them
   */
  registerSchemaDefinitions(definitions: readonly SchemaEntry[]): void {
    for (const [key, schema] of definitions) {
      const actualSchema = schema.actualSchema;
      if (this.isNamedType(actualSchema)) {
        this.getOrGenerateTypeName(actualSchema, key);
      }
    }
  }

  /**
   * Renders every registered type, including types registered while rendering.
   * A record whose generator was replaced after it rendered is rendered again.
   */
  generateTypes(): TypeGeneratorResult[] {
    const rendered = new Map<string, RenderedRecord<TGenerator>>();

    let pending = this.pendingRecords(rendered);
    while (pending.length > 0) {
      for (const record of pending) {
        const generator = record.generator;
        const result = this.renderType(record.name, generator);
        rendered.set(record.name, { generator, result });
        this.logger('Rendered type', { typeName: record.name });
      }
      pending = this.pendingRecords(rendered);
    }

    const results: TypeGeneratorResult[] = [];
    for (const record of this.records.values()) {
      const entry = rendered.get(record.name);
      if (entry) {
        results.push(entry.result);
      }
    }
    return results;
  }

  /**
   * Registers a generator for the schema unless its name is already bound
   */
  protected addGenerator(schema: JsonSchemaNode, typeNameHint?: string): string {
    const typeName = this.getOrGenerateTypeName(schema, typeNameHint);
    if (!this.hasTypeGenerator(typeName)) {
      this.addOrReplaceTypeGenerator(typeName, this.createTypeGenerator(schema.actualSchema));
    }
    return typeName;
  }

  /**
   * Resolves the value type of a dictionary schema
   */
  protected resolveDictionaryValueType(schema: JsonSchemaNode, fallbackType: string, isNullable: boolean): string {
    const valueSchema = schema.additionalPropertiesSchema;
    if (valueSchema) {
      return this.resolve(valueSchema, isNullable);
    }

    if (!schema.allowAdditionalProperties && schema.patternProperties.length > 0) {
      const valueTypes = new Set(schema.patternProperties.map(([, patternSchema]) => this.resolve(patternSchema, isNullable)));
      if (valueTypes.size === 1) {
        const [valueType] = valueTypes;
        return valueType;
      }
    }

    return fallbackType;
  }

  /**
   * Whether a dereferenced schema is emitted as a declared type
   */
  protected isNamedType(schema: JsonSchemaNode): boolean {
    if (schema.isEnumeration) {
      return true;
    }
    const type = schema.type;
    return (
      !schema.isAnyType &&
      !schema.isDictionary &&
      (type === JsonObjectType.None || type === JsonObjectType.Null || hasFlag(type, JsonObjectType.Object))
    );
  }

  private renderType(typeName: string, generator: TGenerator): TypeGeneratorResult {
    try {
      return generator.generateType(typeName);
    } catch (error) {
      if (error instanceof CodegenError) {
        throw error;
      }
      throw new GenerationError(
        `Could not render type '${typeName}': ${error instanceof Error ? error.message : String(error)}`,
        typeName,
        undefined,
        error instanceof Error ? error : undefined
      );
    }
  }

  private pendingRecords(rendered: Map<string, RenderedRecord<TGenerator>>): GeneratorRecord<TGenerator>[] {
    return Array.from(this.records.values()).filter(
      record => rendered.get(record.name)?.generator !== record.generator
    );
  }
}
