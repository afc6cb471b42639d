/**
 * CSharpTypeResolver - Maps schema nodes to C# type expressions
 */

import type { CSharpGeneratorSettings } from '../../types/index.js';
import type { JsonSchemaNode } from '../../schema/json-schema.js';
import { JsonFormatStrings, JsonObjectType, hasFlag } from '../../schema/json-object-type.js';
import { TypeResolverBase, type TypeResolverOptions } from '../type-resolver-base.js';
import { CSharpTypeGenerator } from './type-generator.js';
import { createCSharpTemplateFactory } from './templates.js';

export class CSharpTypeResolver extends TypeResolverBase<CSharpTypeGenerator> {
  /** Array and dictionary nodes whose inline expression is being built */
  private readonly inlineSchemas = new Set<JsonSchemaNode>();

  constructor(readonly settings: CSharpGeneratorSettings, options: TypeResolverOptions = {}) {
    super(options.templateFactory ?? createCSharpTemplateFactory(), options);
  }

  resolve(schema: JsonSchemaNode, isNullable: boolean, typeNameHint?: string): string {
    const actualSchema = schema.actualSchema;

    if (actualSchema.isAnyType) {
      return 'object';
    }

    let type = actualSchema.type;
    if (type === JsonObjectType.None && actualSchema.isEnumeration) {
      type = actualSchema.enumeration.every(value => Number.isInteger(value))
        ? JsonObjectType.Integer
        : JsonObjectType.String;
    }

    if (hasFlag(type, JsonObjectType.Array)) {
      return this.resolveInline(actualSchema, () => this.resolveArray(actualSchema));
    }

    if (hasFlag(type, JsonObjectType.Number)) {
      return this.resolveNumber(actualSchema, isNullable);
    }

    if (hasFlag(type, JsonObjectType.Integer)) {
      return this.resolveInteger(actualSchema, isNullable, typeNameHint);
    }

    if (hasFlag(type, JsonObjectType.Boolean)) {
      return isNullable ? 'bool?' : 'bool';
    }

    if (hasFlag(type, JsonObjectType.String)) {
      return this.resolveString(actualSchema, isNullable, typeNameHint);
    }

    if (hasFlag(type, JsonObjectType.File)) {
      return 'byte[]';
    }

    if (actualSchema.isDictionary) {
      return this.resolveInline(actualSchema, () => {
        const valueType = this.resolveDictionaryValueType(actualSchema, 'object', this.settings.nullableDictionaryValues);
        return `${this.settings.dictionaryType}<string, ${valueType}>`;
      });
    }

    return this.addGenerator(actualSchema, typeNameHint);
  }

  /**
   * Integer enumerations always rebind their name to a fresh generator: an
   * earlier registration may have been made before the literals were known.
   */
  protected addGenerator(schema: JsonSchemaNode, typeNameHint?: string): string {
    if (schema.isEnumeration && schema.type === JsonObjectType.Integer) {
      const typeName = this.getOrGenerateTypeName(schema, typeNameHint);
      this.addOrReplaceTypeGenerator(typeName, this.createTypeGenerator(schema));
    }

    return super.addGenerator(schema, typeNameHint);
  }

  protected createTypeGenerator(schema: JsonSchemaNode): CSharpTypeGenerator {
    return new CSharpTypeGenerator(schema, this.settings, this);
  }

  /**
   * Arrays and dictionaries are never named, so one that contains itself
   * would expand forever; the repeated occurrence becomes `object`.
   */
  private resolveInline(schema: JsonSchemaNode, resolveType: () => string): string {
    if (this.inlineSchemas.has(schema)) {
      return 'object';
    }

    this.inlineSchemas.add(schema);
    try {
      return resolveType();
    } finally {
      this.inlineSchemas.delete(schema);
    }
  }

  private resolveString(schema: JsonSchemaNode, isNullable: boolean, typeNameHint?: string): string {
    switch (schema.format) {
      case JsonFormatStrings.Date:
        return this.resolveConfiguredType(this.settings.dateType, isNullable);
      case JsonFormatStrings.DateTime:
        return this.resolveConfiguredType(this.settings.dateTimeType, isNullable);
      case JsonFormatStrings.Time:
        return this.resolveConfiguredType(this.settings.timeType, isNullable);
      case JsonFormatStrings.Duration:
      case JsonFormatStrings.TimeSpan:
        return this.resolveConfiguredType(this.settings.timeSpanType, isNullable);
      case JsonFormatStrings.Guid:
      case JsonFormatStrings.Uuid:
        return isNullable ? 'System.Guid?' : 'System.Guid';
      case JsonFormatStrings.Base64:
      case JsonFormatStrings.Byte:
        return 'byte[]';
    }

    if (schema.isEnumeration) {
      return this.addGenerator(schema, typeNameHint) + (isNullable ? '?' : '');
    }

    return 'string';
  }

  /**
   * A configured type of "string" is already nullable and gets no marker
   */
  private resolveConfiguredType(typeName: string, isNullable: boolean): string {
    return isNullable && typeName.toLowerCase() !== 'string' ? `${typeName}?` : typeName;
  }

  private resolveInteger(schema: JsonSchemaNode, isNullable: boolean, typeNameHint?: string): string {
    if (schema.isEnumeration) {
      return this.addGenerator(schema, typeNameHint);
    }

    if (schema.format === JsonFormatStrings.Byte) {
      return isNullable ? 'byte?' : 'byte';
    }

    if (schema.format === JsonFormatStrings.Long || schema.format === JsonFormatStrings.LongLegacy) {
      return isNullable ? 'long?' : 'long';
    }

    return isNullable ? 'int?' : 'int';
  }

  private resolveNumber(schema: JsonSchemaNode, isNullable: boolean): string {
    if (schema.format === JsonFormatStrings.Decimal) {
      return isNullable ? 'decimal?' : 'decimal';
    }

    return isNullable ? 'double?' : 'double';
  }

  private resolveArray(schema: JsonSchemaNode): string {
    const item = schema.item;
    if (item) {
      return `${this.settings.arrayType}<${this.resolve(item, false)}>`;
    }

    const items = schema.items;
    if (items.length > 0) {
      return `System.Tuple<${items.map(tupleItem => this.resolve(tupleItem, false)).join(', ')}>`;
    }

    return `${this.settings.arrayType}<object>`;
  }
}
