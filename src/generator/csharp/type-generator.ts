/**
 * CSharpTypeGenerator - Builds the class or enum model for one named type
 *
 * Members are resolved when the type is rendered, after the enclosing run
 * has reserved this type's name, through the same resolver instance.
 */

import type { CSharpGeneratorSettings, TypeGeneratorResult } from '../../types/index.js';
import type { JsonSchemaNode } from '../../schema/json-schema.js';
import { JsonObjectType, hasFlag } from '../../schema/json-object-type.js';
import type { TypeGenerator } from '../type-resolver-base.js';
import { resolveNameConflict, toUpperCamelCase } from '../type-name-generator.js';
import type { CSharpTypeResolver } from './type-resolver.js';
import type { ClassTemplateModel, EnumMemberModel, EnumTemplateModel, PropertyModel } from './models.js';
import { CSHARP_PACKAGE } from './templates.js';

export class CSharpTypeGenerator implements TypeGenerator {
  constructor(
    readonly schema: JsonSchemaNode,
    private readonly settings: CSharpGeneratorSettings,
    private readonly resolver: CSharpTypeResolver
  ) {}

  generateType(typeName: string): TypeGeneratorResult {
    if (this.schema.isEnumeration) {
      const model = this.createEnumModel(typeName);
      return {
        typeName,
        code: this.resolver.templateFactory.render(CSHARP_PACKAGE, 'Enum', model),
      };
    }

    const model = this.createClassModel(typeName);
    return {
      typeName,
      baseTypeName: model.baseClassName,
      code: this.resolver.templateFactory.render(CSHARP_PACKAGE, 'Class', model),
    };
  }

  createClassModel(className: string): ClassTemplateModel {
    const inheritedSchema = this.schema.inheritedSchema;
    const baseClassName = inheritedSchema ? this.resolver.resolve(inheritedSchema, false) : undefined;

    // Own properties first, then those of allOf members that are not the base type
    const sources = [
      this.schema,
      ...this.schema.allOf.filter(member => member !== inheritedSchema).map(member => member.actualSchema),
    ];

    const properties: PropertyModel[] = [];
    const seenProperties = new Set<string>();
    const usedNames = new Set<string>();

    for (const source of sources) {
      const required = new Set(source.requiredProperties);

      for (const [name, propertySchema] of source.properties) {
        if (seenProperties.has(name)) {
          continue;
        }
        seenProperties.add(name);

        const propertyName = this.createPropertyName(name, className, usedNames);
        usedNames.add(propertyName);

        const isRequired = required.has(name);
        const isNullable = !isRequired || propertySchema.acceptsNull || propertySchema.actualSchema.acceptsNull;

        properties.push({
          name,
          propertyName,
          type: this.resolver.resolve(propertySchema, isNullable, toUpperCamelCase(name)),
          isRequired,
          isNullable,
          description: propertySchema.description ?? propertySchema.actualSchema.description,
        });
      }
    }

    return {
      kind: 'class',
      className,
      baseClassName,
      discriminator: this.schema.discriminator,
      description: this.schema.description,
      properties,
      generateDocumentation: this.settings.generateDocumentation,
    };
  }

  createEnumModel(name: string): EnumTemplateModel {
    const type = this.schema.type;
    const literals = this.schema.enumeration.filter(value => value !== null);
    const isIntegerEnum =
      hasFlag(type, JsonObjectType.Integer) ||
      (type === JsonObjectType.None && literals.every(value => Number.isInteger(value)));

    const explicitNames = this.schema.enumerationNames;
    const usedNames = new Set<string>();

    const members = literals.map((literal, index): EnumMemberModel => {
      const memberName = resolveNameConflict(
        toUpperCamelCase(explicitNames[index] ?? '') || this.createEnumMemberName(literal, index),
        usedNames
      );
      usedNames.add(memberName);

      if (isIntegerEnum) {
        return { name: memberName, value: typeof literal === 'number' ? literal : index };
      }
      return { name: memberName, value: index, serializedValue: String(literal) };
    });

    return {
      kind: 'enum',
      name,
      description: this.schema.description,
      isStringEnum: !isIntegerEnum,
      members,
      generateDocumentation: this.settings.generateDocumentation,
    };
  }

  private createEnumMemberName(literal: unknown, index: number): string {
    if (typeof literal === 'number') {
      const digits = String(Math.abs(literal)).replace(/[^0-9]/g, '_');
      return literal < 0 ? `_Minus${digits}` : `_${digits}`;
    }
    return toUpperCamelCase(String(literal)) || `Value${index}`;
  }

  private createPropertyName(name: string, className: string, usedNames: ReadonlySet<string>): string {
    let propertyName = toUpperCamelCase(name) || 'Property';

    // A member may not share its enclosing type's name
    if (propertyName === className) {
      propertyName = `_${propertyName}`;
    }

    return resolveNameConflict(propertyName, usedNames);
  }
}
