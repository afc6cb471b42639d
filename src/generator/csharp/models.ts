/**
 * Rendering models passed from type generators to the C# templates
 */

export interface PropertyModel {
  /** JSON property name */
  name: string;
  /** C# property identifier */
  propertyName: string;
  type: string;
  isRequired: boolean;
  isNullable: boolean;
  description?: string;
}

export interface ClassTemplateModel {
  kind: 'class';
  className: string;
  baseClassName?: string;
  /** Discriminator property; its presence adds the inheritance converter attribute */
  discriminator?: string;
  description?: string;
  properties: PropertyModel[];
  generateDocumentation: boolean;
}

export interface EnumMemberModel {
  name: string;
  value: number;
  /** Wire value of a string-backed member */
  serializedValue?: string;
}

export interface EnumTemplateModel {
  kind: 'enum';
  name: string;
  description?: string;
  isStringEnum: boolean;
  members: EnumMemberModel[];
  generateDocumentation: boolean;
}

export interface FileTemplateModel {
  kind: 'file';
  namespace: string;
  toolName: string;
  types: string;
}

export interface InheritanceConverterTemplateModel {
  kind: 'inheritance-converter';
}

function hasKind(value: unknown, kind: string): boolean {
  return typeof value === 'object' && value !== null && 'kind' in value && value.kind === kind;
}

export function isClassTemplateModel(value: unknown): value is ClassTemplateModel {
  return hasKind(value, 'class');
}

export function isEnumTemplateModel(value: unknown): value is EnumTemplateModel {
  return hasKind(value, 'enum');
}

export function isFileTemplateModel(value: unknown): value is FileTemplateModel {
  return hasKind(value, 'file');
}

export function isInheritanceConverterTemplateModel(value: unknown): value is InheritanceConverterTemplateModel {
  return hasKind(value, 'inheritance-converter');
}
