/**
 * TypeNameGenerator - Allocates unique type names for schema nodes
 */

import type { JsonSchemaNode } from '../schema/json-schema.js';

/**
 * Produces a type name for a schema that is not yet named in the current run
 */
export interface TypeNameGenerator {
  generate(schema: JsonSchemaNode, typeNameHint: string | undefined, reservedNames: ReadonlySet<string>): string;
}

/**
 * Options for the default name allocation strategy
 */
export interface TypeNameGeneratorOptions {
  /** Name used when neither a hint nor the schema provides one */
  anonymousTypeName?: string;
}

/**
 * Converts arbitrary text to an upper camel case identifier.
 * Anything but Unicode letters and digits separates words, and a leading
 * digit gets an underscore prefix.
 */
export function toUpperCamelCase(value: string): string {
  const converted = value
    .split(/[^\p{L}\p{N}]+/u)
    .filter(part => part.length > 0)
    .map(part => part.charAt(0).toUpperCase() + part.slice(1))
    .join('');

  return /^\p{N}/u.test(converted) ? `_${converted}` : converted;
}

/**
 * Returns `baseName`, or `baseName` with the smallest free numeric suffix from 2 upward
 */
export function resolveNameConflict(baseName: string, reservedNames: ReadonlySet<string>): string {
  if (!reservedNames.has(baseName)) {
    return baseName;
  }

  let suffix = 2;
  while (reservedNames.has(`${baseName}${suffix}`)) {
    suffix++;
  }
  return `${baseName}${suffix}`;
}

/**
 * Names a schema from the caller's hint, then its definition key, then its title
 */
export class DefaultTypeNameGenerator implements TypeNameGenerator {
  private readonly anonymousTypeName: string;

  constructor(options: TypeNameGeneratorOptions = {}) {
    this.anonymousTypeName = options.anonymousTypeName ?? 'Anonymous';
  }

  generate(schema: JsonSchemaNode, typeNameHint: string | undefined, reservedNames: ReadonlySet<string>): string {
    const source = typeNameHint || schema.typeNameRaw || schema.title || this.anonymousTypeName;

    // "Namespace.Type" hints keep only the last segment
    const lastSegment = source.split('.').pop() ?? source;
    const baseName = toUpperCamelCase(lastSegment) || this.anonymousTypeName;

    return resolveNameConflict(baseName, reservedNames);
  }
}
