/**
 * Generator module - type resolution, registry and source generation from JSON Schema
 */

export {
  TypeResolverBase,
  type TypeGenerator,
  type TypeResolverOptions
} from './type-resolver-base.js';
export {
  DefaultTypeNameGenerator,
  resolveNameConflict,
  toUpperCamelCase,
  type TypeNameGenerator,
  type TypeNameGeneratorOptions
} from './type-name-generator.js';
export {
  TemplateFactory,
  expectModel,
  type Template,
  type TemplateFactoryFunction
} from './template-factory.js';
export {
  TemplateBuilder,
  type TemplateBuilderOptions
} from './template-builder.js';
export * from './csharp/index.js';
