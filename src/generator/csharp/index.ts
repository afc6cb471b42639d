export { CSharpCodeGenerator, TOOL_NAME } from './code-generator.js';
export { CSharpTypeResolver } from './type-resolver.js';
export { CSharpTypeGenerator } from './type-generator.js';
export { DEFAULT_CSHARP_SETTINGS, createCSharpGeneratorSettings } from './settings.js';
export {
  CSHARP_PACKAGE,
  INHERITANCE_CONVERTER_NAME,
  ClassTemplate,
  EnumTemplate,
  FileTemplate,
  InheritanceConverterTemplate,
  createCSharpTemplateFactory,
} from './templates.js';
export type {
  ClassTemplateModel,
  EnumMemberModel,
  EnumTemplateModel,
  FileTemplateModel,
  InheritanceConverterTemplateModel,
  PropertyModel,
} from './models.js';
