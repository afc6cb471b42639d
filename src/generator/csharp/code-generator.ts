/**
 * CSharpCodeGenerator - Drives one complete generation run
 *
 * Each call builds a fresh resolver, so runs never share reserved names.
 */

import type { CSharpGeneratorSettings, JSONSchema, Logger } from '../../types/index.js';
import { CodegenError, GenerationError } from '../../types/errors.js';
import { JsonSchemaDocument } from '../../schema/json-schema.js';
import type { TemplateFactory } from '../template-factory.js';
import type { TypeResolverOptions } from '../type-resolver-base.js';
import { silentLogger } from '../../utils/logger.js';
import { createCSharpGeneratorSettings } from './settings.js';
import { CSharpTypeResolver } from './type-resolver.js';
import { CSHARP_PACKAGE, INHERITANCE_CONVERTER_NAME, createCSharpTemplateFactory } from './templates.js';
import type { FileTemplateModel, InheritanceConverterTemplateModel } from './models.js';

export const TOOL_NAME = 'schema-typegen';

export class CSharpCodeGenerator {
  readonly settings: CSharpGeneratorSettings;
  readonly document: JsonSchemaDocument;
  private readonly templateFactory: TemplateFactory;
  private readonly logger: Logger;

  constructor(
    schema: JSONSchema | JsonSchemaDocument,
    settings: Partial<CSharpGeneratorSettings> = {},
    private readonly options: TypeResolverOptions = {}
  ) {
    this.document = schema instanceof JsonSchemaDocument ? schema : new JsonSchemaDocument(schema);
    this.settings = createCSharpGeneratorSettings(settings);
    this.templateFactory = options.templateFactory ?? createCSharpTemplateFactory();
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Generates the declarations of every type reachable from the root schema
   */
  generateTypes(): string {
    try {
      const resolver = new CSharpTypeResolver(this.settings, {
        ...this.options,
        templateFactory: this.templateFactory,
        logger: this.logger,
      });

      const definitions = this.document.definitions;
      resolver.registerSchemaDefinitions(definitions);
      this.logger('Registered schema definitions', { count: definitions.length });

      const root = this.document.root;
      resolver.resolve(root, false, this.settings.rootTypeName ?? root.title);

      if (this.settings.generateAllDefinitions) {
        for (const [key, schema] of definitions) {
          resolver.resolve(schema, false, key);
        }
      }

      const types = resolver.generateTypes();
      this.logger('Generated types', { count: types.length });

      let code = types.map(type => type.code).join('\n\n');
      if (code.includes(INHERITANCE_CONVERTER_NAME)) {
        const model: InheritanceConverterTemplateModel = { kind: 'inheritance-converter' };
        code += `\n\n${this.templateFactory.render(CSHARP_PACKAGE, INHERITANCE_CONVERTER_NAME, model)}`;
      }
      return code;
    } catch (error) {
      if (error instanceof CodegenError) {
        throw error;
      }
      throw new GenerationError(
        `Type generation failed: ${error instanceof Error ? error.message : String(error)}`,
        undefined,
        undefined,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Generates a complete source file: header, namespace and all types
   */
  generateFile(): string {
    const model: FileTemplateModel = {
      kind: 'file',
      namespace: this.settings.namespace,
      toolName: TOOL_NAME,
      types: this.generateTypes(),
    };
    return this.templateFactory.render(CSHARP_PACKAGE, 'File', model);
  }
}
