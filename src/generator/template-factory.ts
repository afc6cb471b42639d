/**
 * TemplateFactory - Explicit registry of templates keyed by (package, template name)
 */

import { TemplateError } from '../types/errors.js';

/**
 * A template bound to its model, ready to render
 */
export interface Template {
  render(): string;
}

export type TemplateFactoryFunction = (model: unknown) => Template;

/**
 * Looks templates up by exact key. A miss is fatal; there is no fallback template.
 */
export class TemplateFactory {
  private readonly factories = new Map<string, TemplateFactoryFunction>();

  /**
   * Registers a factory, replacing any existing one for the same key
   */
  register(packageName: string, templateName: string, factory: TemplateFactoryFunction): this {
    this.factories.set(this.key(packageName, templateName), factory);
    return this;
  }

  has(packageName: string, templateName: string): boolean {
    return this.factories.has(this.key(packageName, templateName));
  }

  /**
   * Creates a template for the given package, template name and model
   */
  createTemplate(packageName: string, templateName: string, model: unknown): Template {
    const factory = this.factories.get(this.key(packageName, templateName));
    if (!factory) {
      throw new TemplateError(
        `Could not load template '${templateName}' for package '${packageName}'`,
        packageName,
        templateName
      );
    }
    return factory(model);
  }

  render(packageName: string, templateName: string, model: unknown): string {
    return this.createTemplate(packageName, templateName, model).render();
  }

  private key(packageName: string, templateName: string): string {
    return `${packageName}/${templateName}`;
  }
}

/**
 * Narrows a template model or fails the same way a missing template does
 */
export function expectModel<TModel>(
  model: unknown,
  guard: (value: unknown) => value is TModel,
  packageName: string,
  templateName: string
): TModel {
  if (!guard(model)) {
    throw new TemplateError(
      `Template '${templateName}' for package '${packageName}' received an incompatible model`,
      packageName,
      templateName
    );
  }
  return model;
}
