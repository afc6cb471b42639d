/**
 * Error handling types and classes for schema-typegen
 */

/**
 * Categories of errors that can occur during code generation
 */
export enum ErrorCategory {
  SCHEMA = 'schema',
  GENERATION = 'generation',
  TEMPLATE = 'template',
  VALIDATION = 'validation',
  CONFIGURATION = 'configuration'
}

/**
 * Base error class for all schema-typegen errors
 */
export class CodegenError extends Error {
  constructor(
    message: string,
    public readonly category: ErrorCategory,
    public readonly context?: Record<string, unknown>,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CodegenError';

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CodegenError);
    }
  }

  /**
   * Convert error to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      context: this.context,
      stack: this.stack,
      cause: this.cause?.message
    };
  }
}

/**
 * Error related to schema graph traversal, such as an unresolvable $ref
 */
export class SchemaError extends CodegenError {
  constructor(
    message: string,
    public readonly schemaPath?: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, ErrorCategory.SCHEMA, { schemaPath, ...context }, cause);
    this.name = 'SchemaError';
  }
}

/**
 * Error related to a generation run
 */
export class GenerationError extends CodegenError {
  constructor(
    message: string,
    public readonly typeName?: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, ErrorCategory.GENERATION, { typeName, ...context }, cause);
    this.name = 'GenerationError';
  }
}

/**
 * No template is registered for a (package, template) pair.
 * Always fatal for the run that hit it.
 */
export class TemplateError extends CodegenError {
  constructor(
    message: string,
    public readonly packageName: string,
    public readonly templateName: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, ErrorCategory.TEMPLATE, { packageName, templateName, ...context }, cause);
    this.name = 'TemplateError';
  }
}

/**
 * Error related to settings or input shape validation
 */
export class ValidationError extends CodegenError {
  constructor(
    message: string,
    public readonly field?: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, ErrorCategory.VALIDATION, { field, ...context }, cause);
    this.name = 'ValidationError';
  }
}

/**
 * Error related to configuration issues
 */
export class ConfigurationError extends CodegenError {
  constructor(
    message: string,
    public readonly configPath?: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, ErrorCategory.CONFIGURATION, { configPath, ...context }, cause);
    this.name = 'ConfigurationError';
  }
}
