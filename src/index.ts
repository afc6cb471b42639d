/**
 * schema-typegen - named type generation from JSON Schema
 */

export * from './types/index.js';
export * from './schema/index.js';
export * from './generator/index.js';
export { validateGeneratorSettings, validateJSONSchema } from './utils/validation.js';
export { createConsoleLogger, silentLogger } from './utils/logger.js';
export { runCli, USAGE, type CliIO } from './cli/index.js';
