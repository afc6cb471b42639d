export { JsonSchemaDocument, JsonSchemaNode, isSchemaObject, type SchemaEntry } from './json-schema.js';
export { JsonFormatStrings, JsonObjectType, hasFlag, parseObjectType } from './json-object-type.js';
