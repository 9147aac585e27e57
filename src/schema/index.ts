/**
 * Schema Module
 *
 * Schema definitions and documentation for QuickBooks Time records and the
 * engine's report shapes.
 */

export {
  getSchema,
  ENTITIES,
  ENUMS,
  SCHEMA_CATEGORIES,
} from './definitions.js';

export type {
  FieldDefinition,
  EntityDefinition,
  EnumDefinition,
  SchemaCategory,
} from './definitions.js';
