/**
 * Schema Definitions
 *
 * Structured documentation of the QuickBooks Time records and the values
 * this server's tools accept and return, for the get_schema tool. The
 * catalog itself lives in catalog.json.
 */

import catalog from './catalog.json';

export interface FieldDefinition {
  name: string;
  type: string;
  description: string;
  required?: boolean;
  enum_values?: string[];
}

export interface EntityDefinition {
  name: string;
  description: string;
  fields: FieldDefinition[];
}

export interface EnumDefinition {
  name: string;
  description: string;
  values: { value: string; description: string }[];
}

export interface SchemaCategory {
  name: string;
  description: string;
  entities?: EntityDefinition[];
  enums?: EnumDefinition[];
}

interface CatalogFile {
  enums: EnumDefinition[];
  entities: EntityDefinition[];
  categories: { name: string; description: string; entities?: string[]; enums?: string[] }[];
}

const CATALOG: CatalogFile = catalog;

export const ENUMS: EnumDefinition[] = CATALOG.enums;

export const ENTITIES: EntityDefinition[] = CATALOG.entities;

export const SCHEMA_CATEGORIES: SchemaCategory[] = CATALOG.categories.map((category) => ({
  name: category.name,
  description: category.description,
  ...(category.entities ? { entities: ENTITIES.filter((e) => category.entities?.includes(e.name)) } : {}),
  ...(category.enums ? { enums: ENUMS.filter((e) => category.enums?.includes(e.name)) } : {}),
}));

function byName<T extends { name: string }>(items: readonly T[], name: string): T | undefined {
  return items.find((item) => item.name.toLowerCase() === name.toLowerCase());
}

/**
 * Get schema information
 */
export function getSchema(params: {
  category?: string;
  entity?: string;
  enum?: string;
}): {
  categories?: SchemaCategory[];
  entity?: EntityDefinition;
  enum?: EnumDefinition;
  available_categories?: string[];
  available_entities?: string[];
  available_enums?: string[];
} {
  // If specific entity requested
  if (params.entity) {
    const entity = byName(ENTITIES, params.entity);
    if (entity) {
      return { entity };
    }
    return {
      available_entities: ENTITIES.map(e => e.name),
    };
  }

  // If specific enum requested
  if (params.enum) {
    const enumDef = byName(ENUMS, params.enum);
    if (enumDef) {
      return { enum: enumDef };
    }
    return {
      available_enums: ENUMS.map(e => e.name),
    };
  }

  // If specific category requested
  if (params.category) {
    const category = byName(SCHEMA_CATEGORIES, params.category);
    if (category) {
      return { categories: [category] };
    }
    return {
      available_categories: SCHEMA_CATEGORIES.map(c => c.name),
    };
  }

  // Return full schema overview
  return {
    categories: SCHEMA_CATEGORIES,
    available_entities: ENTITIES.map(e => e.name),
    available_enums: ENUMS.map(e => e.name),
  };
}
