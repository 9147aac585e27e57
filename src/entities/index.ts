/**
 * Entity Resolution Module
 */

export { EntityResolver } from './entity-resolver.js';
export type {
  EntityCatalog,
  EntityType,
  ResolvedEntity,
  EntityResolutionParams,
  EntityResolutionResponse,
} from './types.js';
