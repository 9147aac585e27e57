/**
 * Types for entity resolution
 */

import type { Group, Jobcode, User } from '../qbtime/types.js';

export type EntityType = 'jobcode' | 'user' | 'group';

export interface ResolvedEntity {
  type: EntityType;
  id: number;
  name: string;
  confidence: number;  // 0-1 score
  match_type: 'exact' | 'normalized' | 'fuzzy' | 'partial';
  path?: string;        // jobcodes: "Client › Project"
  depth?: number;       // jobcodes: 0 for top level
  parent_id?: number;   // jobcodes: the parent jobcode
  parent_name?: string;
}

export interface EntityResolutionParams {
  query: string;
  types?: EntityType[];    // Filter to specific entity types
  min_confidence?: number; // Minimum confidence score (default: 0.5)
  limit?: number;          // Max results per type (default: 5)
  active_only?: boolean;   // Skip inactive records (default: true)
}

export interface EntityResolutionResponse {
  query: string;
  results: ResolvedEntity[];
  total_matches: number;
  search_types: EntityType[];
}

/**
 * Records the resolver searches, fetched fresh for each request
 */
export interface EntityCatalog {
  jobcodes: readonly Jobcode[];
  users: readonly User[];
  groups: readonly Group[];
}
