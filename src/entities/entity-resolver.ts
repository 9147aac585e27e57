/**
 * Entity Resolution Service
 *
 * Fuzzy matching of names to QuickBooks Time jobcodes (clients, projects,
 * tasks), users and groups. Works over a catalog the caller has just
 * fetched; nothing is cached between requests.
 */

import { JobcodeTree } from '../compute/jobcode-tree.js';
import { ValidationError } from '../errors.js';
import type {
  EntityCatalog,
  EntityType,
  ResolvedEntity,
  EntityResolutionParams,
  EntityResolutionResponse,
} from './types.js';

// Common company suffix variations to normalize
const COMPANY_SUFFIXES = [
  /\s+(inc\.?|incorporated)$/i,
  /\s+(llc|l\.l\.c\.)$/i,
  /\s+(ltd\.?|limited)$/i,
  /\s+(corp\.?|corporation)$/i,
  /\s+(co\.?|company)$/i,
  /\s+(plc)$/i,
  /\s+(gmbh)$/i,
  /\s+(ag)$/i,
];

const TYPE_LABELS: Record<EntityType, string> = {
  jobcode: 'client, project or jobcode',
  user: 'employee',
  group: 'department',
};

export class EntityResolver {
  private tree: JobcodeTree;

  constructor(private readonly catalog: EntityCatalog) {
    this.tree = new JobcodeTree(catalog.jobcodes);
  }

  /**
   * Normalize text for comparison
   */
  private normalize(text: string): string {
    let normalized = text.toLowerCase().trim();

    for (const suffix of COMPANY_SUFFIXES) {
      normalized = normalized.replace(suffix, '');
    }

    normalized = normalized.replace(/\s+/g, ' ').trim();
    normalized = normalized.replace(/[.,'"]/g, '');

    return normalized;
  }

  /**
   * Calculate Levenshtein distance between two strings
   */
  private levenshteinDistance(a: string, b: string): number {
    let previous = Array.from({ length: a.length + 1 }, (_, j) => j);

    for (let i = 1; i <= b.length; i++) {
      const current = [i];
      for (let j = 1; j <= a.length; j++) {
        if (b.charAt(i - 1) === a.charAt(j - 1)) {
          current[j] = previous[j - 1];
        } else {
          current[j] = Math.min(previous[j - 1] + 1, current[j - 1] + 1, previous[j] + 1);
        }
      }
      previous = current;
    }

    return previous[a.length];
  }

  /**
   * Calculate similarity score (0-1) between two strings
   */
  calculateSimilarity(query: string, target: string): { score: number; matchType: ResolvedEntity['match_type'] } {
    const normalizedQuery = this.normalize(query);
    const normalizedTarget = this.normalize(target);

    if (query.trim().toLowerCase() === target.trim().toLowerCase()) {
      return { score: 1.0, matchType: 'exact' };
    }

    if (normalizedQuery === normalizedTarget) {
      return { score: 0.95, matchType: 'normalized' };
    }

    if (normalizedQuery && normalizedTarget &&
        (normalizedTarget.includes(normalizedQuery) || normalizedQuery.includes(normalizedTarget))) {
      const ratio = Math.min(normalizedQuery.length, normalizedTarget.length) /
                    Math.max(normalizedQuery.length, normalizedTarget.length);
      return { score: 0.7 + (ratio * 0.2), matchType: 'partial' };
    }

    const maxLength = Math.max(normalizedQuery.length, normalizedTarget.length);
    if (maxLength === 0) {
      return { score: 0, matchType: 'fuzzy' };
    }
    const distance = this.levenshteinDistance(normalizedQuery, normalizedTarget);
    return { score: Math.max(0, 1 - (distance / maxLength)), matchType: 'fuzzy' };
  }

  /**
   * Resolve entities matching the query
   */
  resolve(params: EntityResolutionParams): EntityResolutionResponse {
    const {
      query,
      types = ['jobcode', 'user', 'group'],
      min_confidence = 0.5,
      limit = 5,
      active_only = true,
    } = params;

    const results: ResolvedEntity[] = [];

    if (types.includes('jobcode')) {
      for (const jobcode of this.catalog.jobcodes) {
        if (active_only && !jobcode.active) continue;
        const { score: nameScore, matchType } = this.calculateSimilarity(query, jobcode.name);

        // Also try the full path, so "Acme Website" finds Acme › Website
        const path = this.tree.path(jobcode.id);
        const { score: pathScore } = this.calculateSimilarity(query, path.replace(/ › /g, ' '));

        const score = Math.max(nameScore, pathScore);
        if (score >= min_confidence) {
          const parent = jobcode.parent_id === 0 ? undefined : this.tree.get(jobcode.parent_id);
          results.push({
            type: 'jobcode',
            id: jobcode.id,
            name: jobcode.name,
            confidence: score,
            match_type: matchType,
            path,
            depth: this.tree.ancestors(jobcode.id).length - 1,
            ...(parent ? { parent_id: parent.id, parent_name: parent.name } : {}),
          });
        }
      }
    }

    if (types.includes('user')) {
      for (const user of this.catalog.users) {
        if (active_only && !user.active) continue;
        const name = `${user.first_name} ${user.last_name}`.trim() || user.username;
        const { score, matchType } = this.calculateSimilarity(query, name);
        if (score >= min_confidence) {
          results.push({ type: 'user', id: user.id, name, confidence: score, match_type: matchType });
        }
      }
    }

    if (types.includes('group')) {
      for (const group of this.catalog.groups) {
        if (active_only && !group.active) continue;
        const { score, matchType } = this.calculateSimilarity(query, group.name);
        if (score >= min_confidence) {
          results.push({ type: 'group', id: group.id, name: group.name, confidence: score, match_type: matchType });
        }
      }
    }

    // Best first; among equals, shallower jobcodes (clients before their projects)
    results.sort((a, b) => b.confidence - a.confidence || (a.depth ?? 0) - (b.depth ?? 0) || a.id - b.id);

    const limitedResults: ResolvedEntity[] = [];
    const typeCounts: Record<EntityType, number> = { jobcode: 0, user: 0, group: 0 };

    for (const result of results) {
      if (typeCounts[result.type] < limit) {
        limitedResults.push(result);
        typeCounts[result.type]++;
      }
    }

    return {
      query,
      results: limitedResults,
      total_matches: results.length,
      search_types: types,
    };
  }

  /**
   * The single best match of one type, active or not, or a ValidationError
   * naming the miss
   */
  resolveOne(query: string, type: EntityType, minConfidence = 0.6): ResolvedEntity {
    const [best] = this.resolve({
      query,
      types: [type],
      min_confidence: minConfidence,
      limit: 1,
      active_only: false,
    }).results;
    if (!best) {
      throw new ValidationError(`No ${TYPE_LABELS[type]} matching "${query}" was found.`);
    }
    return best;
  }
}
